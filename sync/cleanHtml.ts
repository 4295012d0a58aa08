import { parseFragment, serializeFragment, unwrap } from './html';

// Only keep the attributes we need, everything else just takes up space.
const KEEP_ATTRS = new Set([
  'style',
  'start', // numbered lists
  'href',
  'target',
  'rel',
  'title',
  'src',
  'alt',
  'height',
  'width',
]);

const KEEP_STYLES = new Set([
  'background',
  'background-color',
  'color',
  'font-style',
  'font-weight',
  'text-decoration',
]);

const REMOVE_SELECTOR = 'colgroup, table caption, script, style';

export function parseStyle(text: string): Map<string, string> {
  const result = new Map<string, string>();
  for (const pair of text.split(';')) {
    const index = pair.indexOf(':');
    if (index === -1) continue;
    const key = pair.slice(0, index).trim().toLowerCase();
    const value = pair.slice(index + 1).trim();
    if (key) result.set(key, value);
  }
  return result;
}

export function formatStyle(values: Map<string, string>): string {
  return Array.from(values, ([key, value]) => `${key}:${value}`).join(';');
}

/**
 * Normalizes ingested HTML so it imports cleanly: drops unused attributes and
 * style properties, flattens lists inside table cells and removes elements
 * that never render in a card. Running it on its own output changes nothing.
 */
export function cleanUpHtml(html: string): string {
  const template = parseFragment(html);
  const root = template.content;

  for (const el of Array.from(root.querySelectorAll('*'))) {
    for (const attr of Array.from(el.attributes)) {
      if (!KEEP_ATTRS.has(attr.name)) el.removeAttribute(attr.name);
    }
  }

  // Table cells can't hold lists, each item becomes a "- " line instead.
  for (const li of Array.from(root.querySelectorAll('td li'))) {
    const document = li.ownerDocument;
    li.insertBefore(document.createTextNode('- '), li.firstChild);
    li.insertBefore(document.createElement('br'), li.firstChild);
    unwrap(li);
  }
  for (const list of Array.from(root.querySelectorAll('td ul, td ol'))) {
    unwrap(list);
  }

  root.querySelectorAll(REMOVE_SELECTOR).forEach(el => el.remove());

  for (const el of Array.from(root.querySelectorAll('[style]'))) {
    const values = parseStyle(el.getAttribute('style') ?? '');
    for (const key of Array.from(values.keys())) {
      if (!KEEP_STYLES.has(key)) values.delete(key);
    }
    const style = formatStyle(values);
    if (style.trim()) {
      el.setAttribute('style', style);
    } else {
      el.removeAttribute('style');
    }
  }

  for (const span of Array.from(root.querySelectorAll('span'))) {
    if (!span.getAttribute('style')) unwrap(span);
  }

  return serializeFragment(template);
}
