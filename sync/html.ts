import { JSDOM } from 'jsdom';

let window: JSDOM['window'] | undefined;

function getWindow(): JSDOM['window'] {
  if (!window) {
    window = new JSDOM('<!DOCTYPE html><html><body></body></html>').window;
  }
  return window;
}

/**
 * Parses an HTML fragment into a detached <template>. Its `content` can be
 * edited with the regular DOM API and `innerHTML` serializes it back.
 */
export function parseFragment(html: string): HTMLTemplateElement {
  const template = getWindow().document.createElement('template');
  template.innerHTML = html;
  return template;
}

export function serializeFragment(template: HTMLTemplateElement): string {
  return template.innerHTML;
}

export function unwrap(el: Element): void {
  const parent = el.parentNode;
  if (!parent) return;
  while (el.firstChild) parent.insertBefore(el.firstChild, el);
  el.remove();
}
