import fs from 'fs';
import path from 'path';
import type { EventLog } from './eventLog';
import { parseFragment, serializeFragment } from './html';
import { urlToId } from './ids';
import { contentCardId } from './insertNodes';
import type { SyncNode } from './syncNode';
import { NodeType, type Downloader, type LinkComparator } from './types';
import { canonicalUrl, isLocal, resolveUrl } from './urls';

export const RESOURCE_PREFIX = 'resources/';
export const CARD_PREFIX = 'cards/';

export type FileCopier = (sourcePath: string, destPath: string) => void;

export const copyLocalFile: FileCopier = (sourcePath, destPath) => {
  fs.mkdirSync(path.dirname(destPath), { recursive: true });
  fs.copyFileSync(sourcePath, destPath);
};

/**
 * State shared by every card in one finalize run. `resources` maps a resource
 * id to the local file it was downloaded or copied to.
 */
export interface NormalizeSession {
  nodes: readonly SyncNode[];
  resources: Map<string, string>;
  resourceDir: string;
  log: EventLog;
  downloader?: Downloader;
  linkComparator?: LinkComparator;
  copyFile?: FileCopier;
}

const isSkipped = (value: string) => !value || value.startsWith('data:') || value.startsWith('mailto:');

/**
 * Rewrites src and href values in a card's HTML so they point at exported
 * resources, other cards, or at least an absolute address.
 * @param node - Card whose content is rewritten in place
 * @param session - State shared by every card of the finalize run
 * @returns True when the stored content changed
 */
export function normalizeCardContent(node: SyncNode, session: NormalizeSession): boolean {
  if (!node.content || node.type !== NodeType.CARD) {
    return false;
  }

  const template = parseFragment(node.content);
  const root = template.content;
  // Two references with the same literal value always end up identical.
  const urlMap = new Map<string, string>();
  let updated = false;

  const resolveResource = (value: string): string => {
    const absoluteUrl = resolveUrl(node.url, value);
    const resourceId = urlToId(absoluteUrl);
    const relativePath = `${RESOURCE_PREFIX}${resourceId}`;

    if (session.resources.has(resourceId)) {
      return relativePath;
    }

    const destPath = path.join(session.resourceDir, resourceId);

    if (session.downloader) {
      session.log.record('checking if we should download attachment', { url: absoluteUrl, file: destPath });
      let downloaded = false;
      try {
        downloaded = session.downloader(absoluteUrl, destPath);
      } catch (error) {
        session.log.record('download failed', {
          url: absoluteUrl,
          file: destPath,
          error: error instanceof Error ? error.message : String(error),
        });
      }

      if (downloaded) {
        session.log.record('download successful', { url: absoluteUrl, file: destPath });
        session.resources.set(resourceId, destPath);
        return relativePath;
      }
      session.log.record('did not download', { url: absoluteUrl, file: destPath });
      return absoluteUrl;
    }

    if (isLocal(node.url) && isLocal(value)) {
      // e.g. node.url /export/page.html + images/a.gif -> /export/images/a.gif
      const copyFile = session.copyFile ?? copyLocalFile;
      try {
        copyFile(absoluteUrl, destPath);
      } catch (error) {
        session.log.record('could not copy local resource', {
          file: absoluteUrl,
          resource: destPath,
          error: error instanceof Error ? error.message : String(error),
        });
        return absoluteUrl;
      }
      session.log.record('copied local resource', { file: absoluteUrl, resource: destPath });
      session.resources.set(resourceId, destPath);
      return relativePath;
    }
    if (isLocal(value)) {
      return absoluteUrl;
    }
    if (value.startsWith('//')) {
      return `https:${value}`;
    }
    return value;
  };

  const checkElement = (el: Element, attr: 'src' | 'href'): boolean => {
    const value = el.getAttribute(attr) ?? '';
    if (isSkipped(value)) {
      return false;
    }

    const previous = urlMap.get(value);
    if (previous !== undefined) {
      el.setAttribute(attr, previous);
      return true;
    }

    const replacement = resolveResource(value);
    if (replacement === value) {
      return false;
    }
    urlMap.set(value, replacement);
    el.setAttribute(attr, replacement);
    return true;
  };

  const sameAddress = (nodeUrl: string, absoluteUrl: string) =>
    canonicalUrl(nodeUrl) === canonicalUrl(absoluteUrl) ||
    (session.linkComparator?.(nodeUrl, absoluteUrl) ?? false);

  // First page in registry order whose address matches. A container points
  // at its content card when it has one.
  const findLinkedCard = (absoluteUrl: string): string | undefined => {
    const page = session.nodes.find(other => other !== node && !!other.url && sameAddress(other.url, absoluteUrl));
    if (!page || page.type === NodeType.CARD) {
      return page?.id;
    }
    const contentCard = session.nodes.find(other => other.id === contentCardId(page.id) && other.type === NodeType.CARD);
    return contentCard?.id ?? page.id;
  };

  // images and iframes
  for (const el of Array.from(root.querySelectorAll('[src]'))) {
    if (checkElement(el, 'src')) updated = true;
  }

  for (const link of Array.from(root.querySelectorAll('a[href]'))) {
    const href = link.getAttribute('href') ?? '';
    if (isSkipped(href)) continue;

    const cardId = findLinkedCard(resolveUrl(node.url, href));
    if (cardId) {
      link.setAttribute('href', `${CARD_PREFIX}${cardId}`);
      session.log.record('link converted to card reference', { node: node.id, href, card: cardId });
      updated = true;
    } else if (checkElement(link, 'href')) {
      updated = true;
    }
  }

  if (updated) {
    node.content = serializeFragment(template);
  }
  return updated;
}
