import crypto from 'crypto';

/**
 * Hashes an address into a stable id. With `includeExtension`, a short file
 * extension (fewer than five characters, taken after the last "." of the
 * address without its query string) is kept so resources stay recognizable.
 * @param url - Address to hash
 * @param includeExtension - Keep a short file extension (default: true)
 * @returns md5 hex digest, with the extension when kept
 */
export function urlToId(url: string, includeExtension: boolean = true): string {
  const id = crypto.createHash('md5').update(url, 'utf-8').digest('hex');

  if (includeExtension) {
    const withoutQuery = url.split('?')[0].split('#')[0];
    const dot = withoutQuery.lastIndexOf('.');
    if (dot !== -1) {
      const extension = withoutQuery.slice(dot + 1);
      if (extension.length > 0 && extension.length < 5 && !extension.includes('/')) {
        return `${id}.${extension}`;
      }
    }
  }
  return id;
}

export function idToFilename(id: string): string {
  return id.replace(/\//g, '_');
}

export function slugify(text: string): string {
  return text.replace(/ /g, '_').replace(/[^a-zA-Z0-9_-]/g, '');
}

export function truncateTitle(title: string): string {
  const trimmed = title.trim();
  if (trimmed.length > 200) {
    return `${trimmed.slice(0, 197)}...`;
  }
  return trimmed;
}
