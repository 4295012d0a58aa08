import path from 'path';

const SCHEME = /^[a-zA-Z][a-zA-Z0-9+.-]*:/;

export function hasScheme(url: string): boolean {
  return SCHEME.test(url);
}

/**
 * Anything that isn't http(s), mailto or scheme-relative is treated as a
 * filesystem path.
 */
export function isLocal(urlOrPath: string): boolean {
  if (urlOrPath.startsWith('http') || urlOrPath.startsWith('mailto:')) {
    return false;
  }
  return !urlOrPath.startsWith('//');
}

/**
 * Resolves `url` against `base`. Bases without a scheme are filesystem paths
 * and are joined relative to their directory.
 */
export function resolveUrl(base: string, url: string): string {
  if (!base || hasScheme(url)) {
    return url;
  }

  if (hasScheme(base)) {
    try {
      return new URL(url, base).toString();
    } catch {
      return url;
    }
  }

  if (url.startsWith('/') || !url) {
    return url || base;
  }
  const baseDir = base.endsWith('/') ? base : path.posix.dirname(base);
  return path.posix.normalize(path.posix.join(baseDir, url));
}

/**
 * Normal form for comparing addresses: percent-encoded path, lowercase host.
 * Values that don't parse as a URL (filesystem paths) are returned as-is.
 * @param url - Address to normalize
 * @returns The WHATWG serialization of `url`, or `url` itself
 */
export function canonicalUrl(url: string): string {
  try {
    return new URL(url).href;
  } catch {
    return url;
  }
}
