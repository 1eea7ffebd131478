const HTTP_SCHEME = /^https?:\/\//;
const LOOSE_URL = /^([a-z][a-z0-9+.-]*):\/\/[^/?]*([^?]*)(?:\?(.*))?$/;

interface UrlParts {
  scheme: string;
  host: string;
  path: string;
  query: string;
}

function stripWww(host: string): string {
  return host.startsWith('www.') ? host.slice(4) : host;
}

export function ensureScheme(url: string): string {
  const trimmed = url.trim();
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

function splitUrl(url: string): UrlParts {
  try {
    const parsed = new URL(url);
    return {
      scheme: parsed.protocol.replace(/:$/, ''),
      host: parsed.host,
      path: parsed.pathname,
      query: parsed.search.replace(/^\?/, ''),
    };
  } catch {
    // Unparseable authority: keep whatever path and query can be recovered.
    const match = LOOSE_URL.exec(url);
    return {
      scheme: match?.[1] ?? 'https',
      host: '',
      path: match?.[2] ?? '',
      query: match?.[3] ?? '',
    };
  }
}

/**
 * Canonical comparison key for a URL. Case, a `www.` prefix, a trailing slash,
 * the fragment and the http/https distinction do not change the key.
 *
 * @example normalizeUrl('http://www.Example.com/About/#team') === 'https://example.com/about'
 */
export function normalizeUrl(raw: string): string {
  let url = raw.trim().toLowerCase();
  if (!HTTP_SCHEME.test(url)) {
    url = `https://${url}`;
  }

  const hashIndex = url.indexOf('#');
  if (hashIndex !== -1) {
    url = url.slice(0, hashIndex);
  }

  const parts = splitUrl(url);
  const scheme = parts.scheme === 'http' ? 'https' : parts.scheme;
  const host = stripWww(parts.host);
  const path = parts.path.endsWith('/') ? parts.path.slice(0, -1) : parts.path;
  const query = parts.query ? `?${parts.query}` : '';

  // URL writes percent-escapes in upper case; keys compare them lowercased.
  return `${scheme}://${host}${path}${query}`.toLowerCase();
}

/** Lowercased host of an absolute URL without a leading `www.`; empty when unparseable. */
export function getDomain(url: string): string {
  try {
    return stripWww(new URL(url).hostname.toLowerCase());
  } catch {
    return '';
  }
}

/** Reduces free-form input such as `https://www.Example.com/` to `example.com`. */
export function normalizeHostInput(raw: string): string {
  const withoutScheme = raw.trim().toLowerCase().replace(/^https?:\/\//, '');
  const host = withoutScheme.split(/[/?#]/, 1)[0] ?? '';
  return stripWww(host);
}

/**
 * Lookup form of a bare host, comparable with `getDomain` output. Unicode
 * hosts come back in punycode.
 */
export function hostKey(host: string): string {
  const bare = normalizeHostInput(host);
  return getDomain(`https://${bare}/`) || bare;
}
