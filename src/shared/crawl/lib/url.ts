const DEFAULT_PORTS: Record<string, string> = {
  'http:': '80',
  'https:': '443',
};

/**
 * Canonical form used for dedup: lowercase scheme and host, no default port,
 * no fragment, query parameters sorted, no trailing slash except on the root path.
 * Returns null for anything that is not an absolute http(s) URL.
 */
export function normalizeUrl(raw: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(raw.trim());
  } catch {
    return null;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return null;
  }

  parsed.hash = '';
  if (parsed.port === DEFAULT_PORTS[parsed.protocol]) {
    parsed.port = '';
  }
  parsed.searchParams.sort();

  if (parsed.pathname.length > 1 && parsed.pathname.endsWith('/')) {
    parsed.pathname = parsed.pathname.replace(/\/+$/, '') || '/';
  }

  return parsed.toString();
}

export function originOf(url: string): string {
  return new URL(url).origin;
}

export function hostOf(url: string): string {
  return new URL(url).host;
}
