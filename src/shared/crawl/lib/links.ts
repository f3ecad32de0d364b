import * as cheerio from 'cheerio';

const SKIPPED_SCHEMES = /^(mailto|javascript|tel|data):/i;

/**
 * Absolute http(s) targets of every `<a href>` on the page, resolved against
 * `baseUrl`, fragments removed, in document order without duplicates.
 */
export function discoverLinks(html: string, baseUrl: string): string[] {
  const $ = cheerio.load(html);
  const seen = new Set<string>();
  const links: string[] = [];

  $('a[href]').each((_, element) => {
    const href = $(element).attr('href')?.trim();
    if (!href || href.startsWith('#') || SKIPPED_SCHEMES.test(href)) return;

    let resolved: URL;
    try {
      resolved = new URL(href, baseUrl);
    } catch {
      return;
    }
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return;

    resolved.hash = '';
    const absolute = resolved.toString();
    if (seen.has(absolute)) return;
    seen.add(absolute);
    links.push(absolute);
  });

  return links;
}
