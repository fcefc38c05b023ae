/**
 * Canonical URL used as the article deduplication key.
 *
 * scheme://host-without-www/path-without-trailing-slash?kept-params
 * Tracking params are dropped, the rest keep their order and raw encoding,
 * and the fragment is discarded.
 */

const TRACKING_PARAMS = new Set(['fbclid', 'gclid', 'igshid', 'ref', 'ref_src']);

export function isTrackingParam(key: string): boolean {
  const k = key.toLowerCase();
  return k.startsWith('utm_') || TRACKING_PARAMS.has(k);
}

function paramKey(pair: string): string {
  const raw = pair.split('=', 1)[0];
  try {
    return decodeURIComponent(raw.replace(/\+/g, ' '));
  } catch {
    return raw;
  }
}

function keptParams(search: string): string[] {
  return search.split('&').filter((pair) => pair.length > 0 && !isTrackingParam(paramKey(pair)));
}

function withQuery(head: string, kept: string[]): string {
  return kept.length > 0 ? `${head}?${kept.join('&')}` : head;
}

function fallbackCanonical(raw: string): string {
  const cleaned = raw.trim().toLowerCase().replace(/#.*$/, '');
  const q = cleaned.indexOf('?');
  const base = q === -1 ? cleaned : cleaned.slice(0, q);
  const head = base.replace(/^([a-z][a-z0-9+.-]*:\/\/)?(www\.)+/, '$1').replace(/\/+$/, '');
  return withQuery(head, q === -1 ? [] : keptParams(cleaned.slice(q + 1)));
}

export function canonicalizeUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    return fallbackCanonical(raw);
  }
  if (!url.host) {
    return fallbackCanonical(raw);
  }

  const scheme = url.protocol.replace(/:$/, '');
  const host = url.host.replace(/^(www\.)+/, '');
  const path = url.pathname.replace(/\/+$/, '');

  return withQuery(`${scheme}://${host}${path}`, keptParams(url.search.replace(/^\?/, '')));
}

/** Cluster key for an article; articles without a URL form their own cluster. */
export function clusterKeyFor(article: { id: string; url: string | null }): string {
  const url = article.url?.trim();
  return url ? canonicalizeUrl(url) : `id:${article.id}`;
}
