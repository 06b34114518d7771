export const HASHTAG_MARKER = '#';

const WHITESPACE_RE = /\s+/g;

/** Canonical form of a single candidate, or null when nothing is left after trimming. */
export function toCanonicalHashtag(candidate: string): string | null {
  const trimmed = (candidate ?? '').toString().trim();
  if (!trimmed) return null;
  const compact = trimmed.replace(WHITESPACE_RE, '');
  return compact.startsWith(HASHTAG_MARKER) ? compact : `${HASHTAG_MARKER}${compact}`;
}

/** Case-insensitive dedupe; first occurrence (and its casing) wins. */
export function dedupeHashtags(hashtags: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const tag of hashtags) {
    const key = tag.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(tag);
  }
  return out;
}

export function formatHashtags(candidates: readonly string[]): string[] {
  const canonical: string[] = [];
  for (const candidate of candidates) {
    const tag = toCanonicalHashtag(candidate);
    if (tag) canonical.push(tag);
  }
  return dedupeHashtags(canonical);
}
