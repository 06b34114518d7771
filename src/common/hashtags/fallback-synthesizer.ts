import { HASHTAG_MARKER } from './hashtag-formatter';
import { toAlphanumeric } from './text-sanitizer';

export const PLACEHOLDER_WORD = 'hashtag';

/** Pair candidates share a suffix for this many attempts before it increments. */
export const PAIR_SUFFIX_PERIOD = 5;

export type SynthesizeParams = {
  /** Sanitized keywords from the source text (see `sanitizeKeywords`). */
  keywords: readonly string[];
  deficit: number;
  /** Hashtags already in the result; compared case-insensitively. */
  used: Iterable<string>;
};

function withSuffix(base: string, suffix: number): string {
  return suffix <= 1 ? base : `${base}${suffix}`;
}

/**
 * Raw (pre-sanitize) candidate for the given attempt number.
 * Every scheme puts the attempt number into the suffix, so the sequence never runs dry.
 */
function rawCandidate(keywords: readonly string[], attempt: number): string {
  if (keywords.length === 0) return withSuffix(PLACEHOLDER_WORD, attempt + 1);
  if (keywords.length === 1) return withSuffix(keywords[0] ?? '', attempt + 1);
  const i = attempt % keywords.length;
  const pair = `${keywords[i] ?? ''}${keywords[(i + 1) % keywords.length] ?? ''}`;
  return withSuffix(pair, Math.floor(attempt / PAIR_SUFFIX_PERIOD) + 1);
}

function toSynthesizedHashtag(raw: string): string {
  const cleaned = toAlphanumeric(raw);
  return `${HASHTAG_MARKER}${cleaned || PLACEHOLDER_WORD}`;
}

/**
 * Deterministically produce exactly `deficit` hashtags that collide with nothing in `used`
 * nor with each other.
 */
export function synthesizeHashtags(params: SynthesizeParams): string[] {
  const deficit = Math.max(0, Math.floor(params.deficit));
  const taken = new Set<string>();
  for (const tag of params.used) taken.add(tag.toLowerCase());

  const out: string[] = [];
  for (let attempt = 0; out.length < deficit; attempt++) {
    const tag = toSynthesizedHashtag(rawCandidate(params.keywords, attempt));
    const key = tag.toLowerCase();
    if (taken.has(key)) continue;
    taken.add(key);
    out.push(tag);
  }
  return out;
}
