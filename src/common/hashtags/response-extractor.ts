import { HASHTAG_MARKER } from './hashtag-formatter';

/**
 * Shapes an inference engine reply can take. The engine is asked for JSON, but nothing enforces it:
 * - directHashtagArray: `{ hashtags: [...] }` (or a bare array)
 * - nestedJsonString: `{ response: "<json with hashtags>" }` (Ollama's envelope)
 * - proseText: a `response` string (or raw body) that is not hashtag JSON
 * - unparseable: anything else
 */
export type EnginePayload =
  | { kind: 'directHashtagArray'; items: unknown[] }
  | { kind: 'nestedJsonString'; items: unknown[] }
  | { kind: 'proseText'; text: string }
  | { kind: 'unparseable' };

export type ExtractionStrategy = 'direct' | 'nested' | 'prose-tokens' | 'keyword-frequency' | 'none';

export type ExtractionResult = {
  payloadKind: EnginePayload['kind'];
  strategy: ExtractionStrategy;
  candidates: string[];
};

const CODE_FENCE_RE = /```(?:json)?\s*|\s*```/gi;
const PROSE_TOKEN_SEPARATOR_RE = /[\s,;]+/;
const OUTER_PUNCTUATION_RE = /^[\p{P}\p{S}]+|[\p{P}\p{S}]+$/gu;
const MIN_FREQUENCY_WORD_LENGTH = 3;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseJson(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}

/** Hashtag list carried by a parsed JSON value, if any. */
function hashtagItemsOf(value: unknown): unknown[] | null {
  if (Array.isArray(value)) return value;
  if (isObject(value) && Array.isArray(value.hashtags)) return value.hashtags;
  return null;
}

export function classifyEnginePayload(payload: unknown): EnginePayload {
  if (typeof payload === 'string') {
    const parsed = tryParseJson(payload.replace(CODE_FENCE_RE, '').trim());
    if (Array.isArray(parsed) || isObject(parsed)) return classifyEnginePayload(parsed);
    return { kind: 'proseText', text: payload };
  }

  const direct = hashtagItemsOf(payload);
  if (direct) return { kind: 'directHashtagArray', items: direct };

  if (isObject(payload) && typeof payload.response === 'string') {
    const text = payload.response;
    const nested = hashtagItemsOf(tryParseJson(text.replace(CODE_FENCE_RE, '').trim()));
    if (nested) return { kind: 'nestedJsonString', items: nested };
    return { kind: 'proseText', text };
  }

  return { kind: 'unparseable' };
}

function itemsToCandidates(items: unknown[]): string[] {
  const out: string[] = [];
  for (const item of items) {
    if (typeof item === 'string') out.push(item);
    else if (typeof item === 'number' && Number.isFinite(item)) out.push(String(item));
  }
  return out;
}

/** `#tokens` in prose, in order of appearance. */
export function scanProseHashtags(text: string): string[] {
  return (text ?? '')
    .toString()
    .split(PROSE_TOKEN_SEPARATOR_RE)
    .filter((token) => token.startsWith(HASHTAG_MARKER) && token.length > HASHTAG_MARKER.length);
}

/**
 * Most frequent words (case-insensitive) as hashtags.
 * Ties keep first-seen order.
 */
export function frequentKeywordHashtags(text: string, limit: number): string[] {
  const counts = new Map<string, number>();
  for (const raw of (text ?? '').toString().split(/\s+/)) {
    const word = raw.replace(OUTER_PUNCTUATION_RE, '');
    if ([...word].length < MIN_FREQUENCY_WORD_LENGTH) continue;
    const key = word.toLowerCase();
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  // Map iteration is insertion order and Array#sort is stable, so ties stay first-seen.
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, Math.max(0, limit))
    .map(([word]) => `${HASHTAG_MARKER}${word}`);
}

export function extractCandidates(payload: unknown, requestedCount: number): ExtractionResult {
  const classified = classifyEnginePayload(payload);
  switch (classified.kind) {
    case 'directHashtagArray':
      return { payloadKind: classified.kind, strategy: 'direct', candidates: itemsToCandidates(classified.items) };
    case 'nestedJsonString':
      return { payloadKind: classified.kind, strategy: 'nested', candidates: itemsToCandidates(classified.items) };
    case 'proseText': {
      const tokens = scanProseHashtags(classified.text);
      if (tokens.length > 0) return { payloadKind: classified.kind, strategy: 'prose-tokens', candidates: tokens };
      return {
        payloadKind: classified.kind,
        strategy: 'keyword-frequency',
        candidates: frequentKeywordHashtags(classified.text, requestedCount),
      };
    }
    case 'unparseable':
      return { payloadKind: classified.kind, strategy: 'none', candidates: [] };
  }
}
