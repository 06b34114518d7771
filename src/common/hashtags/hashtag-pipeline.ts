import { GenerationError } from '../errors/generation-error';
import { synthesizeHashtags } from './fallback-synthesizer';
import { dedupeHashtags, formatHashtags } from './hashtag-formatter';
import { extractCandidates, type ExtractionStrategy } from './response-extractor';
import { sanitizeKeywords } from './text-sanitizer';

export type GenerationRequest = {
  sourceText: string;
  requestedCount: number;
  modelIdentifier: string;
};

export type HashtagResult = {
  model: string;
  count: number;
  hashtags: string[];
};

export type PipelineOutcome = {
  result: HashtagResult;
  strategy: ExtractionStrategy;
  /** How many of the returned hashtags came from the synthesizer. */
  synthesized: number;
};

/**
 * extract → format → (if short) synthesize from the source text → exact count.
 * Pure: the caller records history.
 */
export function runHashtagPipeline(params: { request: GenerationRequest; payload: unknown }): PipelineOutcome {
  const { request, payload } = params;
  const requestedCount = request.requestedCount;
  if (!Number.isInteger(requestedCount) || requestedCount < 1) {
    throw new GenerationError('InvalidRequest', `requestedCount must be a positive integer (got ${requestedCount}).`);
  }

  const extraction = extractCandidates(payload, requestedCount);
  const formatted = formatHashtags(extraction.candidates);

  if (formatted.length >= requestedCount) {
    return {
      result: toResult(request.modelIdentifier, formatted.slice(0, requestedCount)),
      strategy: extraction.strategy,
      synthesized: 0,
    };
  }

  const keywords = sanitizeKeywords(request.sourceText);
  if (formatted.length === 0 && keywords.length === 0) {
    // A reply of no known shape is an upstream fault; a well-formed but empty one is not.
    if (extraction.payloadKind === 'unparseable') {
      throw new GenerationError('UnparseableUpstreamPayload', 'The model response did not contain anything usable.');
    }
    throw new GenerationError('NoHashtagsProducible', 'No hashtags could be produced from the text or the model response.');
  }

  const extra = synthesizeHashtags({
    keywords,
    deficit: requestedCount - formatted.length,
    used: formatted,
  });
  const combined = dedupeHashtags([...formatted, ...extra]).slice(0, requestedCount);

  return {
    result: toResult(request.modelIdentifier, combined),
    strategy: extraction.strategy,
    synthesized: combined.length - formatted.length,
  };
}

function toResult(model: string, hashtags: string[]): HashtagResult {
  return { model, count: hashtags.length, hashtags };
}
