import type { HashtagResult } from '../hashtags/hashtag-pipeline';

export type HashtagResultDto = HashtagResult;

/** A result as retained in the in-memory history. Frozen once stored. */
export type HashtagHistoryEntryDto = {
  readonly id: string;
  /** ISO timestamp of when the result was produced. */
  readonly createdAt: string;
  readonly model: string;
  readonly count: number;
  readonly hashtags: readonly string[];
};
