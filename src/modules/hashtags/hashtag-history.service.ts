import { Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import type { HashtagHistoryEntryDto } from '../../common/dto/hashtag.dto';
import type { HashtagResult } from '../../common/hashtags/hashtag-pipeline';
import { AppConfigService } from '../app/app-config.service';

/**
 * Process-lifetime log of generated results (lost on restart).
 * Appends and reads run synchronously on the event loop, so a reader never sees a partial entry.
 */
@Injectable()
export class HashtagHistoryService {
  private readonly entries: HashtagHistoryEntryDto[] = [];

  constructor(private readonly appConfig: AppConfigService) {}

  append(result: HashtagResult, now: Date = new Date()): HashtagHistoryEntryDto {
    const entry: HashtagHistoryEntryDto = Object.freeze({
      id: randomUUID(),
      createdAt: now.toISOString(),
      model: result.model,
      count: result.count,
      hashtags: Object.freeze([...result.hashtags]),
    });
    this.entries.push(entry);
    const overflow = this.entries.length - this.appConfig.historyMaxEntries();
    if (overflow > 0) this.entries.splice(0, overflow);
    return entry;
  }

  /** Oldest first. With `limit`, only the most recent `limit` entries. */
  list(limit?: number): HashtagHistoryEntryDto[] {
    if (limit == null) return [...this.entries];
    const n = Math.max(0, Math.floor(limit));
    return n === 0 ? [] : this.entries.slice(-n);
  }

  size(): number {
    return this.entries.length;
  }
}
