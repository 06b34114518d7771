import { Injectable, Logger } from '@nestjs/common';
import type { HashtagHistoryEntryDto, HashtagResultDto } from '../../common/dto/hashtag.dto';
import { runHashtagPipeline } from '../../common/hashtags/hashtag-pipeline';
import { AppConfigService } from '../app/app-config.service';
import { OllamaClient } from '../ollama/ollama.client';
import { HashtagHistoryService } from './hashtag-history.service';
import { buildHashtagPrompt } from './hashtag-prompt';

@Injectable()
export class HashtagsService {
  private readonly logger = new Logger(HashtagsService.name);

  constructor(
    private readonly ollama: OllamaClient,
    private readonly history: HashtagHistoryService,
    private readonly appConfig: AppConfigService,
  ) {}

  async generate(params: { text: string; count: number; model?: string | null }): Promise<HashtagResultDto> {
    const model = (params.model ?? '').trim() || this.appConfig.ollama().defaultModel;
    const prompt = buildHashtagPrompt({
      text: params.text,
      count: params.count,
      model,
      language: this.appConfig.hashtagLanguage(),
    });

    // Upstream failures propagate as-is; the pipeline only runs on a received payload.
    const payload = await this.ollama.generate({ model, prompt, format: 'json' });
    const { result, strategy, synthesized } = runHashtagPipeline({
      request: { sourceText: params.text, requestedCount: params.count, modelIdentifier: model },
      payload,
    });

    if (synthesized > 0) {
      this.logger.log(`model=${model} under-delivered (strategy=${strategy}); synthesized ${synthesized}/${result.count}`);
    } else {
      this.logger.debug(`model=${model} strategy=${strategy} count=${result.count}`);
    }

    this.history.append(result);
    return result;
  }

  listHistory(limit?: number): HashtagHistoryEntryDto[] {
    return this.history.list(limit);
  }
}
