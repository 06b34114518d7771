import { Controller, Get, Res } from '@nestjs/common';
import { setNoStore, type HeaderSink } from '../../common/http-cache';
import { AppConfigService } from '../app/app-config.service';
import { OllamaClient } from '../ollama/ollama.client';
import { HashtagHistoryService } from '../hashtags/hashtag-history.service';

@Controller('health')
export class HealthController {
  constructor(
    private readonly appConfig: AppConfigService,
    private readonly ollama: OllamaClient,
    private readonly history: HashtagHistoryService,
  ) {}

  @Get()
  async health(@Res({ passthrough: true }) httpRes: HeaderSink) {
    setNoStore(httpRes);
    const now = new Date();
    const ollamaConfig = this.appConfig.ollama();

    // Readiness-style check: the model server must answer a cheap listing call.
    const upstream = await this.ollama.probe();
    return {
      data: {
        status: upstream.status === 'ok' ? 'ok' : 'degraded',
        nowIso: now.toISOString(),
        uptimeSeconds: Math.max(0, Math.floor(process.uptime())),
        service: 'hashtag-generator-api',
        config: {
          nodeEnv: this.appConfig.nodeEnv(),
          ollamaBaseUrl: ollamaConfig.baseUrl,
          defaultModel: ollamaConfig.defaultModel,
          language: this.appConfig.hashtagLanguage(),
        },
        history: { entries: this.history.size(), maxEntries: this.appConfig.historyMaxEntries() },
        ollama: upstream,
      },
    };
  }
}
