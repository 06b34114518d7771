import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export type NodeEnv = 'development' | 'test' | 'production';

export type OllamaConfig = {
  baseUrl: string;
  timeoutMs: number;
  defaultModel: string;
};

@Injectable()
export class AppConfigService {
  private readonly logger = new Logger(AppConfigService.name);

  constructor(private readonly config: ConfigService) {}

  private readBool(key: string, fallback: boolean): boolean {
    const raw = this.config.get<string>(key);
    if (raw == null) return fallback;
    const v = String(raw).trim().toLowerCase();
    if (!v) return fallback;
    if (['1', 'true', 'yes', 'on'].includes(v)) return true;
    if (['0', 'false', 'no', 'off'].includes(v)) return false;
    return fallback;
  }

  private readPositiveInt(key: string, fallback: number): number {
    const raw = this.config.get<string>(key);
    if (raw == null || String(raw).trim() === '') return fallback;
    const n = Number(raw);
    return Number.isFinite(n) && n > 0 ? Math.floor(n) : fallback;
  }

  private readString(key: string, fallback: string): string {
    return (this.config.get<string>(key) ?? '').trim() || fallback;
  }

  nodeEnv(): NodeEnv {
    const raw = this.config.get<string>('NODE_ENV');
    return raw === 'production' || raw === 'test' ? raw : 'development';
  }

  isProd(): boolean {
    return this.nodeEnv() === 'production';
  }

  port(): number {
    return this.readPositiveInt('PORT', 3001);
  }

  trustProxy(): boolean {
    return this.readBool('TRUST_PROXY', false);
  }

  bodyJsonLimit(): string {
    return this.readString('BODY_JSON_LIMIT', '100kb');
  }

  logRequests(): boolean {
    return this.readBool('LOG_REQUESTS', false);
  }

  swaggerEnabled(): boolean {
    return this.readBool('ENABLE_SWAGGER', !this.isProd());
  }

  allowedOrigins(): string[] {
    const raw = this.config.get<string>('ALLOWED_ORIGINS') ?? '';
    return raw
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }

  isOriginAllowed(origin: string): boolean {
    return this.allowedOrigins().includes(origin);
  }

  logCorsBlocked(origin: string) {
    this.logger.warn(
      `CORS blocked origin: ${origin}. Allowed origins: ${this.allowedOrigins().join(', ') || '(none)'}`,
    );
  }

  ollama(): OllamaConfig {
    return {
      baseUrl: this.readString('OLLAMA_BASE_URL', 'http://localhost:11434').replace(/\/+$/, ''),
      // Local models can take minutes on first load.
      timeoutMs: this.readPositiveInt('OLLAMA_TIMEOUT_MS', 120_000),
      defaultModel: this.readString('OLLAMA_DEFAULT_MODEL', 'llama3.2:3b'),
    };
  }

  hashtagLanguage(): string {
    return this.readString('HASHTAG_LANGUAGE', 'Portuguese');
  }

  historyMaxEntries(): number {
    return this.readPositiveInt('HASHTAG_HISTORY_MAX_ENTRIES', 1000);
  }

  rateLimitLimit(): number {
    return this.readPositiveInt('RATE_LIMIT_LIMIT', 120);
  }

  rateLimitTtlSeconds(): number {
    return this.readPositiveInt('RATE_LIMIT_TTL_SECONDS', 60);
  }

  rateLimitGenerateLimit(): number {
    return this.readPositiveInt('RATE_LIMIT_GENERATE_LIMIT', 20);
  }

  rateLimitGenerateTtlSeconds(): number {
    return this.readPositiveInt('RATE_LIMIT_GENERATE_TTL_SECONDS', 60);
  }
}
