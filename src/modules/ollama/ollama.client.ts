import { Injectable, Logger } from '@nestjs/common';
import { AppConfigService } from '../app/app-config.service';
import { GenerationError } from '../../common/errors/generation-error';

export type OllamaGenerateParams = {
  model: string;
  prompt: string;
  /** Ask the engine to constrain output to JSON. */
  format?: 'json';
};

export type OllamaProbe = {
  status: 'ok' | 'down';
  latencyMs: number;
  error?: string;
};

const PROBE_TIMEOUT_MS = 2000;

function errorName(err: unknown): string | undefined {
  return typeof err === 'object' && err !== null && 'name' in err && typeof err.name === 'string' ? err.name : undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Body as JSON when it parses, otherwise the raw text (handed to the extractor as prose). */
function parseBody(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

/**
 * Thin client for a local Ollama server. One request per call, no retries;
 * every failure surfaces as `UpstreamUnavailable`.
 */
@Injectable()
export class OllamaClient {
  private readonly logger = new Logger(OllamaClient.name);

  constructor(private readonly appConfig: AppConfigService) {}

  async generate(params: OllamaGenerateParams): Promise<unknown> {
    const { baseUrl, timeoutMs } = this.appConfig.ollama();
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const startedAt = Date.now();

    try {
      const res = await fetch(`${baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({
          model: params.model,
          prompt: params.prompt,
          stream: false,
          ...(params.format ? { format: params.format } : {}),
        }),
        signal: controller.signal,
      });
      const text = await res.text();
      if (!res.ok) {
        this.logger.warn(`Ollama generate failed: HTTP ${res.status} model=${params.model} body=${text.slice(0, 200)}`);
        throw new GenerationError('UpstreamUnavailable', `The model server responded with HTTP ${res.status}.`);
      }
      this.logger.debug(`Ollama generate ok model=${params.model} (${Date.now() - startedAt}ms)`);
      return parseBody(text);
    } catch (err) {
      if (err instanceof GenerationError) throw err;
      const name = errorName(err);
      if (name === 'AbortError' || name === 'TimeoutError') {
        this.logger.warn(`Ollama generate timed out after ${timeoutMs}ms model=${params.model}`);
        throw new GenerationError('UpstreamUnavailable', `The model server did not answer within ${timeoutMs}ms.`, {
          cause: err,
        });
      }
      this.logger.warn(`Ollama generate unreachable at ${baseUrl}: ${errorMessage(err)}`);
      throw new GenerationError('UpstreamUnavailable', 'Could not reach the model server.', { cause: err });
    } finally {
      clearTimeout(timeout);
    }
  }

  /** Readiness probe: lists local models. Never throws. */
  async probe(): Promise<OllamaProbe> {
    const { baseUrl, timeoutMs } = this.appConfig.ollama();
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), Math.min(timeoutMs, PROBE_TIMEOUT_MS));
    const startedAt = Date.now();
    try {
      const res = await fetch(`${baseUrl}/api/tags`, { method: 'GET', signal: controller.signal });
      const latencyMs = Date.now() - startedAt;
      if (!res.ok) return { status: 'down', latencyMs, error: `HTTP ${res.status}` };
      return { status: 'ok', latencyMs };
    } catch (err) {
      return { status: 'down', latencyMs: Date.now() - startedAt, error: errorMessage(err) };
    } finally {
      clearTimeout(timeout);
    }
  }
}
