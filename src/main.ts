import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import helmet from 'helmet';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import compression = require('compression');
import * as express from 'express';
import { randomUUID } from 'crypto';
import type { Request, Response, NextFunction } from 'express';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { Logger } from '@nestjs/common';
import { AppModule } from './modules/app/app.module';
import { ApiResponseInterceptor } from './common/interceptors/api-response.interceptor';
import { ApiExceptionFilter } from './common/filters/api-exception.filter';
import { AppConfigService } from './modules/app/app-config.service';
import { RATE_LIMITS_LOCALS_KEY, type RateLimitEntry } from './common/throttling/rate-limit.resolver';

type RequestWithId = Request & { requestId?: string };

async function bootstrap() {
  const logger = new Logger('HTTP');
  const startup = new Logger('Startup');
  const nodeEnv = (process.env.NODE_ENV ?? 'development').trim().toLowerCase();
  const isProd = nodeEnv === 'production';
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: isProd ? ['error', 'warn', 'log'] : ['error', 'warn', 'log', 'debug', 'verbose'],
    // Body parsing is configured below with an explicit limit.
    bodyParser: false,
  });

  const appConfig = app.get(AppConfigService);
  const ollama = appConfig.ollama();

  // Make route-specific rate limits available to Throttler resolvers
  // (stored on Express app locals so they can be read from ExecutionContext without DI).
  const rateLimits: Record<string, RateLimitEntry> = {
    generate: {
      limit: appConfig.rateLimitGenerateLimit(),
      ttl: appConfig.rateLimitGenerateTtlSeconds() * 1000,
    },
  };
  app.setLocal(RATE_LIMITS_LOCALS_KEY, rateLimits);
  // API responses should not be conditional-cached via ETag/If-None-Match.
  app.disable('etag');

  if (appConfig.trustProxy()) {
    // Only enable when a trusted reverse proxy sits in front.
    app.set('trust proxy', 1);
  }

  if (!appConfig.isProd()) {
    startup.log(
      [
        `nodeEnv=${appConfig.nodeEnv()}`,
        `port=${appConfig.port()}`,
        `ollama=${ollama.baseUrl}`,
        `defaultModel=${ollama.defaultModel}`,
        `ollamaTimeoutMs=${ollama.timeoutMs}`,
        `language=${appConfig.hashtagLanguage()}`,
        `historyMax=${appConfig.historyMaxEntries()}`,
        `throttle.global=${appConfig.rateLimitLimit()}/${appConfig.rateLimitTtlSeconds()}s`,
        `throttle.generate=${appConfig.rateLimitGenerateLimit()}/${appConfig.rateLimitGenerateTtlSeconds()}s`,
      ].join(' | '),
    );
  }

  // Security headers (API-safe defaults). Swagger UI needs inline scripts, so no CSP.
  app.use(
    helmet({
      crossOriginResourcePolicy: false,
      contentSecurityPolicy: false,
    }),
  );
  app.use(compression());
  app.use(express.json({ limit: appConfig.bodyJsonLimit() }));

  // Request id (for tracing + debugging). Returned as `x-request-id`.
  app.use((req: RequestWithId, res: Response, next: NextFunction) => {
    const incoming = String(req.headers['x-request-id'] ?? '').trim();
    const id = incoming || randomUUID();
    res.setHeader('x-request-id', id);
    req.requestId = id;
    next();
  });

  // Opt-in request logging (LOG_REQUESTS=true).
  if (appConfig.logRequests()) {
    app.use((req: Request, res: Response, next: NextFunction) => {
      const start = Date.now();
      const method = String(req.method || '');
      const path = String(req.originalUrl || req.url || '');
      res.on('finish', () => {
        const ms = Date.now() - start;
        const rid = String(res.getHeader('x-request-id') ?? '');
        logger.log(`${method} ${path} -> ${res.statusCode} (${ms}ms)${rid ? ` rid=${rid}` : ''}`);
      });
      next();
    });
  }

  app.useGlobalInterceptors(new ApiResponseInterceptor());
  app.useGlobalFilters(new ApiExceptionFilter());
  app.enableShutdownHooks();

  app.enableCors({
    origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
      // Allow non-browser clients (no Origin header)
      if (!origin) return callback(null, true);
      if (appConfig.isOriginAllowed(origin)) return callback(null, true);
      // Do not surface this as a 500; the browser blocks the response without CORS headers.
      appConfig.logCorsBlocked(origin);
      return callback(null, false);
    },
  });

  if (appConfig.swaggerEnabled()) {
    const swaggerConfig = new DocumentBuilder()
      .setTitle('Hashtag Generator API')
      .setDescription('Generates hashtags for a text through a local Ollama model.')
      .setVersion('1.0.0')
      .build();
    const document = SwaggerModule.createDocument(app, swaggerConfig);
    SwaggerModule.setup('swagger', app, document);
  }

  const port = appConfig.port();
  try {
    await app.listen(port);
    startup.log(`Listening on :${port}`);
  } catch (err) {
    const code = typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined;
    if (code === 'EADDRINUSE') {
      startup.error(`Port ${port} is already in use (set PORT in .env).`);
    } else {
      startup.error(`Failed to start server: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(1);
  }
}

void bootstrap();
