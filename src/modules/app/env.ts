import { z } from 'zod';

const numeric = (name: string) =>
  z
    .string()
    .optional()
    .refine((v) => (v ? !Number.isNaN(Number(v)) : true), `${name} must be a number`);

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: numeric('PORT'),
  // Comma-separated list of allowed web origins for CORS.
  // Example: http://localhost:3000,https://app.example.com
  ALLOWED_ORIGINS: z.string().optional().default('http://localhost:3000'),
  TRUST_PROXY: z.string().optional(),
  BODY_JSON_LIMIT: z.string().optional(),
  LOG_REQUESTS: z.string().optional(),
  ENABLE_SWAGGER: z.string().optional(),

  // Inference engine (Ollama)
  OLLAMA_BASE_URL: z.string().url('OLLAMA_BASE_URL must be a URL').optional(),
  OLLAMA_TIMEOUT_MS: numeric('OLLAMA_TIMEOUT_MS'),
  OLLAMA_DEFAULT_MODEL: z.string().trim().min(1).optional(),

  HASHTAG_LANGUAGE: z.string().trim().min(1).optional(),
  HASHTAG_HISTORY_MAX_ENTRIES: numeric('HASHTAG_HISTORY_MAX_ENTRIES'),

  RATE_LIMIT_LIMIT: numeric('RATE_LIMIT_LIMIT'),
  RATE_LIMIT_TTL_SECONDS: numeric('RATE_LIMIT_TTL_SECONDS'),
  RATE_LIMIT_GENERATE_LIMIT: numeric('RATE_LIMIT_GENERATE_LIMIT'),
  RATE_LIMIT_GENERATE_TTL_SECONDS: numeric('RATE_LIMIT_GENERATE_TTL_SECONDS'),
});

export function validateEnv<TSchema extends z.ZodTypeAny>(schema: TSchema) {
  return (config: Record<string, unknown>) => {
    const parsed = schema.safeParse(config);
    if (!parsed.success) {
      // Nest expects thrown errors to abort bootstrap.
      throw new Error(
        `Invalid environment variables:\n${parsed.error.issues
          .map((i) => `- ${i.path.join('.')}: ${i.message}`)
          .join('\n')}`,
      );
    }
    return parsed.data;
  };
}
