import { config } from 'dotenv';
import { z } from 'zod';

config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['silent', 'error', 'warn', 'info', 'debug']).default('info'),
  ANALYSIS_PROVIDER: z.enum(['gemini', 'chatgpt', 'local']).default('gemini'),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().default('gemini-flash-lite-latest'),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  LOCAL_AI_ENDPOINT: z.string().url().default('http://localhost:8080/v1'),
  LOCAL_AI_MODEL: z.string().default('local-model'),
  LOCAL_AI_API_KEY: z.string().optional(),
  ANALYSIS_CACHE_DIR: z.string().default('.analysis-cache'),
  CHUNK_SIZE_BYTES: z.string().default('25000').transform(Number).pipe(z.number().int().positive()),
  PROVIDER_TIMEOUT_MS: z.string().default('60000').transform(Number).pipe(z.number().int().positive()),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const errors = error.issues.map((err) => `${err.path.join('.')}: ${err.message}`);
      throw new Error(`Environment validation failed:\n${errors.join('\n')}`);
    }
    throw error;
  }
}

export const env = validateEnv();
