import 'dotenv/config';
import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const EnvSchema = z
  .object({
    UPSTREAM_URL: z.string().url().default('https://api.glhf.chat'),
    HOST: z.string().min(1).default('0.0.0.0'),
    PORT: z.coerce.number().int().min(0).max(65535).default(8000),
    // LLM completions can take minutes before the first byte
    UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
    BODY_LIMIT_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
    DEFAULT_REASONING_EFFORT: z.string().min(1).default('high'),
    REASONING_START_MARKER: z.string().min(1).default('<think>'),
    REASONING_END_MARKER: z.string().min(1).default('</think>'),
    REASONING_FIELD: z.string().min(1).default('reasoning_content'),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  })
  .refine((env) => env.REASONING_START_MARKER !== env.REASONING_END_MARKER, {
    message: 'REASONING_START_MARKER and REASONING_END_MARKER must differ',
    path: ['REASONING_END_MARKER'],
  });

export type Config = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

export const CONFIG = loadConfig();
