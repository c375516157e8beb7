import os from 'os';
import path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim().length > 0 ? value.trim() : undefined));

const optionalUserId = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (!value || value.trim().length === 0) return undefined;
    const parsed = Number(value);
    if (!Number.isSafeInteger(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be an integer user id' });
      return z.NEVER;
    }
    return parsed;
  });

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_MODE: z.enum(['webhook', 'polling']).default('polling'),
  TELEGRAM_WEBHOOK_SECRET: optionalString,
  PUBLIC_URL: optionalString,

  OPENAI_API_KEY: optionalString,
  GROQ_API_KEY: optionalString,
  TRANSCRIPTION_PROVIDER: z.enum(['openai', 'groq']).default('openai'),

  ADMIN_USER_ID: optionalUserId,
  ADMIN_API_TOKEN: optionalString,

  DAILY_LIMIT_SECONDS: z.coerce.number().int().positive().default(300),
  PENDING_JOB_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  EXTERNAL_CALL_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),

  DATABASE_DIR: z.string().default('.'),
  TEMP_DIR: z.string().default(os.tmpdir()),
  FFMPEG_PATH: z.string().default('ffmpeg'),

  BACKUP_DIR: z.string().default('./backups'),
  BACKUP_RETENTION: z.coerce.number().int().positive().default(10),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${issues}`);
  }
  return result.data;
}

export const env = parseEnv(process.env);

export const DATABASE_FILE = path.join(env.DATABASE_DIR, 'bot_users.db');
