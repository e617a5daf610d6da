import { z } from 'zod';
import { EMBED_DESCRIPTION_LIMIT } from '../discord/chunking';
import { DEFAULT_MODEL, isModelDisplayName } from './models';

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

const optionalSnowflake = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed && trimmed !== '0' ? trimmed : undefined;
  })
  .refine((value) => value === undefined || /^\d{17,20}$/.test(value), {
    message: 'TESTING_GUILD_ID must be a Discord guild id',
  });

export const envSchema = z.object({
  DISCORD_TOKEN: z.string().min(1, 'DISCORD_TOKEN is required'),
  GOOGLE_API_KEY: z.string().min(1, 'GOOGLE_API_KEY is required'),
  TESTING_GUILD_ID: optionalSnowflake,
  GEMINI_BASE_URL: z.string().url().default('https://generativelanguage.googleapis.com/v1beta'),
  GEMINI_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  DATA_FILE: z.string().min(1).default('data.json'),
  DEFAULT_MODEL: z
    .string()
    .default(DEFAULT_MODEL)
    .refine(isModelDisplayName, { message: 'DEFAULT_MODEL must name a known model' }),
  DEFAULT_PERSONALITY: z.string().min(1).default('John Robot'),
  USAGE_TIMEZONE: z
    .string()
    .default('UTC')
    .refine(isTimeZone, { message: 'USAGE_TIMEZONE must be an IANA time zone' }),
  DAILY_REQUEST_LIMIT: z.coerce.number().int().nonnegative().default(0),
  RESPONSE_CHUNK_SIZE: z.coerce
    .number()
    .int()
    .min(100)
    .max(EMBED_DESCRIPTION_LIMIT)
    .default(EMBED_DESCRIPTION_LIMIT),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validates a flat environment. Every failing variable is listed in the
 * thrown error, one `path: message` per line.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const formatted = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${formatted}`);
  }

  return parsed.data;
}
