import path from 'path';
import { Env } from './config/env';
import { ModelDisplayName } from './config/models';
import { LogLevel } from './logger';

export interface Config {
  discord: {
    token: string;
    testingGuildId?: string;
  };
  gemini: {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
    defaultModel: ModelDisplayName;
  };
  usage: {
    dataFile: string;
    timeZone: string;
    dailyLimit: number;
  };
  bot: {
    defaultPersonality: string;
    chunkSize: number;
    followUpTtlMs: number;
  };
  logLevel: LogLevel;
}

export const FOLLOWUP_TTL_MS = 5 * 60 * 1000;

export function createConfig(env: Env): Config {
  return {
    discord: {
      token: env.DISCORD_TOKEN,
      testingGuildId: env.TESTING_GUILD_ID,
    },
    gemini: {
      apiKey: env.GOOGLE_API_KEY,
      baseUrl: env.GEMINI_BASE_URL,
      timeoutMs: env.GEMINI_TIMEOUT_MS,
      defaultModel: env.DEFAULT_MODEL,
    },
    usage: {
      dataFile: path.resolve(process.cwd(), env.DATA_FILE),
      timeZone: env.USAGE_TIMEZONE,
      dailyLimit: env.DAILY_REQUEST_LIMIT,
    },
    bot: {
      defaultPersonality: env.DEFAULT_PERSONALITY,
      chunkSize: env.RESPONSE_CHUNK_SIZE,
      followUpTtlMs: FOLLOWUP_TTL_MS,
    },
    logLevel: env.LOG_LEVEL,
  };
}
