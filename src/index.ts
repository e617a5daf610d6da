import dotenv from 'dotenv';
import { Config, createConfig } from './config';
import { parseEnv } from './config/env';
import { DiscordBot } from './discord/client';
import { GeminiService } from './llm/geminiService';
import { logger, setLogLevel } from './logger';
import { loadPersonalities } from './personalities';
import { UsageTracker } from './usage/usageTracker';

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection:', reason);
  process.exit(1);
});

function loadConfig(): Config {
  dotenv.config();
  try {
    return createConfig(parseEnv(process.env));
  } catch (error) {
    logger.error(error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const personalities = await loadPersonalities(config.usage.dataFile, config.bot.defaultPersonality);
  const tracker = new UsageTracker({
    filePath: config.usage.dataFile,
    timeZone: config.usage.timeZone,
    systemPrompts: personalities.toSystemPrompts(),
  });
  const generator = new GeminiService({
    apiKey: config.gemini.apiKey,
    baseUrl: config.gemini.baseUrl,
    timeoutMs: config.gemini.timeoutMs,
  });

  const bot = new DiscordBot(config, { generator, tracker, personalities });
  await bot.start();

  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully...`);
    await bot.stop();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((error) => {
  logger.error('Failed to start:', error);
  process.exit(1);
});
