import assert from 'assert';
import path from 'path';
import { describe, it } from 'node:test';
import { createConfig, FOLLOWUP_TTL_MS } from '../src/config';
import { parseEnv } from '../src/config/env';
import { getModelChoices, getModelDisplayName, resolveModel } from '../src/config/models';
import { ValidationError } from '../src/errors';

const requiredEnv = { DISCORD_TOKEN: 'test-token', GOOGLE_API_KEY: 'test-key' };

describe('parseEnv', () => {
  it('fills in defaults', () => {
    const env = parseEnv(requiredEnv);
    assert.strictEqual(env.TESTING_GUILD_ID, undefined);
    assert.strictEqual(env.GEMINI_BASE_URL, 'https://generativelanguage.googleapis.com/v1beta');
    assert.strictEqual(env.GEMINI_TIMEOUT_MS, 60_000);
    assert.strictEqual(env.DATA_FILE, 'data.json');
    assert.strictEqual(env.DEFAULT_MODEL, '3.0 Flash');
    assert.strictEqual(env.DEFAULT_PERSONALITY, 'John Robot');
    assert.strictEqual(env.USAGE_TIMEZONE, 'UTC');
    assert.strictEqual(env.DAILY_REQUEST_LIMIT, 0);
    assert.strictEqual(env.RESPONSE_CHUNK_SIZE, 4096);
    assert.strictEqual(env.LOG_LEVEL, 'info');
  });

  it('treats a zero guild id as unset', () => {
    assert.strictEqual(parseEnv({ ...requiredEnv, TESTING_GUILD_ID: '0' }).TESTING_GUILD_ID, undefined);
    assert.strictEqual(
      parseEnv({ ...requiredEnv, TESTING_GUILD_ID: '123456789012345678' }).TESTING_GUILD_ID,
      '123456789012345678'
    );
  });

  it('coerces numeric settings', () => {
    const env = parseEnv({ ...requiredEnv, DAILY_REQUEST_LIMIT: '250', GEMINI_TIMEOUT_MS: '5000' });
    assert.strictEqual(env.DAILY_REQUEST_LIMIT, 250);
    assert.strictEqual(env.GEMINI_TIMEOUT_MS, 5000);
  });

  it('lists every missing credential', () => {
    assert.throws(() => parseEnv({}), {
      message: 'Invalid environment configuration:\nDISCORD_TOKEN: Required\nGOOGLE_API_KEY: Required',
    });
  });

  it('rejects an unknown time zone', () => {
    assert.throws(() => parseEnv({ ...requiredEnv, USAGE_TIMEZONE: 'Mars/Olympus' }), {
      message: 'Invalid environment configuration:\nUSAGE_TIMEZONE: USAGE_TIMEZONE must be an IANA time zone',
    });
  });

  it('rejects an unknown default model', () => {
    assert.throws(() => parseEnv({ ...requiredEnv, DEFAULT_MODEL: 'GPT' }), {
      message: 'Invalid environment configuration:\nDEFAULT_MODEL: DEFAULT_MODEL must name a known model',
    });
  });
});

describe('createConfig', () => {
  it('nests the environment and resolves the data file', () => {
    const config = createConfig(parseEnv({ ...requiredEnv, DAILY_REQUEST_LIMIT: '10' }));
    assert.strictEqual(config.discord.token, 'test-token');
    assert.strictEqual(config.gemini.apiKey, 'test-key');
    assert.strictEqual(config.gemini.defaultModel, '3.0 Flash');
    assert.strictEqual(config.usage.dataFile, path.resolve(process.cwd(), 'data.json'));
    assert.strictEqual(config.usage.dailyLimit, 10);
    assert.strictEqual(config.bot.followUpTtlMs, FOLLOWUP_TTL_MS);
  });
});

describe('models', () => {
  it('resolves display names, ids and the default', () => {
    assert.strictEqual(resolveModel(undefined), 'gemini-3-flash-preview');
    assert.strictEqual(resolveModel(null, '2.5 Flash'), 'gemini-2.5-flash');
    assert.strictEqual(resolveModel('2.5 Pro'), 'gemini-2.5-pro');
    assert.strictEqual(resolveModel('gemini-2.5-flash'), 'gemini-2.5-flash');
  });

  it('rejects unknown models', () => {
    assert.throws(
      () => resolveModel('gemini-1.0-ultra'),
      (error: unknown) =>
        error instanceof ValidationError &&
        error.message === 'Unknown model "gemini-1.0-ultra". Choose one of: 2.5 Flash, 2.5 Pro, 3.0 Flash.'
    );
  });

  it('maps ids back to display names', () => {
    assert.strictEqual(getModelDisplayName('gemini-2.5-pro'), '2.5 Pro');
    assert.strictEqual(getModelDisplayName('custom-model'), 'custom-model');
  });

  it('offers every model as a command choice', () => {
    assert.deepStrictEqual(getModelChoices(), [
      { name: '2.5 Flash', value: 'gemini-2.5-flash' },
      { name: '2.5 Pro', value: 'gemini-2.5-pro' },
      { name: '3.0 Flash', value: 'gemini-3-flash-preview' },
    ]);
  });
});
