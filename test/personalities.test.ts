import assert from 'assert';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it } from 'node:test';
import { ValidationError } from '../src/errors';
import { loadPersonalities, PersonalityRegistry } from '../src/personalities';

describe('PersonalityRegistry', () => {
  it('resolves the preferred default when it exists', () => {
    const registry = new PersonalityRegistry({ Pirate: 'Arr.', 'John Robot': 'Beep.' }, 'John Robot');
    assert.strictEqual(registry.defaultName, 'John Robot');
    assert.deepStrictEqual(registry.resolve(undefined), { name: 'John Robot', systemPrompt: 'Beep.' });
    assert.deepStrictEqual(registry.resolve('Pirate'), { name: 'Pirate', systemPrompt: 'Arr.' });
  });

  it('falls back to the first personality when the default is missing', () => {
    const registry = new PersonalityRegistry({ Pirate: 'Arr.', Poet: 'Rhyme.' }, 'John Robot');
    assert.strictEqual(registry.defaultName, 'Pirate');
    assert.strictEqual(registry.resolve(null).name, 'Pirate');
  });

  it('refuses to answer without personalities', () => {
    const registry = new PersonalityRegistry({}, 'John Robot');
    assert.strictEqual(registry.defaultName, undefined);
    assert.throws(() => registry.resolve(), {
      name: 'ValidationError',
      message: 'Error: No personalities configured or loaded. Cannot process request.',
    });
  });

  it('rejects names outside the loaded set', () => {
    const registry = new PersonalityRegistry({ Pirate: 'Arr.' }, 'Pirate');
    assert.throws(() => registry.resolve('Hacker'), ValidationError);
  });

  it('offers at most 25 choices', () => {
    const prompts = Object.fromEntries(Array.from({ length: 30 }, (_, i) => [`P${i}`, `prompt ${i}`]));
    const choices = new PersonalityRegistry(prompts, 'P0').getChoices();
    assert.strictEqual(choices.length, 25);
    assert.deepStrictEqual(choices[0], { name: 'P0', value: 'P0' });
  });
});

describe('loadPersonalities', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'personalities-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads system_prompts from the data file', async () => {
    const filePath = path.join(dir, 'data.json');
    fs.writeFileSync(
      filePath,
      JSON.stringify({
        system_prompts: { 'John Robot': 'You are John.' },
        usage: { date: '2026-03-01', count: 2 },
      })
    );

    const registry = await loadPersonalities(filePath, 'John Robot');
    assert.deepStrictEqual(registry.toSystemPrompts(), { 'John Robot': 'You are John.' });
  });

  it('is empty when the file is missing', async () => {
    const registry = await loadPersonalities(path.join(dir, 'missing.json'), 'John Robot');
    assert.strictEqual(registry.size, 0);
  });

  it('is empty when system_prompts is not a map of strings', async () => {
    const filePath = path.join(dir, 'data.json');
    fs.writeFileSync(filePath, JSON.stringify({ system_prompts: { 'John Robot': 42 } }));
    const registry = await loadPersonalities(filePath, 'John Robot');
    assert.strictEqual(registry.size, 0);
  });
});
