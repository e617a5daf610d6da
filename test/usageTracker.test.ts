import assert from 'assert';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it } from 'node:test';
import { calendarDate, UsageTracker } from '../src/usage/usageTracker';

function readJson(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

describe('UsageTracker', () => {
  let dir: string;
  let filePath: string;
  let now: Date;

  const createTracker = (systemPrompts?: Record<string, string>) =>
    new UsageTracker({ filePath, now: () => now, systemPrompts });

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'usage-tracker-'));
    filePath = path.join(dir, 'data.json');
    now = new Date('2026-03-01T10:00:00Z');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('counts up from 1 within one day', async () => {
    const tracker = createTracker();
    assert.strictEqual(await tracker.getAndIncrement(), 1);
    assert.strictEqual(await tracker.getAndIncrement(), 2);
    assert.strictEqual(await tracker.getAndIncrement(), 3);
    assert.deepStrictEqual(readJson(filePath), {
      usage: { date: '2026-03-01', count: 3 },
      system_prompts: {},
    });
  });

  it('resets when the stored date is an earlier day', async () => {
    fs.writeFileSync(filePath, JSON.stringify({ usage: { date: '2026-02-28', count: 41 } }));
    assert.strictEqual(await createTracker().getAndIncrement(), 1);
  });

  it('starts at 1 when the file is absent', async () => {
    assert.strictEqual(await createTracker().getAndIncrement(), 1);
  });

  it('starts at 1 when the file is not JSON', async () => {
    fs.writeFileSync(filePath, '{not json');
    assert.strictEqual(await createTracker().getAndIncrement(), 1);
  });

  it('starts at 1 when the usage record is malformed', async () => {
    fs.writeFileSync(filePath, JSON.stringify({ usage: { date: 'yesterday', count: -3 } }));
    assert.strictEqual(await createTracker().getAndIncrement(), 1);
  });

  it('keeps counting in memory when the file cannot be written', async () => {
    const tracker = new UsageTracker({ filePath: dir, now: () => now });
    const observed = [
      await tracker.getAndIncrement(),
      await tracker.getAndIncrement(),
      await tracker.getAndIncrement(),
    ];

    assert.deepStrictEqual(observed, [1, 2, 3]);
    assert.strictEqual(await tracker.peek(), 3);
  });

  it('keeps counting when the file is corrupted mid-day', async () => {
    const tracker = createTracker();
    await tracker.getAndIncrement();
    await tracker.getAndIncrement();
    fs.writeFileSync(filePath, '{not json');

    assert.strictEqual(await tracker.getAndIncrement(), 3);
    assert.deepStrictEqual(readJson(filePath), {
      usage: { date: '2026-03-01', count: 3 },
      system_prompts: {},
    });
  });

  it('starts again at 1 on a new day even when the file is unusable', async () => {
    const tracker = new UsageTracker({ filePath: dir, now: () => now });
    await tracker.getAndIncrement();
    await tracker.getAndIncrement();
    now = new Date('2026-03-02T00:00:01Z');

    assert.strictEqual(await tracker.getAndIncrement(), 1);
  });

  it('observes 1, 2 on one day and 1 on the next', async () => {
    const tracker = createTracker();
    const observed = [await tracker.getAndIncrement(), await tracker.getAndIncrement()];
    now = new Date('2026-03-02T00:00:01Z');
    observed.push(await tracker.getAndIncrement());
    assert.deepStrictEqual(observed, [1, 2, 1]);
  });

  it('loses no increments under concurrent calls', async () => {
    const tracker = createTracker();
    const results = await Promise.all(Array.from({ length: 20 }, () => tracker.getAndIncrement()));

    assert.deepStrictEqual(
      [...results].sort((a, b) => a - b),
      Array.from({ length: 20 }, (_, i) => i + 1)
    );
    assert.strictEqual(await tracker.peek(), 20);
  });

  it('keeps other keys of the data file intact', async () => {
    fs.writeFileSync(
      filePath,
      JSON.stringify({
        usage: { date: '2026-03-01', count: 4 },
        system_prompts: { Pirate: 'Talk like a pirate.' },
        notes: 'hand edited',
      })
    );

    await createTracker({ 'John Robot': 'You are John.' }).getAndIncrement();

    assert.deepStrictEqual(readJson(filePath), {
      usage: { date: '2026-03-01', count: 5 },
      system_prompts: { Pirate: 'Talk like a pirate.' },
      notes: 'hand edited',
    });
  });

  it('writes its own personalities when the file has none', async () => {
    await createTracker({ 'John Robot': 'You are John.' }).getAndIncrement();
    assert.deepStrictEqual(readJson(filePath), {
      usage: { date: '2026-03-01', count: 1 },
      system_prompts: { 'John Robot': 'You are John.' },
    });
  });

  it('peeks without changing the record', async () => {
    const stored = { usage: { date: '2026-02-28', count: 9 } };
    fs.writeFileSync(filePath, JSON.stringify(stored));
    const tracker = createTracker();

    assert.strictEqual(await tracker.peek(), 0);
    assert.deepStrictEqual(readJson(filePath), stored);

    await tracker.getAndIncrement();
    await tracker.getAndIncrement();
    assert.strictEqual(await tracker.peek(), 2);
    assert.strictEqual(await tracker.peek(), 2);
  });

  it('load adopts a record from today', async () => {
    fs.writeFileSync(filePath, JSON.stringify({ usage: { date: '2026-03-01', count: 7 } }));
    assert.strictEqual(await createTracker().load(), 7);
  });

  it('load resets and persists a stale record', async () => {
    fs.writeFileSync(
      filePath,
      JSON.stringify({ usage: { date: '2026-02-27', count: 7 }, system_prompts: {} })
    );
    assert.strictEqual(await createTracker().load(), 0);
    assert.deepStrictEqual(readJson(filePath), {
      usage: { date: '2026-03-01', count: 0 },
      system_prompts: {},
    });
  });

  it('follows the configured time zone', async () => {
    now = new Date('2026-03-01T23:30:00Z');
    fs.writeFileSync(filePath, JSON.stringify({ usage: { date: '2026-03-01', count: 5 } }));
    const tokyo = new UsageTracker({ filePath, timeZone: 'Asia/Tokyo', now: () => now });

    assert.strictEqual(tokyo.today(), '2026-03-02');
    assert.strictEqual(await tokyo.getAndIncrement(), 1);
  });
});

describe('calendarDate', () => {
  it('formats the local date of a zone', () => {
    const instant = new Date('2026-01-01T03:00:00Z');
    assert.strictEqual(calendarDate(instant, 'UTC'), '2026-01-01');
    assert.strictEqual(calendarDate(instant, 'America/New_York'), '2025-12-31');
  });
});
