import { z } from 'zod';
import { createLogger } from '../logger';
import { errorMessage } from '../errors';
import { DataFileContents, readDataFile, writeDataFile } from '../storage/dataFile';

const log = createLogger('usage');

export interface UsageRecord {
  date: string;
  count: number;
}

const usageRecordSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  count: z.number().int().nonnegative(),
});

export interface UsageTrackerOptions {
  filePath: string;
  /** IANA zone whose calendar day the counter follows. Defaults to UTC. */
  timeZone?: string;
  now?: () => Date;
  /** Written under `system_prompts` when the file has none yet. */
  systemPrompts?: Record<string, string>;
}

/**
 * Calendar date of `date` in `timeZone`, as YYYY-MM-DD.
 */
export function calendarDate(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';
  return `${part('year')}-${part('month')}-${part('day')}`;
}

/**
 * Daily count of Gemini calls, persisted under the `usage` key of the data
 * file. Every read-modify-write runs behind one in-process lock. The last
 * record is also kept in memory, so the count keeps rising for the day when
 * the file cannot be read back or written.
 */
export class UsageTracker {
  private readonly filePath: string;
  private readonly timeZone: string;
  private readonly now: () => Date;
  private readonly systemPrompts: Record<string, string>;
  private tail: Promise<void> = Promise.resolve();
  private last: UsageRecord | null = null;

  constructor(options: UsageTrackerOptions) {
    this.filePath = options.filePath;
    this.timeZone = options.timeZone ?? 'UTC';
    this.now = options.now ?? (() => new Date());
    this.systemPrompts = options.systemPrompts ?? {};
  }

  today(): string {
    return calendarDate(this.now(), this.timeZone);
  }

  /**
   * Startup read. Resets and persists the record when it is stale or unusable.
   */
  async load(): Promise<number> {
    return this.withLock(async () => {
      const contents = await readDataFile(this.filePath);
      const stored = this.parseRecord(contents);
      const today = this.today();
      const count = this.countFor(today, stored);

      if (count !== null) {
        log.info(`Loaded usage data: ${count} calls made today (${today}).`);
        this.last = { date: today, count };
        return count;
      }

      if (stored) {
        log.info(`Detected new day (${today}). API usage counter reset.`);
      } else {
        log.warn(`No usable usage record in ${this.filePath}. Initializing count to 0.`);
      }
      await this.save(contents, { date: today, count: 0 });
      return 0;
    });
  }

  async getAndIncrement(): Promise<number> {
    return this.withLock(async () => {
      const contents = await readDataFile(this.filePath);
      const stored = this.parseRecord(contents);
      const today = this.today();

      let count = this.countFor(today, stored);
      if (count === null) {
        if (stored || this.last) {
          log.info(`Detected new day (${today}) during increment. API usage counter reset.`);
        }
        count = 0;
      }

      const next: UsageRecord = { date: today, count: count + 1 };
      await this.save(contents, next);
      log.info(`Gemini call successful. Count for today: ${next.count}`);
      return next.count;
    });
  }

  async peek(): Promise<number> {
    return this.withLock(async () => {
      const stored = this.parseRecord(await readDataFile(this.filePath));
      return this.countFor(this.today(), stored) ?? 0;
    });
  }

  /**
   * Today's count from the file or from memory, whichever is higher; null
   * when neither holds a record for today.
   */
  private countFor(today: string, stored: UsageRecord | null): number | null {
    const counts = [stored, this.last]
      .filter((record): record is UsageRecord => record !== null && record.date === today)
      .map((record) => record.count);
    return counts.length > 0 ? Math.max(...counts) : null;
  }

  private parseRecord(contents: DataFileContents | null): UsageRecord | null {
    if (!contents) return null;
    const parsed = usageRecordSchema.safeParse(contents.usage);
    return parsed.success ? parsed.data : null;
  }

  // Only the usage section is replaced; other keys survive external edits.
  private async save(contents: DataFileContents | null, record: UsageRecord): Promise<void> {
    this.last = record;
    const next: DataFileContents = { ...(contents ?? {}), usage: record };
    if (!('system_prompts' in next)) {
      next.system_prompts = this.systemPrompts;
    }
    try {
      await writeDataFile(this.filePath, next);
    } catch (error) {
      log.error(`Error saving usage data to '${this.filePath}': ${errorMessage(error)}`);
    }
  }

  private withLock<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
