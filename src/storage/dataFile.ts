import fs from 'fs/promises';
import path from 'path';
import { createLogger } from '../logger';
import { errorMessage } from '../errors';

const log = createLogger('data');

export type DataFileContents = Record<string, unknown>;

function isRecord(value: unknown): value is DataFileContents {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads the bot's JSON data file. Returns null when the file is absent,
 * unreadable, empty or not a JSON object.
 */
export async function readDataFile(filePath: string): Promise<DataFileContents | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      log.debug(`No data file at ${filePath}`);
    } else {
      log.warn(`Could not read data file ${filePath}: ${errorMessage(error)}`);
    }
    return null;
  }

  if (!raw.trim()) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed)) {
      log.warn(`Data file ${filePath} does not hold a JSON object`);
      return null;
    }
    return parsed;
  } catch (error) {
    log.warn(`Data file ${filePath} is not valid JSON: ${errorMessage(error)}`);
    return null;
  }
}

export async function writeDataFile(filePath: string, contents: DataFileContents): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(contents, null, 2), 'utf-8');
}
