/**
 * Personality registry
 *
 * Personalities are named system prompts read once at startup from the
 * `system_prompts` map of the data file. The set is closed: names that were
 * not loaded are rejected rather than passed through.
 */

import { z } from 'zod';
import { ValidationError } from './errors';
import { createLogger } from './logger';
import { readDataFile } from './storage/dataFile';

const log = createLogger('personalities');

// Discord caps a string option at 25 choices.
export const MAX_PERSONALITY_CHOICES = 25;

export interface Personality {
  name: string;
  systemPrompt: string;
}

const systemPromptsSchema = z.record(z.string(), z.string());

export class PersonalityRegistry {
  private readonly personalities: ReadonlyMap<string, Personality>;
  readonly defaultName: string | undefined;

  constructor(systemPrompts: Record<string, string>, preferredDefault: string) {
    const entries = Object.entries(systemPrompts).map(
      ([name, systemPrompt]): [string, Personality] => [name, Object.freeze({ name, systemPrompt })]
    );
    this.personalities = new Map(entries);

    if (this.personalities.has(preferredDefault) || entries.length === 0) {
      this.defaultName = entries.length === 0 ? undefined : preferredDefault;
    } else {
      const [firstName] = entries[0];
      log.warn(`Default personality '${preferredDefault}' not found. Using '${firstName}' instead.`);
      this.defaultName = firstName;
    }
  }

  get size(): number {
    return this.personalities.size;
  }

  names(): string[] {
    return [...this.personalities.keys()];
  }

  /**
   * The named personality, or the default one when no name is given.
   */
  resolve(name?: string | null): Personality {
    const wanted = name?.trim() || this.defaultName;
    if (!wanted) {
      throw new ValidationError('Error: No personalities configured or loaded. Cannot process request.');
    }
    const personality = this.personalities.get(wanted);
    if (!personality) {
      throw new ValidationError(
        `Unknown personality "${wanted}". Choose one of: ${this.names().join(', ')}.`
      );
    }
    return personality;
  }

  getChoices(): Array<{ name: string; value: string }> {
    return this.names()
      .slice(0, MAX_PERSONALITY_CHOICES)
      .map((name) => ({ name, value: name }));
  }

  toSystemPrompts(): Record<string, string> {
    return Object.fromEntries(
      [...this.personalities.values()].map((p) => [p.name, p.systemPrompt])
    );
  }
}

export async function loadPersonalities(
  filePath: string,
  preferredDefault: string
): Promise<PersonalityRegistry> {
  const contents = await readDataFile(filePath);
  const parsed = systemPromptsSchema.safeParse(contents?.system_prompts ?? {});

  if (!contents || !parsed.success) {
    log.warn(`Could not load personalities from '${filePath}'. Personalities will be unavailable.`);
    return new PersonalityRegistry({}, preferredDefault);
  }

  const registry = new PersonalityRegistry(parsed.data, preferredDefault);
  log.info(`Loaded ${registry.size} personalities from '${filePath}'.`);
  return registry;
}
