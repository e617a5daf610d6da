import { ValidationError } from '../errors';

/**
 * Gemini models offered by /ask_gemini, keyed by the name shown in Discord.
 */
export const MODELS = {
  '2.5 Flash': 'gemini-2.5-flash',
  '2.5 Pro': 'gemini-2.5-pro',
  '3.0 Flash': 'gemini-3-flash-preview',
} as const;

export type ModelDisplayName = keyof typeof MODELS;
export type ModelId = (typeof MODELS)[ModelDisplayName];

export const DEFAULT_MODEL: ModelDisplayName = '3.0 Flash';

const displayNames = Object.keys(MODELS).filter(
  (name): name is ModelDisplayName => name in MODELS
);

export function isModelDisplayName(value: string): value is ModelDisplayName {
  return displayNames.some((name) => name === value);
}

export function isModelId(value: string): value is ModelId {
  return displayNames.some((name) => MODELS[name] === value);
}

/**
 * Accepts a display name ("2.5 Pro") or a model id ("gemini-2.5-pro").
 * Falls back to `defaultModel` when nothing was chosen.
 */
export function resolveModel(choice: string | null | undefined, defaultModel: ModelDisplayName = DEFAULT_MODEL): ModelId {
  const value = choice?.trim();
  if (!value) {
    return MODELS[defaultModel];
  }
  if (isModelId(value)) {
    return value;
  }
  if (isModelDisplayName(value)) {
    return MODELS[value];
  }
  throw new ValidationError(
    `Unknown model "${value}". Choose one of: ${displayNames.join(', ')}.`
  );
}

export function getModelDisplayName(modelId: string): string {
  return displayNames.find((name) => MODELS[name] === modelId) ?? modelId;
}

export function getModelChoices(): Array<{ name: string; value: string }> {
  return displayNames.map((name) => ({ name, value: MODELS[name] }));
}
