/**
 * Splits model output into pieces that fit Discord's length limits.
 */

export const EMBED_DESCRIPTION_LIMIT = 4096;
export const EMBED_TITLE_LIMIT = 256;

const SENTENCE_END = /[.!?]\s/g;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

function lastSentenceCut(window: string): number {
  let cut = -1;
  for (const match of window.matchAll(SENTENCE_END)) {
    cut = (match.index ?? 0) + match[0].length;
  }
  return cut;
}

function lastWhitespaceCut(window: string): number {
  for (let i = window.length - 1; i >= 0; i--) {
    if (/\s/.test(window[i])) {
      return i + 1;
    }
  }
  return -1;
}

/**
 * Length of the next chunk starting at `start`. Prefers, in order, a
 * paragraph break, a line break, a sentence end and any whitespace, but
 * only a cut that leaves at most `budget` code units for the chunks after
 * this one. Otherwise cuts hard at `maxLength`.
 */
function nextCut(text: string, start: number, maxLength: number, budget: number): number {
  const window = text.slice(start, start + maxLength);
  const fits = (cut: number): boolean => cut > 0 && text.length - (start + cut) <= budget;

  const paragraph = window.lastIndexOf('\n\n');
  const candidates = [
    paragraph >= 0 ? paragraph + 2 : -1,
    window.lastIndexOf('\n') + 1,
    lastSentenceCut(window),
    lastWhitespaceCut(window),
  ];
  for (const cut of candidates) {
    if (fits(cut)) {
      return cut;
    }
  }

  // Hard cut; keep surrogate pairs together.
  const last = text.charCodeAt(start + maxLength - 1);
  const next = text.charCodeAt(start + maxLength);
  if (isHighSurrogate(last) && isLowSurrogate(next)) {
    return maxLength - 1;
  }
  return maxLength;
}

/**
 * Lazily yields at most `ceil(text.length / maxLength)` chunks of at most
 * `maxLength` code units each. The whitespace a chunk breaks at stays at
 * its end, so joining the chunks gives back `text`.
 *
 * A hard cut that would split a surrogate pair moves back one unit, which
 * can cost one extra chunk on text with no slack left.
 */
export function* chunkText(text: string, maxLength: number): Generator<string, void, undefined> {
  if (!Number.isInteger(maxLength) || maxLength < 2) {
    throw new RangeError(`maxLength must be an integer >= 2, got ${maxLength}`);
  }

  const total = Math.ceil(text.length / maxLength);
  let start = 0;
  let emitted = 0;
  while (start < text.length) {
    if (text.length - start <= maxLength) {
      yield text.slice(start);
      return;
    }
    emitted++;
    const budget = Math.max(0, total - emitted) * maxLength;
    const cut = nextCut(text, start, maxLength, budget);
    yield text.slice(start, start + cut);
    start += cut;
  }
}

/**
 * Shortens `text` to `maxLength`, ending with "..." when something was cut.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength - 3)}...`;
}
