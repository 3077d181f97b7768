const WORD_PATTERN = /[\p{L}\p{N}]+(?:['’]\p{L}+)*/gu;

/**
 * Splits text into word tokens, keeping their original casing. Curly
 * apostrophes are folded to straight ones so contractions match word lists.
 */
export const extractWords = (text: string): string[] =>
  (text.match(WORD_PATTERN) ?? []).map((word) => word.replace(/’/g, "'"));

/**
 * Lowercased word tokens
 */
export const tokenize = (text: string): string[] =>
  extractWords(text).map((word) => word.toLowerCase());

export const isBlank = (text: string | null | undefined): boolean =>
  !text || text.trim().length === 0;

export const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

/**
 * Formats a millisecond span as H:MM:SS
 */
export const formatDuration = (durationMs: number): string => {
  const totalSeconds = Math.max(0, Math.floor(durationMs / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  return `${hours}:${String(minutes).padStart(2, "0")}:${String(seconds).padStart(2, "0")}`;
};
