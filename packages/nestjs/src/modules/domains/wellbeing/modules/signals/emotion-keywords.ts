/**
 * Whole-word triggers for the anxiety and sadness overrides. Matching is
 * done on lowercased tokens, so "download" never counts as "down".
 */
export const ANXIETY_KEYWORDS: ReadonlySet<string> = new Set([
  "anxious",
  "anxiety",
  "worried",
  "worry",
  "worrying",
  "nervous",
  "panic",
  "panicking",
  "stress",
  "stressed",
  "scared",
  "afraid",
  "overwhelmed",
]);

export const SADNESS_KEYWORDS: ReadonlySet<string> = new Set([
  "sad",
  "sadness",
  "depressed",
  "depression",
  "down",
  "hopeless",
  "grief",
  "grieving",
  "lonely",
  "heartbroken",
  "miserable",
]);

export const NEGATION_WORDS: ReadonlySet<string> = new Set([
  "not",
  "no",
  "never",
  "neither",
  "nor",
  "without",
  "cannot",
  "dont",
  "don't",
  "doesn't",
  "didn't",
  "isn't",
  "aren't",
  "wasn't",
  "weren't",
  "won't",
  "wouldn't",
  "can't",
  "couldn't",
  "shouldn't",
  "haven't",
  "hasn't",
  "hadn't",
]);

/**
 * Multipliers applied to the lexicon word that follows
 */
export const DEGREE_MODIFIERS: ReadonlyMap<string, number> = new Map([
  ["absolutely", 1.6],
  ["deeply", 1.4],
  ["extremely", 1.8],
  ["incredibly", 1.7],
  ["really", 1.3],
  ["so", 1.3],
  ["totally", 1.3],
  ["truly", 1.4],
  ["utterly", 1.6],
  ["very", 1.5],
  ["barely", 0.3],
  ["hardly", 0.3],
  ["mildly", 0.5],
  ["slightly", 0.5],
  ["somewhat", 0.6],
]);
