/**
 * Emotional tone assigned to a single message
 */
export enum SentimentCategory {
  POSITIVE = "positive",
  NEGATIVE = "negative",
  NEUTRAL = "neutral",
  ANXIETY = "anxiety",
  SADNESS = "sadness",
}

export const SENTIMENT_CATEGORIES: readonly SentimentCategory[] =
  Object.values(SentimentCategory);

/**
 * Labels a sentiment model may produce before keyword overrides are applied
 */
export type ModelSentimentLabel =
  | SentimentCategory.POSITIVE
  | SentimentCategory.NEGATIVE
  | SentimentCategory.NEUTRAL;

export type KeywordOverride =
  | SentimentCategory.ANXIETY
  | SentimentCategory.SADNESS;

/**
 * Secondary scores gathered while classifying a message
 */
export interface SentimentSignals {
  /**
   * Lexical polarity in [-1, 1]
   */
  polarity: number;

  /**
   * Lexical subjectivity in [0, 1]
   */
  subjectivity: number;

  /**
   * Identifier of the model variant that produced the base label
   */
  modelId: string;

  /**
   * Raw label reported by the model, before normalization
   */
  modelLabel?: string;

  /**
   * Raw score reported by the model
   */
  modelScore?: number;

  /**
   * Category forced by a keyword match, if any
   */
  keywordOverride?: KeywordOverride;

  /**
   * Why the lexical fallback answered instead of the configured model
   */
  fallbackReason?: string;
}

export interface SentimentResult {
  readonly category: SentimentCategory;

  /**
   * Certainty of the assigned category, in [0, 1]
   */
  readonly confidence: number;

  readonly sourceText: string;

  readonly rawSignals?: Readonly<SentimentSignals>;
}

export const isSentimentCategory = (
  value: unknown,
): value is SentimentCategory =>
  SENTIMENT_CATEGORIES.some((category) => category === value);
