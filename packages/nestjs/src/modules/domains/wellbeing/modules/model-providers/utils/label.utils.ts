import {
  type ModelSentimentLabel,
  SentimentCategory,
} from "../../../../../../common/types/sentiment.type";

// Index order used by three-way sentiment heads (LABEL_0 .. LABEL_2)
const INDEXED_LABELS: readonly ModelSentimentLabel[] = [
  SentimentCategory.NEGATIVE,
  SentimentCategory.NEUTRAL,
  SentimentCategory.POSITIVE,
];

/**
 * Maps whatever label a model emits onto positive / negative / neutral.
 * Unknown labels count as neutral.
 */
export const normalizeModelLabel = (rawLabel: string): ModelSentimentLabel => {
  const label = rawLabel.trim().toLowerCase();

  const indexed = /^label_(\d+)$/.exec(label);
  if (indexed) {
    return INDEXED_LABELS[Number(indexed[1])] ?? SentimentCategory.NEUTRAL;
  }

  if (label.includes("pos")) {
    return SentimentCategory.POSITIVE;
  }

  if (label.includes("neg")) {
    return SentimentCategory.NEGATIVE;
  }

  return SentimentCategory.NEUTRAL;
};

/**
 * Lexical policy: beyond +threshold is positive, below -threshold negative,
 * anything in between neutral.
 */
export const labelFromPolarity = (
  polarity: number,
  threshold: number,
): { label: ModelSentimentLabel; confidence: number } => {
  if (polarity > threshold) {
    return { label: SentimentCategory.POSITIVE, confidence: polarity };
  }

  if (polarity < -threshold) {
    return {
      label: SentimentCategory.NEGATIVE,
      confidence: Math.abs(polarity),
    };
  }

  return {
    label: SentimentCategory.NEUTRAL,
    confidence: 1 - Math.abs(polarity),
  };
};
