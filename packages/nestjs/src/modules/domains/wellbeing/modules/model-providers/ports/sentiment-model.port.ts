import { Inject } from "@nestjs/common";

import type { ModelSentimentLabel } from "../../../../../../common/types/sentiment.type";

export const PRIMARY_SENTIMENT_MODEL = Symbol("primary-sentiment-model");

/**
 * A model's verdict on one message, already mapped onto
 * positive / negative / neutral
 */
export interface SentimentPrediction {
  label: ModelSentimentLabel;

  /**
   * Certainty of the label, in [0, 1]
   */
  confidence: number;

  /**
   * Label exactly as the model reported it
   */
  rawLabel?: string;

  /**
   * Score exactly as the model reported it
   */
  rawScore?: number;
}

/**
 * Health check result for model status
 */
export interface SentimentModelHealth {
  healthy: boolean;
  status: string;
  metrics?: {
    lastSuccess?: Date;
    lastFailure?: Date;
    successCount?: number;
    errorCount?: number;
  };
}

/**
 * Port interface defining the contract for every sentiment model variant
 */
export interface SentimentModelPort {
  /**
   * Unique identifier for the model variant
   */
  readonly modelId: string;

  /**
   * Classify a single message. Implementations may reject; callers own the
   * fallback.
   */
  classify(text: string): Promise<SentimentPrediction>;

  healthCheck(): Promise<SentimentModelHealth>;
}

export const InjectPrimarySentimentModel = () =>
  Inject(PRIMARY_SENTIMENT_MODEL);
