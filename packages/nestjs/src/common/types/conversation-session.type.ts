import type { SentimentCategory, SentimentResult } from "./sentiment.type";

/**
 * A single processed message and the reply it received
 */
export interface Interaction {
  /**
   * ISO-8601 time the interaction was recorded
   */
  readonly timestamp: string;
  readonly userInput: string;
  readonly sentiment: SentimentResult;
  readonly botResponse: string;
}

/**
 * Ordered history of interactions under one conversational identity
 */
export interface Session {
  readonly id: string;
  readonly startTime: Date;
  readonly interactions: readonly Interaction[];
  readonly sentimentHistory: readonly SentimentCategory[];
}

export interface SessionSummary {
  sessionId: string;
  startTime: string;
  durationMs: number;

  /**
   * Elapsed time formatted as H:MM:SS
   */
  duration: string;
  totalInteractions: number;
  sentimentDistribution: Partial<Record<SentimentCategory, number>>;
  recentInteractions: Interaction[];
}
