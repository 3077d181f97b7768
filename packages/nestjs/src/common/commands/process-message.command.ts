import { Command } from "@nestjs/cqrs";

import type { SentimentResult } from "../types/sentiment.type";

export const DEFAULT_SESSION_ID = "default";

/**
 * Outcome of processing one user message
 */
export interface ProcessMessageResult {
  sessionId: string;
  responseText: string;
  sentiment: SentimentResult;

  /**
   * ISO-8601 time the interaction was recorded
   */
  timestamp: string;
}

/**
 * Classifies a message, composes a reply and records the interaction
 */
export class ProcessMessageCommand extends Command<ProcessMessageResult> {
  /**
   * The user's message, typed or transcribed
   */
  readonly text: string;

  readonly sessionId: string;

  constructor(params: { text: string; sessionId?: string }) {
    super();

    this.text = params.text;
    this.sessionId = params.sessionId?.trim() || DEFAULT_SESSION_ID;
  }

  static create(text: string, sessionId?: string): ProcessMessageCommand {
    return new ProcessMessageCommand({ text, sessionId });
  }
}
