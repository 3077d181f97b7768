import { Inject } from "@nestjs/common";

import type {
  Interaction,
  Session,
  SessionSummary,
} from "../../../../../../common/types/conversation-session.type";
import type { SentimentResult } from "../../../../../../common/types/sentiment.type";

export const SESSION_LEDGER = Symbol("session-ledger");

/**
 * Port interface for the store of conversation sessions
 */
export interface SessionLedgerPort {
  /**
   * Appends one interaction, creating the session on first use. The
   * interaction and its history entry are written in the same synchronous
   * step, so implementations must not await in between.
   */
  record(
    sessionId: string,
    userInput: string,
    sentiment: SentimentResult,
    botResponse: string,
  ): Interaction;

  /**
   * @throws SessionNotFoundError when nothing was ever recorded for the id
   */
  summary(sessionId: string): SessionSummary;

  get(sessionId: string): Session | undefined;

  listAll(): ReadonlyMap<string, Session>;
}

export const InjectSessionLedger = () => Inject(SESSION_LEDGER);
