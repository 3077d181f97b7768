import { Query } from "@nestjs/cqrs";

import type { SessionSummary } from "../types/conversation-session.type";

/**
 * Aggregated view of one session: duration, counts per category and the most
 * recent interactions
 */
export class SessionSummaryQuery extends Query<SessionSummary> {
  constructor(readonly sessionId: string) {
    super();
  }
}
