import { Query } from "@nestjs/cqrs";

import type { Session } from "../types/conversation-session.type";

/**
 * Full history of one session
 */
export class SessionQuery extends Query<Session> {
  constructor(readonly sessionId: string) {
    super();
  }
}

/**
 * Every session recorded since the process started, for analytics
 */
export class AllSessionsQuery extends Query<ReadonlyMap<string, Session>> {}
