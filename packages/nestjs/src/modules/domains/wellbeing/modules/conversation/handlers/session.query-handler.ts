import { type IQueryHandler, QueryHandler } from "@nestjs/cqrs";

import { SessionNotFoundError } from "../../../../../../common/errors/domain.errors";
import {
  AllSessionsQuery,
  SessionQuery,
} from "../../../../../../common/queries/session.query";
import type { Session } from "../../../../../../common/types/conversation-session.type";
import { ConversationService } from "../services/conversation.service";

@QueryHandler(SessionQuery)
export class SessionQueryHandler
  implements IQueryHandler<SessionQuery, Session>
{
  constructor(private readonly conversationService: ConversationService) {}

  async execute(query: SessionQuery): Promise<Session> {
    const session = this.conversationService.getSession(query.sessionId);

    if (!session) {
      throw new SessionNotFoundError(query.sessionId);
    }

    return session;
  }
}

@QueryHandler(AllSessionsQuery)
export class AllSessionsQueryHandler
  implements IQueryHandler<AllSessionsQuery, ReadonlyMap<string, Session>>
{
  constructor(private readonly conversationService: ConversationService) {}

  async execute(): Promise<ReadonlyMap<string, Session>> {
    return this.conversationService.getAllSessions();
  }
}
