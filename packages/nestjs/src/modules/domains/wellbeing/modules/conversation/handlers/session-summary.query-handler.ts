import { type IQueryHandler, QueryHandler } from "@nestjs/cqrs";

import { SessionSummaryQuery } from "../../../../../../common/queries/session-summary.query";
import type { SessionSummary } from "../../../../../../common/types/conversation-session.type";
import { ConversationService } from "../services/conversation.service";

@QueryHandler(SessionSummaryQuery)
export class SessionSummaryQueryHandler
  implements IQueryHandler<SessionSummaryQuery, SessionSummary>
{
  constructor(private readonly conversationService: ConversationService) {}

  async execute(query: SessionSummaryQuery): Promise<SessionSummary> {
    return this.conversationService.getSummary(query.sessionId);
  }
}
