import { Module } from "@nestjs/common";
import { CqrsModule } from "@nestjs/cqrs";

import { ResponsesModule } from "../responses/responses.module";
import { SentimentModule } from "../sentiment/sentiment.module";
import { SessionLedgerModule } from "../session-ledger/session-ledger.module";
import { ProcessMessageCommandHandler } from "./handlers/process-message.command-handler";
import { SessionSummaryQueryHandler } from "./handlers/session-summary.query-handler";
import {
  AllSessionsQueryHandler,
  SessionQueryHandler,
} from "./handlers/session.query-handler";
import { ConversationService } from "./services/conversation.service";

const commandHandlers = [ProcessMessageCommandHandler];
const queryHandlers = [
  SessionSummaryQueryHandler,
  SessionQueryHandler,
  AllSessionsQueryHandler,
];

@Module({
  imports: [CqrsModule, SentimentModule, ResponsesModule, SessionLedgerModule],
  providers: [...commandHandlers, ...queryHandlers, ConversationService],
  exports: [ConversationService],
})
export class ConversationModule {}
