import {
  Body,
  Controller,
  Get,
  HttpCode,
  Logger,
  Param,
  Post,
} from "@nestjs/common";
import { CommandBus, QueryBus } from "@nestjs/cqrs";

import { ProcessMessageCommand } from "../../../../common/commands/process-message.command";
import { SessionSummaryQuery } from "../../../../common/queries/session-summary.query";
import {
  AllSessionsQuery,
  SessionQuery,
} from "../../../../common/queries/session.query";
import type {
  Session,
  SessionSummary,
} from "../../../../common/types/conversation-session.type";
import { ChatRequestDto, type ChatResponseDto } from "./dtos/chat.dto";

@Controller()
export class ChatController {
  private readonly logger = new Logger(ChatController.name);

  constructor(
    private readonly commandBus: CommandBus,
    private readonly queryBus: QueryBus,
  ) {}

  @Post("chat")
  @HttpCode(200)
  async chat(@Body() body: ChatRequestDto): Promise<ChatResponseDto> {
    const command = ProcessMessageCommand.create(
      body.message ?? "",
      body.sessionId,
    );

    this.logger.debug(`Processing message for session ${command.sessionId}`);

    const result = await this.commandBus.execute(command);

    return {
      response: result.responseText,
      sentiment: result.sentiment.category,
      confidence: result.sentiment.confidence,
      sessionId: result.sessionId,
      timestamp: result.timestamp,
    };
  }

  @Get("sessions")
  async listSessions(): Promise<Record<string, Session>> {
    const sessions = await this.queryBus.execute(new AllSessionsQuery());
    return Object.fromEntries(sessions);
  }

  @Get("sessions/:sessionId")
  getSession(@Param("sessionId") sessionId: string): Promise<Session> {
    return this.queryBus.execute(new SessionQuery(sessionId));
  }

  @Get("sessions/:sessionId/summary")
  getSummary(@Param("sessionId") sessionId: string): Promise<SessionSummary> {
    return this.queryBus.execute(new SessionSummaryQuery(sessionId));
  }
}
