import { Injectable, Logger } from "@nestjs/common";

import type { ProcessMessageResult } from "../../../../../../common/commands/process-message.command";
import { InvalidInputError } from "../../../../../../common/errors/domain.errors";
import type {
  Session,
  SessionSummary,
} from "../../../../../../common/types/conversation-session.type";
import { isBlank } from "../../../../../../common/utils/text.utils";
import { ResponseComposerService } from "../../responses/services/response-composer.service";
import { SentimentClassifierService } from "../../sentiment/services/sentiment-classifier.service";
import {
  InjectSessionLedger,
  type SessionLedgerPort,
} from "../../session-ledger/ports/session-ledger.port";

@Injectable()
export class ConversationService {
  private readonly logger = new Logger(ConversationService.name);

  constructor(
    private readonly classifier: SentimentClassifierService,
    private readonly composer: ResponseComposerService,
    @InjectSessionLedger() private readonly ledger: SessionLedgerPort,
  ) {}

  /**
   * Classifies the message, composes a reply and records both under the
   * session. Nothing is recorded for blank input.
   */
  async process(text: string, sessionId: string): Promise<ProcessMessageResult> {
    if (isBlank(text)) {
      throw new InvalidInputError();
    }

    const sentiment = await this.classifier.classify(text);
    const responseText = this.composer.compose(sentiment);
    const interaction = this.ledger.record(
      sessionId,
      text,
      sentiment,
      responseText,
    );

    this.logger.debug(
      `Session ${sessionId}: ${sentiment.category} (${sentiment.confidence.toFixed(2)})`,
    );

    return {
      sessionId,
      responseText,
      sentiment,
      timestamp: interaction.timestamp,
    };
  }

  getSummary(sessionId: string): SessionSummary {
    return this.ledger.summary(sessionId);
  }

  getSession(sessionId: string): Session | undefined {
    return this.ledger.get(sessionId);
  }

  getAllSessions(): ReadonlyMap<string, Session> {
    return this.ledger.listAll();
  }
}
