import { Inject, Injectable, Logger } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";

import { SessionNotFoundError } from "../../../../../../common/errors/domain.errors";
import type {
  Interaction,
  Session,
  SessionSummary,
} from "../../../../../../common/types/conversation-session.type";
import type {
  SentimentCategory,
  SentimentResult,
} from "../../../../../../common/types/sentiment.type";
import { type Clock, InjectClock } from "../../../../../../common/utils/clock.utils";
import { formatDuration } from "../../../../../../common/utils/text.utils";
import conversationConfig from "../../../../../config-management/configs/conversation.config";
import type { SessionLedgerPort } from "../ports/session-ledger.port";

interface SessionRecord {
  readonly id: string;
  readonly startTime: Date;
  readonly interactions: Interaction[];
  readonly sentimentHistory: SentimentCategory[];
}

/**
 * Keeps every session in process memory for the lifetime of the app
 */
@Injectable()
export class InMemorySessionLedgerAdapter implements SessionLedgerPort {
  private readonly logger = new Logger(InMemorySessionLedgerAdapter.name);
  private readonly sessions = new Map<string, SessionRecord>();

  constructor(
    @InjectClock() private readonly clock: Clock,
    @Inject(conversationConfig.KEY)
    private readonly config: ConfigType<typeof conversationConfig>,
  ) {}

  record(
    sessionId: string,
    userInput: string,
    sentiment: SentimentResult,
    botResponse: string,
  ): Interaction {
    const now = this.clock();
    let session = this.sessions.get(sessionId);

    if (!session) {
      session = {
        id: sessionId,
        startTime: now,
        interactions: [],
        sentimentHistory: [],
      };
      this.sessions.set(sessionId, session);
      this.logger.debug(`Started session ${sessionId}`);
    }

    const interaction: Interaction = Object.freeze({
      timestamp: now.toISOString(),
      userInput,
      sentiment,
      botResponse,
    });

    session.interactions.push(interaction);
    session.sentimentHistory.push(sentiment.category);

    return interaction;
  }

  summary(sessionId: string): SessionSummary {
    const session = this.sessions.get(sessionId);

    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }

    const durationMs = Math.max(
      0,
      this.clock().getTime() - session.startTime.getTime(),
    );

    const sentimentDistribution: SessionSummary["sentimentDistribution"] = {};
    for (const category of session.sentimentHistory) {
      sentimentDistribution[category] =
        (sentimentDistribution[category] ?? 0) + 1;
    }

    return {
      sessionId,
      startTime: session.startTime.toISOString(),
      durationMs,
      duration: formatDuration(durationMs),
      totalInteractions: session.interactions.length,
      sentimentDistribution,
      recentInteractions:
        this.config.recentLimit > 0
          ? session.interactions.slice(-this.config.recentLimit)
          : [],
    };
  }

  get(sessionId: string): Session | undefined {
    const session = this.sessions.get(sessionId);
    return session && this.snapshot(session);
  }

  listAll(): ReadonlyMap<string, Session> {
    return new Map(
      [...this.sessions].map(([id, session]) => [id, this.snapshot(session)]),
    );
  }

  private snapshot(session: SessionRecord): Session {
    return Object.freeze({
      id: session.id,
      startTime: new Date(session.startTime),
      interactions: Object.freeze([...session.interactions]),
      sentimentHistory: Object.freeze([...session.sentimentHistory]),
    });
  }
}
