import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import { CLOCK, systemClock } from "../../../../../common/utils/clock.utils";
import conversationConfig from "../../../../config-management/configs/conversation.config";
import { InMemorySessionLedgerAdapter } from "./adapters/in-memory.session-ledger.adapter";
import { SESSION_LEDGER } from "./ports/session-ledger.port";

@Module({
  imports: [ConfigModule.forFeature(conversationConfig)],
  providers: [
    { provide: CLOCK, useValue: systemClock },
    { provide: SESSION_LEDGER, useClass: InMemorySessionLedgerAdapter },
  ],
  exports: [SESSION_LEDGER],
})
export class SessionLedgerModule {}
