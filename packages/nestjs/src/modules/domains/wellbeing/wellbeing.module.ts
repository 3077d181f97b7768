import { Module } from "@nestjs/common";

import { ConversationModule } from "./modules/conversation/conversation.module";

@Module({
  imports: [ConversationModule],
})
export class WellbeingModule {}
