import { Module } from "@nestjs/common";
import { CqrsModule } from "@nestjs/cqrs";

import { ChatController } from "./chat.controller";

@Module({
  imports: [CqrsModule],
  controllers: [ChatController],
})
export class HttpEntryPointModule {}
