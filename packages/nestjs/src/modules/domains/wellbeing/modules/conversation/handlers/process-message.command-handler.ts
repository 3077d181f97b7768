import { CommandHandler, type ICommandHandler } from "@nestjs/cqrs";

import {
  ProcessMessageCommand,
  type ProcessMessageResult,
} from "../../../../../../common/commands/process-message.command";
import { ConversationService } from "../services/conversation.service";

@CommandHandler(ProcessMessageCommand)
export class ProcessMessageCommandHandler
  implements ICommandHandler<ProcessMessageCommand, ProcessMessageResult>
{
  constructor(private readonly conversationService: ConversationService) {}

  execute(command: ProcessMessageCommand): Promise<ProcessMessageResult> {
    return this.conversationService.process(command.text, command.sessionId);
  }
}
