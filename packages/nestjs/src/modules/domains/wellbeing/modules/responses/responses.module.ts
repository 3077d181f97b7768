import { Module } from "@nestjs/common";
import { ConfigModule, type ConfigType } from "@nestjs/config";

import {
  createRandomSource,
  RANDOM_SOURCE,
} from "../../../../../common/utils/random.utils";
import conversationConfig from "../../../../config-management/configs/conversation.config";
import responseTemplates from "./data/response-templates.json";
import { RESPONSE_TEMPLATES } from "./response-templates";
import { ResponseComposerService } from "./services/response-composer.service";
import { ResponseTemplateStore } from "./services/response-template.store";

@Module({
  imports: [ConfigModule.forFeature(conversationConfig)],
  providers: [
    { provide: RESPONSE_TEMPLATES, useValue: responseTemplates },
    {
      provide: RANDOM_SOURCE,
      inject: [conversationConfig.KEY],
      useFactory: (config: ConfigType<typeof conversationConfig>) =>
        createRandomSource(config.randomSeed),
    },
    ResponseTemplateStore,
    ResponseComposerService,
  ],
  exports: [ResponseTemplateStore, ResponseComposerService],
})
export class ResponsesModule {}
