import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import Joi from "joi";

import conversationConfig from "./configs/conversation.config";
import sentimentConfig from "./configs/sentiment.config";
import { commonValidationSchema } from "./schemas/common.schema";
import { conversationValidationSchema } from "./schemas/conversation.schema";
import { sentimentValidationSchema } from "./schemas/sentiment.schema";

export const configValidationSchema = Joi.any()
  .concat(commonValidationSchema)
  .concat(conversationValidationSchema)
  .concat(sentimentValidationSchema);

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      expandVariables: true,
      validationSchema: configValidationSchema,
      validationOptions: {
        allowUnknown: true,
        abortEarly: false,
      },
      load: [conversationConfig, sentimentConfig],
    }),
  ],
})
export class ConfigManagementModule {}
