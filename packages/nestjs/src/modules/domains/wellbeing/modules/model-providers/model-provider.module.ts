import { HttpModule, HttpService } from "@nestjs/axios";
import { Logger, Module } from "@nestjs/common";
import { ConfigModule, type ConfigType } from "@nestjs/config";

import sentimentConfig from "../../../../config-management/configs/sentiment.config";
import { SentimentModelProvider } from "../../../../config-management/types/config.types";
import { SignalsModule } from "../signals/signals.module";
import { HttpSentimentModelAdapter } from "./adapters/http-inference.sentiment-model.adapter";
import { LexicalSentimentModelAdapter } from "./adapters/lexical.sentiment-model.adapter";
import {
  PRIMARY_SENTIMENT_MODEL,
  type SentimentModelPort,
} from "./ports/sentiment-model.port";

/**
 * Chooses the primary model once, at startup. The lexical model answers
 * whenever no external model is configured.
 */
export const selectPrimarySentimentModel = (
  config: ConfigType<typeof sentimentConfig>,
  lexical: LexicalSentimentModelAdapter,
  httpService: HttpService,
): SentimentModelPort => {
  const logger = new Logger("SentimentModelProvider");

  if (config.provider === SentimentModelProvider.HTTP) {
    logger.log(`Using http sentiment model at ${config.endpoint}`);
    return new HttpSentimentModelAdapter(httpService, config);
  }

  logger.log("Using lexical sentiment model");
  return lexical;
};

@Module({
  imports: [
    HttpModule,
    ConfigModule.forFeature(sentimentConfig),
    SignalsModule,
  ],
  providers: [
    LexicalSentimentModelAdapter,
    {
      provide: PRIMARY_SENTIMENT_MODEL,
      inject: [sentimentConfig.KEY, LexicalSentimentModelAdapter, HttpService],
      useFactory: selectPrimarySentimentModel,
    },
  ],
  exports: [PRIMARY_SENTIMENT_MODEL, LexicalSentimentModelAdapter],
})
export class ModelProviderModule {}
