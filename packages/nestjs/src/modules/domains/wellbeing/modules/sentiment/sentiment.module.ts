import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import sentimentConfig from "../../../../config-management/configs/sentiment.config";
import { ModelProviderModule } from "../model-providers/model-provider.module";
import { SignalsModule } from "../signals/signals.module";
import { SentimentClassifierService } from "./services/sentiment-classifier.service";

@Module({
  imports: [
    ConfigModule.forFeature(sentimentConfig),
    SignalsModule,
    ModelProviderModule,
  ],
  providers: [SentimentClassifierService],
  exports: [SentimentClassifierService],
})
export class SentimentModule {}
