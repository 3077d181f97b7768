import { Module } from "@nestjs/common";
import { TerminusModule } from "@nestjs/terminus";

import { ModelProviderModule } from "../domains/wellbeing/modules/model-providers/model-provider.module";
import { HealthController } from "./health.controller";
import { SentimentModelHealthIndicator } from "./sentiment-model.health";

@Module({
  imports: [TerminusModule, ModelProviderModule],
  controllers: [HealthController],
  providers: [SentimentModelHealthIndicator],
})
export class HealthModule {}
