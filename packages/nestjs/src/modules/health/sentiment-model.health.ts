import { Injectable } from "@nestjs/common";
import { HealthIndicatorService } from "@nestjs/terminus";

import {
  InjectPrimarySentimentModel,
  type SentimentModelPort,
} from "../domains/wellbeing/modules/model-providers/ports/sentiment-model.port";

/**
 * Reports the primary sentiment model. Classification falls back to the
 * lexical scorer, so a down model degrades replies rather than failing them.
 */
@Injectable()
export class SentimentModelHealthIndicator {
  constructor(
    private readonly healthIndicatorService: HealthIndicatorService,
    @InjectPrimarySentimentModel()
    private readonly model: SentimentModelPort,
  ) {}

  async isHealthy(key: string) {
    const indicator = this.healthIndicatorService.check(key);
    const health = await this.model.healthCheck();
    const details = {
      modelId: this.model.modelId,
      message: health.status,
      successCount: health.metrics?.successCount ?? 0,
      errorCount: health.metrics?.errorCount ?? 0,
    };

    return health.healthy ? indicator.up(details) : indicator.down(details);
  }
}
