import { Inject, Injectable } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";

import sentimentConfig from "../../../../../config-management/configs/sentiment.config";
import { SignalExtractorService } from "../../signals/services/signal-extractor.service";
import type {
  SentimentModelHealth,
  SentimentModelPort,
  SentimentPrediction,
} from "../ports/sentiment-model.port";
import { labelFromPolarity } from "../utils/label.utils";

export const LEXICAL_MODEL_ID = "lexical";

/**
 * Always-available model that labels a message from its lexical polarity
 */
@Injectable()
export class LexicalSentimentModelAdapter implements SentimentModelPort {
  readonly modelId = LEXICAL_MODEL_ID;

  constructor(
    private readonly extractor: SignalExtractorService,
    @Inject(sentimentConfig.KEY)
    private readonly config: ConfigType<typeof sentimentConfig>,
  ) {}

  classify(text: string): Promise<SentimentPrediction> {
    return Promise.resolve(this.fromPolarity(this.extractor.extract(text).polarity));
  }

  /**
   * Synchronous form used when the polarity is already known
   */
  fromPolarity(polarity: number): SentimentPrediction {
    return labelFromPolarity(polarity, this.config.polarityThreshold);
  }

  healthCheck(): Promise<SentimentModelHealth> {
    return Promise.resolve({ healthy: true, status: "lexical scorer ready" });
  }
}
