import { Inject, Injectable, Logger } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import { defer, firstValueFrom, timeout } from "rxjs";

import {
  ExternalModelError,
  toError,
} from "../../../../../../common/errors/domain.errors";
import {
  type KeywordOverride,
  SentimentCategory,
  type SentimentResult,
  type SentimentSignals,
} from "../../../../../../common/types/sentiment.type";
import { clamp } from "../../../../../../common/utils/text.utils";
import sentimentConfig from "../../../../../config-management/configs/sentiment.config";
import { LexicalSentimentModelAdapter } from "../../model-providers/adapters/lexical.sentiment-model.adapter";
import {
  InjectPrimarySentimentModel,
  type SentimentModelPort,
  type SentimentPrediction,
} from "../../model-providers/ports/sentiment-model.port";
import {
  type Signals,
  SignalExtractorService,
} from "../../signals/services/signal-extractor.service";

const FAILSAFE_CONFIDENCE = 0.5;

interface ModelVerdict {
  prediction: SentimentPrediction;
  modelId: string;
  fallbackReason?: string;
}

/**
 * Merges the primary model's label with lexical signals and keyword overrides
 * into one category. Never rejects.
 */
@Injectable()
export class SentimentClassifierService {
  private readonly logger = new Logger(SentimentClassifierService.name);

  constructor(
    private readonly extractor: SignalExtractorService,
    @InjectPrimarySentimentModel()
    private readonly primaryModel: SentimentModelPort,
    private readonly lexicalModel: LexicalSentimentModelAdapter,
    @Inject(sentimentConfig.KEY)
    private readonly config: ConfigType<typeof sentimentConfig>,
  ) {}

  /**
   * @param model - replaces the primary model for this call only
   */
  async classify(
    text: string,
    model: SentimentModelPort = this.primaryModel,
  ): Promise<SentimentResult> {
    try {
      const signals = this.extractor.extract(text);
      const verdict = await this.predict(text, signals, model);
      const keywordOverride = this.keywordOverride(signals);

      const rawSignals: SentimentSignals = {
        polarity: signals.polarity,
        subjectivity: signals.subjectivity,
        modelId: verdict.modelId,
        modelLabel: verdict.prediction.rawLabel,
        modelScore: verdict.prediction.rawScore,
        keywordOverride,
        fallbackReason: verdict.fallbackReason,
      };

      return Object.freeze({
        category: keywordOverride ?? verdict.prediction.label,
        confidence: this.boundConfidence(verdict.prediction.confidence),
        sourceText: text,
        rawSignals: Object.freeze(rawSignals),
      });
    } catch (error) {
      const errorObj = toError(error);
      this.logger.error(
        `Sentiment classification failed: ${errorObj.message}`,
        errorObj.stack,
      );

      return Object.freeze({
        category: SentimentCategory.NEUTRAL,
        confidence: FAILSAFE_CONFIDENCE,
        sourceText: text,
      });
    }
  }

  private async predict(
    text: string,
    signals: Signals,
    model: SentimentModelPort,
  ): Promise<ModelVerdict> {
    if (model.modelId === this.lexicalModel.modelId) {
      return {
        prediction: this.lexicalModel.fromPolarity(signals.polarity),
        modelId: this.lexicalModel.modelId,
      };
    }

    try {
      const prediction = await firstValueFrom(
        defer(() => model.classify(text)).pipe(timeout(this.config.timeoutMs)),
      );

      return { prediction, modelId: model.modelId };
    } catch (error) {
      const failure = new ExternalModelError(
        model.modelId,
        toError(error).message,
        { cause: error },
      );
      this.logger.warn(
        `${failure.message} - falling back to ${this.lexicalModel.modelId}`,
      );

      return {
        prediction: this.lexicalModel.fromPolarity(signals.polarity),
        modelId: this.lexicalModel.modelId,
        fallbackReason: failure.message,
      };
    }
  }

  /**
   * Anxiety wins over sadness when both are present
   */
  private keywordOverride(signals: Signals): KeywordOverride | undefined {
    if (signals.anxietyKeywords.length > 0) {
      return SentimentCategory.ANXIETY;
    }

    if (signals.sadnessKeywords.length > 0) {
      return SentimentCategory.SADNESS;
    }

    return undefined;
  }

  private boundConfidence(confidence: number): number {
    return Number.isFinite(confidence) ? clamp(confidence, 0, 1) : 0;
  }
}
