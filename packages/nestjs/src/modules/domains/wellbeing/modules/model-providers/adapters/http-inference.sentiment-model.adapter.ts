import { HttpService } from "@nestjs/axios";
import { Logger } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import { firstValueFrom, timeout } from "rxjs";
import { z } from "zod";

import { toError } from "../../../../../../common/errors/domain.errors";
import { clamp } from "../../../../../../common/utils/text.utils";
import sentimentConfig from "../../../../../config-management/configs/sentiment.config";
import type {
  SentimentModelHealth,
  SentimentModelPort,
  SentimentPrediction,
} from "../ports/sentiment-model.port";
import { normalizeModelLabel } from "../utils/label.utils";

export const HTTP_MODEL_ID = "http-inference";

const scoredLabelSchema = z.object({
  label: z.string(),
  score: z.number(),
});

/**
 * Text-classification endpoints answer either with a flat list of scored
 * labels or with one list per input.
 */
export const inferenceResponseSchema = z.union([
  z.array(scoredLabelSchema),
  z.array(z.array(scoredLabelSchema)),
]);

export type InferenceResponse = z.infer<typeof inferenceResponseSchema>;

type ScoredLabel = z.infer<typeof scoredLabelSchema>;

/**
 * Sentiment model served over HTTP, e.g. a hosted transformer behind an
 * inference API. Constructed only when the HTTP provider is configured.
 */
export class HttpSentimentModelAdapter implements SentimentModelPort {
  private readonly logger = new Logger(HttpSentimentModelAdapter.name);

  readonly modelId = HTTP_MODEL_ID;

  private successCount = 0;
  private errorCount = 0;
  private lastSuccess?: Date;
  private lastFailure?: Date;

  private readonly endpoint: string;

  constructor(
    private readonly httpService: HttpService,
    private readonly config: ConfigType<typeof sentimentConfig>,
  ) {
    if (!config.endpoint) {
      throw new Error(
        "SENTIMENT_MODEL_ENDPOINT is required for the http sentiment model",
      );
    }

    this.endpoint = config.endpoint;
  }

  async classify(text: string): Promise<SentimentPrediction> {
    try {
      const response = await firstValueFrom(
        this.httpService
          .post<unknown>(
            this.endpoint,
            { inputs: text },
            {
              headers: this.config.apiKey
                ? { Authorization: `Bearer ${this.config.apiKey}` }
                : undefined,
              timeout: this.config.timeoutMs,
            },
          )
          .pipe(timeout(this.config.timeoutMs)),
      );

      const parsed = inferenceResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new Error(
          `Unexpected inference response: ${parsed.error.message}`,
        );
      }

      const best = this.pickBest(parsed.data);

      this.successCount++;
      this.lastSuccess = new Date();

      return {
        label: normalizeModelLabel(best.label),
        confidence: clamp(best.score, 0, 1),
        rawLabel: best.label,
        rawScore: best.score,
      };
    } catch (error) {
      this.errorCount++;
      this.lastFailure = new Date();
      this.logger.debug(
        `Inference call failed: ${toError(error).message}`,
      );
      throw error;
    }
  }

  healthCheck(): Promise<SentimentModelHealth> {
    const healthy =
      this.lastFailure === undefined ||
      (this.lastSuccess !== undefined && this.lastSuccess >= this.lastFailure);

    return Promise.resolve({
      healthy,
      status: healthy
        ? "inference endpoint responding"
        : "last inference call failed",
      metrics: {
        lastSuccess: this.lastSuccess,
        lastFailure: this.lastFailure,
        successCount: this.successCount,
        errorCount: this.errorCount,
      },
    });
  }

  private pickBest(response: InferenceResponse): ScoredLabel {
    const entries: Array<ScoredLabel | ScoredLabel[]> = response;
    const candidates = entries.flatMap((entry) =>
      Array.isArray(entry) ? entry : [entry],
    );

    if (candidates.length === 0) {
      throw new Error("Inference response contained no labels");
    }

    return candidates.reduce((best, candidate) =>
      candidate.score > best.score ? candidate : best,
    );
  }
}
