import * as Joi from "joi";

import { SentimentModelProvider } from "../types/config.types";

export const sentimentValidationSchema = Joi.object({
  SENTIMENT_MODEL_PROVIDER: Joi.string()
    .valid(...Object.values(SentimentModelProvider))
    .default(SentimentModelProvider.LEXICAL)
    .description("Which sentiment model answers first"),
  SENTIMENT_MODEL_ENDPOINT: Joi.any()
    .when("SENTIMENT_MODEL_PROVIDER", {
      is: SentimentModelProvider.HTTP,
      then: Joi.string().uri().required(),
      otherwise: Joi.string().uri().optional(),
    })
    .description("Inference endpoint accepting { inputs } and returning label/score pairs"),
  SENTIMENT_MODEL_API_KEY: Joi.string()
    .optional()
    .description("Bearer token sent to the inference endpoint"),
  SENTIMENT_MODEL_TIMEOUT_MS: Joi.number()
    .integer()
    .min(1)
    .default(3000)
    .description("Upper bound for a single model call"),
  SENTIMENT_POLARITY_THRESHOLD: Joi.number()
    .min(0)
    .max(1)
    .default(0.1)
    .description("Lexical polarity beyond which a message is positive or negative"),
});
