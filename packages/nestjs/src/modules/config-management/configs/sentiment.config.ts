import { registerAs } from "@nestjs/config";

import { SentimentModelProvider } from "../types/config.types";

const parseProvider = (value?: string): SentimentModelProvider =>
  value === SentimentModelProvider.HTTP
    ? SentimentModelProvider.HTTP
    : SentimentModelProvider.LEXICAL;

const parseNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseFloat(String(value));
  return Number.isFinite(parsed) ? parsed : fallback;
};

export default registerAs("sentiment", () => {
  return {
    provider: parseProvider(process.env.SENTIMENT_MODEL_PROVIDER),
    endpoint: process.env.SENTIMENT_MODEL_ENDPOINT,
    apiKey: process.env.SENTIMENT_MODEL_API_KEY,
    timeoutMs: parseNumber(process.env.SENTIMENT_MODEL_TIMEOUT_MS, 3000),
    polarityThreshold: parseNumber(
      process.env.SENTIMENT_POLARITY_THRESHOLD,
      0.1,
    ),
  };
});
