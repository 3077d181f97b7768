import { afterEach, describe, expect, it } from "vitest";

import { configValidationSchema } from "../config-management.module";
import conversationConfig from "../configs/conversation.config";
import sentimentConfig from "../configs/sentiment.config";
import { SentimentModelProvider } from "../types/config.types";

describe("configuration", () => {
  describe("configValidationSchema", () => {
    it("should apply defaults to an empty environment", () => {
      const { error, value } = configValidationSchema.validate({});

      expect(error).toBeUndefined();
      expect(value).toMatchObject({
        NODE_ENV: "development",
        PORT: 6655,
        LOG_LEVELS: "log,warn,error,fatal",
        SENTIMENT_MODEL_PROVIDER: "lexical",
        SENTIMENT_MODEL_TIMEOUT_MS: 3000,
        SENTIMENT_POLARITY_THRESHOLD: 0.1,
        SESSION_RECENT_LIMIT: 5,
      });
    });

    it("should require an endpoint for the http model", () => {
      const { error } = configValidationSchema.validate({
        SENTIMENT_MODEL_PROVIDER: "http",
      });

      expect(error?.message).toBe('"SENTIMENT_MODEL_ENDPOINT" is required');
    });

    it("should accept the http model with an endpoint", () => {
      const { error } = configValidationSchema.validate({
        SENTIMENT_MODEL_PROVIDER: "http",
        SENTIMENT_MODEL_ENDPOINT: "http://localhost:8080/classify",
      });

      expect(error).toBeUndefined();
    });

    it("should reject unknown log levels", () => {
      const { error } = configValidationSchema.validate({
        LOG_LEVELS: "log,chatty",
      });

      expect(error).toBeDefined();
    });

    it("should reject a polarity threshold outside 0..1", () => {
      const { error } = configValidationSchema.validate({
        SENTIMENT_POLARITY_THRESHOLD: 1.5,
      });

      expect(error?.message).toBe(
        '"SENTIMENT_POLARITY_THRESHOLD" must be less than or equal to 1',
      );
    });
  });

  describe("config factories", () => {
    const original = { ...process.env };

    afterEach(() => {
      process.env = { ...original };
    });

    it("should read the sentiment settings", () => {
      process.env.SENTIMENT_MODEL_PROVIDER = "http";
      process.env.SENTIMENT_MODEL_ENDPOINT = "http://localhost:8080/classify";
      process.env.SENTIMENT_MODEL_API_KEY = "test-secret";
      process.env.SENTIMENT_MODEL_TIMEOUT_MS = "1500";
      process.env.SENTIMENT_POLARITY_THRESHOLD = "0.3";

      expect(sentimentConfig()).toEqual({
        provider: SentimentModelProvider.HTTP,
        endpoint: "http://localhost:8080/classify",
        apiKey: "test-secret",
        timeoutMs: 1500,
        polarityThreshold: 0.3,
      });
    });

    it("should fall back to the lexical model and default numbers", () => {
      process.env.SENTIMENT_MODEL_PROVIDER = "something-else";
      delete process.env.SENTIMENT_MODEL_TIMEOUT_MS;
      delete process.env.SENTIMENT_POLARITY_THRESHOLD;

      expect(sentimentConfig()).toMatchObject({
        provider: SentimentModelProvider.LEXICAL,
        timeoutMs: 3000,
        polarityThreshold: 0.1,
      });
    });

    it("should leave the random seed unset when not configured", () => {
      delete process.env.RESPONSE_RANDOM_SEED;
      delete process.env.SESSION_RECENT_LIMIT;

      expect(conversationConfig()).toEqual({
        randomSeed: undefined,
        recentLimit: 5,
      });
    });

    it("should read the random seed and recent limit", () => {
      process.env.RESPONSE_RANDOM_SEED = "42";
      process.env.SESSION_RECENT_LIMIT = "3";

      expect(conversationConfig()).toEqual({ randomSeed: 42, recentLimit: 3 });
    });
  });
});
