import "reflect-metadata";

// Setup environment variables for tests
process.env.NODE_ENV = "test";
process.env.LOG_LEVELS = "error";

// Sentiment model configuration
process.env.SENTIMENT_MODEL_PROVIDER = "lexical";
process.env.SENTIMENT_MODEL_TIMEOUT_MS = "3000";
process.env.SENTIMENT_POLARITY_THRESHOLD = "0.1";

// Response composition
process.env.RESPONSE_RANDOM_SEED = "42";
process.env.SESSION_RECENT_LIMIT = "5";
