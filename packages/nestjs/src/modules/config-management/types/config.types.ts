export enum NodeEnv {
  PRODUCTION = "production",
  DEVELOPMENT = "development",
  TEST = "test",
}

export enum SentimentModelProvider {
  LEXICAL = "lexical",
  HTTP = "http",
}

export const LOG_LEVELS = [
  "verbose",
  "debug",
  "log",
  "warn",
  "error",
  "fatal",
] as const;

export type AppLogLevel = (typeof LOG_LEVELS)[number];
