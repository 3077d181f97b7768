// eslint-disable-next-line simple-import-sort/imports
import otelSDK from "./tracing";

import "reflect-metadata";

import { Logger, ValidationPipe } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { NestFactory } from "@nestjs/core";
import type { NestExpressApplication } from "@nestjs/platform-express";

import { AppModule } from "../app.module";
import {
  type AppLogLevel,
  LOG_LEVELS,
} from "../modules/config-management/types/config.types";
import { DomainExceptionFilter } from "../modules/entrypoints/modules/http/filters/domain-exception.filter";

const logger = new Logger("Bootstrap");

const isLogLevel = (value: string): value is AppLogLevel =>
  LOG_LEVELS.some((level) => level === value);

const parseLogLevels = (value: string): AppLogLevel[] =>
  value
    .split(",")
    .map((level) => level.trim())
    .filter(isLogLevel);

async function bootstrap() {
  otelSDK.start();

  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true,
  });

  // GET port and log levels from config
  const config = app.get(ConfigService);
  const port = config.getOrThrow<number>("PORT");
  app.useLogger(parseLogLevels(config.getOrThrow<string>("LOG_LEVELS")));

  app.useGlobalPipes(new ValidationPipe({ transform: true }));
  app.useGlobalFilters(new DomainExceptionFilter());

  const server = await app.listen(port, "0.0.0.0");
  const serverDetails = server.address();

  if (serverDetails && typeof serverDetails !== "string") {
    logger.log(
      `Listening on ${serverDetails.family} ${serverDetails.address}:${serverDetails.port}`,
    );
  }

  return app;
}

async function closeGracefully(signal: NodeJS.Signals) {
  logger.log(`Received signal to terminate: ${signal}`);

  try {
    const nestApp = await app;

    await Promise.all([nestApp.close(), otelSDK.shutdown()]);

    logger.log("Application closed gracefully");
    process.exit(0);
  } catch (error) {
    logger.error("Error during graceful shutdown", error);

    process.exit(1);
  }
}

process.on("SIGINT", (signal) => void closeGracefully(signal));
process.on("SIGTERM", (signal) => void closeGracefully(signal));

// Start the Application
const app = bootstrap();
