import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from "@nestjs/common";
import type { Response } from "express";

import {
  InvalidInputError,
  KindredError,
  SessionNotFoundError,
  toError,
} from "../../../../../common/errors/domain.errors";

interface ErrorBody {
  statusCode: number;
  error: string;
  message: string;
}

const INTERNAL_ERROR: ErrorBody = {
  statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
  error: "Internal Server Error",
  message: "Internal server error",
};

/**
 * Maps domain errors onto HTTP responses. Anything unexpected becomes a bare
 * 500 so no internals reach the client.
 */
@Catch()
export class DomainExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(DomainExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();

    if (exception instanceof HttpException) {
      response.status(exception.getStatus()).json(exception.getResponse());
      return;
    }

    const body = this.toBody(exception);
    response.status(body.statusCode).json(body);
  }

  private toBody(exception: unknown): ErrorBody {
    if (exception instanceof InvalidInputError) {
      return {
        statusCode: HttpStatus.BAD_REQUEST,
        error: "Bad Request",
        message: exception.message,
      };
    }

    if (exception instanceof SessionNotFoundError) {
      return {
        statusCode: HttpStatus.NOT_FOUND,
        error: "Not Found",
        message: "Session not found",
      };
    }

    const error = toError(exception);
    const code = exception instanceof KindredError ? ` [${exception.code}]` : "";
    this.logger.error(`Unhandled error${code}: ${error.message}`, error.stack);

    return INTERNAL_ERROR;
  }
}
