import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpException,
  HttpStatus,
} from "@nestjs/common";
import type { HttpAdapterHost } from "@nestjs/core";
import type { Request } from "express";
import { AppException } from "../errors/app.exception";
import type { ErrorMapper } from "../errors/error-mapper";
import { badRequest, type Failure, unclassified } from "../errors/failure";
import { resolveTraceId, toRequestPath } from "../http/trace-id.helper";

/**
 * Global exception filter that catches everything thrown while handling a request
 * and answers with an RFC 7807 problem body produced by the ErrorMapper.
 *
 * - AppException carries its failure through unchanged
 * - framework 404s (unknown routes) become not-found failures
 * - other framework 4xx errors become bad-request failures
 * - client errors raised by the body parser (http-errors with `expose`) are
 *   classified by their status the same way
 * - anything else is unclassified and answered with a 500
 */
@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  constructor(
    private readonly httpAdapterHost: HttpAdapterHost,
    private readonly errorMapper: ErrorMapper,
  ) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;

    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();

    const instance = toRequestPath(httpAdapter.getRequestUrl(request));
    const traceId = resolveTraceId(request);
    const { status, body } = this.errorMapper.map(toFailure(exception), traceId, instance);

    httpAdapter.reply(ctx.getResponse(), body, status);
  }
}

export function toFailure(exception: unknown): Failure {
  if (exception instanceof AppException) {
    return exception.getFailure();
  }

  if (exception instanceof HttpException) {
    const status = exception.getStatus();

    if (status === HttpStatus.NOT_FOUND) {
      return { kind: "not-found", message: exception.message };
    }
    if (status >= 400 && status < 500) {
      return badRequest(exception.message);
    }
  }

  const clientError = toExposedClientError(exception);
  if (clientError) {
    return clientError.status === HttpStatus.NOT_FOUND
      ? { kind: "not-found", message: clientError.message }
      : badRequest(clientError.message);
  }

  return unclassified(exception);
}

interface ExposedClientError {
  status: number;
  message: string;
}

/**
 * Recognizes the `http-errors` objects thrown by the Express body parser
 * (413 payload too large, 415 unsupported charset, ...). Only errors flagged
 * `expose` carry a message meant for the client.
 */
function toExposedClientError(exception: unknown): ExposedClientError | undefined {
  if (!(exception instanceof Error) || !("expose" in exception) || exception.expose !== true) {
    return undefined;
  }

  const status =
    "status" in exception && typeof exception.status === "number"
      ? exception.status
      : "statusCode" in exception && typeof exception.statusCode === "number"
        ? exception.statusCode
        : undefined;

  if (status === undefined || status < 400 || status >= 500) {
    return undefined;
  }

  return { status, message: exception.message };
}
