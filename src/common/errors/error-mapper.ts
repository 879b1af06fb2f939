import { HttpStatus, Logger } from "@nestjs/common";
import {
  type BadRequestFailure,
  type Failure,
  type NotFoundFailure,
  type UnclassifiedFailure,
  VALIDATION_FAILURE_MESSAGE,
  type ValidationFailure,
} from "./failure";
import type { ProblemDetails } from "./problem-details.interface";

export const PROBLEM_TYPES = {
  BAD_REQUEST: "https://tools.ietf.org/html/rfc7231#section-6.5.1",
  NOT_FOUND: "https://tools.ietf.org/html/rfc7231#section-6.5.4",
  INTERNAL_SERVER_ERROR: "https://tools.ietf.org/html/rfc7231#section-6.6.1",
} as const;

export const INTERNAL_ERROR_TITLE = "An error occurred while processing your request";
export const INTERNAL_ERROR_DETAIL = "An error occurred while processing your request.";

export interface ErrorMapperOptions {
  /**
   * When true, 500 responses carry the full error text including the stack.
   * Only enabled in development.
   */
  exposeInternalErrors: boolean;
}

export interface MappedError {
  status: HttpStatus;
  body: ProblemDetails;
}

/**
 * Turns a failure into the status code and problem details body sent to the client.
 * Every call is logged: warn for client failures, error for unclassified ones.
 */
export class ErrorMapper {
  private readonly logger = new Logger(ErrorMapper.name);

  constructor(private readonly options: ErrorMapperOptions) {}

  map(failure: Failure, traceId: string, instance: string): MappedError {
    switch (failure.kind) {
      case "not-found":
        return this.mapNotFound(failure, traceId, instance);
      case "bad-request":
        return this.mapBadRequest(failure, traceId, instance);
      case "validation":
        return this.mapValidation(failure, traceId, instance);
      case "unclassified":
        return this.mapUnclassified(failure, traceId, instance);
      default: {
        const unhandled: never = failure;
        return this.mapUnclassified({ kind: "unclassified", cause: unhandled }, traceId, instance);
      }
    }
  }

  private mapNotFound(failure: NotFoundFailure, traceId: string, instance: string): MappedError {
    this.logger.warn(`Not found error: ${failure.message}`);

    return {
      status: HttpStatus.NOT_FOUND,
      body: {
        type: PROBLEM_TYPES.NOT_FOUND,
        title: "Not Found",
        status: HttpStatus.NOT_FOUND,
        detail: failure.message,
        instance,
        traceId,
      },
    };
  }

  private mapBadRequest(failure: BadRequestFailure, traceId: string, instance: string): MappedError {
    this.logger.warn(`Bad request error: ${failure.message}`);

    return {
      status: HttpStatus.BAD_REQUEST,
      body: {
        type: PROBLEM_TYPES.BAD_REQUEST,
        title: "Bad Request",
        status: HttpStatus.BAD_REQUEST,
        detail: failure.message,
        instance,
        traceId,
      },
    };
  }

  private mapValidation(failure: ValidationFailure, traceId: string, instance: string): MappedError {
    const fields = Object.keys(failure.errors).join(", ");
    this.logger.warn(`Validation error: ${VALIDATION_FAILURE_MESSAGE} Fields: ${fields}`);

    return {
      status: HttpStatus.BAD_REQUEST,
      body: {
        type: PROBLEM_TYPES.BAD_REQUEST,
        title: "Validation Error",
        status: HttpStatus.BAD_REQUEST,
        detail: VALIDATION_FAILURE_MESSAGE,
        instance,
        errors: failure.errors,
        traceId,
      },
    };
  }

  private mapUnclassified(
    failure: UnclassifiedFailure,
    traceId: string,
    instance: string,
  ): MappedError {
    const { cause } = failure;
    const message = cause instanceof Error ? cause.message : String(cause);
    const stack = cause instanceof Error ? cause.stack : undefined;

    this.logger.error(
      `Unhandled exception during ${failure.operation ?? "operation"}: ${message}`,
      stack,
    );

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: {
        type: PROBLEM_TYPES.INTERNAL_SERVER_ERROR,
        title: INTERNAL_ERROR_TITLE,
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        detail: this.options.exposeInternalErrors ? describeCause(cause) : INTERNAL_ERROR_DETAIL,
        instance,
        traceId,
      },
    };
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.stack ?? `${cause.name}: ${cause.message}`;
  }
  return String(cause);
}
