import { HttpStatus } from "@nestjs/common";
import type { FieldErrors } from "./problem-details.interface";

export const VALIDATION_FAILURE_MESSAGE = "One or more validation failures have occurred.";

export interface NotFoundFailure {
  readonly kind: "not-found";
  readonly message: string;
}

export interface BadRequestFailure {
  readonly kind: "bad-request";
  readonly message: string;
}

export interface ValidationFailure {
  readonly kind: "validation";
  readonly errors: FieldErrors;
}

export interface UnclassifiedFailure {
  readonly kind: "unclassified";
  readonly cause: unknown;
  /** Name of the operation that was running when the failure surfaced. */
  readonly operation?: string;
}

/**
 * Every way a request can fail. The set is closed: the error mapper
 * switches over `kind` and the compiler checks that all four are handled.
 */
export type Failure = NotFoundFailure | BadRequestFailure | ValidationFailure | UnclassifiedFailure;

export type Outcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly failure: Failure };

export function notFound(entity: string, key: string): NotFoundFailure {
  return { kind: "not-found", message: `Entity "${entity}" (${key}) was not found.` };
}

export function badRequest(message: string): BadRequestFailure {
  return { kind: "bad-request", message };
}

export function validationFailure(errors: FieldErrors): ValidationFailure {
  return { kind: "validation", errors };
}

export function unclassified(cause: unknown, operation?: string): UnclassifiedFailure {
  return { kind: "unclassified", cause, ...(operation ? { operation } : {}) };
}

export function succeeded<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function failed(failure: Failure): Outcome<never> {
  return { ok: false, failure };
}

export function describeFailure(failure: Failure): string {
  switch (failure.kind) {
    case "not-found":
    case "bad-request":
      return failure.message;
    case "validation":
      return VALIDATION_FAILURE_MESSAGE;
    case "unclassified":
      return failure.cause instanceof Error ? failure.cause.message : String(failure.cause);
  }
}

export function failureStatus(failure: Failure): HttpStatus {
  switch (failure.kind) {
    case "not-found":
      return HttpStatus.NOT_FOUND;
    case "bad-request":
    case "validation":
      return HttpStatus.BAD_REQUEST;
    case "unclassified":
      return HttpStatus.INTERNAL_SERVER_ERROR;
  }
}
