/**
 * RFC 7807 Problem Details body returned for every failed request.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc7807
 */
export interface ProblemDetails {
  /**
   * A URI reference that identifies the problem type.
   * Example: "https://tools.ietf.org/html/rfc7231#section-6.5.4"
   */
  type: string;

  /**
   * A short, human-readable summary of the problem type.
   * Example: "Not Found", "Validation Error"
   */
  title: string;

  /**
   * The HTTP status code for this occurrence of the problem.
   */
  status: number;

  /**
   * A human-readable explanation specific to this occurrence of the problem.
   */
  detail: string;

  /**
   * The request path that produced the problem, without its query string.
   */
  instance: string;

  /**
   * Field-level validation messages keyed by field path.
   * Only present for validation failures.
   */
  errors?: FieldErrors;

  /**
   * Correlates the response with server-side logs and traces.
   */
  traceId: string;
}

/**
 * Validation messages grouped by field, in the order the rules were declared.
 */
export type FieldErrors = Record<string, string[]>;

/**
 * Individual field validation error.
 */
export interface FieldError {
  /**
   * The field/property that has the error.
   * Uses dot notation for nested fields: "items.0.quantity"
   */
  field: string;

  /**
   * Machine-readable error code for this specific error.
   * Example: "too_small", "invalid_format"
   */
  code?: string;

  /**
   * Human-readable description of the error.
   */
  message: string;
}
