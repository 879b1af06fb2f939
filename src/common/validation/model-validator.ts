import type { z } from "zod";
import type { FieldError, FieldErrors } from "../errors/problem-details.interface";

export const ROOT_FIELD_ERROR = "_root";

export type ValidationCheck<T> =
  | { valid: true; value: T }
  | { valid: false; errors: FieldError[] };

export function mapZodIssuesToFieldErrors(
  issues: ReadonlyArray<{ path: PropertyKey[]; code?: string; message: string }>,
): FieldError[] {
  return issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.map(String).join(".") : ROOT_FIELD_ERROR,
    code: issue.code,
    message: issue.message,
  }));
}

/**
 * Groups field errors by field, keeping the first-seen field order and the
 * order of messages within each field.
 */
export function groupFieldErrors(errors: readonly FieldError[]): FieldErrors {
  const grouped: FieldErrors = {};
  for (const { field, message } of errors) {
    (grouped[field] ??= []).push(message);
  }
  return grouped;
}

/**
 * Checks candidate records against a declarative schema and reports every
 * broken rule at once. Fields are reported in schema declaration order and,
 * within a field, in the order the rules were chained.
 *
 * Never throws: an invalid candidate is data, not an exception.
 */
export class ModelValidator<T> {
  constructor(private readonly schema: z.ZodType<T>) {}

  validate(candidate: unknown): FieldError[] {
    const result = this.check(candidate);
    return result.valid ? [] : result.errors;
  }

  check(candidate: unknown): ValidationCheck<T> {
    const result = this.schema.safeParse(candidate);

    if (!result.success) {
      return { valid: false, errors: mapZodIssuesToFieldErrors(result.error.issues) };
    }

    return { valid: true, value: result.data };
  }
}
