import type { PipeTransform } from "@nestjs/common";
import type { z } from "zod";
import type { FieldError } from "../errors/problem-details.interface";
import { ModelValidator } from "../validation/model-validator";

export type ExceptionFactory = (errors: FieldError[]) => Error;

/**
 * Parses a route argument with a zod schema. Rejected values are turned into
 * the exception built by `exceptionFactory`.
 */
export class ZodValidationPipe<T> implements PipeTransform<unknown, T> {
  private readonly validator: ModelValidator<T>;

  constructor(
    schema: z.ZodType<T>,
    private readonly exceptionFactory: ExceptionFactory,
  ) {
    this.validator = new ModelValidator(schema);
  }

  transform(value: unknown): T {
    const result = this.validator.check(value);

    if (!result.valid) {
      throw this.exceptionFactory(result.errors);
    }

    return result.value;
  }
}
