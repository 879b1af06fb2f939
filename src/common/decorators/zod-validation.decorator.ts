import { Param } from "@nestjs/common";
import type { z } from "zod";
import { AppException } from "../errors/app.exception";
import { badRequest } from "../errors/failure";
import { type ExceptionFactory, ZodValidationPipe } from "../pipes/zod-validation.pipe";
import { entityIdParamSchema } from "../validation/rules";

export function ZodParam<T>(
  paramName: string,
  schema: z.ZodType<T>,
  exceptionFactory: ExceptionFactory,
): ParameterDecorator {
  return Param(paramName, new ZodValidationPipe(schema, exceptionFactory));
}

/**
 * Binds the `:id` route parameter, rejecting anything that is not a UUID
 * with a 400 "Invalid <entity> ID format" before the handler runs.
 */
export function EntityIdParam(entityLabel: string): ParameterDecorator {
  return ZodParam(
    "id",
    entityIdParamSchema,
    () => new AppException(badRequest(`Invalid ${entityLabel} ID format`)),
  );
}
