import { z } from "zod";

export const MODEL_OBJECT_REQUIRED = "Request body must be a JSON object";

/**
 * Object schema for a request model. Unknown keys, including any
 * client-supplied id, are dropped from the parsed value.
 */
export function modelObject<T extends Record<string, z.ZodType>>(shape: T) {
  return z.object(shape, { error: MODEL_OBJECT_REQUIRED });
}

/**
 * A string that must contain something other than whitespace.
 * Missing and non-string values report the same message as blank ones.
 */
export function requiredText(requiredMessage: string) {
  return z
    .string({ error: requiredMessage })
    .refine((value) => value.trim().length > 0, requiredMessage);
}

export function isoDateTime(message: string) {
  return z.iso.datetime({ offset: true, error: message });
}

export function entityId(message: string) {
  return z.uuid({ error: message });
}

export function oneOf<const T extends readonly [string, ...string[]]>(label: string, values: T) {
  return z.enum(values, { error: `${label} must be one of: ${values.join(", ")}` });
}

export const entityIdParamSchema = z.uuid();
