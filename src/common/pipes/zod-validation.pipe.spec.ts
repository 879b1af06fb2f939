import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { ZodValidationPipe } from "./zod-validation.pipe";

describe("ZodValidationPipe", () => {
  const schema = z.object({
    name: z.string().min(2, "Name is too short"),
  });

  it("returns the parsed value when it is valid", () => {
    const exceptionFactory = vi.fn(() => new Error("unexpected"));
    const pipe = new ZodValidationPipe(schema, exceptionFactory);

    expect(pipe.transform({ name: "Ada", extra: true })).toEqual({ name: "Ada" });
    expect(exceptionFactory).not.toHaveBeenCalled();
  });

  it("throws the error built from the field errors", () => {
    const pipe = new ZodValidationPipe(
      schema,
      (errors) => new Error(errors.map(({ field, message }) => `${field}: ${message}`).join("; ")),
    );

    expect(() => pipe.transform({ name: "A" })).toThrow("name: Name is too short");
  });

  it("passes every failure to the factory", () => {
    const exceptionFactory = vi.fn(() => new Error("rejected"));
    const pipe = new ZodValidationPipe(schema, exceptionFactory);

    expect(() => pipe.transform("not an object")).toThrow("rejected");
    expect(exceptionFactory).toHaveBeenCalledWith([
      expect.objectContaining({ field: "_root" }),
    ]);
  });
});
