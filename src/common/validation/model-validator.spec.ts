import { describe, expect, it } from "vitest";
import { z } from "zod";
import {
  groupFieldErrors,
  mapZodIssuesToFieldErrors,
  ModelValidator,
  ROOT_FIELD_ERROR,
} from "./model-validator";

describe("ModelValidator", () => {
  const validator = new ModelValidator(
    z.object({
      title: z.string({ error: "Title is required" }).max(5, "Title is too long"),
      tags: z.array(z.string({ error: "Tag must be text" })),
    }),
  );

  it("returns no failures for a valid candidate", () => {
    expect(validator.validate({ title: "Hello", tags: ["a"] })).toEqual([]);
  });

  it("reports every broken rule with dotted paths for nested fields", () => {
    const messages = validator
      .validate({ title: "Too long title", tags: ["ok", 3] })
      .map(({ field, message }) => ({ field, message }));

    expect(messages).toEqual([
      { field: "title", message: "Title is too long" },
      { field: "tags.1", message: "Tag must be text" },
    ]);
  });

  it("reports a non-object candidate under the root key", () => {
    const errors = validator.validate("not an object");

    expect(errors).toHaveLength(1);
    expect(errors[0]?.field).toBe(ROOT_FIELD_ERROR);
  });

  it("returns the parsed value from check", () => {
    expect(validator.check({ title: "Hi", tags: [], unknown: 1 })).toEqual({
      valid: true,
      value: { title: "Hi", tags: [] },
    });
  });
});

describe("mapZodIssuesToFieldErrors", () => {
  it("maps root-level issues to the _root field", () => {
    expect(
      mapZodIssuesToFieldErrors([{ path: [], code: "custom", message: "Payload is invalid" }]),
    ).toEqual([{ field: "_root", code: "custom", message: "Payload is invalid" }]);
  });
});

describe("groupFieldErrors", () => {
  it("groups messages per field in first-seen order", () => {
    const grouped = groupFieldErrors([
      { field: "email", message: "Email is required" },
      { field: "name", message: "Name is required" },
      { field: "email", message: "Email is invalid" },
    ]);

    expect(grouped).toEqual({
      email: ["Email is required", "Email is invalid"],
      name: ["Name is required"],
    });
    expect(Object.keys(grouped)).toEqual(["email", "name"]);
  });

  it("returns an empty map for no failures", () => {
    expect(groupFieldErrors([])).toEqual({});
  });
});
