import { describe, expect, it } from "vitest";
import { parseOtlpHeaders } from "./tracing.config";

describe("parseOtlpHeaders", () => {
  it("returns undefined when unset or empty", () => {
    expect(parseOtlpHeaders(undefined)).toBeUndefined();
    expect(parseOtlpHeaders("")).toBeUndefined();
  });

  it("parses and percent-decodes header pairs", () => {
    expect(parseOtlpHeaders("Authorization=Bearer%20test-token, X-Custom=value")).toEqual({
      Authorization: "Bearer test-token",
      "X-Custom": "value",
    });
  });

  it("keeps everything after the first equals sign in the value", () => {
    expect(parseOtlpHeaders("x-sig=a=b==")).toEqual({ "x-sig": "a=b==" });
  });

  it("drops pairs without a key or a value", () => {
    expect(parseOtlpHeaders("=orphan,empty=,ok=1,,")).toEqual({ ok: "1" });
  });

  it("keeps malformed escapes verbatim", () => {
    expect(parseOtlpHeaders("key=%E0%A4%A")).toEqual({ key: "%E0%A4%A" });
  });
});
