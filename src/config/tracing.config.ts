/**
 * Parses OTEL_EXPORTER_OTLP_HEADERS.
 * Format: "key1=value1,key2=value2", values percent-decoded.
 *
 * @example
 * parseOtlpHeaders("Authorization=Bearer%20token,X-Custom=value")
 * // { "Authorization": "Bearer token", "X-Custom": "value" }
 */
export function parseOtlpHeaders(
  otlpHeadersRaw: string | undefined,
): Record<string, string> | undefined {
  if (!otlpHeadersRaw) {
    return undefined;
  }

  const entries = otlpHeadersRaw
    .split(",")
    .map((pair) => pair.trim())
    .filter(Boolean)
    .map((pair): [string, string] => {
      const separator = pair.indexOf("=");
      const rawKey = (separator === -1 ? pair : pair.slice(0, separator)).trim();
      const rawValue = separator === -1 ? "" : pair.slice(separator + 1).trim();
      return [safeDecode(rawKey), safeDecode(rawValue)];
    })
    .filter(([key, value]) => key.length > 0 && value.length > 0);

  return Object.fromEntries(entries);
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // malformed escapes are kept verbatim
    return value;
  }
}
