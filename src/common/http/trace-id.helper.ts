import { randomUUID } from "node:crypto";
import { isSpanContextValid, trace } from "@opentelemetry/api";
import type { Request } from "express";
import { REQUEST_ID_HEADER } from "../middlewares/request-id.middleware";

type TraceableRequest = Pick<Request, "headers">;

/**
 * Picks the identifier that ties an error response to server-side telemetry:
 * the active span's trace id when tracing is on, otherwise the request id
 * assigned by RequestIdMiddleware, otherwise a fresh UUID.
 */
export function resolveTraceId(request: TraceableRequest): string {
  const spanContext = trace.getActiveSpan()?.spanContext();
  if (spanContext && isSpanContextValid(spanContext)) {
    return spanContext.traceId;
  }

  const requestId = request.headers[REQUEST_ID_HEADER];
  if (typeof requestId === "string" && requestId.length > 0) {
    return requestId;
  }

  return randomUUID();
}

/**
 * Strips the query string so the problem `instance` is the request path only.
 */
export function toRequestPath(url: string): string {
  const queryStart = url.indexOf("?");
  return queryStart === -1 ? url : url.slice(0, queryStart);
}
