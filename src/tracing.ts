import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { HttpInstrumentation } from "@opentelemetry/instrumentation-http";
import { resourceFromAttributes } from "@opentelemetry/resources";
import { NodeSDK } from "@opentelemetry/sdk-node";
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import { SERVICE_NAME } from "./config/constants";
import { parseOtlpHeaders } from "./config/tracing.config";

const otlpEndpoint = process.env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT;

if (!otlpEndpoint) {
  console.warn("OTEL_EXPORTER_OTLP_TRACES_ENDPOINT not set. Tracing disabled.");
}

const sdk = new NodeSDK({
  resource: resourceFromAttributes({
    [ATTR_SERVICE_NAME]: process.env.OTEL_SERVICE_NAME || SERVICE_NAME,
  }),
  traceExporter: otlpEndpoint
    ? new OTLPTraceExporter({
        url: otlpEndpoint,
        headers: parseOtlpHeaders(process.env.OTEL_EXPORTER_OTLP_HEADERS),
      })
    : undefined,
  instrumentations: [new HttpInstrumentation()],
});

if (otlpEndpoint) {
  sdk.start();

  process.once("SIGTERM", () => {
    sdk.shutdown().catch((error: unknown) => {
      console.error("Failed to shut down tracing", error);
    });
  });
}

export default sdk;
