import { z } from "zod";

export const NODE_ENVIRONMENTS = ["development", "test", "production"] as const;

export const envSchema = z.object({
  NODE_ENV: z.enum(NODE_ENVIRONMENTS).default("production"),
  PORT: z.coerce.number().int().positive("PORT must be a positive integer").default(3000),
  HOST: z.string().min(1, "HOST must not be empty").default("0.0.0.0"),

  OTEL_SERVICE_NAME: z.string().optional(),
  OTEL_EXPORTER_OTLP_TRACES_ENDPOINT: z.url("OTEL_EXPORTER_OTLP_TRACES_ENDPOINT must be a valid URL").optional(),
  OTEL_EXPORTER_OTLP_HEADERS: z.string().optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnvironment(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = z.flattenError(result.error).fieldErrors;
    console.error("Environment validation failed:");

    for (const [field, messages] of Object.entries(errors)) {
      console.error(`  ${field}: ${messages?.join(", ")}`);
    }

    throw new Error("Invalid environment configuration. Please check your .env file.");
  }

  return result.data;
}

export function exposesInternalErrors(nodeEnv: EnvConfig["NODE_ENV"]): boolean {
  return nodeEnv === "development";
}
