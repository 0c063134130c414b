import { z } from "zod";

import { ConfigError } from "./errors.js";

const envSchema = z.object({
  TABLE_NAME: z.string().min(1),
  POWERTOOLS_SERVICE_NAME: z.string().min(1).default("message-ingest"),
  POWERTOOLS_METRICS_NAMESPACE: z.string().min(1).default("MessageIngest"),
});

export interface IngestConfig {
  tableName: string;
  serviceName: string;
  metricsNamespace: string;
}

/**
 * Reads the function's settings from the environment. Called once at cold start;
 * everything downstream receives the returned value instead of touching process.env.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): IngestConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join("."));
    throw new ConfigError(`Invalid environment: ${fields.join(", ")}`);
  }

  return {
    tableName: parsed.data.TABLE_NAME,
    serviceName: parsed.data.POWERTOOLS_SERVICE_NAME,
    metricsNamespace: parsed.data.POWERTOOLS_METRICS_NAMESPACE,
  };
}
