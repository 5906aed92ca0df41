/**
 * Azure usage configuration schema (TypeBox) and default config.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { AzureRetryOptions } from "./types.js";

export const configSchema = Type.Object({
  subscriptionId: Type.Optional(Type.String({ description: "Default Azure subscription ID" })),
  tenantId: Type.Optional(Type.String({ description: "Azure AD tenant ID" })),
  credentialMethod: Type.Union(
    [
      Type.Literal("default"),
      Type.Literal("cli"),
      Type.Literal("service-principal"),
      Type.Literal("managed-identity"),
    ],
    { default: "default" },
  ),
  apiVersion: Type.String({ default: "2023-05-01", description: "Preferred Consumption API version" }),
  fallbackApiVersion: Type.String({
    default: "2021-10-01",
    description: "Used once when the preferred api-version is rejected; empty disables the fallback",
  }),
  retryConfig: Type.Object(
    {
      maxRateLimitAttempts: Type.Integer({ minimum: 1, default: 5 }),
      maxTransientAttempts: Type.Integer({ minimum: 1, default: 3 }),
      minDelayMs: Type.Number({ minimum: 0, default: 1000 }),
      maxDelayMs: Type.Number({ minimum: 0, default: 60_000 }),
      jitterFactor: Type.Number({ minimum: 0, maximum: 1, default: 0.2 }),
    },
    { default: {} },
  ),
  tolerance: Type.Number({ minimum: 0, default: 0.01, description: "Dual-total tolerance (ε)" }),
  invalidRecordPolicy: Type.Union([Type.Literal("abort"), Type.Literal("skip")], { default: "abort" }),
  chunking: Type.Object(
    {
      chunkDays: Type.Integer({ minimum: 1, default: 31 }),
      concurrency: Type.Integer({ minimum: 1, default: 2 }),
    },
    { default: {} },
  ),
  logging: Type.Object(
    {
      level: Type.Union(
        [
          Type.Literal("fatal"),
          Type.Literal("error"),
          Type.Literal("warn"),
          Type.Literal("info"),
          Type.Literal("debug"),
          Type.Literal("trace"),
          Type.Literal("silent"),
        ],
        { default: "info" },
      ),
      json: Type.Boolean({ default: false }),
    },
    { default: {} },
  ),
  diagnostics: Type.Object(
    {
      enabled: Type.Boolean({ default: false }),
    },
    { default: {} },
  ),
});

export type AzureUsageConfig = Static<typeof configSchema>;

export function getDefaultConfig(): AzureUsageConfig {
  return resolveConfig({}, {});
}

/**
 * Merge environment overrides into raw config, apply schema defaults and validate.
 * Throws with every schema violation listed when the result is not a valid config.
 */
export function resolveConfig(
  input: unknown,
  env: Record<string, string | undefined> = process.env,
): AzureUsageConfig {
  const raw: Record<string, unknown> =
    typeof input === "object" && input !== null ? { ...input } : {};

  if (raw.subscriptionId === undefined && env.AZURE_SUBSCRIPTION_ID) {
    raw.subscriptionId = env.AZURE_SUBSCRIPTION_ID;
  }
  if (raw.tenantId === undefined && env.AZURE_TENANT_ID) {
    raw.tenantId = env.AZURE_TENANT_ID;
  }
  if (env.USAGE_LOG_LEVEL) {
    const logging = typeof raw.logging === "object" && raw.logging !== null ? raw.logging : {};
    raw.logging = { ...logging, level: env.USAGE_LOG_LEVEL };
  }

  const withDefaults = Value.Default(configSchema, raw);
  if (!Value.Check(configSchema, withDefaults)) {
    const problems = [...Value.Errors(configSchema, withDefaults)].map(
      (e) => `${e.path || "/"}: ${e.message}`,
    );
    throw new Error(`Invalid usage config: ${problems.join("; ")}`);
  }
  return withDefaults;
}

export function toRetryOptions(config: AzureUsageConfig): AzureRetryOptions {
  return { ...config.retryConfig };
}
