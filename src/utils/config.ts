/**
 * Environment-driven configuration. `.env` files are loaded by the entry point
 * through dotenv before anything reads process.env.
 */

import { z } from "zod";
import type { AuthConfig } from "../auth/types";

export const DEFAULT_PORT = 6290;
export const DEFAULT_JWKS_CACHE_TTL_SECONDS = 300;
export const DEFAULT_HTTP_TIMEOUT_MS = 5000;
export const DEFAULT_HTTP_RETRIES = 3;
export const DEFAULT_CLOCK_SKEW_SECONDS = 60;

const apiClientsSchema = z
  .string()
  .default("{}")
  .transform((value, ctx): unknown => {
    try {
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be valid JSON" });
      return z.NEVER;
    }
  })
  .pipe(z.record(z.string().min(1), z.string().min(1)));

const envSchema = z.object({
  OIDC_SERVER_URL: z.string().url(),
  OIDC_REALM: z.string().min(1),
  OIDC_PUBLIC_CLIENT_ID: z.string().min(1),
  OIDC_CONFIDENTIAL_CLIENT_ID: z.string().min(1),
  OIDC_CONFIDENTIAL_CLIENT_SECRET: z.string().min(1),
  OIDC_API_CLIENTS: apiClientsSchema,
  OIDC_JWKS_CACHE_TTL_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_JWKS_CACHE_TTL_SECONDS),
  OIDC_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_HTTP_TIMEOUT_MS),
  OIDC_HTTP_RETRIES: z.coerce.number().int().min(0).max(10).default(DEFAULT_HTTP_RETRIES),
  OIDC_CLOCK_SKEW_SECONDS: z.coerce.number().int().min(0).default(DEFAULT_CLOCK_SKEW_SECONDS),
  PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
});

export interface AppConfig {
  auth: AuthConfig;
  port: number;
}

/**
 * Reads and validates the configuration. Every invalid variable is reported at once.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }

  const values = result.data;
  return {
    auth: {
      serverUrl: values.OIDC_SERVER_URL,
      realm: values.OIDC_REALM,
      publicClientId: values.OIDC_PUBLIC_CLIENT_ID,
      confidentialClientId: values.OIDC_CONFIDENTIAL_CLIENT_ID,
      confidentialClientSecret: values.OIDC_CONFIDENTIAL_CLIENT_SECRET,
      apiClients: values.OIDC_API_CLIENTS,
      jwksCacheTtlSeconds: values.OIDC_JWKS_CACHE_TTL_SECONDS,
      httpTimeoutMs: values.OIDC_HTTP_TIMEOUT_MS,
      httpRetries: values.OIDC_HTTP_RETRIES,
      clockSkewSeconds: values.OIDC_CLOCK_SKEW_SECONDS,
    },
    port: values.PORT,
  };
}
