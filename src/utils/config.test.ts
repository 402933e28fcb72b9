import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

const baseEnv = {
  OIDC_SERVER_URL: "https://sso.example.com",
  OIDC_REALM: "test-realm",
  OIDC_PUBLIC_CLIENT_ID: "test-public",
  OIDC_CONFIDENTIAL_CLIENT_ID: "test-confidential",
  OIDC_CONFIDENTIAL_CLIENT_SECRET: "test-confidential-secret",
};

describe("loadConfig", () => {
  it("should apply defaults for optional settings", () => {
    expect(loadConfig(baseEnv)).toEqual({
      auth: {
        serverUrl: "https://sso.example.com",
        realm: "test-realm",
        publicClientId: "test-public",
        confidentialClientId: "test-confidential",
        confidentialClientSecret: "test-confidential-secret",
        apiClients: {},
        jwksCacheTtlSeconds: 300,
        httpTimeoutMs: 5000,
        httpRetries: 3,
        clockSkewSeconds: 60,
      },
      port: 6290,
    });
  });

  it("should parse machine clients and numeric overrides", () => {
    const config = loadConfig({
      ...baseEnv,
      OIDC_API_CLIENTS: '{"test-secret-a":"client-a","test-secret-b":"client-b"}',
      OIDC_JWKS_CACHE_TTL_SECONDS: "60",
      OIDC_HTTP_TIMEOUT_MS: "1500",
      OIDC_HTTP_RETRIES: "0",
      OIDC_CLOCK_SKEW_SECONDS: "10",
      PORT: "8080",
    });

    expect(config.auth.apiClients).toEqual({
      "test-secret-a": "client-a",
      "test-secret-b": "client-b",
    });
    expect(config.auth.jwksCacheTtlSeconds).toBe(60);
    expect(config.auth.httpTimeoutMs).toBe(1500);
    expect(config.auth.httpRetries).toBe(0);
    expect(config.auth.clockSkewSeconds).toBe(10);
    expect(config.port).toBe(8080);
  });

  it("should report every missing variable at once", () => {
    expect(() => loadConfig({ OIDC_REALM: "test-realm" })).toThrow(
      /OIDC_SERVER_URL.*OIDC_PUBLIC_CLIENT_ID.*OIDC_CONFIDENTIAL_CLIENT_ID.*OIDC_CONFIDENTIAL_CLIENT_SECRET/,
    );
  });

  it("should reject a server URL that is not a URL", () => {
    expect(() => loadConfig({ ...baseEnv, OIDC_SERVER_URL: "sso.example.com" })).toThrow(
      /^Invalid configuration: OIDC_SERVER_URL: /,
    );
  });

  it("should reject machine clients that are not valid JSON", () => {
    expect(() => loadConfig({ ...baseEnv, OIDC_API_CLIENTS: "{not json" })).toThrow(
      "Invalid configuration: OIDC_API_CLIENTS: must be valid JSON",
    );
  });

  it("should reject machine clients that do not map secrets to client ids", () => {
    expect(() => loadConfig({ ...baseEnv, OIDC_API_CLIENTS: '{"test-secret":42}' })).toThrow(
      /^Invalid configuration: OIDC_API_CLIENTS\.test-secret: /,
    );
  });

  it("should reject an out-of-range port", () => {
    expect(() => loadConfig({ ...baseEnv, PORT: "70000" })).toThrow(/PORT: /);
  });
});
