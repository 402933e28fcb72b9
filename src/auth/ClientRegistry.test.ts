import { describe, expect, it, vi } from "vitest";
import { JWKS_URI, REALM, SERVER_URL } from "../test/oidcFixtures";
import { ClientRegistry } from "./ClientRegistry";
import { KeyRing } from "./KeyRing";
import { OidcClient } from "./OidcClient";

vi.mock("../utils/logger");

describe("ClientRegistry", () => {
  const keyRing = new KeyRing({ jwksUri: JWKS_URI });
  const createClient = vi.fn(
    (clientId: string, clientSecret: string) =>
      new OidcClient({ serverUrl: SERVER_URL, realm: REALM, clientId, clientSecret }, { keyRing }),
  );

  const registry = ClientRegistry.fromConfig(
    { "test-secret-a": "client-a", "test-secret-b": "client-b" },
    createClient,
  );

  it("should create one client per configured secret", () => {
    expect(createClient).toHaveBeenCalledTimes(2);
    expect(createClient).toHaveBeenCalledWith("client-a", "test-secret-a");
    expect(createClient).toHaveBeenCalledWith("client-b", "test-secret-b");
    expect(registry.size).toBe(2);
    expect(registry.clientIds()).toEqual(["client-a", "client-b"]);
  });

  it("should resolve a known secret to its client", () => {
    const client = registry.lookup("test-secret-b");

    expect(client?.clientId).toBe("client-b");
    expect(client?.isConfidential).toBe(true);
  });

  it("should not resolve unknown or partially matching secrets", () => {
    expect(registry.lookup("test-secret-c")).toBeUndefined();
    expect(registry.lookup("test-secret")).toBeUndefined();
    expect(registry.lookup("TEST-SECRET-A")).toBeUndefined();
    expect(registry.lookup("")).toBeUndefined();
  });

  it("should start empty", () => {
    const empty = ClientRegistry.empty();

    expect(empty.size).toBe(0);
    expect(empty.lookup("test-secret-a")).toBeUndefined();
  });
});
