import { afterEach, beforeAll, beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import {
  CONFIDENTIAL_CLIENT_ID,
  createSigner,
  JWKS_URI,
  MACHINE_CLIENT_ID,
  MACHINE_SECRET,
  PUBLIC_CLIENT_ID,
  providerFetch,
  requestUrl,
  serviceAccountClaims,
  signToken,
  type TestSigner,
  testAuthConfig,
  tokenResponse,
  userClaims,
} from "../test/oidcFixtures";
import { type AuthContext, createAuthContext } from "./AuthContext";
import { AuthenticatorChain } from "./AuthenticatorChain";
import {
  type Authenticator,
  ClientSecretAuthenticator,
  createConfidentialBearerAuthenticator,
} from "./authenticators";
import { AuthenticationError } from "./errors";
import { Principal } from "./Principal";
import { Token } from "./Token";
import { AuthErrorCode } from "./types";

vi.mock("../utils/logger");

const mockFetch = vi.fn<typeof fetch>();

function fakeAuthenticator(
  name: string,
  authenticate: Authenticator["authenticate"],
): Authenticator & { authenticate: Mock<Authenticator["authenticate"]> } {
  return { name, authenticate: vi.fn<Authenticator["authenticate"]>(authenticate) };
}

describe("AuthenticatorChain", () => {
  let signer: TestSigner;
  let machineToken: string;
  let auth: AuthContext;

  beforeAll(async () => {
    signer = await createSigner();
    machineToken = await signToken(signer, serviceAccountClaims(MACHINE_CLIENT_ID));
  });

  beforeEach(() => {
    vi.resetAllMocks();
    mockFetch.mockImplementation(providerFetch([signer]));
    vi.stubGlobal("fetch", mockFetch);
    auth = createAuthContext(testAuthConfig(), { retryBaseDelayMs: 0 });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("with fake authenticators", () => {
    let principal: Principal;

    beforeEach(() => {
      principal = Principal.fromToken(
        Token.preTrusted({ access_token: machineToken, token_type: "Bearer" }, auth.confidentialClient),
      );
    });

    it("should report the names of its authenticators in order", () => {
      const chain = new AuthenticatorChain([
        fakeAuthenticator("first", async () => null),
        fakeAuthenticator("second", async () => null),
      ]);

      expect(chain.names).toEqual(["first", "second"]);
    });

    it("should stop at the first authenticator that accepts", async () => {
      const abstaining = fakeAuthenticator("abstaining", async () => null);
      const accepting = fakeAuthenticator("accepting", async () => principal);
      const unreached = fakeAuthenticator("unreached", async () => null);
      const chain = new AuthenticatorChain([abstaining, accepting, unreached]);

      const result = await chain.run({ headers: {} });

      expect(result).toEqual({ status: "authenticated", principal, authenticator: "accepting" });
      expect(abstaining.authenticate).toHaveBeenCalledTimes(1);
      expect(unreached.authenticate).not.toHaveBeenCalled();
    });

    it("should stop at the first rejection without trying later schemes", async () => {
      const error = new AuthenticationError(AuthErrorCode.BAD_ACCESS_TOKEN, "Malformed access token.");
      const rejecting = fakeAuthenticator("rejecting", async () => {
        throw error;
      });
      const accepting = fakeAuthenticator("accepting", async () => principal);
      const chain = new AuthenticatorChain([rejecting, accepting]);

      const result = await chain.run({ headers: {} });

      expect(result).toEqual({ status: "rejected", error, authenticator: "rejecting" });
      expect(accepting.authenticate).not.toHaveBeenCalled();
    });

    it("should be anonymous when every authenticator abstains", async () => {
      const chain = new AuthenticatorChain([
        fakeAuthenticator("first", async () => null),
        fakeAuthenticator("second", async () => null),
      ]);

      await expect(chain.run({ headers: {} })).resolves.toEqual({ status: "anonymous" });
    });

    it("should propagate errors that are not authentication failures", async () => {
      const chain = new AuthenticatorChain([
        fakeAuthenticator("broken", async () => {
          throw new TypeError("bug");
        }),
      ]);

      await expect(chain.run({ headers: {} })).rejects.toThrow(TypeError);
    });

    it("should hand the request and signal to each authenticator", async () => {
      const authenticator = fakeAuthenticator("first", async () => null);
      const chain = new AuthenticatorChain([authenticator]);
      const request = { headers: { authorization: "Bearer abc" } };
      const controller = new AbortController();

      await chain.run(request, controller.signal);

      expect(authenticator.authenticate).toHaveBeenCalledWith(request, controller.signal);
    });
  });

  describe("with the identity route schemes", () => {
    const identityChain = () =>
      new AuthenticatorChain([
        new ClientSecretAuthenticator(auth.registry),
        createConfidentialBearerAuthenticator(auth),
      ]);

    it("should leave a request without credentials anonymous", async () => {
      await expect(identityChain().run({ headers: {} })).resolves.toEqual({ status: "anonymous" });
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it("should abort on an unregistered secret even with a valid bearer token", async () => {
      const raw = await signToken(signer, userClaims(CONFIDENTIAL_CLIENT_ID, PUBLIC_CLIENT_ID));

      const result = await identityChain().run({
        headers: { "x-client-secret": "test-unknown-secret", authorization: `Bearer ${raw}` },
      });

      expect(result).toMatchObject({
        status: "rejected",
        authenticator: "client-secret",
        error: { code: AuthErrorCode.APP_SECRET_NOT_AUTHORIZED },
      });
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it("should authenticate a registered secret as its machine client", async () => {
      mockFetch.mockImplementation(providerFetch([signer], () => tokenResponse(machineToken)));

      const result = await identityChain().run({
        headers: { "x-client-secret": MACHINE_SECRET },
      });

      expect(result.status).toBe("authenticated");
      if (result.status === "authenticated") {
        expect(result.authenticator).toBe("client-secret");
        expect(result.principal.clientId).toBe(MACHINE_CLIENT_ID);
        expect(result.principal.token.state.kind).toBe("pre_trusted");
      }
    });

    it("should reject a public token on a confidential route", async () => {
      const raw = await signToken(signer, userClaims(PUBLIC_CLIENT_ID, PUBLIC_CLIENT_ID));

      const result = await identityChain().run({ headers: { authorization: `Bearer ${raw}` } });

      expect(result).toMatchObject({
        status: "rejected",
        authenticator: "confidential-bearer",
        error: { code: AuthErrorCode.INVALID_AUDIENCE },
      });
    });

    it("should fetch the key set once for concurrent requests", async () => {
      const raw = await signToken(signer, userClaims(CONFIDENTIAL_CLIENT_ID, PUBLIC_CLIENT_ID));
      const chain = identityChain();

      const results = await Promise.all(
        Array.from({ length: 10 }, () => chain.run({ headers: { authorization: `Bearer ${raw}` } })),
      );

      expect(results.every((result) => result.status === "authenticated")).toBe(true);
      const keySetFetches = mockFetch.mock.calls.filter(([input]) => requestUrl(input) === JWKS_URI);
      expect(keySetFetches).toHaveLength(1);
    });
  });
});
