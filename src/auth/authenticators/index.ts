export {
  BearerAuthenticator,
  type BearerAuthenticatorOptions,
  type BearerClients,
  type BearerPolicy,
  createConfidentialBearerAuthenticator,
  createPublicBearerAuthenticator,
} from "./BearerAuthenticator";
export { ClientSecretAuthenticator } from "./ClientSecretAuthenticator";
export type { Authenticator } from "./types";
