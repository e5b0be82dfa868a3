export {
  AzureKeyProviderFactory,
  createKeyProviderFactory,
} from "./key-provider/factory.js";

export { AzureKeyProvider } from "./key-provider/provider.js";

export {
  ServicePrincipalCredentials,
  parseAuthority,
  DEFAULT_AUTHORITY,
  type Authority,
  type RefreshOptions,
  type ServicePrincipalOptions,
} from "./credentials/service-principal.js";

export {
  CertificateAssertionSigner,
  CLIENT_ASSERTION_TYPE,
  loadCertificate,
  parseCertificatePem,
  type CertificateMaterial,
  type ClientAssertionClaims,
  type ClientAssertionSigner,
} from "./credentials/assertion.js";

export {
  UndiciTokenTransport,
  createUndiciTransport,
  type TlsOptions,
  type TokenRequest,
  type TokenTransport,
  type TransportFactory,
  type TransportResponse,
} from "./transport/http.js";

export {
  RetryExecutor,
  DEFAULT_RETRY_POLICY,
  isRetryableError,
  type RetryPolicy,
  type Sleeper,
} from "./utils/retry.js";

export { type ConfigurationSource } from "./config/source.js";

export type {
  AccessToken,
  ClosableCredentials,
  Credentials,
  EncryptionContext,
  KeyProvider,
  KeyProviderFactory,
  KeyProviderOptions,
  ResourceScope,
} from "./types.js";

export { AuthMethod, createAccessToken, isTokenExpired } from "./types.js";

export type { AbortSignalLike } from "./utils/abort.js";

export { AuthError, AUTH_ERROR_CODES, type AuthErrorCode } from "./utils/errors.js";

export { getLogger, setRootLogger } from "./utils/logging.js";
export type { Logger } from "./types/logger.js";
