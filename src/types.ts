import type { TokenTransport, TlsOptions } from "./transport/http.js";

export const AuthMethod = {
  Secret: "secret",
  Certificate: "certificate",
} as const;

export type AuthMethod = (typeof AuthMethod)[keyof typeof AuthMethod];

/** Audience a token is requested for, usually a resource URI. */
export type ResourceScope = string;

export interface AccessToken {
  readonly token: string;
  /** Epoch milliseconds. */
  readonly expiresAt: number;
  readonly resource: ResourceScope;
}

export function createAccessToken(
  token: string,
  expiresAt: number,
  resource: ResourceScope,
): AccessToken {
  return Object.freeze({ token, expiresAt, resource });
}

export function isTokenExpired(
  token: AccessToken,
  now: number,
  bufferMs = 0,
): boolean {
  return token.expiresAt - bufferMs <= now;
}

/**
 * v2.0 token endpoints take scopes rather than resources; a bare resource URI
 * is turned into its default scope.
 */
export function toRequestScope(resource: ResourceScope): string {
  if (resource.endsWith("/.default")) {
    return resource;
  }
  return `${resource.replace(/\/+$/, "")}/.default`;
}

export interface Credentials {
  getName(): string;
  refresh(resource: ResourceScope): Promise<AccessToken>;
  getToken(resource: ResourceScope): Promise<AccessToken>;
}

/** Credentials holding resources that must be released when done. */
export interface ClosableCredentials extends Credentials {
  close?(): Promise<void>;
}

export interface KeyProvider {
  readonly name: string;
  getCredentials(): Credentials;
  getAuthorizationHeader(): Promise<string>;
  release(): Promise<void>;
}

export interface EncryptionContext {
  createTransport?(tls: TlsOptions): TokenTransport;
  /** Aborted when the owning subsystem shuts down. */
  readonly shutdownSignal?: AbortSignal;
}

export type KeyProviderOptions = Readonly<Record<string, string | undefined>>;

export interface KeyProviderFactory {
  getProvider(
    context: EncryptionContext,
    options: KeyProviderOptions,
  ): Promise<KeyProvider>;
}
