import type {
  AccessToken as AzureAccessToken,
  GetTokenOptions,
  TokenCredential,
} from "@azure/identity";
import { z } from "zod";
import {
  AuthMethod,
  createAccessToken,
  isTokenExpired,
  toRequestScope,
  type AccessToken,
  type ClosableCredentials,
  type ResourceScope,
} from "../types.js";
import type { Logger } from "../types/logger.js";
import {
  createUndiciTransport,
  type TokenTransport,
  type TransportFactory,
  type TransportResponse,
} from "../transport/http.js";
import { linkSignals, type AbortSignalLike } from "../utils/abort.js";
import { CacheManager } from "../utils/cache.js";
import {
  AuthError,
  AUTH_ERROR_CODES,
  configurationError,
  describeError,
} from "../utils/errors.js";
import { getLogger } from "../utils/logging.js";
import {
  RetryExecutor,
  type RetryPolicy,
  type Sleeper,
} from "../utils/retry.js";
import {
  CLIENT_ASSERTION_TYPE,
  CertificateAssertionSigner,
  buildAssertionClaims,
  loadCertificate,
  parseCertificatePem,
  type ClientAssertionSigner,
} from "./assertion.js";

export const DEFAULT_AUTHORITY = "https://login.microsoftonline.com";
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_EXPIRY_BUFFER_MS = 5 * 60 * 1000;

const NAME = "ServicePrincipalCredentials";
const TOKEN_PATH_TEMPLATE = "/{tenant}/oauth2/v2.0/token";
const MIME_TYPE = "application/x-www-form-urlencoded";
const TOKEN_CACHE_MAX_SIZE = 64;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.union([
    z.number().nonnegative(),
    z.string().regex(/^\d+$/).transform(Number),
  ]),
  token_type: z.string().optional(),
});

const oauthErrorSchema = z.object({
  error: z.string().optional(),
  error_description: z.string().optional(),
});

export interface Authority {
  host: string;
  port: number;
  secured: boolean;
}

export interface ServicePrincipalOptions {
  tenantId: string;
  clientId: string;
  clientSecret?: string;
  /** Path to a PEM bundle holding the certificate and its private key. */
  clientCertificatePath?: string;
  clientCertificatePem?: string;
  /** Identity provider base URL, e.g. `https://login.microsoftonline.com:443`. */
  authority?: string;
  truststore?: string;
  priorityString?: string;
  logContext?: string;
  retry?: Partial<RetryPolicy>;
  timeoutMs?: number;
  expiryBufferMs?: number;
  /** Aborts every refresh issued through this instance. */
  signal?: AbortSignal;
  transport?: TokenTransport;
  transportFactory?: TransportFactory;
  signer?: ClientAssertionSigner;
  sleep?: Sleeper;
  now?: () => number;
}

export interface RefreshOptions {
  /**
   * Stops this caller from waiting. A shared exchange keeps running for the
   * other callers and is cancelled only when every caller has given up.
   */
  signal?: AbortSignalLike;
}

export function parseAuthority(authority: string): Authority {
  let url: URL;
  try {
    url = new URL(authority.includes("://") ? authority : `https://${authority}`);
  } catch {
    throw configurationError(`Invalid authority: ${authority}`);
  }

  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw configurationError(
      `Unsupported authority scheme ${url.protocol} in ${authority}`,
    );
  }

  const secured = url.protocol === "https:";
  return {
    host: url.hostname,
    port: url.port ? Number(url.port) : secured ? 443 : 80,
    secured,
  };
}

export class ServicePrincipalCredentials implements ClosableCredentials {
  readonly method: AuthMethod;
  readonly authority: Authority;
  readonly tokenEndpoint: string;

  private readonly tenantId: string;
  private readonly clientId: string;
  private readonly clientSecret: string | undefined;
  private readonly signer: ClientAssertionSigner | undefined;
  private readonly transport: TokenTransport;
  private readonly ownsTransport: boolean;
  private readonly retryExecutor: RetryExecutor;
  private readonly timeoutMs: number;
  private readonly expiryBufferMs: number;
  private readonly signal: AbortSignal | undefined;
  private readonly now: () => number;
  private readonly tokenCache: CacheManager<AccessToken>;
  private readonly logger: Logger;

  constructor(options: ServicePrincipalOptions) {
    if (!options.tenantId) {
      throw configurationError(`${NAME}: tenant id is required`);
    }
    if (!options.clientId) {
      throw configurationError(`${NAME}: client id is required`);
    }

    const hasSecret = !!options.clientSecret;
    const certificateSources = [
      options.clientCertificatePath,
      options.clientCertificatePem,
      options.signer,
    ].filter((source) => !!source).length;

    if (hasSecret && certificateSources > 0) {
      throw configurationError(
        `${NAME}: provide either a client secret or a client certificate, not both`,
      );
    }
    if (!hasSecret && certificateSources === 0) {
      throw configurationError(
        `${NAME}: a client secret or a client certificate is required`,
      );
    }
    if (certificateSources > 1) {
      throw configurationError(
        `${NAME}: more than one client certificate source was provided`,
      );
    }

    this.tenantId = options.tenantId;
    this.clientId = options.clientId;
    this.clientSecret = hasSecret ? options.clientSecret : undefined;
    this.method = hasSecret ? AuthMethod.Secret : AuthMethod.Certificate;
    this.signer = hasSecret ? undefined : this.createSigner(options);

    this.authority = parseAuthority(options.authority || DEFAULT_AUTHORITY);
    this.tokenEndpoint = this.buildTokenEndpoint();

    if (options.transport) {
      this.transport = options.transport;
      this.ownsTransport = false;
    } else {
      const transportFactory = options.transportFactory ?? createUndiciTransport;
      this.transport = transportFactory({
        truststore: options.truststore,
        priorityString: options.priorityString,
        secured: this.authority.secured,
      });
      this.ownsTransport = true;
    }

    this.retryExecutor = new RetryExecutor(options.retry, options.sleep);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.expiryBufferMs = options.expiryBufferMs ?? DEFAULT_EXPIRY_BUFFER_MS;
    this.signal = options.signal;
    this.now = options.now ?? Date.now;
    this.tokenCache = new CacheManager<AccessToken>(
      { maxSize: TOKEN_CACHE_MAX_SIZE, defaultTtl: this.expiryBufferMs },
      "access-token",
    );
    this.logger = getLogger(
      "service-principal-credentials",
      options.logContext ? { logContext: options.logContext } : undefined,
    );

    this.logger.debug("Credentials created", {
      method: this.method,
      tenantId: this.tenantId,
      clientId: this.clientId,
      host: this.authority.host,
      port: this.authority.port,
      secured: this.authority.secured,
    });
  }

  getName(): string {
    return NAME;
  }

  /**
   * Runs the authentication flow and replaces the cached token for
   * `resource`. Concurrent calls for the same resource share one exchange.
   */
  async refresh(
    resource: ResourceScope,
    options: RefreshOptions = {},
  ): Promise<AccessToken> {
    return this.tokenCache.replace(
      resource,
      (exchangeSignal) => this.acquireToken(resource, exchangeSignal),
      {
        ttl: (token) => token.expiresAt - this.expiryBufferMs - this.now(),
        contextInfo: { resource, method: this.method },
        signal: options.signal,
      },
    );
  }

  /** Returns the cached token unless it is inside the expiry buffer. */
  async getToken(
    resource: ResourceScope,
    options: RefreshOptions = {},
  ): Promise<AccessToken> {
    const cached = this.tokenCache.get(resource);
    if (cached && !isTokenExpired(cached, this.now(), this.expiryBufferMs)) {
      this.logger.debug("Using cached access token", {
        resource,
        expiresAt: new Date(cached.expiresAt).toISOString(),
      });
      return cached;
    }
    return this.refresh(resource, options);
  }

  toTokenCredential(): TokenCredential {
    return {
      getToken: async (
        scopes: string | string[],
        options?: GetTokenOptions,
      ): Promise<AzureAccessToken> => {
        const resource = Array.isArray(scopes) ? scopes[0] : scopes;
        if (!resource) {
          throw configurationError(`${NAME}: at least one scope is required`);
        }

        const token = await this.getToken(resource, {
          signal: options?.abortSignal,
        });
        return { token: token.token, expiresOnTimestamp: token.expiresAt };
      },
    };
  }

  async close(): Promise<void> {
    this.tokenCache.clear();
    if (this.ownsTransport) {
      await this.transport.close();
    }
  }

  toString(): string {
    const { host, port, secured } = this.authority;
    return `${NAME}{tenantId=${this.tenantId}, clientId=${this.clientId}, method=${this.method}, authority=${secured ? "https" : "http"}://${host}:${port}}`;
  }

  private createSigner(options: ServicePrincipalOptions): ClientAssertionSigner {
    if (options.signer) {
      return options.signer;
    }
    const material = options.clientCertificatePem
      ? parseCertificatePem(options.clientCertificatePem)
      : loadCertificate(options.clientCertificatePath ?? "");
    return new CertificateAssertionSigner(material);
  }

  private buildTokenEndpoint(): string {
    const { host, port, secured } = this.authority;
    const path = TOKEN_PATH_TEMPLATE.replace(
      "{tenant}",
      encodeURIComponent(this.tenantId),
    );
    return `${secured ? "https" : "http"}://${host}:${port}${path}`;
  }

  private async acquireToken(
    resource: ResourceScope,
    exchangeSignal: AbortSignal,
  ): Promise<AccessToken> {
    const callTime = this.now();
    const linked = linkSignals(exchangeSignal, this.signal);
    const { signal } = linked;

    this.logger.debug("Requesting access token", {
      method: this.method,
      host: this.authority.host,
      resource,
    });

    let response: TransportResponse;
    try {
      response = await this.retryExecutor.execute(
        async (attempt) => {
          const body = await this.buildRequestBody(resource);
          this.logger.debug("Posting token request", {
            method: this.method,
            attempt,
          });
          const result = await this.transport.post({
            url: this.tokenEndpoint,
            body,
            contentType: MIME_TYPE,
            timeoutMs: this.timeoutMs,
            signal,
          });
          return this.checkStatus(result);
        },
        { signal, operationName: `${this.method} token request` },
      );
    } catch (error: unknown) {
      throw this.toFailure(error);
    } finally {
      linked.dispose();
    }

    const token = this.makeToken(response.body, resource, callTime);
    this.logger.debug("Access token obtained", {
      method: this.method,
      resource,
      expiresAt: new Date(token.expiresAt).toISOString(),
    });
    return token;
  }

  private async buildRequestBody(resource: ResourceScope): Promise<string> {
    const params = new URLSearchParams();
    params.set("grant_type", "client_credentials");
    params.set("client_id", this.clientId);
    params.set("scope", toRequestScope(resource));

    if (this.signer) {
      const claims = buildAssertionClaims(
        this.tokenEndpoint,
        this.clientId,
        this.now(),
      );
      params.set("client_assertion_type", CLIENT_ASSERTION_TYPE);
      params.set("client_assertion", await this.signer.sign(claims));
    } else {
      params.set("client_secret", this.clientSecret ?? "");
    }

    return params.toString();
  }

  private checkStatus(response: TransportResponse): TransportResponse {
    const { status } = response;
    if (status >= 200 && status < 300) {
      return response;
    }

    const detail = describeOAuthError(response.body);
    const target = `${this.authority.host}:${this.authority.port}`;

    if (status >= 500 || status === 408 || status === 429) {
      throw new AuthError(
        AUTH_ERROR_CODES.transient_failure,
        `${NAME}: ${this.method} token request to ${target} returned ${status}${detail}`,
        { status },
      );
    }

    throw new AuthError(
      AUTH_ERROR_CODES.authentication_rejected,
      `${NAME}: ${this.method} authentication rejected by ${target} with ${status}${detail}`,
      { status },
    );
  }

  private toFailure(error: unknown): AuthError {
    if (
      error instanceof AuthError &&
      error.code !== AUTH_ERROR_CODES.transient_failure &&
      error.code !== AUTH_ERROR_CODES.retries_exhausted
    ) {
      return error;
    }

    return new AuthError(
      AUTH_ERROR_CODES.authentication_failed,
      `${NAME}: ${this.method} authentication against ${this.authority.host}:${this.authority.port} failed: ${describeError(error)}`,
      {
        cause: error,
        ...(error instanceof AuthError && error.status !== undefined
          ? { status: error.status }
          : {}),
      },
    );
  }

  private makeToken(
    body: string,
    resource: ResourceScope,
    callTime: number,
  ): AccessToken {
    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (error: unknown) {
      throw new AuthError(
        AUTH_ERROR_CODES.protocol_error,
        `${NAME}: token response from ${this.authority.host} is not valid JSON`,
        { cause: error },
      );
    }

    const parsed = tokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      const fields = parsed.error.issues
        .map((issue) => issue.path.join(".") || "(root)")
        .join(", ");
      throw new AuthError(
        AUTH_ERROR_CODES.protocol_error,
        `${NAME}: token response from ${this.authority.host} is missing or has invalid fields: ${fields}`,
        { cause: parsed.error },
      );
    }

    return createAccessToken(
      parsed.data.access_token,
      callTime + parsed.data.expires_in * 1000,
      resource,
    );
  }
}

function describeOAuthError(body: string): string {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    return "";
  }

  const parsed = oauthErrorSchema.safeParse(payload);
  if (!parsed.success || !parsed.data.error) {
    return "";
  }

  return parsed.data.error_description
    ? `: ${parsed.data.error} (${parsed.data.error_description})`
    : `: ${parsed.data.error}`;
}
