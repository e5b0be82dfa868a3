import { Agent, request, type Dispatcher } from "undici";
import type { ConnectionOptions } from "tls";
import * as fs from "fs";
import {
  AuthError,
  AUTH_ERROR_CODES,
  configurationError,
  describeError,
} from "../utils/errors.js";
import { isRetryableError } from "../utils/retry.js";
import { getLogger } from "../utils/logging.js";

const logger = getLogger("token-transport");

export interface TlsOptions {
  /** Path to a PEM bundle of trusted CA certificates. */
  truststore?: string;
  /** OpenSSL cipher list handed to the TLS layer as-is. */
  priorityString?: string;
  /** When set, the transport refuses any URL that is not https. */
  secured: boolean;
}

export interface TokenRequest {
  url: string;
  body: string;
  contentType: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface TransportResponse {
  status: number;
  body: string;
}

export interface TokenTransport {
  post(tokenRequest: TokenRequest): Promise<TransportResponse>;
  close(): Promise<void>;
}

export type TransportFactory = (tls: TlsOptions) => TokenTransport;

export class UndiciTokenTransport implements TokenTransport {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly secured: boolean;

  constructor(tls: TlsOptions, dispatcher?: Dispatcher) {
    this.secured = tls.secured;
    if (dispatcher) {
      this.dispatcher = dispatcher;
      this.ownsDispatcher = false;
    } else {
      this.dispatcher = new Agent({ connect: buildConnectOptions(tls) });
      this.ownsDispatcher = true;
    }

    logger.debug("Token transport created", {
      secured: tls.secured,
      hasTruststore: !!tls.truststore,
      hasPriorityString: !!tls.priorityString,
      sharedDispatcher: !this.ownsDispatcher,
    });
  }

  async post(tokenRequest: TokenRequest): Promise<TransportResponse> {
    const url = new URL(tokenRequest.url);
    if (this.secured && url.protocol !== "https:") {
      throw configurationError(
        `Refusing to send a token request to ${url.host} over ${url.protocol.slice(0, -1)} on a secured transport`,
      );
    }

    try {
      const response = await request(url, {
        method: "POST",
        dispatcher: this.dispatcher,
        headers: {
          "content-type": tokenRequest.contentType,
          accept: "application/json",
        },
        body: tokenRequest.body,
        signal: tokenRequest.signal,
        headersTimeout: tokenRequest.timeoutMs,
        bodyTimeout: tokenRequest.timeoutMs,
      });

      const body = await response.body.text();
      return { status: response.statusCode, body };
    } catch (error: unknown) {
      if (tokenRequest.signal?.aborted || !isRetryableError(error)) {
        throw error;
      }
      throw new AuthError(
        AUTH_ERROR_CODES.transient_failure,
        `Token request to ${url.host} failed: ${describeError(error)}`,
        { cause: error },
      );
    }
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}

export const createUndiciTransport: TransportFactory = (tls) =>
  new UndiciTokenTransport(tls);

function buildConnectOptions(tls: TlsOptions): ConnectionOptions {
  const options: ConnectionOptions = {};

  if (tls.truststore) {
    try {
      options.ca = fs.readFileSync(tls.truststore, "utf8");
    } catch (error: unknown) {
      throw configurationError(
        `Unable to read truststore ${tls.truststore}: ${describeError(error)}`,
      );
    }
  }

  if (tls.priorityString) {
    options.ciphers = tls.priorityString;
  }

  return options;
}
