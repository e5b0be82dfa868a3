import jwt from "jsonwebtoken";
import { X509Certificate, createHash, randomUUID } from "crypto";
import * as fs from "fs";
import { configurationError, describeError } from "../utils/errors.js";

export const CLIENT_ASSERTION_TYPE =
  "urn:ietf:params:oauth:client-assertion-type:jwt-bearer";

const ASSERTION_LIFETIME_SECONDS = 600;

const CERTIFICATE_BLOCK =
  /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/;
const PRIVATE_KEY_BLOCK =
  /-----BEGIN (RSA |EC )?PRIVATE KEY-----[\s\S]+?-----END \1?PRIVATE KEY-----/;

export interface ClientAssertionClaims {
  aud: string;
  iss: string;
  sub: string;
  jti: string;
  nbf: number;
  iat: number;
  exp: number;
}

export interface ClientAssertionSigner {
  sign(claims: ClientAssertionClaims): Promise<string>;
}

export interface CertificateMaterial {
  privateKey: string;
  /** base64url SHA-1 digest of the DER certificate, as sent in `x5t`. */
  thumbprint: string;
}

export function buildAssertionClaims(
  tokenEndpoint: string,
  clientId: string,
  nowMs: number,
): ClientAssertionClaims {
  const now = Math.floor(nowMs / 1000);
  return {
    aud: tokenEndpoint,
    iss: clientId,
    sub: clientId,
    jti: randomUUID(),
    nbf: now,
    iat: now,
    exp: now + ASSERTION_LIFETIME_SECONDS,
  };
}

/**
 * Splits a PEM bundle holding the client certificate and its unencrypted
 * private key.
 */
export function parseCertificatePem(pem: string): CertificateMaterial {
  const certificate = pem.match(CERTIFICATE_BLOCK)?.[0];
  if (!certificate) {
    throw configurationError("Client certificate PEM contains no certificate");
  }

  const privateKey = pem.match(PRIVATE_KEY_BLOCK)?.[0];
  if (!privateKey) {
    throw configurationError("Client certificate PEM contains no private key");
  }

  let x509: X509Certificate;
  try {
    x509 = new X509Certificate(certificate);
  } catch (error: unknown) {
    throw configurationError(
      `Client certificate could not be parsed: ${describeError(error)}`,
    );
  }

  return {
    privateKey,
    thumbprint: createHash("sha1").update(x509.raw).digest("base64url"),
  };
}

export function loadCertificate(certificatePath: string): CertificateMaterial {
  let pem: string;
  try {
    pem = fs.readFileSync(certificatePath, "utf8");
  } catch (error: unknown) {
    throw configurationError(
      `Unable to read client certificate ${certificatePath}: ${describeError(error)}`,
    );
  }
  return parseCertificatePem(pem);
}

export class CertificateAssertionSigner implements ClientAssertionSigner {
  constructor(private readonly material: CertificateMaterial) {}

  async sign(claims: ClientAssertionClaims): Promise<string> {
    return jwt.sign({ ...claims }, this.material.privateKey, {
      algorithm: "RS256",
      header: { alg: "RS256", typ: "JWT", x5t: this.material.thumbprint },
    });
  }
}
