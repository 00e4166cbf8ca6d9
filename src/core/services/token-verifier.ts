import { constants, verify, type KeyObject } from "node:crypto";
import type { TokenClaimSet } from "../types/auth.js";

interface JwtHeader {
  alg?: unknown;
}

interface RsaAlgorithm {
  digest: "sha256" | "sha384" | "sha512";
  padding: number;
}

export interface TokenVerifierOptions {
  clockToleranceSeconds?: number | undefined;
  now?: (() => number) | undefined;
}

export type TokenVerification = { ok: true; claims: TokenClaimSet } | { ok: false; reason: string };

const RSA_ALGORITHMS: Record<string, RsaAlgorithm> = {
  RS256: { digest: "sha256", padding: constants.RSA_PKCS1_PADDING },
  RS384: { digest: "sha384", padding: constants.RSA_PKCS1_PADDING },
  RS512: { digest: "sha512", padding: constants.RSA_PKCS1_PADDING },
  PS256: { digest: "sha256", padding: constants.RSA_PKCS1_PSS_PADDING },
  PS384: { digest: "sha384", padding: constants.RSA_PKCS1_PSS_PADDING },
  PS512: { digest: "sha512", padding: constants.RSA_PKCS1_PSS_PADDING }
};

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]+$/;

function decodeSegment(segment: string): Record<string, unknown> | null {
  if (!BASE64URL_PATTERN.test(segment)) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(segment, "base64url").toString("utf8"));
  } catch {
    return null;
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    return null;
  }
  return parsed as Record<string, unknown>;
}

function rsaAlgorithmFor(alg: unknown): RsaAlgorithm | null {
  if (typeof alg !== "string" || !Object.hasOwn(RSA_ALGORITHMS, alg)) {
    return null;
  }
  return RSA_ALGORITHMS[alg] ?? null;
}

function checkTemporalClaims(claims: TokenClaimSet, nowSeconds: number, tolerance: number): string | null {
  const { exp, nbf, iat } = claims;
  if (exp !== undefined) {
    if (typeof exp !== "number" || !Number.isFinite(exp)) {
      return "exp claim is not a number";
    }
    if (nowSeconds > exp + tolerance) {
      return "token is expired";
    }
  }
  if (nbf !== undefined) {
    if (typeof nbf !== "number" || !Number.isFinite(nbf)) {
      return "nbf claim is not a number";
    }
    if (nowSeconds < nbf - tolerance) {
      return "token is not valid yet";
    }
  }
  if (iat !== undefined) {
    if (typeof iat !== "number" || !Number.isFinite(iat)) {
      return "iat claim is not a number";
    }
    if (nowSeconds < iat - tolerance) {
      return "token used before issued";
    }
  }
  return null;
}

/**
 * Verifies a compact JWS against an RSA public key and checks the temporal
 * claims that are present (`exp`, `nbf`, `iat`). Only the RSA family is
 * accepted, whatever the header declares.
 */
export function verifyToken(token: string, key: KeyObject, options?: TokenVerifierOptions): TokenVerification {
  const parts = token.split(".");
  if (parts.length !== 3) {
    return { ok: false, reason: "token must have three segments" };
  }
  const [headerSegment = "", payloadSegment = "", signatureSegment = ""] = parts;
  if (!headerSegment || !payloadSegment || !signatureSegment) {
    return { ok: false, reason: "token has an empty segment" };
  }

  const header: JwtHeader | null = decodeSegment(headerSegment);
  if (!header) {
    return { ok: false, reason: "token header is not a JSON object" };
  }
  const claims = decodeSegment(payloadSegment);
  if (!claims) {
    return { ok: false, reason: "token payload is not a JSON object" };
  }

  const algorithm = rsaAlgorithmFor(header.alg);
  if (!algorithm) {
    return { ok: false, reason: `unsupported signing algorithm: ${String(header.alg)}` };
  }
  if (key.type !== "public" || key.asymmetricKeyType !== "rsa") {
    return { ok: false, reason: "key does not support RSA signatures" };
  }
  if (!BASE64URL_PATTERN.test(signatureSegment)) {
    return { ok: false, reason: "signature is not base64url encoded" };
  }

  let valid: boolean;
  try {
    valid = verify(
      algorithm.digest,
      Buffer.from(`${headerSegment}.${payloadSegment}`),
      {
        key,
        padding: algorithm.padding,
        ...(algorithm.padding === constants.RSA_PKCS1_PSS_PADDING
          ? { saltLength: constants.RSA_PSS_SALTLEN_AUTO }
          : {})
      },
      Buffer.from(signatureSegment, "base64url")
    );
  } catch (error) {
    return { ok: false, reason: `signature verification error: ${error instanceof Error ? error.message : String(error)}` };
  }
  if (!valid) {
    return { ok: false, reason: "signature mismatch" };
  }

  const nowSeconds = Math.floor((options?.now ?? Date.now)() / 1000);
  const temporalError = checkTemporalClaims(claims, nowSeconds, options?.clockToleranceSeconds ?? 0);
  if (temporalError) {
    return { ok: false, reason: temporalError };
  }

  return { ok: true, claims };
}
