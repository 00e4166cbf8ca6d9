import { createPublicKey, type KeyObject } from "node:crypto";

export interface PublicKeyServiceOptions {
  cacheKeys?: boolean | undefined;
}

const PEM_BLOCK_PATTERN = /^-----BEGIN ([^\r\n-]*)-----[ \t]*\r?\n([\s\S]*?)^-----END \1-----/gm;
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

function decodePemBody(rawBody: string): Buffer | null {
  const lines = rawBody.split(/\r?\n/);
  let index = 0;
  // RFC 1421 "Name: value" headers precede the base64 body.
  while (index < lines.length && (lines[index] ?? "").indexOf(":") > 0) {
    index += 1;
  }
  const body = lines.slice(index).join("").replace(/\s+/g, "");
  if (body.length % 4 !== 0 || !BASE64_PATTERN.test(body)) {
    return null;
  }
  return Buffer.from(body, "base64");
}

/**
 * Returns the bytes of the first well-formed PEM block. A block whose body is
 * not valid base64 is skipped in favour of the next one.
 */
export function decodePem(input: string): Buffer | null {
  for (const match of input.matchAll(PEM_BLOCK_PATTERN)) {
    const bytes = decodePemBody(match[2] ?? "");
    if (bytes) {
      return bytes;
    }
  }
  return null;
}

/**
 * Decodes a PEM string and parses its first block as a PKCS#1 RSA public key.
 * The block label is not inspected; only the DER bytes must be PKCS#1.
 * Returns null on any failure; the parser message is logged, never returned.
 */
export function loadPublicKey(pem: string): KeyObject | null {
  if (!pem) {
    return null;
  }

  const der = decodePem(pem);
  if (!der) {
    console.warn("[auth] Public key is not PEM encoded.");
    return null;
  }

  let key: KeyObject;
  try {
    key = createPublicKey({ key: der, format: "der", type: "pkcs1" });
  } catch (error) {
    console.warn("[auth] Public key is not a PKCS#1 RSA public key:", error instanceof Error ? error.message : error);
    return null;
  }

  if (key.asymmetricKeyType !== "rsa") {
    console.warn(`[auth] Public key has unsupported type: ${key.asymmetricKeyType ?? "unknown"}`);
    return null;
  }
  return key;
}

export class PublicKeyService {
  // Only successfully parsed keys are stored, so a racing insert for the same PEM is a no-op.
  private readonly cache: Map<string, KeyObject> | null;

  constructor(options?: PublicKeyServiceOptions) {
    this.cache = options?.cacheKeys ? new Map() : null;
  }

  load(pem: string): KeyObject | null {
    const cached = this.cache?.get(pem);
    if (cached) {
      return cached;
    }
    const key = loadPublicKey(pem);
    if (key && this.cache) {
      this.cache.set(pem, key);
    }
    return key;
  }

  cachedKeyCount(): number {
    return this.cache?.size ?? 0;
  }
}
