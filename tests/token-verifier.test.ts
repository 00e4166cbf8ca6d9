import { describe, expect, it } from "vitest";
import type { KeyObject } from "node:crypto";
import { loadPublicKey } from "../src/core/services/public-key-service.js";
import { verifyToken } from "../src/core/services/token-verifier.js";
import { generateRsaKeyPair, signToken, unsignedToken } from "./support/tokens.js";

const keys = generateRsaKeyPair();
const foreignKeys = generateRsaKeyPair();

function requireKey(pem: string): KeyObject {
  const key = loadPublicKey(pem);
  if (!key) {
    throw new Error("test key failed to load");
  }
  return key;
}

const publicKey = requireKey(keys.publicKeyPem);
const fixedNowMs = 1_700_000_000_000;
const fixedNowSeconds = 1_700_000_000;
const now = () => fixedNowMs;

describe("verifyToken", () => {
  it("returns the claim set of a correctly signed token", () => {
    const token = signToken({ sub: "caller", exp: fixedNowSeconds + 60 }, keys.privateKeyPem);
    const result = verifyToken(token, publicKey, { now });
    expect(result).toEqual({ ok: true, claims: { sub: "caller", exp: fixedNowSeconds + 60 } });
  });

  it.each(["RS384", "RS512", "PS256", "PS384", "PS512"])("accepts %s signatures", (alg) => {
    const token = signToken({ sub: "caller" }, keys.privateKeyPem, { alg });
    expect(verifyToken(token, publicKey).ok).toBe(true);
  });

  it("rejects a token signed by another key", () => {
    const token = signToken({ sub: "caller" }, foreignKeys.privateKeyPem);
    expect(verifyToken(token, publicKey)).toEqual({ ok: false, reason: "signature mismatch" });
  });

  it("rejects a token whose payload was altered after signing", () => {
    const token = signToken({ sub: "caller" }, keys.privateKeyPem);
    const [header, , signature] = token.split(".");
    const forgedPayload = Buffer.from(JSON.stringify({ sub: "admin" })).toString("base64url");
    const result = verifyToken(`${header}.${forgedPayload}.${signature}`, publicKey);
    expect(result).toEqual({ ok: false, reason: "signature mismatch" });
  });

  it("rejects a signature made with a different RSA scheme than declared", () => {
    const pssToken = signToken({ sub: "caller" }, keys.privateKeyPem, { alg: "PS256" });
    const [, payload, signature] = pssToken.split(".");
    const header = Buffer.from(JSON.stringify({ alg: "RS256", typ: "JWT" })).toString("base64url");
    expect(verifyToken(`${header}.${payload}.${signature}`, publicKey).ok).toBe(false);
  });

  it.each(["HS256", "none", "ES256"])("rejects the %s algorithm", (alg) => {
    const token = unsignedToken({ sub: "caller" }, { alg, typ: "JWT" });
    expect(verifyToken(token, publicKey)).toEqual({ ok: false, reason: `unsupported signing algorithm: ${alg}` });
  });

  it("rejects a header without an algorithm", () => {
    const token = unsignedToken({ sub: "caller" }, { typ: "JWT" });
    expect(verifyToken(token, publicKey)).toEqual({ ok: false, reason: "unsupported signing algorithm: undefined" });
  });

  it("rejects tokens that are not three segments", () => {
    expect(verifyToken("a.b", publicKey)).toEqual({ ok: false, reason: "token must have three segments" });
    expect(verifyToken("a.b.c.d", publicKey)).toEqual({ ok: false, reason: "token must have three segments" });
    expect(verifyToken("a..c", publicKey)).toEqual({ ok: false, reason: "token has an empty segment" });
  });

  it("rejects a header that is not JSON", () => {
    expect(verifyToken("abc.def.ghi", publicKey)).toEqual({ ok: false, reason: "token header is not a JSON object" });
  });

  it("accepts a token expiring at the current second and rejects one already past", () => {
    const atNow = signToken({ exp: fixedNowSeconds }, keys.privateKeyPem);
    const past = signToken({ exp: fixedNowSeconds - 1 }, keys.privateKeyPem);
    expect(verifyToken(atNow, publicKey, { now }).ok).toBe(true);
    expect(verifyToken(past, publicKey, { now })).toEqual({ ok: false, reason: "token is expired" });
  });

  it("applies the clock tolerance to expiry", () => {
    const past = signToken({ exp: fixedNowSeconds - 5 }, keys.privateKeyPem);
    expect(verifyToken(past, publicKey, { now, clockToleranceSeconds: 5 }).ok).toBe(true);
    expect(verifyToken(past, publicKey, { now, clockToleranceSeconds: 4 }).ok).toBe(false);
  });

  it("rejects a token that is not valid yet", () => {
    const token = signToken({ nbf: fixedNowSeconds + 30 }, keys.privateKeyPem);
    expect(verifyToken(token, publicKey, { now })).toEqual({ ok: false, reason: "token is not valid yet" });
  });

  it("rejects a token issued in the future", () => {
    const token = signToken({ iat: fixedNowSeconds + 30 }, keys.privateKeyPem);
    expect(verifyToken(token, publicKey, { now })).toEqual({ ok: false, reason: "token used before issued" });
  });

  it("rejects temporal claims that are not numbers", () => {
    const token = signToken({ exp: "tomorrow" }, keys.privateKeyPem);
    expect(verifyToken(token, publicKey, { now })).toEqual({ ok: false, reason: "exp claim is not a number" });
  });

  it("accepts a token without temporal claims", () => {
    const token = signToken({ application_claim: [] }, keys.privateKeyPem);
    expect(verifyToken(token, publicKey, { now })).toEqual({ ok: true, claims: { application_claim: [] } });
  });
});
