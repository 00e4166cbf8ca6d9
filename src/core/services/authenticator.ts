import type { AuthConfig } from "../config.js";
import type { Verdict } from "../types/auth.js";
import { extractApplicationClaim } from "./claim-extractor.js";
import { matchesIdentity } from "./identity-matcher.js";
import { PublicKeyService } from "./public-key-service.js";
import { verifyToken } from "./token-verifier.js";

export const FUNCTION_TOKEN_HEADER = "scw_functions_token";

export interface AuthenticatorDependencies {
  publicKeyService?: PublicKeyService | undefined;
  now?: (() => number) | undefined;
}

export function tokenFromHeaders(headers: Record<string, unknown>): string | undefined {
  const header = headers[FUNCTION_TOKEN_HEADER];
  if (typeof header === "string" && header.length > 0) {
    return header;
  }
  if (Array.isArray(header) && typeof header[0] === "string" && header[0].length > 0) {
    return header[0];
  }
  return undefined;
}

export class Authenticator {
  private readonly config: AuthConfig;
  private readonly publicKeyService: PublicKeyService;
  private readonly now: (() => number) | undefined;

  constructor(config: AuthConfig, dependencies?: AuthenticatorDependencies) {
    this.config = config;
    this.publicKeyService = dependencies?.publicKeyService ?? new PublicKeyService();
    this.now = dependencies?.now;
  }

  /**
   * Runs the checks in order and stops at the first failure:
   * public function, token presence, key load, signature and validity,
   * application claims, runtime identity, claim match.
   */
  authenticate(headers: Record<string, unknown>): Verdict {
    const { identity } = this.config;
    if (identity.isPublic) {
      return { ok: true };
    }

    const token = tokenFromHeaders(headers);
    if (!token) {
      return { ok: false, error: "NoToken" };
    }

    const key = this.publicKeyService.load(this.config.publicKey);
    if (!key) {
      return { ok: false, error: "InvalidPublicKey" };
    }

    const verification = verifyToken(token, key, {
      clockToleranceSeconds: this.config.clockToleranceSeconds,
      now: this.now
    });
    if (!verification.ok) {
      console.warn(`[auth] Token rejected: ${verification.reason}`);
      return { ok: false, error: "TokenInvalid" };
    }

    const claim = extractApplicationClaim(verification.claims);
    if (!claim) {
      return { ok: false, error: "ClaimsInvalid" };
    }

    if (!identity.applicationId) {
      return { ok: false, error: "MissingApplicationID" };
    }
    if (!identity.namespaceId) {
      return { ok: false, error: "MissingNamespaceID" };
    }

    if (!matchesIdentity(claim, identity)) {
      return { ok: false, error: "ClaimMismatch" };
    }
    return { ok: true };
  }
}
