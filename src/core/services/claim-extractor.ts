import { APPLICATION_CLAIM_FIELD, applicationClaimsSchema } from "../types/schemas.js";
import type { ApplicationClaim, TokenClaimSet } from "../types/auth.js";

/**
 * Decodes the `application_claim` list from a verified claim set and returns
 * its first entry. A missing, malformed or empty list yields null.
 *
 * Only the first entry is evaluated; tokens carrying several scopes are
 * reduced to their first one.
 */
export function extractApplicationClaim(claims: TokenClaimSet): ApplicationClaim | null {
  const parsed = applicationClaimsSchema.safeParse(claims[APPLICATION_CLAIM_FIELD]);
  if (!parsed.success) {
    console.warn(
      "[auth] Malformed application claims:",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ")
    );
    return null;
  }
  const [first] = parsed.data;
  if (!first) {
    console.warn("[auth] Token carries no application claims.");
    return null;
  }
  return first;
}
