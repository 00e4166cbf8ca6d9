import type { ApplicationClaim, RuntimeIdentity } from "../types/auth.js";

// A namespace-scoped token covers every application in the namespace; an
// application-scoped token covers that application only. Callers must reject
// empty identity values first, since "" === "" would match.
export function matchesIdentity(claim: ApplicationClaim, identity: RuntimeIdentity): boolean {
  return claim.namespaceId === identity.namespaceId || claim.applicationId === identity.applicationId;
}
