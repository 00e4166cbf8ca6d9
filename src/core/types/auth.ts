export interface ApplicationClaim {
  namespaceId: string;
  applicationId: string;
}

export interface RuntimeIdentity {
  applicationId: string;
  namespaceId: string;
  isPublic: boolean;
}

export type TokenClaimSet = Record<string, unknown>;

export type AuthErrorKind =
  | "NoToken"
  | "InvalidPublicKey"
  | "TokenInvalid"
  | "ClaimsInvalid"
  | "MissingApplicationID"
  | "MissingNamespaceID"
  | "ClaimMismatch";

export type Verdict = { ok: true } | { ok: false; error: AuthErrorKind };
