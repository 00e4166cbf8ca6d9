import { ZodError } from "zod";
import { createId } from "../lib/id.js";
import type { AuthErrorKind } from "../core/types/auth.js";

export function requestIdFromHeaders(headers: Record<string, unknown>): string {
  const header = headers["x-request-id"];
  if (typeof header === "string" && header.trim().length > 0) {
    return header;
  }
  if (Array.isArray(header) && typeof header[0] === "string" && header[0].trim().length > 0) {
    return header[0];
  }
  return createId("req");
}

export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly errorCode: string,
    message: string
  ) {
    super(message);
  }
}

const AUTH_ERRORS: Record<AuthErrorKind, { statusCode: number; errorCode: string; message: string }> = {
  NoToken: {
    statusCode: 401,
    errorCode: "no_token",
    message: "Authentication token was not provided in the request."
  },
  TokenInvalid: {
    statusCode: 401,
    errorCode: "token_invalid",
    message: "Authentication token is invalid."
  },
  ClaimsInvalid: {
    statusCode: 403,
    errorCode: "claims_invalid",
    message: "Authentication token carries invalid claims."
  },
  ClaimMismatch: {
    statusCode: 403,
    errorCode: "claim_mismatch",
    message: "Authentication token does not grant access to this function."
  },
  InvalidPublicKey: {
    statusCode: 500,
    errorCode: "invalid_public_key",
    message: "Function public key is invalid."
  },
  MissingApplicationID: {
    statusCode: 500,
    errorCode: "missing_application_id",
    message: "Application ID was not provided."
  },
  MissingNamespaceID: {
    statusCode: 500,
    errorCode: "missing_namespace_id",
    message: "Namespace ID was not provided."
  }
};

export function httpErrorForAuth(kind: AuthErrorKind): HttpError {
  const mapped = AUTH_ERRORS[kind];
  return new HttpError(mapped.statusCode, mapped.errorCode, mapped.message);
}

export function handleError(
  error: unknown,
  reply: { status: (code: number) => { send: (body: unknown) => unknown } },
  requestId?: string
) {
  const errorBody = (body: Record<string, unknown>) =>
    requestId
      ? {
          ...body,
          requestId
        }
      : body;

  if (error instanceof ZodError) {
    return reply.status(400).send({
      error: errorBody({
        code: "validation_error",
        message: "Invalid request payload.",
        details: error.issues
      })
    });
  }

  if (error instanceof HttpError) {
    return reply.status(error.statusCode).send({
      error: errorBody({
        code: error.errorCode,
        message: error.message
      })
    });
  }

  // Framework errors (bad JSON, body limit) carry their own status; their text stays out of the reply.
  if (error instanceof Error && "statusCode" in error) {
    const maybeStatus = error.statusCode;
    if (typeof maybeStatus === "number" && Number.isInteger(maybeStatus) && maybeStatus >= 400 && maybeStatus <= 599) {
      return reply.status(maybeStatus).send({
        error: errorBody({
          code: "request_error",
          message: maybeStatus < 500 ? "Request could not be processed." : "Unexpected error."
        })
      });
    }
  }

  console.error("[function] Request failed:", error);
  return reply.status(500).send({
    error: errorBody({
      code: "internal_error",
      message: "Unexpected error."
    })
  });
}
