import { z } from "zod";

export const APPLICATION_CLAIM_FIELD = "application_claim";

const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? "");

export const applicationClaimSchema = z
  .object({
    namespace_id: optionalString,
    application_id: optionalString
  })
  .transform((value) => ({
    namespaceId: value.namespace_id,
    applicationId: value.application_id
  }));

// A null or missing field decodes to an empty list, which the extractor rejects.
export const applicationClaimsSchema = z
  .array(applicationClaimSchema)
  .nullish()
  .transform((value) => value ?? []);

const flagSchema = z
  .string()
  .optional()
  .transform((value) => {
    const normalized = value?.trim().toLowerCase();
    return normalized === "true" || normalized === "1";
  });

export const runtimeEnvSchema = z.object({
  SCW_PUBLIC: z
    .string()
    .optional()
    .transform((value) => value === "true"),
  SCW_PUBLIC_KEY: z.string().default(""),
  SCW_APPLICATION_ID: z.string().default(""),
  SCW_NAMESPACE_ID: z.string().default(""),
  FUNCTION_AUTH_CLOCK_TOLERANCE_SECONDS: z.coerce.number().int().min(0).default(0),
  FUNCTION_AUTH_CACHE_KEYS: flagSchema,
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().min(1).default("0.0.0.0")
});
