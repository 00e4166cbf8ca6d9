import { runtimeEnvSchema } from "./types/schemas.js";
import type { RuntimeIdentity } from "./types/auth.js";

export interface AuthConfig {
  identity: RuntimeIdentity;
  publicKey: string;
  clockToleranceSeconds: number;
}

export interface RuntimeConfig {
  auth: AuthConfig;
  cacheKeys: boolean;
  port: number;
  host: string;
}

/**
 * Resolves the values injected by the function platform. Empty identity
 * values are accepted here and reported per request by the authenticator.
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = runtimeEnvSchema.parse(env);
  return {
    auth: {
      identity: {
        applicationId: parsed.SCW_APPLICATION_ID,
        namespaceId: parsed.SCW_NAMESPACE_ID,
        isPublic: parsed.SCW_PUBLIC
      },
      publicKey: parsed.SCW_PUBLIC_KEY,
      clockToleranceSeconds: parsed.FUNCTION_AUTH_CLOCK_TOLERANCE_SECONDS
    },
    cacheKeys: parsed.FUNCTION_AUTH_CACHE_KEYS,
    port: parsed.PORT,
    host: parsed.HOST
  };
}
