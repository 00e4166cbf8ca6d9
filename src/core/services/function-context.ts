import type { RuntimeConfig } from "../config.js";
import { loadRuntimeConfig } from "../config.js";
import { Authenticator } from "./authenticator.js";
import { PublicKeyService } from "./public-key-service.js";

export interface FunctionContext {
  config: RuntimeConfig;
  publicKeyService: PublicKeyService;
  authenticator: Authenticator;
}

export interface FunctionContextOptions {
  config?: RuntimeConfig | undefined;
  publicKeyService?: PublicKeyService | undefined;
  now?: (() => number) | undefined;
}

export function createFunctionContext(options?: FunctionContextOptions): FunctionContext {
  const config = options?.config ?? loadRuntimeConfig();
  const publicKeyService = options?.publicKeyService ?? new PublicKeyService({ cacheKeys: config.cacheKeys });
  const authenticator = new Authenticator(config.auth, { publicKeyService, now: options?.now });
  return {
    config,
    publicKeyService,
    authenticator
  };
}
