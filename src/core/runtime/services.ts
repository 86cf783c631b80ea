// src/core/runtime/services.ts
// Per-runtime services reachable from every scope

import { DEFAULT_CONFIG, type MarlConfig } from "../config/config";
import { createLogger, type RuntimeLogger } from "../log/logger";
import { DispatchCache } from "../obj/dispatchCache";
import type { EventHook } from "../log/events";

export type RuntimeServices = {
  config: MarlConfig;
  logger: RuntimeLogger;
  onEvent?: EventHook;
  dispatchCache: DispatchCache;
};

export function createServices(options: {
  config?: MarlConfig;
  logger?: RuntimeLogger;
  onEvent?: EventHook;
} = {}): RuntimeServices {
  const config = options.config ?? DEFAULT_CONFIG;
  return {
    config,
    logger: options.logger ?? createLogger(config.log.level),
    onEvent: options.onEvent,
    dispatchCache: new DispatchCache(config.runtime.dispatchCacheSize),
  };
}

let fallback: RuntimeServices | undefined;

/** Services for scopes created outside any runtime. */
export function defaultServices(): RuntimeServices {
  return (fallback ??= createServices());
}
