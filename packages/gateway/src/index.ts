export const VERSION = "0.1.0";

export * from "./types/index.js";
export * from "./transport/index.js";
export * from "./streaming/index.js";
export * from "./jobs/index.js";
export * from "./config/index.js";
export * from "./providers/index.js";

export {
  getLogger,
  setLogger,
  configureLogging,
  componentLogger,
} from "./logging/logger.js";
export type { Logger, LoggingOptions } from "./logging/logger.js";

export { ResiliencePolicy, calculateDelay } from "./resilience/policy.js";
export type { ResilienceOptions, RetryEvent, ExecuteContext } from "./resilience/policy.js";
export { sleep, throwIfCanceled } from "./resilience/sleep.js";

export {
  CapabilityRegistry,
  assertOperationSupported,
  assertRequestSupported,
  stripUnsupportedParameters,
} from "./capabilities/registry.js";
export type {
  CapabilityDescriptor,
  CapabilityLimits,
  ParameterSupport,
} from "./capabilities/registry.js";
export { loadBuiltinCatalog, parseCatalog } from "./capabilities/catalog.js";
export type { CapabilityCatalog, CatalogModel } from "./capabilities/catalog.js";

export type {
  AdapterContext,
  JobOperations,
  JobStrategy,
  ProviderAdapter,
} from "./contract/adapter.js";
export { ProviderClient } from "./contract/client.js";
export type {
  ClientObserver,
  ProviderClientOptions,
  RequestOutcome,
} from "./contract/client.js";
export {
  validateChatRequest,
  validateEmbeddingRequest,
  validateImageRequest,
  validateSpeechRequest,
  validateVideoRequest,
  validateCredentials,
} from "./contract/validation.js";
export { Gateway } from "./contract/gateway.js";
export type {
  FromConfigOptions,
  GatewayOptions,
  Middleware,
  StreamMiddleware,
} from "./contract/gateway.js";

// ---------------------------------------------------------------------------
// Module-level default gateway
// ---------------------------------------------------------------------------

import { loadConfig } from "./config/index.js";
import { Gateway } from "./contract/gateway.js";

let defaultGateway: Gateway | undefined;

export function setDefaultGateway(gateway: Gateway): void {
  defaultGateway = gateway;
}

/** The default gateway, built from the environment on first use. */
export function getDefaultGateway(): Gateway {
  if (!defaultGateway) {
    defaultGateway = Gateway.fromConfig(loadConfig());
  }
  return defaultGateway;
}

export function resetDefaultGateway(): void {
  defaultGateway = undefined;
}
