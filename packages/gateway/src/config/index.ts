import { ConfigurationError } from "../types/errors.js";
import { gatewayConfigSchema, type GatewayConfig } from "./schema.js";

export {
  gatewayConfigSchema,
  providerConfigSchema,
  providerTypeSchema,
  type GatewayConfig,
  type GatewayConfigInput,
  type ProviderConfig,
  type ProviderType,
  type LoggingConfig,
  type RetryConfig,
  type PollingConfig,
  type StreamingConfig,
} from "./schema.js";

type Env = Record<string, string | undefined>;

// ---------------------------------------------------------------------------
// Merge helper
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...target };
  for (const [key, value] of Object.entries(source)) {
    const existing = result[key];
    if (isRecord(value)) {
      result[key] = deepMerge(isRecord(existing) ? existing : {}, value);
    } else if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

// ---------------------------------------------------------------------------
// Environment variable overrides
// ---------------------------------------------------------------------------

function parseIntEnv(env: Env, name: string): number | string | undefined {
  const raw = env[name];
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  // Leave non-numeric input as a string so the schema reports it.
  return Number.isInteger(value) ? value : raw;
}

/** Environment variable -> provider entry defaults. */
const PROVIDER_KEYS: ReadonlyArray<{
  name: string;
  type: string;
  vars: readonly string[];
}> = [
  { name: "openai", type: "openai-compatible", vars: ["OPENAI_API_KEY"] },
  { name: "anthropic", type: "anthropic", vars: ["ANTHROPIC_API_KEY"] },
  { name: "gemini", type: "gemini", vars: ["GEMINI_API_KEY", "GOOGLE_API_KEY"] },
  { name: "replicate", type: "replicate", vars: ["REPLICATE_API_TOKEN"] },
];

function getEnvOverrides(env: Env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};

  const level = env["LLM_GATEWAY_LOG_LEVEL"];
  if (level) {
    overrides["logging"] = { level };
  }

  const maxRetries = parseIntEnv(env, "LLM_GATEWAY_MAX_RETRIES");
  if (maxRetries !== undefined) {
    overrides["retry"] = { maxRetries };
  }

  const intervalMs = parseIntEnv(env, "LLM_GATEWAY_POLL_INTERVAL_MS");
  const maxDurationMs = parseIntEnv(env, "LLM_GATEWAY_MAX_POLL_DURATION_MS");
  if (intervalMs !== undefined || maxDurationMs !== undefined) {
    overrides["polling"] = {
      ...(intervalMs !== undefined ? { intervalMs } : {}),
      ...(maxDurationMs !== undefined ? { maxDurationMs } : {}),
    };
  }

  const defaultProvider = env["LLM_GATEWAY_DEFAULT_PROVIDER"];
  if (defaultProvider) {
    overrides["defaultProvider"] = defaultProvider;
  }

  const providers: Record<string, unknown> = {};
  for (const { name, type, vars } of PROVIDER_KEYS) {
    const apiKey = vars.map((v) => env[v]).find((v) => v !== undefined && v !== "");
    if (apiKey) {
      providers[name] = { type, apiKey };
    }
  }
  if (Object.keys(providers).length > 0) {
    overrides["providers"] = providers;
  }

  return overrides;
}

// ---------------------------------------------------------------------------
// Load config
// ---------------------------------------------------------------------------

export interface LoadConfigOptions {
  /** Defaults to `process.env`. */
  env?: Env;
  /** Applied last; wins over the environment. */
  overrides?: Record<string, unknown>;
}

/**
 * Resolve configuration with precedence: overrides > env vars > defaults.
 *
 * @throws {ConfigurationError} listing every invalid path.
 */
export function loadConfig(options: LoadConfigOptions = {}): GatewayConfig {
  const env = options.env ?? process.env;
  const merged = deepMerge(getEnvOverrides(env), options.overrides ?? {});

  const result = gatewayConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new ConfigurationError(`Invalid configuration:\n${issues.join("\n")}`, {
      cause: result.error,
    });
  }

  const config = result.data;
  if (config.defaultProvider && !(config.defaultProvider in config.providers)) {
    throw new ConfigurationError(
      `Default provider "${config.defaultProvider}" is not configured`,
    );
  }
  return config;
}
