import { z } from "zod";

// ---------------------------------------------------------------------------
// Provider entry
// ---------------------------------------------------------------------------

export const providerTypeSchema = z.enum([
  "openai-compatible",
  "anthropic",
  "gemini",
  "replicate",
]);

export const providerConfigSchema = z.object({
  type: providerTypeSchema,
  apiKey: z.string().min(1, "API key is required"),
  secret: z.string().optional(),
  baseUrl: z.string().url("Must be a valid URL").optional(),
  region: z.string().optional(),
  apiVersion: z.string().optional(),
  /** Caller-facing model name -> upstream model id. */
  modelAliases: z.record(z.string()).default({}),
});

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

export const loggingConfigSchema = z.object({
  level: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  pretty: z.boolean().default(false),
});

export const retryConfigSchema = z.object({
  maxRetries: z.number().int().min(0).default(3),
  baseDelayMs: z.number().int().positive().default(1000),
  maxDelayMs: z.number().int().positive().default(30000),
});

export const pollingConfigSchema = z.object({
  intervalMs: z.number().int().positive().default(2000),
  maxDurationMs: z.number().int().positive().default(600000),
});

export const streamingConfigSchema = z.object({
  /** Words per synthetic chunk. */
  wordsPerChunk: z.number().int().positive().default(4),
  /** Delay between synthetic chunks. */
  chunkDelayMs: z.number().int().min(0).default(0),
});

// ---------------------------------------------------------------------------
// Root
// ---------------------------------------------------------------------------

export const gatewayConfigSchema = z.object({
  logging: loggingConfigSchema.default({}),
  retry: retryConfigSchema.default({}),
  polling: pollingConfigSchema.default({}),
  streaming: streamingConfigSchema.default({}),
  requestTimeoutMs: z.number().int().positive().default(300000),
  defaultProvider: z.string().optional(),
  providers: z.record(providerConfigSchema).default({}),
});

export type ProviderType = z.infer<typeof providerTypeSchema>;
export type ProviderConfig = z.infer<typeof providerConfigSchema>;
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;
export type RetryConfig = z.infer<typeof retryConfigSchema>;
export type PollingConfig = z.infer<typeof pollingConfigSchema>;
export type StreamingConfig = z.infer<typeof streamingConfigSchema>;
export type GatewayConfig = z.infer<typeof gatewayConfigSchema>;
/** Configuration as written by a caller, before defaults apply. */
export type GatewayConfigInput = z.input<typeof gatewayConfigSchema>;
