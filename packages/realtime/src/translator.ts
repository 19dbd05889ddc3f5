/**
 * Realtime translator contract.
 *
 * A translator owns everything provider-specific about a realtime
 * session: where to connect, what to send first, and how frames map to
 * and from the unified message set. `toProviderWire` and
 * `fromProviderWire` are pure.
 */

import { CommunicationError, type ProviderCredentials } from "@llm-gateway/gateway";
import { z } from "zod";
import {
  ErrorSeverity,
  type ConfigValidation,
  type ErrorMessage,
  type InboundMessage,
  type OutboundMessage,
  type SessionConfig,
} from "./messages.js";

/** A JSON object sent to the provider as one text frame. */
export interface WireMessage {
  readonly type: string;
  readonly [key: string]: unknown;
}

export interface RealtimeTranslator {
  /** Capability catalog key for this provider's realtime models. */
  readonly provider: string;
  /** WebSocket subprotocol the provider requires, if any. */
  readonly subprotocol?: string;

  connectionUrl(config: SessionConfig, credentials: ProviderCredentials): string;
  connectionHeaders(credentials: ProviderCredentials): Record<string, string>;
  validateConfig(config: SessionConfig): ConfigValidation;

  /** Frames sent right after the connection opens. */
  initializationMessages(config: SessionConfig): WireMessage[];
  /** Frames that apply `config` to a live session. */
  sessionUpdateMessages(config: SessionConfig): WireMessage[];
  /** Frames that tell the provider no more input audio is coming. */
  endOfInputMessages(): WireMessage[];

  toProviderWire(message: OutboundMessage): WireMessage;
  /**
   * One upstream text frame to zero or more unified messages.
   *
   * @throws {CommunicationError} when the frame is not valid JSON or has an unexpected shape
   */
  fromProviderWire(data: string): InboundMessage[];
  classifyError(code: string): ErrorClassification;
}

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

export interface ErrorClassification {
  readonly severity: ErrorSeverity;
  readonly terminal: boolean;
  readonly retry_after_ms?: number;
}

/** Per-provider error classification data. */
export interface ErrorClassificationTable {
  readonly severities: Readonly<Record<string, ErrorSeverity>>;
  /** Codes after which the session cannot continue. */
  readonly terminal: readonly string[];
  readonly retryAfterMs?: Readonly<Record<string, number>>;
  /** Severity of codes absent from `severities`. Defaults to "error". */
  readonly fallback?: ErrorSeverity;
}

export function classifyError(
  table: ErrorClassificationTable,
  code: string,
): ErrorClassification {
  const classification: ErrorClassification = {
    severity: table.severities[code] ?? table.fallback ?? ErrorSeverity.ERROR,
    terminal: table.terminal.includes(code),
  };
  const retryAfter = table.retryAfterMs?.[code];
  return retryAfter === undefined ? classification : { ...classification, retry_after_ms: retryAfter };
}

/** Build an error message classified through `table`. */
export function errorMessage(
  table: ErrorClassificationTable,
  code: string | undefined,
  message: string | undefined,
): ErrorMessage {
  const resolved = code ?? "unknown";
  return {
    type: "error",
    code: resolved,
    message: message ?? "Unknown error",
    ...classifyError(table, resolved),
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const frameSchema = z.object({ type: z.string() }).passthrough();

export type WireFrame = z.output<typeof frameSchema>;

/** Parse one text frame into a JSON object with a string `type`. */
export function parseFrame(data: string, provider: string): WireFrame {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch (err: unknown) {
    throw new CommunicationError(`Malformed realtime frame from ${provider}`, {
      provider,
      cause: err,
      retryable: false,
    });
  }
  return expectShape(frameSchema, json, provider);
}

/** Check a decoded frame against the schema for its type. */
export function expectShape<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  provider: string,
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? ` at ${issue.path.join(".") || "(root)"}: ${issue.message}` : "";
    throw new CommunicationError(`Unexpected realtime frame from ${provider}${where}`, {
      provider,
      cause: result.error,
      retryable: false,
    });
  }
  return result.data;
}

/** Map an https/http base URL to its WebSocket counterpart. */
export function toWebSocketUrl(baseUrl: string): string {
  return baseUrl.replace(/^https:\/\//, "wss://").replace(/^http:\/\//, "ws://").replace(/\/+$/, "");
}

/** Sample rate in Hz of a unified audio format. */
export function sampleRateOf(format: string | undefined, fallback: number): number {
  switch (format) {
    case "pcm16_16k":
      return 16000;
    case "pcm16_24k":
      return 24000;
    case "g711_ulaw":
    case "g711_alaw":
      return 8000;
    default:
      return fallback;
  }
}
