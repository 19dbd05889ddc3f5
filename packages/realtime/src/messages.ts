/**
 * Unified realtime message set and session types.
 *
 * Every frame exchanged with a realtime provider is translated to or from
 * one of these variants. The union is closed: translators switch on `type`.
 */

import type { ToolDefinition } from "@llm-gateway/gateway";

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export const SessionState = {
  CONNECTING: "connecting",
  CONNECTED: "connected",
  /** At least one frame has been sent. */
  ACTIVE: "active",
  CLOSING: "closing",
  CLOSED: "closed",
} as const satisfies Record<string, string>;

export type SessionState = (typeof SessionState)[keyof typeof SessionState];

export const ErrorSeverity = {
  WARNING: "warning",
  ERROR: "error",
  CRITICAL: "critical",
} as const satisfies Record<string, string>;

export type ErrorSeverity = (typeof ErrorSeverity)[keyof typeof ErrorSeverity];

export const AudioFormat = {
  PCM16_16K: "pcm16_16k",
  PCM16_24K: "pcm16_24k",
  G711_ULAW: "g711_ulaw",
  G711_ALAW: "g711_alaw",
} as const satisfies Record<string, string>;

export type AudioFormat = (typeof AudioFormat)[keyof typeof AudioFormat];

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

export interface AudioFrameMessage {
  readonly type: "audio_frame";
  /** Base64-encoded audio in the session's format. */
  readonly audio: string;
  readonly direction: "input" | "output";
}

export interface TextInputMessage {
  readonly type: "text_input";
  readonly text: string;
}

export interface TextOutputMessage {
  readonly type: "text_output";
  readonly text: string;
  /** True for an incremental fragment, false for a complete utterance. */
  readonly delta: boolean;
}

export interface FunctionCallMessage {
  readonly type: "function_call";
  readonly call_id: string;
  readonly name?: string;
  /** Complete JSON arguments, or a fragment when `delta` is set. */
  readonly arguments: string;
  readonly delta: boolean;
}

export interface FunctionResponseMessage {
  readonly type: "function_response";
  readonly call_id: string;
  readonly output: string;
}

export interface ResponseRequestMessage {
  readonly type: "response_request";
  readonly instructions?: string;
  readonly temperature?: number;
}

export interface StatusMessage {
  readonly type: "status";
  /** e.g. "session_started", "response_complete", "usage_update". */
  readonly status: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

export interface ErrorMessage {
  readonly type: "error";
  readonly code: string;
  readonly message: string;
  readonly severity: ErrorSeverity;
  /** The session cannot continue after this error. */
  readonly terminal: boolean;
  readonly retry_after_ms?: number;
}

export type RealtimeMessage =
  | AudioFrameMessage
  | TextInputMessage
  | TextOutputMessage
  | FunctionCallMessage
  | FunctionResponseMessage
  | ResponseRequestMessage
  | StatusMessage
  | ErrorMessage;

/** Messages a caller may send upstream. */
export type OutboundMessage =
  | AudioFrameMessage
  | TextInputMessage
  | FunctionResponseMessage
  | ResponseRequestMessage;

/** Messages a session yields to its caller. */
export type InboundMessage =
  | AudioFrameMessage
  | TextOutputMessage
  | FunctionCallMessage
  | StatusMessage
  | ErrorMessage;

/** An input audio frame from raw bytes. */
export function audioFrame(bytes: Uint8Array): AudioFrameMessage {
  return {
    type: "audio_frame",
    audio: Buffer.from(bytes).toString("base64"),
    direction: "input",
  };
}

// ---------------------------------------------------------------------------
// Session configuration
// ---------------------------------------------------------------------------

export interface TurnDetection {
  /** "manual" leaves turn boundaries to the caller's response requests. */
  readonly type: "server_vad" | "manual" | "none";
  readonly threshold?: number;
  readonly prefix_padding_ms?: number;
  readonly silence_duration_ms?: number;
}

export interface SessionConfig {
  readonly model: string;
  readonly voice?: string;
  readonly language?: string;
  readonly system_prompt?: string;
  readonly input_format?: AudioFormat;
  readonly output_format?: AudioFormat;
  readonly turn_detection?: TurnDetection;
  readonly tools?: readonly ToolDefinition[];
  readonly temperature?: number;
  readonly modalities?: readonly ("text" | "audio")[];
  /** Ask the provider to transcribe input audio. */
  readonly transcription?: boolean;
}

/** Session-level changes accepted by `updateSession`. */
export type SessionUpdate = Partial<Omit<SessionConfig, "model">>;

export interface ConfigValidation {
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
}
