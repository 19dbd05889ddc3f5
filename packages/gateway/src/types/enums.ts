/**
 * Core enums for the unified gateway contract.
 *
 * Uses `as const satisfies` objects instead of TypeScript enums so the
 * values stay plain strings on the wire.
 */

// ---------------------------------------------------------------------------
// Role
// ---------------------------------------------------------------------------

/** Conversation roles accepted by the unified request. */
export const Role = {
  SYSTEM: "system",
  USER: "user",
  ASSISTANT: "assistant",
  /** Tool execution results, linked by tool_call_id. */
  TOOL: "tool",
} as const satisfies Record<string, string>;

export type Role = (typeof Role)[keyof typeof Role];

// ---------------------------------------------------------------------------
// FinishReason
// ---------------------------------------------------------------------------

export const FinishReason = {
  STOP: "stop",
  LENGTH: "length",
  TOOL_CALLS: "tool_calls",
  CONTENT_FILTER: "content_filter",
  /** Anything the provider reports that has no unified counterpart. */
  OTHER: "other",
} as const satisfies Record<string, string>;

export type FinishReason = (typeof FinishReason)[keyof typeof FinishReason];

// ---------------------------------------------------------------------------
// Feature
// ---------------------------------------------------------------------------

/** Unified operations and features a provider/model may support. */
export const Feature = {
  CHAT: "chat",
  STREAMING: "streaming",
  VISION: "vision",
  FUNCTION_CALLING: "functionCalling",
  EMBEDDINGS: "embeddings",
  IMAGE_GENERATION: "imageGeneration",
  VIDEO_GENERATION: "videoGeneration",
  AUDIO_GENERATION: "audioGeneration",
  REALTIME_AUDIO: "realtimeAudio",
} as const satisfies Record<string, string>;

export type Feature = (typeof Feature)[keyof typeof Feature];

// ---------------------------------------------------------------------------
// JobStatus
// ---------------------------------------------------------------------------

/** Lifecycle of an asynchronous prediction job. */
export const JobStatus = {
  STARTING: "starting",
  PROCESSING: "processing",
  SUCCEEDED: "succeeded",
  FAILED: "failed",
  CANCELED: "canceled",
} as const satisfies Record<string, string>;

export type JobStatus = (typeof JobStatus)[keyof typeof JobStatus];
