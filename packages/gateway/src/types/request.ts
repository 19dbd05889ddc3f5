/**
 * Request types for the unified gateway.
 */

import type { Message } from "./message.js";

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

/** A function the model may call. */
export interface ToolDefinition {
  readonly type: "function";
  readonly function: {
    readonly name: string;
    readonly description?: string;
    /** JSON Schema for the arguments object. */
    readonly parameters?: Record<string, unknown>;
  };
}

/** "auto" | "none" | "required", or force one named function. */
export type ToolChoice = "auto" | "none" | "required" | { readonly name: string };

// ---------------------------------------------------------------------------
// Chat
// ---------------------------------------------------------------------------

export interface UnifiedChatRequest {
  /** Model identifier or alias as the caller knows it. */
  readonly model: string;
  /** At least one message. */
  readonly messages: readonly Message[];
  /** Optional; the gateway uses its default provider if omitted. */
  readonly provider?: string;
  readonly temperature?: number;
  readonly top_p?: number;
  readonly top_k?: number;
  readonly max_tokens?: number;
  readonly stop?: readonly string[];
  readonly tools?: readonly ToolDefinition[];
  readonly tool_choice?: ToolChoice;
  readonly stream?: boolean;
  /** End-user identifier forwarded where the provider accepts one. */
  readonly user?: string;
}

// ---------------------------------------------------------------------------
// Embeddings
// ---------------------------------------------------------------------------

export interface EmbeddingRequest {
  readonly model: string;
  readonly input: string | readonly string[];
  readonly provider?: string;
  readonly dimensions?: number;
  readonly encoding_format?: "float" | "base64";
}

// ---------------------------------------------------------------------------
// Images
// ---------------------------------------------------------------------------

export interface ImageGenerationRequest {
  readonly model: string;
  readonly prompt: string;
  readonly provider?: string;
  /** Number of images. Default 1. */
  readonly n?: number;
  /** "WIDTHxHEIGHT", e.g. "1024x1024". */
  readonly size?: string;
  readonly quality?: string;
  readonly style?: string;
  readonly response_format?: "url" | "b64_json";
}

// ---------------------------------------------------------------------------
// Speech
// ---------------------------------------------------------------------------

export type SpeechFormat = "mp3" | "opus" | "aac" | "flac" | "wav" | "pcm";

/** Text-to-speech. */
export interface SpeechRequest {
  readonly model: string;
  /** Text to speak. */
  readonly input: string;
  readonly voice: string;
  readonly provider?: string;
  /** Default "mp3". */
  readonly response_format?: SpeechFormat;
  /** 0.25 to 4.0. */
  readonly speed?: number;
}

// ---------------------------------------------------------------------------
// Video
// ---------------------------------------------------------------------------

export interface VideoGenerationRequest {
  readonly model: string;
  readonly prompt: string;
  readonly provider?: string;
  /** Seconds of output. */
  readonly duration?: number;
  /** "WIDTHxHEIGHT" or a named resolution. */
  readonly size?: string;
  readonly fps?: number;
  readonly seed?: number;
  readonly n?: number;
}
