/**
 * Response types for the unified gateway.
 */

import type { FinishReason } from "./enums.js";
import type { Message } from "./message.js";

// ---------------------------------------------------------------------------
// Usage
// ---------------------------------------------------------------------------

export interface Usage {
  readonly prompt_tokens: number;
  readonly completion_tokens: number;
  readonly total_tokens: number;
}

/** Build a Usage, deriving the total when the provider omits it. */
export function createUsage(
  promptTokens: number,
  completionTokens: number,
  totalTokens?: number,
): Usage {
  return {
    prompt_tokens: promptTokens,
    completion_tokens: completionTokens,
    total_tokens: totalTokens ?? promptTokens + completionTokens,
  };
}

// ---------------------------------------------------------------------------
// Chat
// ---------------------------------------------------------------------------

export interface Choice {
  readonly index: number;
  readonly message: Message;
  readonly finish_reason: FinishReason | null;
}

export interface UnifiedChatResponse {
  readonly id: string;
  readonly object: "chat.completion";
  /** Unix seconds. */
  readonly created: number;
  /** Model that served the request, as reported upstream. */
  readonly model: string;
  readonly choices: readonly Choice[];
  readonly usage: Usage;
  /** The model alias the caller asked for, kept even when remapped. */
  readonly original_model_alias?: string;
}

// ---------------------------------------------------------------------------
// Embeddings
// ---------------------------------------------------------------------------

export interface EmbeddingData {
  readonly index: number;
  readonly embedding: readonly number[];
}

export interface EmbeddingResponse {
  readonly model: string;
  readonly data: readonly EmbeddingData[];
  readonly usage: Usage;
}

// ---------------------------------------------------------------------------
// Images & video
// ---------------------------------------------------------------------------

export interface GeneratedMedia {
  readonly url?: string;
  readonly b64_json?: string;
  readonly revised_prompt?: string;
}

export interface ImageGenerationResponse {
  readonly created: number;
  readonly data: readonly GeneratedMedia[];
}

export interface VideoGenerationResponse {
  readonly created: number;
  readonly data: readonly GeneratedMedia[];
}

export interface SpeechResponse {
  readonly audio: Uint8Array;
  readonly format: string;
  readonly content_type: string;
}

// ---------------------------------------------------------------------------
// Models & authentication
// ---------------------------------------------------------------------------

export interface ModelInfo {
  readonly id: string;
  readonly provider: string;
  readonly owned_by?: string;
}

export interface AuthenticationResult {
  readonly success: boolean;
  readonly message: string;
  readonly details?: string;
  readonly responseTimeMs?: number;
}
