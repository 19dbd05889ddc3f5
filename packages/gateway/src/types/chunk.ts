/**
 * Streaming chunk types.
 *
 * A stream is an ordered sequence of chunks sharing one `id`. The first
 * chunk alone carries `delta.role`; the last chunk alone carries a
 * non-null `finish_reason`.
 */

import type { FinishReason } from "./enums.js";
import type { Usage } from "./response.js";

export interface ToolCallDelta {
  /** Position of the call within the assistant turn. */
  readonly index: number;
  readonly id?: string;
  readonly type?: "function";
  readonly function?: {
    readonly name?: string;
    /** Partial JSON; concatenate across chunks. */
    readonly arguments?: string;
  };
}

export interface ChunkDelta {
  readonly role?: "assistant";
  readonly content?: string;
  readonly tool_calls?: readonly ToolCallDelta[];
}

export interface StreamingChoice {
  readonly index: number;
  readonly delta: ChunkDelta;
  readonly finish_reason: FinishReason | null;
}

export interface ChatCompletionChunk {
  readonly id: string;
  readonly object: "chat.completion.chunk";
  readonly created: number;
  readonly model: string;
  readonly choices: readonly StreamingChoice[];
  /** Present on the terminal chunk when the provider reported usage. */
  readonly usage?: Usage;
  readonly original_model_alias?: string;
}

/** True for the single chunk that ends a stream. */
export function isTerminalChunk(chunk: ChatCompletionChunk): boolean {
  return chunk.choices.some((choice) => choice.finish_reason !== null);
}
