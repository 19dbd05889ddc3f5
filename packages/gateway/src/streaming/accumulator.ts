/**
 * Folds a chunk stream back into a complete UnifiedChatResponse.
 *
 * ```ts
 * const acc = new ChunkAccumulator();
 * for await (const chunk of stream) {
 *   acc.process(chunk);
 * }
 * const response = acc.response();
 * ```
 */

import type { ChatCompletionChunk } from "../types/chunk.js";
import { FinishReason, Role } from "../types/enums.js";
import { textContent, type ToolCall } from "../types/message.js";
import { createUsage, type Usage, type UnifiedChatResponse } from "../types/response.js";

interface ToolCallBuilder {
  id: string;
  name: string;
  argumentChunks: string[];
}

export class ChunkAccumulator {
  private id = "";
  private model = "";
  private created = 0;
  private alias: string | undefined;
  private textChunks: string[] = [];
  private toolCallBuilders = new Map<number, ToolCallBuilder>();
  private finishReason: FinishReason | undefined;
  private accumulatedUsage: Usage | undefined;

  process(chunk: ChatCompletionChunk): void {
    this.id = chunk.id;
    this.model = chunk.model;
    this.created = chunk.created;
    this.alias = chunk.original_model_alias ?? this.alias;
    if (chunk.usage) this.accumulatedUsage = chunk.usage;

    for (const choice of chunk.choices) {
      if (choice.delta.content !== undefined) {
        this.textChunks.push(choice.delta.content);
      }
      for (const delta of choice.delta.tool_calls ?? []) {
        let builder = this.toolCallBuilders.get(delta.index);
        if (!builder) {
          builder = { id: "", name: "", argumentChunks: [] };
          this.toolCallBuilders.set(delta.index, builder);
        }
        if (delta.id) builder.id = delta.id;
        if (delta.function?.name) builder.name = delta.function.name;
        if (delta.function?.arguments) builder.argumentChunks.push(delta.function.arguments);
      }
      if (choice.finish_reason !== null) {
        this.finishReason = choice.finish_reason;
      }
    }
  }

  get text(): string {
    return this.textChunks.join("");
  }

  get toolCalls(): readonly ToolCall[] {
    return [...this.toolCallBuilders.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, builder]) => ({
        id: builder.id,
        type: "function" as const,
        function: { name: builder.name, arguments: builder.argumentChunks.join("") },
      }));
  }

  response(): UnifiedChatResponse {
    const toolCalls = this.toolCalls;
    return {
      id: this.id,
      object: "chat.completion",
      created: this.created,
      model: this.model,
      choices: [
        {
          index: 0,
          message: {
            role: Role.ASSISTANT,
            content: textContent(this.text),
            ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
          },
          finish_reason: this.finishReason ?? FinishReason.OTHER,
        },
      ],
      usage: this.accumulatedUsage ?? createUsage(0, 0),
      ...(this.alias !== undefined ? { original_model_alias: this.alias } : {}),
    };
  }
}
