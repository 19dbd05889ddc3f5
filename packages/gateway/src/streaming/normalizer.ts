/**
 * Streaming normalizer: upstream events in, canonical chunks out.
 *
 * Invariants on the output sequence:
 *   - every chunk shares one `id`
 *   - `delta.role` appears on the first chunk only
 *   - exactly one chunk has a non-null `finish_reason`, and it is last
 *
 * A `finish` event does not end the stream by itself. Providers report
 * usage after their stop signal, so the terminal chunk is emitted once the
 * upstream sequence is exhausted.
 */

import type { Logger } from "pino";
import { componentLogger } from "../logging/logger.js";
import { throwIfCanceled } from "../resilience/sleep.js";
import type { ChatCompletionChunk, ChunkDelta, ToolCallDelta } from "../types/chunk.js";
import { FinishReason } from "../types/enums.js";
import { CanceledError, toGatewayError } from "../types/errors.js";
import type { Usage } from "../types/response.js";
import type { UpstreamEvent } from "./events.js";

export interface NormalizeOptions {
  /** Chunk id used unless the upstream `start` event supplies one. */
  id: string;
  model: string;
  /** Copied to every chunk as `original_model_alias`. */
  alias?: string;
  /** Unix seconds. Defaults to now. */
  created?: number;
  signal?: AbortSignal;
  provider?: string;
  logger?: Logger;
}

/** Resolve with the next event, or reject as soon as `signal` fires. */
function nextOrCancel<T>(
  iterator: AsyncIterator<T>,
  signal?: AbortSignal,
): Promise<IteratorResult<T>> {
  if (!signal) return iterator.next();
  throwIfCanceled(signal);
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      reject(new CanceledError("Stream canceled", { cause: signal.reason }));
    };
    signal.addEventListener("abort", onAbort, { once: true });
    iterator.next().then(
      (result) => {
        signal.removeEventListener("abort", onAbort);
        resolve(result);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

export async function* normalizeStream(
  events: AsyncIterable<UpstreamEvent>,
  options: NormalizeOptions,
): AsyncGenerator<ChatCompletionChunk, void, undefined> {
  const { signal, provider } = options;
  const logger = options.logger ?? componentLogger("streaming", { provider });
  const created = options.created ?? Math.floor(Date.now() / 1000);
  let id = options.id;
  let model = options.model;
  let roleSent = false;
  let finishReason: FinishReason | undefined;
  let usage: Usage | undefined;
  let exhausted = false;

  const chunk = (
    delta: ChunkDelta,
    finish: FinishReason | null,
    extra?: { usage?: Usage },
  ): ChatCompletionChunk => ({
    id,
    object: "chat.completion.chunk",
    created,
    model,
    choices: [{ index: 0, delta, finish_reason: finish }],
    ...(extra?.usage ? { usage: extra.usage } : {}),
    ...(options.alias !== undefined ? { original_model_alias: options.alias } : {}),
  });

  const withRole = (delta: ChunkDelta): ChunkDelta => {
    if (roleSent) return delta;
    roleSent = true;
    return { role: "assistant", ...delta };
  };

  const iterator = events[Symbol.asyncIterator]();
  try {
    for (;;) {
      let next: IteratorResult<UpstreamEvent>;
      try {
        next = await nextOrCancel(iterator, signal);
      } catch (err: unknown) {
        throw toGatewayError(err, signal, { provider, operation: "streamChatCompletion" });
      }
      if (next.done) {
        exhausted = true;
        break;
      }

      const event = next.value;
      switch (event.type) {
        case "start":
          // The id is fixed once the first chunk is out.
          if (event.id && !roleSent) id = event.id;
          if (event.model && !roleSent) model = event.model;
          if (event.announce && !roleSent) {
            yield chunk(withRole({}), null);
          }
          break;
        case "content_delta":
          if (event.text !== "") {
            yield chunk(withRole({ content: event.text }), null);
          }
          break;
        case "tool_call_delta": {
          const call: ToolCallDelta = {
            index: event.index,
            ...(event.id !== undefined ? { id: event.id, type: "function" as const } : {}),
            function: {
              ...(event.name !== undefined ? { name: event.name } : {}),
              ...(event.arguments !== undefined ? { arguments: event.arguments } : {}),
            },
          };
          yield chunk(withRole({ tool_calls: [call] }), null);
          break;
        }
        case "usage":
          usage = event.usage;
          break;
        case "finish":
          finishReason = event.reason;
          break;
      }
      throwIfCanceled(signal);
    }

    yield chunk(withRole({}), finishReason ?? FinishReason.STOP, { usage });
  } finally {
    if (!exhausted) {
      releaseIterator(iterator, logger);
    }
  }
}

/**
 * Ask the upstream iterator to clean up. Not awaited: the iterator may be
 * parked on a read that only the transport's abort will settle.
 */
function releaseIterator(iterator: AsyncIterator<unknown>, logger: Logger): void {
  const closing = iterator.return?.();
  closing?.catch((err: unknown) => {
    logger.debug({ err }, "upstream iterator failed while closing");
  });
}
