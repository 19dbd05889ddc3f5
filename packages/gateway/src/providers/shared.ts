/**
 * Helpers shared by the built-in adapters.
 */

import { randomUUID } from "node:crypto";
import type { z } from "zod";
import { FinishReason } from "../types/enums.js";
import { CommunicationError } from "../types/errors.js";
import { getContentText } from "../types/message.js";
import type { Message } from "../types/message.js";

/**
 * Parse an upstream body against `schema`. A body of the wrong shape is a
 * non-retryable CommunicationError.
 */
export function parseBody<S extends z.ZodTypeAny>(
  schema: S,
  body: unknown,
  provider: string,
  what = "response",
): z.output<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? ` at ${issue.path.join(".") || "(root)"}: ${issue.message}` : "";
    throw new CommunicationError(`Unexpected ${what} from ${provider}${where}`, {
      provider,
      cause: result.error,
      retryable: false,
    });
  }
  return result.data;
}

/** Decode one SSE `data:` payload as JSON and check its shape. */
export function parseStreamPayload<S extends z.ZodTypeAny>(
  schema: S,
  data: string,
  provider: string,
): z.output<S> {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch (err: unknown) {
    throw new CommunicationError(`Malformed stream event from ${provider}`, {
      provider,
      cause: err,
      retryable: false,
    });
  }
  return parseBody(schema, json, provider, "stream event");
}

/** Map an OpenAI-style finish reason string. */
export function mapFinishReason(raw: string | null | undefined): FinishReason {
  switch (raw) {
    case "stop":
    case "end_turn":
    case "stop_sequence":
      return FinishReason.STOP;
    case "length":
    case "max_tokens":
      return FinishReason.LENGTH;
    case "tool_calls":
    case "tool_use":
    case "function_call":
      return FinishReason.TOOL_CALLS;
    case "content_filter":
      return FinishReason.CONTENT_FILTER;
    default:
      return FinishReason.OTHER;
  }
}

/** Text of all system messages, joined by blank lines. */
export function systemPrompt(messages: readonly Message[]): string | undefined {
  const text = messages
    .filter((message) => message.role === "system")
    .map((message) => getContentText(message.content))
    .filter((part) => part !== "")
    .join("\n\n");
  return text === "" ? undefined : text;
}

export function generateId(prefix: string): string {
  return `${prefix}-${randomUUID()}`;
}

export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/** "1024x768" -> { width: 1024, height: 768 }. */
export function parseSize(size: string | undefined): { width: number; height: number } | undefined {
  const match = size ? /^(\d+)x(\d+)$/.exec(size) : null;
  if (!match?.[1] || !match[2]) return undefined;
  return { width: Number(match[1]), height: Number(match[2]) };
}
