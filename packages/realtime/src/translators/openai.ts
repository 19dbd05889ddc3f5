/**
 * OpenAI Realtime API translation.
 *
 *   session.created / session.updated        -> status "session_updated"
 *   response.audio.delta                     -> output audio frame
 *   response.text.delta                      -> text delta
 *   response.function_call_arguments.delta   -> function call fragment
 *   response.function_call_arguments.done    -> complete function call
 *   response.done                            -> status "response_complete"
 *   error                                    -> classified error
 *
 * Other event types produce nothing.
 */

import type { ProviderCredentials } from "@llm-gateway/gateway";
import { z } from "zod";
import type {
  AudioFormat,
  ConfigValidation,
  InboundMessage,
  OutboundMessage,
  SessionConfig,
} from "../messages.js";
import {
  classifyError,
  errorMessage,
  expectShape,
  parseFrame,
  toWebSocketUrl,
  type ErrorClassification,
  type ErrorClassificationTable,
  type RealtimeTranslator,
  type WireMessage,
} from "../translator.js";

const PROVIDER = "openai-realtime";
const DEFAULT_URL = "wss://api.openai.com/v1";
const DEFAULT_MODEL = "gpt-4o-realtime-preview";

export const OPENAI_MODELS = ["gpt-4o-realtime-preview", "gpt-4o-realtime-preview-2024-10-01"];
export const OPENAI_VOICES = ["alloy", "echo", "shimmer"];
const INPUT_FORMATS: readonly AudioFormat[] = ["pcm16_16k", "pcm16_24k", "g711_ulaw"];

export const OPENAI_ERRORS: ErrorClassificationTable = {
  severities: {
    invalid_request_error: "error",
    server_error: "critical",
    rate_limit_error: "warning",
  },
  terminal: ["invalid_api_key", "insufficient_quota"],
};

// ---------------------------------------------------------------------------
// Inbound schemas
// ---------------------------------------------------------------------------

const deltaSchema = z.object({ delta: z.string() });

const argumentsDeltaSchema = z.object({ call_id: z.string(), delta: z.string() });

const argumentsDoneSchema = z.object({
  call_id: z.string(),
  name: z.string().optional(),
  arguments: z.string(),
});

const errorSchema = z.object({
  error: z.object({
    code: z.string().nullish(),
    type: z.string().nullish(),
    message: z.string().nullish(),
  }),
});

function wireFormat(format: AudioFormat | undefined): string {
  switch (format) {
    case "g711_ulaw":
      return "g711_ulaw";
    case "g711_alaw":
      return "g711_alaw";
    default:
      return "pcm16";
  }
}

// ---------------------------------------------------------------------------
// Translator
// ---------------------------------------------------------------------------

export class OpenAIRealtimeTranslator implements RealtimeTranslator {
  readonly provider = PROVIDER;
  readonly subprotocol = "openai-beta.realtime-v1";

  connectionUrl(config: SessionConfig, credentials: ProviderCredentials): string {
    const base = credentials.baseUrl ? toWebSocketUrl(credentials.baseUrl) : DEFAULT_URL;
    return `${base}/realtime?model=${encodeURIComponent(config.model)}`;
  }

  connectionHeaders(credentials: ProviderCredentials): Record<string, string> {
    return {
      Authorization: `Bearer ${credentials.apiKey}`,
      "OpenAI-Beta": "realtime=v1",
    };
  }

  validateConfig(config: SessionConfig): ConfigValidation {
    const errors: string[] = [];
    const warnings: string[] = [];
    if (!OPENAI_MODELS.includes(config.model)) {
      errors.push(`Model '${config.model}' is not supported. Use: ${OPENAI_MODELS.join(", ")}`);
    }
    if (config.voice !== undefined && !OPENAI_VOICES.includes(config.voice)) {
      warnings.push(
        `Voice '${config.voice}' may not be supported. Recommended: ${OPENAI_VOICES.join(", ")}`,
      );
    }
    if (config.input_format !== undefined && !INPUT_FORMATS.includes(config.input_format)) {
      errors.push(`Input format '${config.input_format}' is not supported by OpenAI`);
    }
    return { errors, warnings };
  }

  initializationMessages(config: SessionConfig): WireMessage[] {
    return this.sessionUpdateMessages(config);
  }

  sessionUpdateMessages(config: SessionConfig): WireMessage[] {
    const turn = config.turn_detection;
    return [
      {
        type: "session.update",
        session: {
          model: config.model || DEFAULT_MODEL,
          voice: config.voice ?? "alloy",
          instructions: config.system_prompt,
          input_audio_format: wireFormat(config.input_format),
          output_audio_format: wireFormat(config.output_format),
          input_audio_transcription: config.transcription ? { model: "whisper-1" } : undefined,
          turn_detection:
            turn === undefined
              ? undefined
              : turn.type !== "server_vad"
                ? null
                : {
                    type: turn.type,
                    threshold: turn.threshold,
                    prefix_padding_ms: turn.prefix_padding_ms,
                    silence_duration_ms: turn.silence_duration_ms,
                  },
          tools: config.tools?.map((tool) => ({
            type: "function",
            name: tool.function.name,
            description: tool.function.description,
            parameters: tool.function.parameters,
          })),
          temperature: config.temperature,
          modalities: config.modalities ?? ["text", "audio"],
        },
      },
    ];
  }

  endOfInputMessages(): WireMessage[] {
    return [{ type: "input_audio_buffer.commit" }];
  }

  toProviderWire(message: OutboundMessage): WireMessage {
    switch (message.type) {
      case "audio_frame":
        return { type: "input_audio_buffer.append", audio: message.audio };
      case "text_input":
        return {
          type: "conversation.item.create",
          item: {
            type: "message",
            role: "user",
            content: [{ type: "input_text", text: message.text }],
          },
        };
      case "function_response":
        return {
          type: "conversation.item.create",
          item: { type: "function_call_output", call_id: message.call_id, output: message.output },
        };
      case "response_request":
        return {
          type: "response.create",
          response: {
            modalities: ["text", "audio"],
            instructions: message.instructions,
            temperature: message.temperature,
          },
        };
    }
  }

  fromProviderWire(data: string): InboundMessage[] {
    const frame = parseFrame(data, PROVIDER);

    switch (frame.type) {
      case "session.created":
      case "session.updated":
        return [{ type: "status", status: "session_updated", details: { event: frame.type } }];

      case "response.audio.delta": {
        const event = expectShape(deltaSchema, frame, PROVIDER);
        return [{ type: "audio_frame", audio: event.delta, direction: "output" }];
      }

      case "response.text.delta": {
        const event = expectShape(deltaSchema, frame, PROVIDER);
        return [{ type: "text_output", text: event.delta, delta: true }];
      }

      case "response.function_call_arguments.delta": {
        const event = expectShape(argumentsDeltaSchema, frame, PROVIDER);
        return [{ type: "function_call", call_id: event.call_id, arguments: event.delta, delta: true }];
      }

      case "response.function_call_arguments.done": {
        const event = expectShape(argumentsDoneSchema, frame, PROVIDER);
        return [
          {
            type: "function_call",
            call_id: event.call_id,
            name: event.name,
            arguments: event.arguments,
            delta: false,
          },
        ];
      }

      case "response.done":
        return [{ type: "status", status: "response_complete" }];

      case "error": {
        const { error } = expectShape(errorSchema, frame, PROVIDER);
        return [errorMessage(OPENAI_ERRORS, error.code ?? error.type ?? undefined, error.message ?? undefined)];
      }

      default:
        return [];
    }
  }

  classifyError(code: string): ErrorClassification {
    return classifyError(OPENAI_ERRORS, code);
  }
}
