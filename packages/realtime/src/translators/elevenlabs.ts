/**
 * ElevenLabs Conversational AI translation.
 *
 * `turn_complete` carries synthesis metrics; when it reports a character
 * count a `usage_update` status follows the `response_complete` status.
 */

import type { ProviderCredentials } from "@llm-gateway/gateway";
import { z } from "zod";
import type {
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

const PROVIDER = "elevenlabs";
const DEFAULT_URL = "wss://api.elevenlabs.io/v1";

export const ELEVENLABS_AGENTS = ["conversational-v1", "rachel", "sam", "charlie"];

/** Voice names to ElevenLabs voice ids. Unknown names fall back to rachel. */
export const ELEVENLABS_VOICES: Readonly<Record<string, string>> = {
  rachel: "21m00Tcm4TlvDq8ikWAM",
  sam: "yoZ06aMxZJJ28mfd3POQ",
  charlie: "IKne3meq5aSn9XLyUdCD",
  emily: "LcfcDJNUP1GQjkzn1xUU",
  adam: "pNInz6obpgDQGcFmaJgB",
  elli: "MF3mGyEYCl7XYWbV9V6O",
  josh: "TxGEqnHWrfWFTfGW9XjX",
};

export const ELEVENLABS_ERRORS: ErrorClassificationTable = {
  severities: {
    authentication_error: "critical",
    rate_limit_exceeded: "warning",
    server_error: "critical",
    invalid_request: "error",
    voice_not_found: "error",
  },
  terminal: ["authentication_error", "invalid_api_key", "subscription_expired", "quota_exceeded"],
  retryAfterMs: { rate_limit_exceeded: 60000 },
};

export function voiceId(voice: string | undefined): string {
  const fallback = "21m00Tcm4TlvDq8ikWAM";
  if (!voice) return fallback;
  return ELEVENLABS_VOICES[voice.toLowerCase()] ?? fallback;
}

const audioOutputSchema = z.object({ audio: z.object({ data: z.string() }) });

const textOutputSchema = z.object({ text: z.string(), is_partial: z.boolean().optional() });

const toolCallSchema = z.object({
  tool_call_id: z.string(),
  tool_name: z.string(),
  arguments: z.unknown(),
});

const turnCompleteSchema = z.object({
  metrics: z
    .object({
      characters_synthesized: z.number().int().optional(),
      duration_ms: z.number().int().optional(),
    })
    .optional(),
});

const errorBodySchema = z.object({
  code: z.string().nullish(),
  message: z.string().nullish(),
});

const errorSchema = z.union([z.object({ error: errorBodySchema }), errorBodySchema]);

export class ElevenLabsRealtimeTranslator implements RealtimeTranslator {
  readonly provider = PROVIDER;
  readonly subprotocol: string | undefined = undefined;

  connectionUrl(_config: SessionConfig, credentials: ProviderCredentials): string {
    const base = credentials.baseUrl ? toWebSocketUrl(credentials.baseUrl) : DEFAULT_URL;
    return `${base}/conversational/websocket`;
  }

  connectionHeaders(credentials: ProviderCredentials): Record<string, string> {
    return {
      Authorization: `Bearer ${credentials.apiKey}`,
      "X-ElevenLabs-Version": "v1",
      "X-Client-Info": "llm-gateway/1.0",
    };
  }

  validateConfig(config: SessionConfig): ConfigValidation {
    const errors: string[] = [];
    const warnings: string[] = [];
    if (!ELEVENLABS_AGENTS.includes(config.model)) {
      warnings.push(
        `Agent '${config.model}' may not be available. Known agents: ${ELEVENLABS_AGENTS.join(", ")}`,
      );
    }
    if (config.voice !== undefined && !(config.voice.toLowerCase() in ELEVENLABS_VOICES)) {
      warnings.push(
        `Voice '${config.voice}' may not be available. Known voices: ${Object.keys(ELEVENLABS_VOICES).join(", ")}`,
      );
    }
    if (config.input_format !== undefined && config.input_format !== "pcm16_16k") {
      errors.push(
        `Input format '${config.input_format}' is not supported by ElevenLabs. Use PCM16 at 16kHz.`,
      );
    }
    if (config.turn_detection !== undefined && config.turn_detection.type !== "none") {
      warnings.push("ElevenLabs handles turn detection automatically based on voice activity");
    }
    return { errors, warnings };
  }

  initializationMessages(config: SessionConfig): WireMessage[] {
    return [...this.sessionUpdateMessages(config), { type: "conversation_start" }];
  }

  sessionUpdateMessages(config: SessionConfig): WireMessage[] {
    const tools = config.tools?.map((tool) => ({
      name: tool.function.name,
      description: tool.function.description,
      parameters: tool.function.parameters,
    }));
    return [
      {
        type: "conversation_config",
        config: {
          agent_id: config.model || "conversational-v1",
          voice_id: voiceId(config.voice),
          system_prompt: config.system_prompt,
          language: config.language ?? "en",
          voice_settings: {
            stability: 0.5,
            similarity_boost: 0.75,
            style: 0.0,
            use_speaker_boost: true,
          },
          generation_config: {
            temperature: config.temperature ?? 0.8,
            response_format: "audio",
            enable_ssml: false,
          },
          audio_config: {
            input_format: "pcm_16000",
            output_format: "pcm_16000",
            encoding: "pcm_s16le",
          },
          interruption_config: { enabled: true, threshold_ms: 500 },
          ...(tools && tools.length > 0 ? { tools } : {}),
        },
      },
    ];
  }

  endOfInputMessages(): WireMessage[] {
    return [];
  }

  toProviderWire(message: OutboundMessage): WireMessage {
    switch (message.type) {
      case "audio_frame":
        return {
          type: "audio_input",
          audio: { data: message.audio, format: "pcm", sample_rate: 16000, channels: 1 },
        };
      case "text_input":
        return { type: "text_input", text: message.text, metadata: { role: "user" } };
      case "function_response":
        return { type: "tool_response", tool_call_id: message.call_id, output: message.output };
      case "response_request":
        return {
          type: "generate_response",
          config: {
            instructions: message.instructions,
            temperature: message.temperature ?? 0.8,
            voice_settings: { stability: 0.5, similarity_boost: 0.75 },
          },
        };
    }
  }

  fromProviderWire(data: string): InboundMessage[] {
    const frame = parseFrame(data, PROVIDER);

    switch (frame.type) {
      case "conversation_started":
        return [{ type: "status", status: "session_started" }];
      case "conversation_updated":
        return [{ type: "status", status: "session_updated" }];

      case "audio_output": {
        const event = expectShape(audioOutputSchema, frame, PROVIDER);
        return [{ type: "audio_frame", audio: event.audio.data, direction: "output" }];
      }

      case "text_output": {
        const event = expectShape(textOutputSchema, frame, PROVIDER);
        return [{ type: "text_output", text: event.text, delta: event.is_partial ?? false }];
      }

      case "tool_call": {
        const event = expectShape(toolCallSchema, frame, PROVIDER);
        return [
          {
            type: "function_call",
            call_id: event.tool_call_id,
            name: event.tool_name,
            arguments:
              typeof event.arguments === "string"
                ? event.arguments
                : JSON.stringify(event.arguments ?? {}),
            delta: false,
          },
        ];
      }

      case "turn_complete": {
        const { metrics } = expectShape(turnCompleteSchema, frame, PROVIDER);
        const messages: InboundMessage[] = [{ type: "status", status: "response_complete" }];
        if (metrics?.characters_synthesized !== undefined) {
          messages.push({
            type: "status",
            status: "usage_update",
            details: {
              characters: metrics.characters_synthesized,
              duration_ms: metrics.duration_ms ?? 0,
            },
          });
        }
        return messages;
      }

      case "interruption":
        return [{ type: "status", status: "interrupted" }];

      case "error": {
        const event = expectShape(errorSchema, frame, PROVIDER);
        const body = "error" in event ? event.error : event;
        return [errorMessage(ELEVENLABS_ERRORS, body.code ?? undefined, body.message ?? undefined)];
      }

      default:
        return [];
    }
  }

  classifyError(code: string): ErrorClassification {
    return classifyError(ELEVENLABS_ERRORS, code);
  }
}
