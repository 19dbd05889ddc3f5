/**
 * Ultravox realtime translation.
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
  sampleRateOf,
  toWebSocketUrl,
  type ErrorClassification,
  type ErrorClassificationTable,
  type RealtimeTranslator,
  type WireMessage,
} from "../translator.js";

const PROVIDER = "ultravox";
const DEFAULT_URL = "wss://api.ultravox.ai/v1";

export const ULTRAVOX_MODELS = ["ultravox", "ultravox-v2", "ultravox-realtime"];
const INPUT_FORMATS: readonly AudioFormat[] = ["pcm16_16k", "pcm16_24k"];

export const ULTRAVOX_ERRORS: ErrorClassificationTable = {
  severities: {
    invalid_request: "error",
    server_error: "critical",
    rate_limit: "warning",
    authentication_failed: "critical",
  },
  terminal: ["authentication_failed", "invalid_api_key", "quota_exceeded", "model_not_available"],
};

const audioChunkSchema = z.object({ data: z.object({ audio: z.string() }) });

const textChunkSchema = z.object({ data: z.object({ text: z.string() }) });

const functionCallSchema = z.object({
  data: z.object({
    callId: z.string(),
    name: z.string(),
    // Sent as a JSON object; passed on re-serialized.
    arguments: z.unknown(),
  }),
});

const errorBodySchema = z.object({
  code: z.string().nullish(),
  message: z.string().nullish(),
});

const errorSchema = z.union([
  z.object({ error: errorBodySchema }),
  z.object({ data: errorBodySchema }),
]);

export class UltravoxRealtimeTranslator implements RealtimeTranslator {
  readonly provider = PROVIDER;
  readonly subprotocol = "ultravox.v1";

  connectionUrl(config: SessionConfig, credentials: ProviderCredentials): string {
    const base = credentials.baseUrl ? toWebSocketUrl(credentials.baseUrl) : DEFAULT_URL;
    return `${base}/realtime?model=${encodeURIComponent(config.model)}`;
  }

  connectionHeaders(credentials: ProviderCredentials): Record<string, string> {
    return {
      Authorization: `Bearer ${credentials.apiKey}`,
      "X-Ultravox-Version": "1.0",
      "X-Ultravox-Client": "llm-gateway",
    };
  }

  validateConfig(config: SessionConfig): ConfigValidation {
    const errors: string[] = [];
    const warnings: string[] = [];
    if (!ULTRAVOX_MODELS.includes(config.model)) {
      errors.push(`Model '${config.model}' is not supported. Use: ${ULTRAVOX_MODELS.join(", ")}`);
    }
    if (config.input_format !== undefined && !INPUT_FORMATS.includes(config.input_format)) {
      errors.push(`Input format '${config.input_format}' is not supported by Ultravox`);
    }
    if (config.turn_detection?.type === "manual") {
      warnings.push("Ultravox only supports server-side VAD turn detection");
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
        type: "session_config",
        data: {
          model: config.model || "ultravox-v2",
          systemPrompt: config.system_prompt,
          audioConfig: {
            inputFormat: "pcm16",
            outputFormat: "pcm16",
            sampleRate: sampleRateOf(config.input_format, 24000),
            channels: 1,
          },
          turnDetection:
            turn?.type === "server_vad"
              ? {
                  enabled: true,
                  vadThreshold: turn.threshold,
                  silenceDurationMs: turn.silence_duration_ms,
                }
              : undefined,
          responseConfig: {
            temperature: config.temperature,
            voice: config.voice ?? "nova",
            speed: 1.0,
          },
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
        return { type: "audio", data: { audio: message.audio, sampleRate: 24000, channels: 1 } };
      case "text_input":
        return { type: "text", data: { text: message.text, role: "user" } };
      case "function_response":
        return { type: "function_result", data: { callId: message.call_id, result: message.output } };
      case "response_request":
        return {
          type: "generate",
          data: {
            prompt: message.instructions,
            temperature: message.temperature ?? 0.7,
            maxTokens: 4096,
          },
        };
    }
  }

  fromProviderWire(data: string): InboundMessage[] {
    const frame = parseFrame(data, PROVIDER);

    switch (frame.type) {
      case "session_started":
      case "session_updated":
        return [{ type: "status", status: frame.type }];

      case "audio_chunk": {
        const event = expectShape(audioChunkSchema, frame, PROVIDER);
        return [{ type: "audio_frame", audio: event.data.audio, direction: "output" }];
      }

      case "text_chunk": {
        const event = expectShape(textChunkSchema, frame, PROVIDER);
        return [{ type: "text_output", text: event.data.text, delta: true }];
      }

      case "function_call": {
        const { data: call } = expectShape(functionCallSchema, frame, PROVIDER);
        return [
          {
            type: "function_call",
            call_id: call.callId,
            name: call.name,
            arguments:
              typeof call.arguments === "string" ? call.arguments : JSON.stringify(call.arguments ?? {}),
            delta: false,
          },
        ];
      }

      case "generation_complete":
        return [{ type: "status", status: "response_complete" }];

      case "error": {
        const event = expectShape(errorSchema, frame, PROVIDER);
        const body = "error" in event ? event.error : event.data;
        return [errorMessage(ULTRAVOX_ERRORS, body.code ?? undefined, body.message ?? undefined)];
      }

      default:
        return [];
    }
  }

  classifyError(code: string): ErrorClassification {
    return classifyError(ULTRAVOX_ERRORS, code);
  }
}
