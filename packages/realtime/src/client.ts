/**
 * RealtimeClient: opens and manages realtime sessions for one provider.
 */

import {
  CapabilityRegistry,
  Feature,
  ResiliencePolicy,
  ValidationError,
  assertOperationSupported,
  componentLogger,
  toGatewayError,
  validateCredentials,
  type Logger,
  type ProviderCredentials,
} from "@llm-gateway/gateway";
import { z } from "zod";
import {
  AudioFormat,
  type AudioFrameMessage,
  type InboundMessage,
  type SessionConfig,
  type SessionUpdate,
} from "./messages.js";
import { RealtimeSession } from "./session.js";
import type { RealtimeTranslator } from "./translator.js";
import { connectWebSocket, type ConnectOptions, type RealtimeTransport } from "./transport.js";

// ---------------------------------------------------------------------------
// Duplex stream
// ---------------------------------------------------------------------------

export interface DuplexStream<TIn, TOut> {
  readonly isConnected: boolean;
  send(item: TIn): Promise<void>;
  receive(signal?: AbortSignal): AsyncIterable<TOut>;
  /** End input; the read side stays open. */
  complete(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Config validation
// ---------------------------------------------------------------------------

const sessionConfigSchema = z.object({
  model: z.string().trim().min(1, "Model is required"),
  voice: z.string().min(1).optional(),
  language: z.string().min(1).optional(),
  system_prompt: z.string().optional(),
  input_format: z.nativeEnum(AudioFormat).optional(),
  output_format: z.nativeEnum(AudioFormat).optional(),
  turn_detection: z
    .object({
      type: z.enum(["server_vad", "manual", "none"]),
      threshold: z.number().min(0).max(1).optional(),
      prefix_padding_ms: z.number().int().nonnegative().optional(),
      silence_duration_ms: z.number().int().nonnegative().optional(),
    })
    .optional(),
  tools: z
    .array(
      z.object({
        type: z.literal("function"),
        function: z.object({
          name: z.string().min(1, "Tool name is required"),
          description: z.string().optional(),
          parameters: z.record(z.unknown()).optional(),
        }),
      }),
    )
    .optional(),
  temperature: z.number().min(0).max(2).optional(),
  modalities: z.array(z.enum(["text", "audio"])).min(1).optional(),
  transcription: z.boolean().optional(),
});

function structuralIssues(config: SessionConfig): string[] {
  const result = sessionConfigSchema.safeParse(config);
  if (result.success) return [];
  return result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface RealtimeClientOptions {
  translator: RealtimeTranslator;
  credentials: ProviderCredentials;
  capabilities?: CapabilityRegistry;
  /** Retries for the connection handshake. */
  policy?: ResiliencePolicy;
  /** Transport factory. Default: connectWebSocket. */
  connect?: (options: ConnectOptions) => Promise<RealtimeTransport>;
  logger?: Logger;
}

export class RealtimeClient {
  readonly provider: string;
  private readonly translator: RealtimeTranslator;
  private readonly credentials: Readonly<ProviderCredentials>;
  private readonly capabilities: CapabilityRegistry;
  private readonly policy: ResiliencePolicy;
  private readonly connect: (options: ConnectOptions) => Promise<RealtimeTransport>;
  private readonly logger: Logger;

  constructor(options: RealtimeClientOptions) {
    this.translator = options.translator;
    this.provider = options.translator.provider;
    this.credentials = validateCredentials(this.provider, options.credentials);
    this.capabilities = options.capabilities ?? new CapabilityRegistry();
    this.policy = options.policy ?? new ResiliencePolicy();
    this.connect = options.connect ?? connectWebSocket;
    this.logger = options.logger ?? componentLogger("realtime-client", { provider: this.provider });
  }

  /**
   * Open a session: check capabilities and configuration, connect, send
   * the provider's initialization frames.
   *
   * @throws {UnsupportedOperationError} when the model has no realtime audio
   * @throws {ValidationError} when the configuration is rejected
   */
  async createSession(config: SessionConfig, signal?: AbortSignal): Promise<RealtimeSession> {
    const operation = "createSession";
    const origin = { provider: this.provider, operation };

    try {
      const issues = structuralIssues(config);
      if (issues.length > 0) {
        throw new ValidationError(`Invalid session config: ${issues.join("; ")}`, { issues });
      }

      const descriptor = this.capabilities.getCapabilities(this.provider, config.model);
      assertOperationSupported(descriptor, Feature.REALTIME_AUDIO);

      const { errors, warnings } = this.translator.validateConfig(config);
      for (const warning of warnings) {
        this.logger.warn({ model: config.model }, warning);
      }
      if (errors.length > 0) {
        throw new ValidationError(`Invalid session config: ${errors.join("; ")}`, {
          issues: errors,
        });
      }

      const transport = await this.policy.execute(
        () =>
          this.connect({
            url: this.translator.connectionUrl(config, this.credentials),
            headers: this.translator.connectionHeaders(this.credentials),
            subprotocol: this.translator.subprotocol,
            signal,
          }),
        { ...origin, signal },
      );

      const session = new RealtimeSession({ translator: this.translator, transport, config });
      try {
        await session.initialize();
      } catch (err: unknown) {
        await session.close();
        throw err;
      }
      return session;
    } catch (err: unknown) {
      throw toGatewayError(err, signal, origin);
    }
  }

  async updateSession(session: RealtimeSession, update: SessionUpdate): Promise<void> {
    await session.update(update);
  }

  async closeSession(session: RealtimeSession): Promise<void> {
    await session.close();
  }

  /** Audio in, provider messages out, over an open session. */
  streamAudio(session: RealtimeSession): DuplexStream<AudioFrameMessage, InboundMessage> {
    return {
      get isConnected(): boolean {
        return session.isConnected;
      },
      send: (frame) => session.send(frame),
      receive: (signal) => session.receive(signal),
      complete: () => session.complete(),
    };
  }
}
