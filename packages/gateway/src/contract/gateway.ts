/**
 * Gateway: routes unified requests to named provider clients.
 *
 * Chat and streaming calls pass through middleware in onion order: the
 * first registered middleware sees the request first and the response
 * last. Every other operation goes straight to the client.
 */

import type { Logger } from "pino";
import { CapabilityRegistry, type CapabilityDescriptor } from "../capabilities/registry.js";
import type { GatewayConfig } from "../config/schema.js";
import { JobEngine } from "../jobs/engine.js";
import { componentLogger, configureLogging } from "../logging/logger.js";
import { createAdapter } from "../providers/index.js";
import { ResiliencePolicy } from "../resilience/policy.js";
import type { ChatCompletionChunk } from "../types/chunk.js";
import { ConfigurationError } from "../types/errors.js";
import type {
  EmbeddingRequest,
  ImageGenerationRequest,
  SpeechRequest,
  UnifiedChatRequest,
  VideoGenerationRequest,
} from "../types/request.js";
import type {
  AuthenticationResult,
  EmbeddingResponse,
  ImageGenerationResponse,
  ModelInfo,
  SpeechResponse,
  UnifiedChatResponse,
  VideoGenerationResponse,
} from "../types/response.js";
import { ProviderClient, type ClientObserver } from "./client.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Middleware = (
  request: UnifiedChatRequest,
  next: (request: UnifiedChatRequest) => Promise<UnifiedChatResponse>,
) => Promise<UnifiedChatResponse>;

/** Wraps the chunk sequence so each middleware can observe or rewrite it. */
export type StreamMiddleware = (
  request: UnifiedChatRequest,
  next: (request: UnifiedChatRequest) => AsyncIterable<ChatCompletionChunk>,
) => AsyncIterable<ChatCompletionChunk>;

export interface GatewayOptions {
  clients?: Record<string, ProviderClient>;
  /** Key into `clients` used when a request names no provider. */
  defaultProvider?: string;
  middleware?: Middleware[];
  streamMiddleware?: StreamMiddleware[];
}

export interface FromConfigOptions {
  observer?: ClientObserver;
  capabilities?: CapabilityRegistry;
  middleware?: Middleware[];
  streamMiddleware?: StreamMiddleware[];
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Gateway
// ---------------------------------------------------------------------------

export class Gateway {
  private readonly clients: Record<string, ProviderClient>;
  private readonly defaultProvider: string | undefined;
  private readonly middleware: Middleware[];
  private readonly streamMiddleware: StreamMiddleware[];

  constructor(options: GatewayOptions = {}) {
    this.clients = { ...(options.clients ?? {}) };
    this.defaultProvider = options.defaultProvider;
    this.middleware = [...(options.middleware ?? [])];
    this.streamMiddleware = [...(options.streamMiddleware ?? [])];
  }

  /**
   * Build one client per configured provider. Without an explicit
   * `defaultProvider` the first configured provider is the default.
   * The `logging` section replaces the root logger.
   */
  static fromConfig(config: GatewayConfig, options: FromConfigOptions = {}): Gateway {
    configureLogging(config.logging);
    const logger = options.logger ?? componentLogger("gateway");
    const capabilities = options.capabilities ?? new CapabilityRegistry();
    const policy = ResiliencePolicy.fromConfig(config.retry, {
      logger: logger.child({ component: "resilience" }),
    });
    const jobEngine = JobEngine.fromConfig(config.polling, logger.child({ component: "jobs" }));

    const clients: Record<string, ProviderClient> = {};
    for (const [name, entry] of Object.entries(config.providers)) {
      clients[name] = new ProviderClient({
        adapter: createAdapter(entry.type),
        name,
        credentials: {
          apiKey: entry.apiKey,
          secret: entry.secret,
          baseUrl: entry.baseUrl,
          region: entry.region,
          apiVersion: entry.apiVersion,
        },
        modelAliases: entry.modelAliases,
        capabilities,
        policy,
        jobEngine,
        streaming: {
          wordsPerChunk: config.streaming.wordsPerChunk,
          delayMs: config.streaming.chunkDelayMs,
        },
        requestTimeoutMs: config.requestTimeoutMs,
        observer: options.observer,
        logger: logger.child({ component: "provider-client", provider: name }),
      });
    }

    logger.info({ providers: Object.keys(clients) }, "gateway configured");
    return new Gateway({
      clients,
      defaultProvider: config.defaultProvider ?? Object.keys(clients)[0],
      middleware: options.middleware,
      streamMiddleware: options.streamMiddleware,
    });
  }

  // -----------------------------------------------------------------------
  // Routing
  // -----------------------------------------------------------------------

  get providerNames(): string[] {
    return Object.keys(this.clients);
  }

  /** Client for `provider`, or the default. Throws ConfigurationError. */
  getClient(provider?: string): ProviderClient {
    const name = provider ?? this.defaultProvider;
    if (!name) {
      throw new ConfigurationError(
        "No provider specified in request and no default provider configured",
      );
    }
    const client = this.clients[name];
    if (!client) {
      throw new ConfigurationError(`Provider "${name}" is not registered`, { provider: name });
    }
    return client;
  }

  getCapabilities(model: string, provider?: string): CapabilityDescriptor {
    return this.getClient(provider).getCapabilities(model);
  }

  // -----------------------------------------------------------------------
  // Chat
  // -----------------------------------------------------------------------

  async createChatCompletion(
    request: UnifiedChatRequest,
    signal?: AbortSignal,
  ): Promise<UnifiedChatResponse> {
    const innermost = (req: UnifiedChatRequest): Promise<UnifiedChatResponse> =>
      this.getClient(req.provider).createChatCompletion(req, signal);

    const chain = this.middleware.reduceRight<
      (req: UnifiedChatRequest) => Promise<UnifiedChatResponse>
    >((next, mw) => (req) => mw(req, next), innermost);

    return chain(request);
  }

  async *streamChatCompletion(
    request: UnifiedChatRequest,
    signal?: AbortSignal,
  ): AsyncGenerator<ChatCompletionChunk, void, undefined> {
    const innermost = (req: UnifiedChatRequest): AsyncIterable<ChatCompletionChunk> =>
      this.getClient(req.provider).streamChatCompletion(req, signal);

    const chain = this.streamMiddleware.reduceRight<
      (req: UnifiedChatRequest) => AsyncIterable<ChatCompletionChunk>
    >((next, mw) => (req) => mw(req, next), innermost);

    yield* chain(request);
  }

  // -----------------------------------------------------------------------
  // Other operations
  // -----------------------------------------------------------------------

  async createEmbedding(request: EmbeddingRequest, signal?: AbortSignal): Promise<EmbeddingResponse> {
    return this.getClient(request.provider).createEmbedding(request, signal);
  }

  async createImage(
    request: ImageGenerationRequest,
    signal?: AbortSignal,
  ): Promise<ImageGenerationResponse> {
    return this.getClient(request.provider).createImage(request, signal);
  }

  async createVideo(
    request: VideoGenerationRequest,
    signal?: AbortSignal,
  ): Promise<VideoGenerationResponse> {
    return this.getClient(request.provider).createVideo(request, signal);
  }

  async createSpeech(request: SpeechRequest, signal?: AbortSignal): Promise<SpeechResponse> {
    return this.getClient(request.provider).createSpeech(request, signal);
  }

  async listModels(provider?: string, signal?: AbortSignal): Promise<ModelInfo[]> {
    return this.getClient(provider).listModels(signal);
  }

  /** Check every configured provider. Never throws. */
  async verifyAll(signal?: AbortSignal): Promise<Record<string, AuthenticationResult>> {
    const entries = await Promise.all(
      Object.entries(this.clients).map(
        async ([name, client]) => [name, await client.verifyAuthentication(signal)] as const,
      ),
    );
    return Object.fromEntries(entries);
  }
}
