/**
 * ProviderClient: the one client every adapter runs behind.
 *
 * Supplies, uniformly for all adapters: credential validation at
 * construction, request validation, the capability gate (before any
 * network I/O), a per-call HTTP transport with auth, timeout and retry,
 * error normalization tagged with provider and operation, model alias
 * mapping, and outcome reporting. Instances hold configuration only and
 * keep no state between calls.
 */

import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import {
  CapabilityRegistry,
  assertOperationSupported,
  assertRequestSupported,
  stripUnsupportedParameters,
  type CapabilityDescriptor,
} from "../capabilities/registry.js";
import { JobEngine, type JobSteps } from "../jobs/engine.js";
import { componentLogger } from "../logging/logger.js";
import { ResiliencePolicy, type RetryEvent } from "../resilience/policy.js";
import type { UpstreamEvent } from "../streaming/events.js";
import { normalizeStream } from "../streaming/normalizer.js";
import { syntheticEvents, type SyntheticCadence } from "../streaming/synthetic.js";
import { HttpTransport } from "../transport/http.js";
import type { ChatCompletionChunk } from "../types/chunk.js";
import type { ProviderCredentials } from "../types/credentials.js";
import { Feature } from "../types/enums.js";
import {
  CanceledError,
  UnsupportedOperationError,
  formatError,
  toGatewayError,
  type GatewayError,
} from "../types/errors.js";
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
import type { AdapterContext, JobStrategy, ProviderAdapter } from "./adapter.js";
import {
  validateChatRequest,
  validateCredentials,
  validateEmbeddingRequest,
  validateImageRequest,
  validateSpeechRequest,
  validateVideoRequest,
} from "./validation.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RequestOutcome {
  readonly provider: string;
  readonly operation: string;
  readonly model?: string;
  readonly durationMs: number;
  readonly success: boolean;
  readonly error?: GatewayError;
}

/** Observability hooks. Exceptions thrown by hooks are not caught. */
export interface ClientObserver {
  onRetry?(event: RetryEvent): void;
  onRequestComplete?(outcome: RequestOutcome): void;
}

export interface ProviderClientOptions {
  adapter: ProviderAdapter;
  credentials: ProviderCredentials;
  /** Routing name. Default: the adapter name. */
  name?: string;
  /** Caller-facing model name -> upstream model id. */
  modelAliases?: Readonly<Record<string, string>>;
  capabilities?: CapabilityRegistry;
  policy?: ResiliencePolicy;
  jobEngine?: JobEngine;
  /** Cadence for synthetic streaming. */
  streaming?: Omit<SyntheticCadence, "signal">;
  /** Per-attempt HTTP timeout. Default: 300000. */
  requestTimeoutMs?: number;
  observer?: ClientObserver;
  logger?: Logger;
}

const DEFAULT_TIMEOUT_MS = 300_000;

// ---------------------------------------------------------------------------
// ProviderClient
// ---------------------------------------------------------------------------

export class ProviderClient {
  readonly name: string;
  readonly adapter: ProviderAdapter;
  private readonly credentials: Readonly<ProviderCredentials>;
  private readonly modelAliases: Readonly<Record<string, string>>;
  private readonly capabilities: CapabilityRegistry;
  private readonly policy: ResiliencePolicy;
  private readonly jobEngine: JobEngine;
  private readonly cadence: Omit<SyntheticCadence, "signal">;
  private readonly timeoutMs: number;
  private readonly observer: ClientObserver;
  private readonly logger: Logger;

  constructor(options: ProviderClientOptions) {
    this.adapter = options.adapter;
    this.name = options.name ?? options.adapter.name;
    this.credentials = validateCredentials(this.name, options.credentials, {
      requiresSecret: options.adapter.requiresSecret,
    });
    this.modelAliases = { ...(options.modelAliases ?? {}) };
    this.capabilities = options.capabilities ?? new CapabilityRegistry();
    this.policy = options.policy ?? new ResiliencePolicy();
    this.jobEngine = options.jobEngine ?? new JobEngine();
    this.cadence = options.streaming ?? {};
    this.timeoutMs = options.requestTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.observer = options.observer ?? {};
    this.logger = options.logger ?? componentLogger("provider-client", { provider: this.name });
  }

  // -----------------------------------------------------------------------
  // Capabilities
  // -----------------------------------------------------------------------

  /** Upstream model id for a caller-facing name. */
  resolveModel(model: string): string {
    return this.modelAliases[model] ?? model;
  }

  getCapabilities(model: string): CapabilityDescriptor {
    return this.capabilities.getCapabilities(this.adapter.name, this.resolveModel(model));
  }

  // -----------------------------------------------------------------------
  // Chat
  // -----------------------------------------------------------------------

  async createChatCompletion(
    request: UnifiedChatRequest,
    signal?: AbortSignal,
  ): Promise<UnifiedChatResponse> {
    const operation = "createChatCompletion";
    return this.observe(operation, request.model, signal, async () => {
      const { prepared, alias } = this.prepareChat(request, false);
      const ctx = this.context(operation, signal);

      let response: UnifiedChatResponse;
      if (this.adapter.chat) {
        response = await this.adapter.chat(prepared, ctx);
      } else if (this.adapter.jobs?.chat) {
        response = await this.runJob(this.adapter.jobs.chat, prepared, operation, signal);
      } else {
        throw this.unsupported("chat completion");
      }
      return { ...response, original_model_alias: alias };
    });
  }

  /**
   * Stream a chat completion as canonical chunks. Validation, capability
   * and initiating-request failures are thrown before the first chunk.
   */
  async *streamChatCompletion(
    request: UnifiedChatRequest,
    signal?: AbortSignal,
  ): AsyncGenerator<ChatCompletionChunk, void, undefined> {
    const operation = "streamChatCompletion";
    const started = performance.now();
    try {
      const { prepared, alias } = this.prepareChat(request, true);
      const ctx = this.context(operation, signal);
      const cadence: SyntheticCadence = { ...this.cadence, signal };

      let events: AsyncIterable<UpstreamEvent>;
      if (this.adapter.streamChat) {
        events = await this.adapter.streamChat(prepared, ctx);
      } else if (this.adapter.chat) {
        events = syntheticEvents(await this.adapter.chat(prepared, ctx), cadence);
      } else if (this.adapter.jobs?.chat) {
        events = this.jobStreamEvents(this.adapter.jobs.chat, prepared, operation, cadence);
      } else {
        throw this.unsupported("chat completion");
      }

      yield* normalizeStream(events, {
        id: `chatcmpl-${randomUUID()}`,
        model: prepared.model,
        alias,
        signal,
        provider: this.name,
        logger: this.logger,
      });
      this.report(operation, request.model, started);
    } catch (err: unknown) {
      const error = toGatewayError(err, signal, { provider: this.name, operation });
      this.report(operation, request.model, started, error);
      throw error;
    }
  }

  // -----------------------------------------------------------------------
  // Embeddings, images, video
  // -----------------------------------------------------------------------

  async createEmbedding(
    request: EmbeddingRequest,
    signal?: AbortSignal,
  ): Promise<EmbeddingResponse> {
    const operation = "createEmbedding";
    return this.observe(operation, request.model, signal, async () => {
      validateEmbeddingRequest(request);
      const model = this.resolveModel(request.model);
      assertOperationSupported(this.getCapabilities(request.model), Feature.EMBEDDINGS);
      if (!this.adapter.embed) throw this.unsupported("embeddings");
      return this.adapter.embed({ ...request, model }, this.context(operation, signal));
    });
  }

  async createImage(
    request: ImageGenerationRequest,
    signal?: AbortSignal,
  ): Promise<ImageGenerationResponse> {
    const operation = "createImage";
    return this.observe(operation, request.model, signal, async () => {
      validateImageRequest(request);
      const prepared = { ...request, model: this.resolveModel(request.model) };
      assertOperationSupported(this.getCapabilities(request.model), Feature.IMAGE_GENERATION);
      if (this.adapter.createImage) {
        return this.adapter.createImage(prepared, this.context(operation, signal));
      }
      if (this.adapter.jobs?.image) {
        return this.runJob(this.adapter.jobs.image, prepared, operation, signal);
      }
      throw this.unsupported("image generation");
    });
  }

  async createVideo(
    request: VideoGenerationRequest,
    signal?: AbortSignal,
  ): Promise<VideoGenerationResponse> {
    const operation = "createVideo";
    return this.observe(operation, request.model, signal, async () => {
      validateVideoRequest(request);
      const prepared = { ...request, model: this.resolveModel(request.model) };
      assertOperationSupported(this.getCapabilities(request.model), Feature.VIDEO_GENERATION);
      if (this.adapter.createVideo) {
        return this.adapter.createVideo(prepared, this.context(operation, signal));
      }
      if (this.adapter.jobs?.video) {
        return this.runJob(this.adapter.jobs.video, prepared, operation, signal);
      }
      throw this.unsupported("video generation");
    });
  }

  /** Text-to-speech. */
  async createSpeech(request: SpeechRequest, signal?: AbortSignal): Promise<SpeechResponse> {
    const operation = "createSpeech";
    return this.observe(operation, request.model, signal, async () => {
      validateSpeechRequest(request);
      const prepared = { ...request, model: this.resolveModel(request.model) };
      assertOperationSupported(this.getCapabilities(request.model), Feature.AUDIO_GENERATION);
      if (!this.adapter.createSpeech) throw this.unsupported("speech generation");
      return this.adapter.createSpeech(prepared, this.context(operation, signal));
    });
  }

  // -----------------------------------------------------------------------
  // Models & authentication
  // -----------------------------------------------------------------------

  /**
   * Models served by this provider. Falls back to the adapter's static
   * list, then to catalog entries, when the upstream listing is missing
   * or fails.
   */
  async listModels(signal?: AbortSignal): Promise<ModelInfo[]> {
    const operation = "listModels";
    if (this.adapter.listModels) {
      try {
        return await this.adapter.listModels(this.context(operation, signal));
      } catch (err: unknown) {
        const error = toGatewayError(err, signal, { provider: this.name, operation });
        if (error instanceof CanceledError) throw error;
        this.logger.warn({ err: error, operation }, "model listing failed; using fallback list");
      }
    }
    return this.fallbackModels();
  }

  /** Check the credentials against the upstream. Never throws. */
  async verifyAuthentication(signal?: AbortSignal): Promise<AuthenticationResult> {
    const operation = "verifyAuthentication";
    const started = performance.now();
    const elapsed = (): number => Math.round(performance.now() - started);
    const ctx = this.context(operation, signal, ResiliencePolicy.none());

    try {
      if (this.adapter.verifyAuthentication) {
        await this.adapter.verifyAuthentication(ctx);
      } else if (this.adapter.listModels) {
        await this.adapter.listModels(ctx);
      } else {
        return {
          success: true,
          message: "Credentials present; provider has no verification endpoint",
          responseTimeMs: elapsed(),
        };
      }
      return { success: true, message: "Connection successful", responseTimeMs: elapsed() };
    } catch (err: unknown) {
      const error = toGatewayError(err, signal, { provider: this.name, operation });
      return {
        success: false,
        message: `Authentication failed for ${this.name}`,
        details: formatError(error),
        responseTimeMs: elapsed(),
      };
    }
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private fallbackModels(): ModelInfo[] {
    const ids =
      this.adapter.fallbackModels ??
      this.capabilities.listCatalogModels(this.adapter.name).map((model) => model.id);
    return ids.map((id) => ({ id, provider: this.name }));
  }

  private prepareChat(
    request: UnifiedChatRequest,
    stream: boolean,
  ): { prepared: UnifiedChatRequest; alias: string } {
    validateChatRequest(request);
    const descriptor = this.getCapabilities(request.model);
    assertRequestSupported(descriptor, { ...request, stream });
    const prepared = stripUnsupportedParameters(
      descriptor,
      { ...request, model: this.resolveModel(request.model), stream },
      this.logger,
    );
    return { prepared, alias: request.model };
  }

  private context(
    operation: string,
    signal?: AbortSignal,
    policy: ResiliencePolicy = this.policy,
  ): AdapterContext {
    const http = new HttpTransport({
      provider: this.name,
      operation,
      baseUrl: this.credentials.baseUrl ?? this.adapter.defaultBaseUrl,
      auth: this.adapter.auth,
      apiKey: this.credentials.apiKey,
      headers: this.adapter.extraHeaders?.(this.credentials),
      timeoutMs: this.timeoutMs,
      policy,
      signal,
      onRetry: this.observer.onRetry?.bind(this.observer),
    });
    return {
      http,
      credentials: this.credentials,
      logger: this.logger.child({ operation }),
      signal,
    };
  }

  private async runJob<TRequest, TResult>(
    strategy: JobStrategy<TRequest, TResult>,
    request: TRequest,
    operation: string,
    signal?: AbortSignal,
  ): Promise<TResult> {
    const job = await this.jobEngine.run(this.jobSteps(strategy, request, operation, signal), {
      signal,
      provider: this.name,
      operation,
    });
    return strategy.toResult(job, request);
  }

  /**
   * Submit, announce, poll to completion, then replay the result as
   * synthetic events.
   */
  private async *jobStreamEvents(
    strategy: JobStrategy<UnifiedChatRequest, UnifiedChatResponse>,
    request: UnifiedChatRequest,
    operation: string,
    cadence: SyntheticCadence,
  ): AsyncGenerator<UpstreamEvent, void, undefined> {
    const { signal } = cadence;
    const steps = this.jobSteps(strategy, request, operation, signal);
    const runOptions = { signal, provider: this.name, operation };

    const submitted = await this.jobEngine.submit(steps, runOptions);
    yield { type: "start", id: submitted.id, model: request.model, announce: true };

    const finished = await this.jobEngine.waitFor(submitted, steps, runOptions);
    yield* syntheticEvents(strategy.toResult(finished, request), cadence);
  }

  private jobSteps<TRequest, TResult>(
    strategy: JobStrategy<TRequest, TResult>,
    request: TRequest,
    operation: string,
    signal?: AbortSignal,
  ): JobSteps {
    const ctx = this.context(operation, signal);
    const steps: JobSteps = {
      submit: () => strategy.submit(request, ctx),
      poll: (job, pollSignal) => strategy.poll(job, this.context(operation, pollSignal)),
    };
    if (strategy.cancel) {
      // Runs after the caller's signal has fired, so it gets its own context.
      const cancelCtx = this.context(operation, undefined, ResiliencePolicy.none());
      steps.cancel = (job) => strategy.cancel?.(job, cancelCtx) ?? Promise.resolve();
    }
    return steps;
  }

  private unsupported(what: string): UnsupportedOperationError {
    return new UnsupportedOperationError(`Provider ${this.name} does not support ${what}`, {
      provider: this.name,
    });
  }

  private async observe<T>(
    operation: string,
    model: string | undefined,
    signal: AbortSignal | undefined,
    fn: () => Promise<T>,
  ): Promise<T> {
    const started = performance.now();
    try {
      const result = await fn();
      this.report(operation, model, started);
      return result;
    } catch (err: unknown) {
      const error = toGatewayError(err, signal, { provider: this.name, operation });
      this.report(operation, model, started, error);
      throw error;
    }
  }

  private report(
    operation: string,
    model: string | undefined,
    started: number,
    error?: GatewayError,
  ): void {
    const durationMs = Math.round(performance.now() - started);
    if (error) {
      this.logger.debug({ operation, model, durationMs, kind: error.kind }, "request failed");
    } else {
      this.logger.debug({ operation, model, durationMs }, "request completed");
    }
    this.observer.onRequestComplete?.({
      provider: this.name,
      operation,
      model,
      durationMs,
      success: error === undefined,
      ...(error ? { error } : {}),
    });
  }
}
