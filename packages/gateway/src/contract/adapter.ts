/**
 * ProviderAdapter: what each upstream provider contributes.
 *
 * An adapter is a set of wire mappings plus transport facts (base URL,
 * auth scheme, headers). Every optional operation it leaves out is
 * reported as unsupported by ProviderClient. Shared behavior (validation,
 * capability gating, retry, error tagging, alias mapping) lives in
 * ProviderClient, not here.
 */

import type { Logger } from "pino";
import type { PredictionJob } from "../jobs/job.js";
import type { UpstreamEvent } from "../streaming/events.js";
import type { AuthScheme } from "../transport/auth.js";
import type { HttpTransport } from "../transport/http.js";
import type { ProviderCredentials } from "../types/credentials.js";
import type {
  EmbeddingRequest,
  ImageGenerationRequest,
  SpeechRequest,
  UnifiedChatRequest,
  VideoGenerationRequest,
} from "../types/request.js";
import type {
  EmbeddingResponse,
  ImageGenerationResponse,
  ModelInfo,
  SpeechResponse,
  UnifiedChatResponse,
  VideoGenerationResponse,
} from "../types/response.js";

/** Per-call resources handed to adapter operations. */
export interface AdapterContext {
  readonly http: HttpTransport;
  readonly credentials: ProviderCredentials;
  readonly logger: Logger;
  readonly signal?: AbortSignal;
}

/** Submit/poll/cancel mapping for one job-based operation. */
export interface JobStrategy<TRequest, TResult> {
  submit(request: TRequest, ctx: AdapterContext): Promise<PredictionJob>;
  poll(job: PredictionJob, ctx: AdapterContext): Promise<PredictionJob>;
  cancel?(job: PredictionJob, ctx: AdapterContext): Promise<void>;
  /** Map a succeeded job into the unified result. */
  toResult(job: PredictionJob, request: TRequest): TResult;
}

export interface JobOperations {
  readonly chat?: JobStrategy<UnifiedChatRequest, UnifiedChatResponse>;
  readonly image?: JobStrategy<ImageGenerationRequest, ImageGenerationResponse>;
  readonly video?: JobStrategy<VideoGenerationRequest, VideoGenerationResponse>;
}

export interface ProviderAdapter {
  /** Adapter name; also the capability catalog key. */
  readonly name: string;
  readonly defaultBaseUrl: string;
  readonly auth: AuthScheme;
  /** Credentials must carry `secret` as well as `apiKey`. */
  readonly requiresSecret?: boolean;
  /** Model ids reported when the upstream has no listing endpoint. */
  readonly fallbackModels?: readonly string[];
  readonly jobs?: JobOperations;

  /** Static headers sent with every request. */
  extraHeaders?(credentials: ProviderCredentials): Record<string, string>;

  chat?(request: UnifiedChatRequest, ctx: AdapterContext): Promise<UnifiedChatResponse>;

  /**
   * Resolves once the initiating request has succeeded, so failures
   * surface before any chunk.
   */
  streamChat?(
    request: UnifiedChatRequest,
    ctx: AdapterContext,
  ): Promise<AsyncIterable<UpstreamEvent>>;

  embed?(request: EmbeddingRequest, ctx: AdapterContext): Promise<EmbeddingResponse>;

  createImage?(
    request: ImageGenerationRequest,
    ctx: AdapterContext,
  ): Promise<ImageGenerationResponse>;

  createVideo?(
    request: VideoGenerationRequest,
    ctx: AdapterContext,
  ): Promise<VideoGenerationResponse>;

  createSpeech?(request: SpeechRequest, ctx: AdapterContext): Promise<SpeechResponse>;

  listModels?(ctx: AdapterContext): Promise<ModelInfo[]>;

  /** Resolve if the credentials are accepted; throw otherwise. */
  verifyAuthentication?(ctx: AdapterContext): Promise<void>;
}
