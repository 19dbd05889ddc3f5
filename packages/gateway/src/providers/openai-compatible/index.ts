/**
 * OpenAI-compatible provider adapter.
 *
 * Chat Completions, embeddings, image generation, speech and model listing over
 * the `/v1` API shared by OpenAI and compatible servers (vLLM, Ollama,
 * Together, Groq). Bearer token authentication.
 */

import type { AdapterContext, ProviderAdapter } from "../../contract/adapter.js";
import type { UpstreamEvent } from "../../streaming/events.js";
import { bearerAuth, type AuthScheme } from "../../transport/auth.js";
import { parseSSEStream } from "../../transport/sse.js";
import type {
  EmbeddingRequest,
  ImageGenerationRequest,
  SpeechFormat,
  SpeechRequest,
  UnifiedChatRequest,
} from "../../types/request.js";
import type {
  EmbeddingResponse,
  ImageGenerationResponse,
  ModelInfo,
  SpeechResponse,
  UnifiedChatResponse,
} from "../../types/response.js";
import {
  translateEmbeddingRequest,
  translateImageRequest,
  translateRequest,
  translateSpeechRequest,
} from "./translate-request.js";
import {
  translateEmbeddingResponse,
  translateImageResponse,
  translateModelList,
  translateResponse,
} from "./translate-response.js";
import { translateStream } from "./stream.js";

const SPEECH_CONTENT_TYPES: Record<SpeechFormat, string> = {
  mp3: "audio/mpeg",
  opus: "audio/opus",
  aac: "audio/aac",
  flac: "audio/flac",
  wav: "audio/wav",
  pcm: "audio/pcm",
};

export interface OpenAICompatibleAdapterOptions {
  /** Default: "openai-compatible". */
  name?: string;
  /** Default: https://api.openai.com/v1 */
  baseUrl?: string;
  defaultHeaders?: Record<string, string>;
}

export class OpenAICompatibleAdapter implements ProviderAdapter {
  readonly name: string;
  readonly defaultBaseUrl: string;
  readonly auth: AuthScheme = bearerAuth;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: OpenAICompatibleAdapterOptions = {}) {
    this.name = options.name ?? "openai-compatible";
    this.defaultBaseUrl = options.baseUrl ?? "https://api.openai.com/v1";
    this.defaultHeaders = options.defaultHeaders ?? {};
  }

  extraHeaders(): Record<string, string> {
    return { ...this.defaultHeaders };
  }

  async chat(request: UnifiedChatRequest, ctx: AdapterContext): Promise<UnifiedChatResponse> {
    const body = translateRequest({ ...request, stream: false });
    const raw = await ctx.http.postJson("chat/completions", body);
    return translateResponse(raw, request, ctx.http.provider);
  }

  async streamChat(
    request: UnifiedChatRequest,
    ctx: AdapterContext,
  ): Promise<AsyncIterable<UpstreamEvent>> {
    const body = translateRequest({ ...request, stream: true });
    const stream = await ctx.http.openStream("chat/completions", body, {
      headers: { Accept: "text/event-stream" },
    });
    return translateStream(parseSSEStream(stream), ctx.http.provider);
  }

  async embed(request: EmbeddingRequest, ctx: AdapterContext): Promise<EmbeddingResponse> {
    const raw = await ctx.http.postJson("embeddings", translateEmbeddingRequest(request));
    return translateEmbeddingResponse(raw, request.model, ctx.http.provider);
  }

  async createImage(
    request: ImageGenerationRequest,
    ctx: AdapterContext,
  ): Promise<ImageGenerationResponse> {
    const raw = await ctx.http.postJson("images/generations", translateImageRequest(request));
    return translateImageResponse(raw, ctx.http.provider);
  }

  async createSpeech(request: SpeechRequest, ctx: AdapterContext): Promise<SpeechResponse> {
    const format = request.response_format ?? "mp3";
    const { data, contentType } = await ctx.http.postBinary(
      "audio/speech",
      translateSpeechRequest(request),
      { headers: { Accept: SPEECH_CONTENT_TYPES[format] } },
    );
    return { audio: data, format, content_type: contentType ?? SPEECH_CONTENT_TYPES[format] };
  }

  async listModels(ctx: AdapterContext): Promise<ModelInfo[]> {
    return translateModelList(await ctx.http.getJson("models"), ctx.http.provider);
  }

  async verifyAuthentication(ctx: AdapterContext): Promise<void> {
    await ctx.http.getJson("models");
  }
}

export { translateRequest } from "./translate-request.js";
export { translateResponse } from "./translate-response.js";
export { translateStream } from "./stream.js";
