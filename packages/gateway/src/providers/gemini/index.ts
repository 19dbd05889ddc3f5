/**
 * Gemini provider adapter (Generative Language API, v1beta).
 *
 * The API key travels as the `key` query parameter.
 */

import type { AdapterContext, ProviderAdapter } from "../../contract/adapter.js";
import type { UpstreamEvent } from "../../streaming/events.js";
import type { AuthScheme } from "../../transport/auth.js";
import { parseSSEStream } from "../../transport/sse.js";
import type { EmbeddingRequest, UnifiedChatRequest } from "../../types/request.js";
import type { EmbeddingResponse, ModelInfo, UnifiedChatResponse } from "../../types/response.js";
import { modelPath, translateEmbeddingRequests, translateRequest } from "./translate-request.js";
import {
  translateEmbeddingResponse,
  translateModelList,
  translateResponse,
} from "./translate-response.js";
import { translateStream } from "./stream.js";

export class GeminiAdapter implements ProviderAdapter {
  readonly name = "gemini";
  readonly defaultBaseUrl = "https://generativelanguage.googleapis.com/v1beta";
  readonly auth: AuthScheme = { type: "query", param: "key" };

  async chat(request: UnifiedChatRequest, ctx: AdapterContext): Promise<UnifiedChatResponse> {
    const raw = await ctx.http.postJson(
      `${modelPath(request.model)}:generateContent`,
      translateRequest(request),
    );
    return translateResponse(raw, request, ctx.http.provider);
  }

  async streamChat(
    request: UnifiedChatRequest,
    ctx: AdapterContext,
  ): Promise<AsyncIterable<UpstreamEvent>> {
    const stream = await ctx.http.openStream(
      `${modelPath(request.model)}:streamGenerateContent`,
      translateRequest(request),
      { query: { alt: "sse" }, headers: { Accept: "text/event-stream" } },
    );
    return translateStream(parseSSEStream(stream), ctx.http.provider);
  }

  async embed(request: EmbeddingRequest, ctx: AdapterContext): Promise<EmbeddingResponse> {
    const requests = translateEmbeddingRequests(request);
    const [single] = requests;
    if (requests.length === 1 && single) {
      const raw = await ctx.http.postJson(`${modelPath(request.model)}:embedContent`, {
        content: single.content,
        outputDimensionality: single.outputDimensionality,
      });
      return translateEmbeddingResponse(raw, request.model, false, ctx.http.provider);
    }
    const raw = await ctx.http.postJson(`${modelPath(request.model)}:batchEmbedContents`, {
      requests,
    });
    return translateEmbeddingResponse(raw, request.model, true, ctx.http.provider);
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
