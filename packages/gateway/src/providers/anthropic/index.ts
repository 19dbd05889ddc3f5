/**
 * Anthropic provider adapter.
 *
 * Messages API (POST /v1/messages). Authentication via the x-api-key
 * header plus an anthropic-version header.
 */

import type { AdapterContext, ProviderAdapter } from "../../contract/adapter.js";
import type { UpstreamEvent } from "../../streaming/events.js";
import type { AuthScheme } from "../../transport/auth.js";
import { parseSSEStream } from "../../transport/sse.js";
import type { ProviderCredentials } from "../../types/credentials.js";
import type { UnifiedChatRequest } from "../../types/request.js";
import type { ModelInfo, UnifiedChatResponse } from "../../types/response.js";
import { translateRequest } from "./translate-request.js";
import { translateModelList, translateResponse } from "./translate-response.js";
import { translateStream } from "./stream.js";

export const ANTHROPIC_VERSION = "2023-06-01";

export class AnthropicAdapter implements ProviderAdapter {
  readonly name = "anthropic";
  readonly defaultBaseUrl = "https://api.anthropic.com/v1";
  readonly auth: AuthScheme = { type: "header", name: "x-api-key" };

  extraHeaders(credentials: ProviderCredentials): Record<string, string> {
    return { "anthropic-version": credentials.apiVersion ?? ANTHROPIC_VERSION };
  }

  async chat(request: UnifiedChatRequest, ctx: AdapterContext): Promise<UnifiedChatResponse> {
    const raw = await ctx.http.postJson("messages", translateRequest({ ...request, stream: false }));
    return translateResponse(raw, request, ctx.http.provider);
  }

  async streamChat(
    request: UnifiedChatRequest,
    ctx: AdapterContext,
  ): Promise<AsyncIterable<UpstreamEvent>> {
    const stream = await ctx.http.openStream(
      "messages",
      translateRequest({ ...request, stream: true }),
      { headers: { Accept: "text/event-stream" } },
    );
    return translateStream(parseSSEStream(stream), ctx.http.provider);
  }

  async listModels(ctx: AdapterContext): Promise<ModelInfo[]> {
    return translateModelList(await ctx.http.getJson("models"), ctx.http.provider);
  }
}

export { translateRequest } from "./translate-request.js";
export { translateResponse } from "./translate-response.js";
export { translateStream } from "./stream.js";
