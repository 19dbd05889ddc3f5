/**
 * Built-in adapters, keyed by the `type` of a provider config entry.
 */

import type { ProviderType } from "../config/schema.js";
import type { ProviderAdapter } from "../contract/adapter.js";
import { AnthropicAdapter } from "./anthropic/index.js";
import { GeminiAdapter } from "./gemini/index.js";
import { OpenAICompatibleAdapter } from "./openai-compatible/index.js";
import { ReplicateAdapter } from "./replicate/index.js";

export function createAdapter(type: ProviderType): ProviderAdapter {
  switch (type) {
    case "openai-compatible":
      return new OpenAICompatibleAdapter();
    case "anthropic":
      return new AnthropicAdapter();
    case "gemini":
      return new GeminiAdapter();
    case "replicate":
      return new ReplicateAdapter();
  }
}

export { AnthropicAdapter } from "./anthropic/index.js";
export { GeminiAdapter } from "./gemini/index.js";
export {
  OpenAICompatibleAdapter,
  type OpenAICompatibleAdapterOptions,
} from "./openai-compatible/index.js";
export { ReplicateAdapter } from "./replicate/index.js";
