import { readFileSync } from "node:fs";
import { describe, it, expect } from "vitest";
import { pino } from "pino";
import {
  CapabilityRegistry,
  assertOperationSupported,
  assertRequestSupported,
  stripUnsupportedParameters,
} from "../src/capabilities/registry.js";
import { parseCatalog } from "../src/capabilities/catalog.js";
import { Feature } from "../src/types/enums.js";
import { ConfigurationError, UnsupportedOperationError } from "../src/types/errors.js";
import { createMessage } from "../src/types/message.js";
import type { UnifiedChatRequest } from "../src/types/request.js";

const registry = new CapabilityRegistry();

function chat(model: string, extra: Partial<UnifiedChatRequest> = {}): UnifiedChatRequest {
  return { model, messages: [createMessage("user", "hi")], ...extra };
}

describe("CapabilityRegistry", () => {
  it("returns catalog entries with limits", () => {
    const caps = registry.getCapabilities("openai-compatible", "gpt-4o");
    expect(caps.source).toBe("catalog");
    expect(caps.features.vision).toBe(true);
    expect(caps.features.functionCalling).toBe(true);
    expect(caps.features.embeddings).toBe(false);
    expect(caps.limits).toEqual({ maxInputTokens: 128000, maxOutputTokens: 16384 });
  });

  it("matches aliases case-insensitively", () => {
    const caps = registry.getCapabilities("openai-compatible", "GPT-4o-Latest");
    expect(caps.source).toBe("catalog");
    expect(caps.modelId).toBe("GPT-4o-Latest");
  });

  it("applies per-model parameter overrides over provider defaults", () => {
    const caps = registry.getCapabilities("openai-compatible", "o3-mini");
    expect(caps.parameters.temperature).toBe(false);
    expect(caps.parameters.topP).toBe(false);
    expect(caps.parameters.maxTokens).toBe(true);
    expect(caps.parameters.topK).toBe(false);
    expect(registry.getCapabilities("anthropic", "claude-sonnet-4-5").parameters.topK).toBe(true);
  });

  it.each([
    ["my-embedding-model", Feature.EMBEDDINGS],
    ["acme-tts-hd", Feature.AUDIO_GENERATION],
    ["acme-realtime-voice", Feature.REALTIME_AUDIO],
    ["stable-diffusion-xl", Feature.IMAGE_GENERATION],
    ["acme-video-gen", Feature.VIDEO_GENERATION],
  ])("infers %s as %s only", (model, feature) => {
    const caps = registry.getCapabilities("openai-compatible", model);
    expect(caps.source).toBe("inferred");
    const enabled = Object.entries(caps.features)
      .filter(([, on]) => on)
      .map(([name]) => name);
    expect(enabled).toEqual([feature]);
    expect(caps.parameters.temperature).toBe(false);
  });

  it("infers an unknown model as a plain chat model", () => {
    const caps = registry.getCapabilities("openai-compatible", "acme-chat-1");
    expect(caps.features.chat).toBe(true);
    expect(caps.features.streaming).toBe(true);
    expect(caps.features.vision).toBe(false);
    expect(caps.features.functionCalling).toBe(false);
    expect(caps.parameters.tools).toBe(false);
  });

  it("infers vision and tools from known families", () => {
    const caps = registry.getCapabilities("openai-compatible", "llama-3.1-vision-instruct");
    expect(caps.features.vision).toBe(true);
    expect(caps.features.functionCalling).toBe(true);
  });

  it("returns frozen descriptors", () => {
    const caps = registry.getCapabilities("gemini", "gemini-2.0-flash");
    expect(Object.isFrozen(caps)).toBe(true);
    expect(Object.isFrozen(caps.features)).toBe(true);
  });

  it("lists catalog models for a provider", () => {
    const ids = registry.listCatalogModels("gemini").map((m) => m.id);
    expect(ids).toEqual(["gemini-2.0-flash", "text-embedding-004"]);
  });
});

describe("built-in catalog", () => {
  it("is emitted by the build beside the compiled loader", () => {
    const buildConfig: unknown = JSON.parse(
      readFileSync(new URL("../../../tsconfig.build.json", import.meta.url), "utf-8"),
    );
    expect(buildConfig).toMatchObject({
      compilerOptions: { noEmit: false },
      include: expect.arrayContaining(["packages/*/src/**/*.json"]),
    });
  });
});

describe("parseCatalog", () => {
  it("rejects malformed data", () => {
    expect(() => parseCatalog({ models: "nope" })).toThrow(ConfigurationError);
  });
});

describe("gates", () => {
  it("assertOperationSupported names the model and feature", () => {
    const caps = registry.getCapabilities("openai-compatible", "text-embedding-3-small");
    expect(() => assertOperationSupported(caps, Feature.CHAT)).toThrow(
      'Model "text-embedding-3-small" on provider "openai-compatible" does not support chat completion',
    );
    expect(() => assertOperationSupported(caps, Feature.EMBEDDINGS)).not.toThrow();
  });

  it("assertRequestSupported rejects tools and images the model lacks", () => {
    const caps = registry.getCapabilities("openai-compatible", "acme-chat-1");
    const tools = [{ type: "function" as const, function: { name: "lookup" } }];
    expect(() => assertRequestSupported(caps, chat("acme-chat-1", { tools }))).toThrow(
      UnsupportedOperationError,
    );

    const image = chat("acme-chat-1", {
      messages: [
        {
          role: "user",
          content: { kind: "blocks", blocks: [{ type: "image_url", url: "https://img.test/a.png" }] },
        },
      ],
    });
    expect(() => assertRequestSupported(caps, image)).toThrow("does not support image input");
    expect(() => assertRequestSupported(caps, chat("acme-chat-1"))).not.toThrow();
  });

  it("stripUnsupportedParameters drops what the model rejects and logs it", () => {
    const caps = registry.getCapabilities("openai-compatible", "o3-mini");
    const lines: string[] = [];
    const logger = pino({ level: "debug" }, { write: (line: string) => void lines.push(line) });
    const original = chat("o3-mini", { temperature: 0.2, top_p: 0.9, max_tokens: 100 });

    const stripped = stripUnsupportedParameters(caps, original, logger);
    expect(stripped.temperature).toBeUndefined();
    expect(stripped.top_p).toBeUndefined();
    expect(stripped.max_tokens).toBe(100);
    expect(original.temperature).toBe(0.2);
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      msg: "dropping unsupported parameters",
      provider: "openai-compatible",
      model: "o3-mini",
      dropped: ["temperature", "top_p"],
    });
  });
});
