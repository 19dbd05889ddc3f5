/**
 * Capability model: what each provider/model supports.
 *
 * Lookups are pure and synchronous. A model with an explicit catalog entry
 * (matched by id or alias) gets that entry; anything else is inferred from
 * its identifier.
 */

import type { Logger } from "pino";
import { Feature } from "../types/enums.js";
import { UnsupportedOperationError } from "../types/errors.js";
import { hasImageBlocks } from "../types/message.js";
import type { UnifiedChatRequest } from "../types/request.js";
import {
  loadBuiltinCatalog,
  type CapabilityCatalog,
  type CatalogModel,
} from "./catalog.js";

// ---------------------------------------------------------------------------
// Descriptor
// ---------------------------------------------------------------------------

export interface ParameterSupport {
  readonly temperature: boolean;
  readonly topP: boolean;
  readonly topK: boolean;
  readonly maxTokens: boolean;
  readonly stop: boolean;
  readonly tools: boolean;
}

export interface CapabilityLimits {
  readonly maxInputTokens?: number;
  readonly maxOutputTokens?: number;
}

export interface CapabilityDescriptor {
  readonly provider: string;
  readonly modelId: string;
  readonly features: Readonly<Record<Feature, boolean>>;
  readonly parameters: ParameterSupport;
  readonly limits: CapabilityLimits;
  readonly source: "catalog" | "inferred";
}

function featureFlags(enabled: readonly Feature[]): Record<Feature, boolean> {
  const has = (feature: Feature): boolean => enabled.includes(feature);
  return {
    chat: has(Feature.CHAT),
    streaming: has(Feature.STREAMING),
    vision: has(Feature.VISION),
    functionCalling: has(Feature.FUNCTION_CALLING),
    embeddings: has(Feature.EMBEDDINGS),
    imageGeneration: has(Feature.IMAGE_GENERATION),
    videoGeneration: has(Feature.VIDEO_GENERATION),
    audioGeneration: has(Feature.AUDIO_GENERATION),
    realtimeAudio: has(Feature.REALTIME_AUDIO),
  };
}

function freeze(descriptor: CapabilityDescriptor): CapabilityDescriptor {
  Object.freeze(descriptor.features);
  Object.freeze(descriptor.parameters);
  Object.freeze(descriptor.limits);
  return Object.freeze(descriptor);
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export class CapabilityRegistry {
  private readonly catalog: CapabilityCatalog;

  constructor(catalog: CapabilityCatalog = loadBuiltinCatalog()) {
    this.catalog = catalog;
  }

  /** Capabilities of `modelId` when served by `provider`. */
  getCapabilities(provider: string, modelId: string): CapabilityDescriptor {
    const entry = this.findEntry(provider, modelId);
    const features = entry ? entry.features : this.inferFeatures(modelId);
    const flags = featureFlags(features);
    const defaults = this.catalog.providers[provider]?.parameters ?? {};
    const overrides = entry?.parameters ?? {};
    const isChat = flags.chat;

    return freeze({
      provider,
      modelId,
      features: flags,
      parameters: {
        temperature: isChat && (overrides.temperature ?? defaults.temperature ?? true),
        topP: isChat && (overrides.topP ?? defaults.topP ?? true),
        topK: isChat && (overrides.topK ?? defaults.topK ?? false),
        maxTokens: isChat && (overrides.maxTokens ?? defaults.maxTokens ?? true),
        stop: isChat && (overrides.stop ?? defaults.stop ?? true),
        tools: flags.functionCalling,
      },
      limits: entry ? { ...entry.limits } : {},
      source: entry ? "catalog" : "inferred",
    });
  }

  /** Catalog entries for a provider, in catalog order. */
  listCatalogModels(provider: string): readonly CatalogModel[] {
    return this.catalog.models.filter((model) => model.provider === provider);
  }

  private findEntry(provider: string, modelId: string): CatalogModel | undefined {
    const id = modelId.toLowerCase();
    return this.catalog.models.find(
      (model) =>
        model.provider === provider &&
        (model.id.toLowerCase() === id ||
          model.aliases.some((alias) => alias.toLowerCase() === id)),
    );
  }

  private inferFeatures(modelId: string): Feature[] {
    const id = modelId.toLowerCase();
    const h = this.catalog.heuristics;
    const matches = (patterns: readonly string[]): boolean =>
      patterns.some((pattern) => id.includes(pattern));

    if (matches(h.embeddings)) return [Feature.EMBEDDINGS];
    if (matches(h.audioGeneration)) return [Feature.AUDIO_GENERATION];
    if (matches(h.realtimeAudio)) return [Feature.REALTIME_AUDIO];
    if (matches(h.imageGeneration)) return [Feature.IMAGE_GENERATION];
    if (matches(h.videoGeneration)) return [Feature.VIDEO_GENERATION];

    const features: Feature[] = [Feature.CHAT, Feature.STREAMING];
    if (matches(h.vision)) features.push(Feature.VISION);
    if (matches(h.functionCalling)) features.push(Feature.FUNCTION_CALLING);
    return features;
  }
}

// ---------------------------------------------------------------------------
// Gates
// ---------------------------------------------------------------------------

const FEATURE_LABELS: Record<Feature, string> = {
  chat: "chat completion",
  streaming: "streaming",
  vision: "image input",
  functionCalling: "function calling",
  embeddings: "embeddings",
  imageGeneration: "image generation",
  videoGeneration: "video generation",
  audioGeneration: "audio generation",
  realtimeAudio: "realtime audio",
};

/** Throw UnsupportedOperationError unless `feature` is supported. */
export function assertOperationSupported(
  descriptor: CapabilityDescriptor,
  feature: Feature,
): void {
  if (!descriptor.features[feature]) {
    throw new UnsupportedOperationError(
      `Model "${descriptor.modelId}" on provider "${descriptor.provider}" does not support ${FEATURE_LABELS[feature]}`,
    );
  }
}

/** Reject chat requests that need features the model lacks. */
export function assertRequestSupported(
  descriptor: CapabilityDescriptor,
  request: UnifiedChatRequest,
): void {
  assertOperationSupported(descriptor, Feature.CHAT);
  if (request.stream) {
    assertOperationSupported(descriptor, Feature.STREAMING);
  }
  if (request.tools && request.tools.length > 0) {
    assertOperationSupported(descriptor, Feature.FUNCTION_CALLING);
  }
  if (request.messages.some((message) => hasImageBlocks(message.content))) {
    assertOperationSupported(descriptor, Feature.VISION);
  }
}

/**
 * Drop sampling parameters the model does not accept. The request itself
 * is not modified.
 */
export function stripUnsupportedParameters(
  descriptor: CapabilityDescriptor,
  request: UnifiedChatRequest,
  logger?: Logger,
): UnifiedChatRequest {
  const { parameters } = descriptor;
  const dropped: string[] = [];
  const keep = <T>(value: T | undefined, supported: boolean, name: string): T | undefined => {
    if (value === undefined) return undefined;
    if (supported) return value;
    dropped.push(name);
    return undefined;
  };

  const result: UnifiedChatRequest = {
    ...request,
    temperature: keep(request.temperature, parameters.temperature, "temperature"),
    top_p: keep(request.top_p, parameters.topP, "top_p"),
    top_k: keep(request.top_k, parameters.topK, "top_k"),
    max_tokens: keep(request.max_tokens, parameters.maxTokens, "max_tokens"),
    stop: keep(request.stop, parameters.stop, "stop"),
  };

  if (dropped.length > 0) {
    logger?.debug(
      { provider: descriptor.provider, model: descriptor.modelId, dropped },
      "dropping unsupported parameters",
    );
  }
  return result;
}
