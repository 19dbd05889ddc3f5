/**
 * Capability catalog data, loaded from capabilities.json beside this file.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { Feature } from "../types/enums.js";
import { ConfigurationError } from "../types/errors.js";

const featureSchema = z.nativeEnum(Feature);

const parameterSupportSchema = z.object({
  temperature: z.boolean().optional(),
  topP: z.boolean().optional(),
  topK: z.boolean().optional(),
  maxTokens: z.boolean().optional(),
  stop: z.boolean().optional(),
});

const catalogModelSchema = z.object({
  provider: z.string(),
  id: z.string(),
  aliases: z.array(z.string()).default([]),
  features: z.array(featureSchema),
  parameters: parameterSupportSchema.default({}),
  limits: z
    .object({
      maxInputTokens: z.number().int().positive().optional(),
      maxOutputTokens: z.number().int().positive().optional(),
    })
    .default({}),
});

export const capabilityCatalogSchema = z.object({
  providers: z
    .record(z.object({ parameters: parameterSupportSchema.default({}) }))
    .default({}),
  models: z.array(catalogModelSchema).default([]),
  heuristics: z.object({
    embeddings: z.array(z.string()),
    audioGeneration: z.array(z.string()),
    realtimeAudio: z.array(z.string()),
    imageGeneration: z.array(z.string()),
    videoGeneration: z.array(z.string()),
    vision: z.array(z.string()),
    functionCalling: z.array(z.string()),
  }),
});

export type CapabilityCatalog = z.infer<typeof capabilityCatalogSchema>;
export type CatalogModel = z.infer<typeof catalogModelSchema>;
export type CatalogParameterSupport = z.infer<typeof parameterSupportSchema>;

let builtin: CapabilityCatalog | undefined;

/** The catalog shipped with the package. Parsed once. */
export function loadBuiltinCatalog(): CapabilityCatalog {
  if (!builtin) {
    const url = new URL("./capabilities.json", import.meta.url);
    builtin = parseCatalog(JSON.parse(readFileSync(url, "utf-8")));
  }
  return builtin;
}

export function parseCatalog(data: unknown): CapabilityCatalog {
  const result = capabilityCatalogSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid capability catalog: ${result.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
      { cause: result.error },
    );
  }
  return result.data;
}
