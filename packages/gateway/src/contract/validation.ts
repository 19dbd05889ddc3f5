/**
 * Request and credential validation. Runs before any network I/O.
 */

import { z } from "zod";
import { Role } from "../types/enums.js";
import { ConfigurationError, ValidationError } from "../types/errors.js";
import type { ProviderCredentials } from "../types/credentials.js";
import type {
  EmbeddingRequest,
  ImageGenerationRequest,
  SpeechRequest,
  UnifiedChatRequest,
  VideoGenerationRequest,
} from "../types/request.js";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const blockSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("text"), text: z.string() }),
  z.object({
    type: z.literal("image_url"),
    url: z.string().min(1, "Image URL is required"),
    detail: z.string().optional(),
  }),
]);

const contentSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("text"), text: z.string() }),
  z.object({ kind: z.literal("blocks"), blocks: z.array(blockSchema) }),
]);

const toolCallSchema = z.object({
  id: z.string().min(1),
  type: z.literal("function"),
  function: z.object({ name: z.string().min(1), arguments: z.string() }),
});

const messageSchema = z
  .object({
    role: z.nativeEnum(Role),
    content: contentSchema,
    tool_calls: z.array(toolCallSchema).optional(),
    tool_call_id: z.string().optional(),
    name: z.string().optional(),
  })
  .refine((message) => message.role !== Role.TOOL || Boolean(message.tool_call_id), {
    message: "Tool messages require tool_call_id",
    path: ["tool_call_id"],
  });

const toolSchema = z.object({
  type: z.literal("function"),
  function: z.object({
    name: z.string().min(1, "Tool name is required"),
    description: z.string().optional(),
    parameters: z.record(z.unknown()).optional(),
  }),
});

const modelSchema = z.string().trim().min(1, "Model is required");

export const chatRequestSchema = z.object({
  model: modelSchema,
  messages: z.array(messageSchema).min(1, "At least one message is required"),
  provider: z.string().optional(),
  temperature: z.number().min(0).max(2).optional(),
  top_p: z.number().min(0).max(1).optional(),
  top_k: z.number().int().positive().optional(),
  max_tokens: z.number().int().positive().optional(),
  stop: z.array(z.string()).optional(),
  tools: z.array(toolSchema).optional(),
  tool_choice: z
    .union([
      z.enum(["auto", "none", "required"]),
      z.object({ name: z.string().min(1) }),
    ])
    .optional(),
  stream: z.boolean().optional(),
  user: z.string().optional(),
});

export const embeddingRequestSchema = z.object({
  model: modelSchema,
  input: z.union([
    z.string().min(1, "Input is required"),
    z.array(z.string()).min(1, "Input is required"),
  ]),
  dimensions: z.number().int().positive().optional(),
  encoding_format: z.enum(["float", "base64"]).optional(),
});

export const imageRequestSchema = z.object({
  model: modelSchema,
  prompt: z.string().trim().min(1, "Prompt is required"),
  n: z.number().int().min(1).max(10).optional(),
  size: z.string().optional(),
  quality: z.string().optional(),
  style: z.string().optional(),
  response_format: z.enum(["url", "b64_json"]).optional(),
});

export const speechRequestSchema = z.object({
  model: modelSchema,
  input: z.string().trim().min(1, "Input text is required").max(4096),
  voice: z.string().trim().min(1, "Voice is required"),
  response_format: z.enum(["mp3", "opus", "aac", "flac", "wav", "pcm"]).optional(),
  speed: z.number().min(0.25).max(4).optional(),
});

export const videoRequestSchema = z.object({
  model: modelSchema,
  prompt: z.string().trim().min(1, "Prompt is required"),
  duration: z.number().positive().optional(),
  size: z.string().optional(),
  fps: z.number().int().positive().optional(),
  seed: z.number().int().optional(),
  n: z.number().int().min(1).optional(),
});

export const credentialsSchema = z.object({
  apiKey: z.string().trim().min(1, "API key is required"),
  secret: z.string().optional(),
  baseUrl: z.string().url("Base URL must be a valid URL").optional(),
  region: z.string().optional(),
  apiVersion: z.string().optional(),
});

// ---------------------------------------------------------------------------
// Validators
// ---------------------------------------------------------------------------

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

function validate<T>(schema: z.ZodTypeAny, value: T, what: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = describeIssues(result.error);
    throw new ValidationError(`Invalid ${what}: ${issues.join("; ")}`, {
      cause: result.error,
      issues,
    });
  }
  return value;
}

export function validateChatRequest(request: UnifiedChatRequest): UnifiedChatRequest {
  return validate(chatRequestSchema, request, "chat request");
}

export function validateEmbeddingRequest(request: EmbeddingRequest): EmbeddingRequest {
  return validate(embeddingRequestSchema, request, "embedding request");
}

export function validateImageRequest(request: ImageGenerationRequest): ImageGenerationRequest {
  return validate(imageRequestSchema, request, "image generation request");
}

export function validateSpeechRequest(request: SpeechRequest): SpeechRequest {
  return validate(speechRequestSchema, request, "speech request");
}

export function validateVideoRequest(request: VideoGenerationRequest): VideoGenerationRequest {
  return validate(videoRequestSchema, request, "video generation request");
}

/**
 * Check credentials for `provider` and return a frozen copy.
 *
 * @throws {ConfigurationError} when a required value is missing or invalid
 */
export function validateCredentials(
  provider: string,
  credentials: ProviderCredentials,
  options: { requiresSecret?: boolean } = {},
): Readonly<ProviderCredentials> {
  const result = credentialsSchema.safeParse(credentials);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid credentials for ${provider}: ${describeIssues(result.error).join("; ")}`,
      { provider, cause: result.error },
    );
  }
  if (options.requiresSecret && !credentials.secret) {
    throw new ConfigurationError(`Provider ${provider} requires a secret`, { provider });
  }
  return Object.freeze({ ...credentials });
}
