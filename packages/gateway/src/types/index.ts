/**
 * Barrel re-export for all type modules.
 */

// Enums
export { Role, FinishReason, Feature, JobStatus } from "./enums.js";

// Message types
export type {
  TextBlock,
  ImageBlock,
  Block,
  TextContent,
  BlocksContent,
  Content,
  ToolCall,
  Message,
} from "./message.js";
export {
  textContent,
  createMessage,
  getContentText,
  hasImageBlocks,
} from "./message.js";

// Request types
export type {
  ToolDefinition,
  ToolChoice,
  UnifiedChatRequest,
  EmbeddingRequest,
  ImageGenerationRequest,
  SpeechFormat,
  SpeechRequest,
  VideoGenerationRequest,
} from "./request.js";

// Response types
export type {
  Usage,
  Choice,
  UnifiedChatResponse,
  EmbeddingData,
  EmbeddingResponse,
  GeneratedMedia,
  ImageGenerationResponse,
  VideoGenerationResponse,
  SpeechResponse,
  ModelInfo,
  AuthenticationResult,
} from "./response.js";
export { createUsage } from "./response.js";

// Chunk types
export type {
  ToolCallDelta,
  ChunkDelta,
  StreamingChoice,
  ChatCompletionChunk,
} from "./chunk.js";
export { isTerminalChunk } from "./chunk.js";

// Credentials
export type { ProviderCredentials } from "./credentials.js";

// Error types
export type { ErrorOrigin } from "./errors.js";
export {
  ErrorKind,
  GatewayError,
  ConfigurationError,
  ValidationError,
  UnsupportedOperationError,
  CommunicationError,
  UpstreamJobFailedError,
  UpstreamJobCanceledError,
  OperationTimeoutError,
  CanceledError,
  isRetryableStatus,
  isGatewayError,
  toGatewayError,
  formatError,
} from "./errors.js";
