export {
  SessionState,
  ErrorSeverity,
  AudioFormat,
  audioFrame,
} from "./messages.js";
export type {
  AudioFrameMessage,
  TextInputMessage,
  TextOutputMessage,
  FunctionCallMessage,
  FunctionResponseMessage,
  ResponseRequestMessage,
  StatusMessage,
  ErrorMessage,
  RealtimeMessage,
  OutboundMessage,
  InboundMessage,
  TurnDetection,
  SessionConfig,
  SessionUpdate,
  ConfigValidation,
} from "./messages.js";

export {
  classifyError,
  errorMessage,
  parseFrame,
  expectShape,
  toWebSocketUrl,
} from "./translator.js";
export type {
  RealtimeTranslator,
  WireMessage,
  WireFrame,
  ErrorClassification,
  ErrorClassificationTable,
} from "./translator.js";

export * from "./translators/index.js";

export { FrameQueue, connectWebSocket } from "./transport.js";
export type { RealtimeTransport, ConnectOptions } from "./transport.js";

export { RealtimeSession } from "./session.js";
export type { RealtimeSessionOptions } from "./session.js";

export { RealtimeClient } from "./client.js";
export type { DuplexStream, RealtimeClientOptions } from "./client.js";
