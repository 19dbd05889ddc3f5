export { HttpTransport, mergeHeaders, joinUrl } from "./http.js";
export type { BinaryResponse, HttpTransportOptions, RequestOptions } from "./http.js";
export { applyAuth, bearerAuth } from "./auth.js";
export type { AuthScheme } from "./auth.js";
export { mapHttpError, parseRetryAfter, extractMessage } from "./error-mapping.js";
export { parseSSEStream } from "./sse.js";
export type { SSEEvent } from "./sse.js";
