/**
 * Maps non-2xx provider responses onto the gateway error taxonomy.
 */

import {
  CommunicationError,
  ConfigurationError,
  type GatewayError,
} from "../types/errors.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

/** Pull a human-readable message out of a provider error body. */
export function extractMessage(body: unknown): string {
  if (isRecord(body)) {
    const error = body["error"];
    // Most providers nest under `error.message`.
    if (isRecord(error)) {
      const nested = stringField(error, "message");
      if (nested) return nested;
    }
    const message = stringField(body, "message") ?? stringField(body, "detail");
    if (message) return message;
    if (typeof error === "string") return error;
  }
  if (typeof body === "string") return body;
  if (body === undefined) return "";
  return JSON.stringify(body);
}

function extractErrorCode(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined;
  const error = body["error"];
  if (isRecord(error)) {
    const code = stringField(error, "code") ?? stringField(error, "type");
    if (code) return code;
    const status = stringField(error, "status");
    if (status) return status;
  }
  return stringField(body, "code") ?? stringField(body, "type");
}

/**
 * `Retry-After` in seconds. Only the integer form is handled; LLM APIs
 * rarely send HTTP dates.
 */
export function parseRetryAfter(headers?: Headers): number | undefined {
  const raw = headers?.get("retry-after");
  if (raw == null) return undefined;
  const seconds = parseFloat(raw);
  return !Number.isNaN(seconds) && seconds >= 0 ? seconds : undefined;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Map an HTTP error response to a GatewayError.
 *
 *   401, 403          -> ConfigurationError (credentials rejected)
 *   408, 429, 5xx     -> retryable CommunicationError
 *   any other status  -> non-retryable CommunicationError
 *
 * @param body - parsed JSON body, or raw text when it was not JSON
 */
export function mapHttpError(
  status: number,
  body: unknown,
  provider: string,
  headers?: Headers,
): GatewayError {
  const detail = extractMessage(body) || `HTTP ${status}`;

  if (status === 401 || status === 403) {
    return new ConfigurationError(
      `${provider} rejected the credentials (HTTP ${status}): ${detail}`,
      { provider },
    );
  }

  return new CommunicationError(detail, {
    provider,
    status_code: status,
    error_code: extractErrorCode(body),
    retry_after: parseRetryAfter(headers),
  });
}
