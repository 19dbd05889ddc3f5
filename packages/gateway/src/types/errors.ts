/**
 * Error taxonomy for the gateway.
 *
 * All library errors inherit from GatewayError. Every error carries a
 * `kind` discriminator and, once it has crossed a provider boundary, the
 * provider and operation that raised it.
 */

// ---------------------------------------------------------------------------
// Kinds
// ---------------------------------------------------------------------------

export const ErrorKind = {
  CONFIGURATION: "configuration",
  VALIDATION: "validation",
  UNSUPPORTED_OPERATION: "unsupported_operation",
  COMMUNICATION: "communication",
  UPSTREAM_JOB_FAILED: "upstream_job_failed",
  UPSTREAM_JOB_CANCELED: "upstream_job_canceled",
  TIMEOUT: "timeout",
  CANCELED: "canceled",
} as const satisfies Record<string, string>;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

/** Where an error was raised. */
export interface ErrorOrigin {
  readonly provider?: string;
  readonly operation?: string;
}

// ---------------------------------------------------------------------------
// GatewayError: base for all library errors
// ---------------------------------------------------------------------------

export class GatewayError extends Error {
  readonly kind: ErrorKind;
  /** Whether the resilience policy may retry this error. */
  readonly retryable: boolean;
  private _provider?: string;
  private _operation?: string;

  constructor(
    kind: ErrorKind,
    message: string,
    options?: { cause?: unknown; retryable?: boolean } & ErrorOrigin,
  ) {
    super(message, { cause: options?.cause });
    this.name = "GatewayError";
    this.kind = kind;
    this.retryable = options?.retryable ?? false;
    this._provider = options?.provider;
    this._operation = options?.operation;
  }

  get provider(): string | undefined {
    return this._provider;
  }

  get operation(): string | undefined {
    return this._operation;
  }

  /**
   * Attach provider/operation tags. Tags already present are kept so the
   * innermost origin wins.
   */
  tag(origin: ErrorOrigin): this {
    this._provider ??= origin.provider;
    this._operation ??= origin.operation;
    return this;
  }
}

// ---------------------------------------------------------------------------
// Never retried
// ---------------------------------------------------------------------------

/** Missing or invalid credentials or configuration. */
export class ConfigurationError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown } & ErrorOrigin) {
    super(ErrorKind.CONFIGURATION, message, { ...options, retryable: false });
    this.name = "ConfigurationError";
  }
}

/** Malformed unified request. */
export class ValidationError extends GatewayError {
  /** Offending field paths, e.g. "messages.0.role". */
  readonly issues: readonly string[];

  constructor(
    message: string,
    options?: { cause?: unknown; issues?: readonly string[] } & ErrorOrigin,
  ) {
    super(ErrorKind.VALIDATION, message, { ...options, retryable: false });
    this.name = "ValidationError";
    this.issues = options?.issues ?? [];
  }
}

/** Operation not supported by the provider or model. */
export class UnsupportedOperationError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown } & ErrorOrigin) {
    super(ErrorKind.UNSUPPORTED_OPERATION, message, {
      ...options,
      retryable: false,
    });
    this.name = "UnsupportedOperationError";
  }
}

/** The upstream job reached `failed`. */
export class UpstreamJobFailedError extends GatewayError {
  readonly jobId: string;

  constructor(
    message: string,
    options: { jobId: string; cause?: unknown } & ErrorOrigin,
  ) {
    super(ErrorKind.UPSTREAM_JOB_FAILED, message, {
      ...options,
      retryable: false,
    });
    this.name = "UpstreamJobFailedError";
    this.jobId = options.jobId;
  }
}

/** The upstream job reached `canceled` without the caller asking for it. */
export class UpstreamJobCanceledError extends GatewayError {
  readonly jobId: string;

  constructor(
    message: string,
    options: { jobId: string; cause?: unknown } & ErrorOrigin,
  ) {
    super(ErrorKind.UPSTREAM_JOB_CANCELED, message, {
      ...options,
      retryable: false,
    });
    this.name = "UpstreamJobCanceledError";
    this.jobId = options.jobId;
  }
}

/** A poll loop or operation exceeded its bound. */
export class OperationTimeoutError extends GatewayError {
  /** Milliseconds elapsed when the bound was hit. */
  readonly elapsedMs?: number;

  constructor(
    message: string,
    options?: { cause?: unknown; elapsedMs?: number } & ErrorOrigin,
  ) {
    super(ErrorKind.TIMEOUT, message, { ...options, retryable: false });
    this.name = "OperationTimeoutError";
    this.elapsedMs = options?.elapsedMs;
  }
}

/** Caller-initiated cancellation. */
export class CanceledError extends GatewayError {
  constructor(message = "Operation canceled", options?: { cause?: unknown } & ErrorOrigin) {
    super(ErrorKind.CANCELED, message, { ...options, retryable: false });
    this.name = "CanceledError";
  }
}

// ---------------------------------------------------------------------------
// CommunicationError: transport and upstream HTTP failures
// ---------------------------------------------------------------------------

export class CommunicationError extends GatewayError {
  /** HTTP status code, if the failure came from a response. */
  readonly status_code?: number;
  /** Seconds to wait before retrying, from Retry-After. */
  readonly retry_after?: number;
  /** Provider-specific error code. */
  readonly error_code?: string;

  constructor(
    message: string,
    options?: {
      cause?: unknown;
      retryable?: boolean;
      status_code?: number;
      retry_after?: number;
      error_code?: string;
    } & ErrorOrigin,
  ) {
    super(ErrorKind.COMMUNICATION, message, {
      ...options,
      retryable: options?.retryable ?? isRetryableStatus(options?.status_code),
    });
    this.name = "CommunicationError";
    this.status_code = options?.status_code;
    this.retry_after = options?.retry_after;
    this.error_code = options?.error_code;
  }
}

/** 408, 429 and 5xx are transient; everything else is final. */
export function isRetryableStatus(status: number | undefined): boolean {
  if (status === undefined) return false;
  return status === 408 || status === 429 || (status >= 500 && status <= 599);
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

export function isGatewayError(err: unknown): err is GatewayError {
  return err instanceof GatewayError;
}

/**
 * Normalize any thrown value into the taxonomy.
 *
 * `signal` is the caller's cancellation signal: an abort while it is
 * aborted is a cancellation, any other abort is a timeout of the
 * underlying request.
 */
export function toGatewayError(
  err: unknown,
  signal?: AbortSignal,
  origin?: ErrorOrigin,
): GatewayError {
  const normalized = normalize(err, signal);
  return origin ? normalized.tag(origin) : normalized;
}

function normalize(err: unknown, signal?: AbortSignal): GatewayError {
  if (err instanceof GatewayError) return err;

  if (signal?.aborted) {
    return new CanceledError("Operation canceled", { cause: err });
  }

  if (err instanceof Error) {
    if (err.name === "TimeoutError") {
      return new CommunicationError(`Request timed out: ${err.message}`, {
        cause: err,
        retryable: true,
      });
    }
    if (err.name === "AbortError") {
      return new CommunicationError(`Request aborted: ${err.message}`, {
        cause: err,
        retryable: true,
      });
    }
    if (err instanceof TypeError) {
      // fetch() reports DNS, connection and TLS failures as TypeError.
      return new CommunicationError(`Network error: ${err.message}`, {
        cause: err,
        retryable: true,
      });
    }
    if (err instanceof SyntaxError) {
      return new CommunicationError(`Malformed response body: ${err.message}`, {
        cause: err,
        retryable: false,
      });
    }
    return new CommunicationError(err.message, { cause: err, retryable: false });
  }

  return new CommunicationError(String(err), { cause: err, retryable: false });
}

/** One-line description suitable for logs and CLI output. */
export function formatError(err: unknown): string {
  if (err instanceof GatewayError) {
    const where = [err.provider, err.operation].filter(Boolean).join("/");
    const status =
      err instanceof CommunicationError && err.status_code !== undefined
        ? ` (HTTP ${err.status_code})`
        : "";
    return where
      ? `[${err.kind}] ${where}: ${err.message}${status}`
      : `[${err.kind}] ${err.message}${status}`;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}
