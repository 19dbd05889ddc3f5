/**
 * HTTP transport around the global `fetch`.
 *
 * One transport is built per provider call. It applies the provider's auth
 * scheme and headers, a per-attempt timeout combined with the caller's
 * signal, and runs every request through the resilience policy. Non-2xx
 * responses are mapped to the error taxonomy before the policy sees them.
 */

import {
  ResiliencePolicy,
  type ExecuteContext,
  type RetryEvent,
} from "../resilience/policy.js";
import { applyAuth, type AuthScheme } from "./auth.js";
import { mapHttpError } from "./error-mapping.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface HttpTransportOptions {
  provider: string;
  operation: string;
  baseUrl: string;
  auth: AuthScheme;
  apiKey: string;
  headers?: Record<string, string>;
  /** Per-attempt timeout in milliseconds. */
  timeoutMs?: number;
  policy?: ResiliencePolicy;
  /** Caller cancellation. */
  signal?: AbortSignal;
  onRetry?: (event: RetryEvent) => void;
}

export interface BinaryResponse {
  readonly data: Uint8Array;
  /** Response Content-Type, if the upstream sent one. */
  readonly contentType?: string;
}

export interface RequestOptions {
  query?: Record<string, string | undefined>;
  headers?: Record<string, string>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Merge header objects. Later entries override earlier ones. A
 * `Content-Type: application/json` default is always present unless
 * explicitly overridden.
 */
export function mergeHeaders(
  ...headerSets: Array<Record<string, string> | undefined>
): Record<string, string> {
  const merged: Record<string, string> = {
    "Content-Type": "application/json",
  };
  for (const set of headerSets) {
    if (set) {
      Object.assign(merged, set);
    }
  }
  return merged;
}

/** Join a base URL and a path without doubling or dropping slashes. */
export function joinUrl(baseUrl: string, path: string): string {
  if (/^https?:\/\//.test(path)) return path;
  return `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

function parseBody(text: string): unknown {
  return text === "" ? undefined : JSON.parse(text);
}

function tryParseBody(text: string): unknown {
  try {
    return parseBody(text);
  } catch {
    return text;
  }
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

export class HttpTransport {
  readonly provider: string;
  readonly operation: string;
  readonly signal?: AbortSignal;
  private readonly options: HttpTransportOptions;
  private readonly policy: ResiliencePolicy;

  constructor(options: HttpTransportOptions) {
    this.options = options;
    this.provider = options.provider;
    this.operation = options.operation;
    this.signal = options.signal;
    this.policy = options.policy ?? ResiliencePolicy.none();
  }

  async getJson(path: string, options?: RequestOptions): Promise<unknown> {
    return this.requestJson("GET", path, undefined, options);
  }

  async postJson(path: string, body: unknown, options?: RequestOptions): Promise<unknown> {
    return this.requestJson("POST", path, body, options);
  }

  /** POST a JSON body and read the response as raw bytes. */
  async postBinary(path: string, body: unknown, options?: RequestOptions): Promise<BinaryResponse> {
    return this.policy.execute(
      async () => {
        const res = await this.send("POST", path, body, options);
        const data = new Uint8Array(await res.arrayBuffer());
        return { data, contentType: res.headers.get("Content-Type") ?? undefined };
      },
      this.executeContext(),
    );
  }

  /**
   * POST and return the response body stream once headers arrive. Only
   * the initiating request is retried; the caller owns the stream.
   */
  async openStream(
    path: string,
    body: unknown,
    options?: RequestOptions,
  ): Promise<ReadableStream<Uint8Array>> {
    return this.policy.execute(
      async () => {
        const res = await this.send("POST", path, body, options);
        if (!res.body) {
          throw new TypeError("Response body is empty; streaming not supported");
        }
        return res.body;
      },
      this.executeContext(),
    );
  }

  private async requestJson(
    method: string,
    path: string,
    body: unknown,
    options?: RequestOptions,
  ): Promise<unknown> {
    return this.policy.execute(
      async () => {
        const res = await this.send(method, path, body, options);
        return parseBody(await res.text());
      },
      this.executeContext(),
    );
  }

  /** One attempt. Resolves only for 2xx responses. */
  private async send(
    method: string,
    path: string,
    body: unknown,
    options?: RequestOptions,
  ): Promise<Response> {
    const url = new URL(joinUrl(this.options.baseUrl, path));
    for (const [key, value] of Object.entries(options?.query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, value);
    }

    const headers = mergeHeaders(this.options.headers, options?.headers);
    applyAuth(this.options.auth, this.options.apiKey, url, headers);

    const res = await fetch(url, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: this.attemptSignal(),
    });

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw mapHttpError(res.status, tryParseBody(text), this.provider, res.headers);
    }
    return res;
  }

  private executeContext(): ExecuteContext {
    return {
      signal: this.signal,
      provider: this.provider,
      operation: this.operation,
      onRetry: this.options.onRetry,
    };
  }

  private attemptSignal(): AbortSignal | undefined {
    const signals: AbortSignal[] = [];
    if (this.signal) signals.push(this.signal);
    const timeout = this.options.timeoutMs;
    if (timeout != null && timeout > 0) {
      signals.push(AbortSignal.timeout(timeout));
    }
    if (signals.length <= 1) return signals[0];
    return AbortSignal.any(signals);
  }
}
