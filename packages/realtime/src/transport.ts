/**
 * WebSocket transport for realtime sessions.
 *
 * Frames are text carrying JSON. Incoming frames are buffered from the
 * moment the socket is created so nothing sent during the handshake is
 * lost. A closed socket ends the frame sequence; it does not throw.
 */

import type { ClientRequest, IncomingMessage } from "node:http";
import {
  CanceledError,
  CommunicationError,
  componentLogger,
  type Logger,
} from "@llm-gateway/gateway";
import WebSocket from "ws";

export interface RealtimeTransport {
  readonly isOpen: boolean;
  send(data: string): Promise<void>;
  /** Incoming text frames until the connection closes. */
  frames(signal?: AbortSignal): AsyncIterable<string>;
  /** Graceful close. Resolves once the socket is closed. Idempotent. */
  close(code?: number, reason?: string): Promise<void>;
}

export interface ConnectOptions {
  url: string;
  headers?: Record<string, string>;
  subprotocol?: string;
  signal?: AbortSignal;
  /** Default 10 s. */
  handshakeTimeoutMs?: number;
}

// ---------------------------------------------------------------------------
// FrameQueue
// ---------------------------------------------------------------------------

/** Unbounded FIFO of frames with one pending reader at a time. */
export class FrameQueue {
  private readonly items: string[] = [];
  private waiter: ((frame: string | undefined) => void) | undefined;
  private ended = false;

  push(frame: string): void {
    if (this.ended) return;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = undefined;
      resolve(frame);
      return;
    }
    this.items.push(frame);
  }

  end(): void {
    this.ended = true;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = undefined;
      resolve(undefined);
    }
  }

  /** The next frame, or `undefined` once the queue has ended and drained. */
  next(signal?: AbortSignal): Promise<string | undefined> {
    const buffered = this.items.shift();
    if (buffered !== undefined) return Promise.resolve(buffered);
    if (this.ended) return Promise.resolve(undefined);
    if (signal?.aborted) {
      return Promise.reject(new CanceledError("Operation canceled", { cause: signal.reason }));
    }
    if (this.waiter) {
      return Promise.reject(new Error("FrameQueue already has a pending reader"));
    }

    return new Promise((resolve, reject) => {
      const onAbort = (): void => {
        this.waiter = undefined;
        reject(new CanceledError("Operation canceled", { cause: signal?.reason }));
      };
      this.waiter = (frame) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(frame);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}

// ---------------------------------------------------------------------------
// WebSocketTransport
// ---------------------------------------------------------------------------

function rawToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  return Buffer.from(data).toString("utf-8");
}

class WebSocketTransport implements RealtimeTransport {
  private readonly queue = new FrameQueue();
  private readonly closed: Promise<void>;

  constructor(
    private readonly socket: WebSocket,
    private readonly logger: Logger,
  ) {
    socket.on("message", (data: WebSocket.RawData) => {
      this.queue.push(rawToString(data));
    });
    socket.on("error", (err: Error) => {
      this.logger.warn({ err }, "WebSocket error");
    });
    this.closed = new Promise((resolve) => {
      socket.once("close", (code: number, reason: Buffer) => {
        this.logger.debug({ code, reason: reason.toString("utf-8") }, "WebSocket closed");
        this.queue.end();
        resolve();
      });
    });
  }

  get isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  send(data: string): Promise<void> {
    if (!this.isOpen) {
      return Promise.reject(new CommunicationError("WebSocket is not open", { retryable: false }));
    }
    return new Promise((resolve, reject) => {
      this.socket.send(data, (err?: Error) => {
        if (err) {
          reject(new CommunicationError(`WebSocket send failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  async *frames(signal?: AbortSignal): AsyncGenerator<string, void, undefined> {
    for (;;) {
      const frame = await this.queue.next(signal);
      if (frame === undefined) return;
      yield frame;
    }
  }

  close(code = 1000, reason = ""): Promise<void> {
    switch (this.socket.readyState) {
      case WebSocket.CONNECTING:
        this.socket.terminate();
        break;
      case WebSocket.OPEN:
        this.socket.close(code, reason);
        break;
      default:
        break;
    }
    return this.closed;
  }
}

// ---------------------------------------------------------------------------
// connectWebSocket
// ---------------------------------------------------------------------------

/**
 * Open a WebSocket and resolve once the handshake completes.
 *
 * @throws {CommunicationError} when the connection fails or the upgrade is rejected
 * @throws {CanceledError} when `signal` fires first
 */
export function connectWebSocket(options: ConnectOptions): Promise<RealtimeTransport> {
  if (options.signal?.aborted) {
    return Promise.reject(new CanceledError("Operation canceled", { cause: options.signal.reason }));
  }
  const logger = componentLogger("realtime-transport", { url: options.url });

  return new Promise((resolve, reject) => {
    const socket = new WebSocket(options.url, options.subprotocol ? [options.subprotocol] : [], {
      headers: options.headers,
      handshakeTimeout: options.handshakeTimeoutMs ?? 10_000,
    });
    const transport = new WebSocketTransport(socket, logger);

    const cleanup = (): void => {
      socket.off("open", onOpen);
      socket.off("error", onError);
      socket.off("unexpected-response", onUnexpectedResponse);
      options.signal?.removeEventListener("abort", onAbort);
    };
    const onOpen = (): void => {
      cleanup();
      logger.debug({ protocol: socket.protocol }, "WebSocket connected");
      resolve(transport);
    };
    const onError = (err: Error): void => {
      cleanup();
      reject(
        new CommunicationError(`WebSocket connection failed: ${err.message}`, {
          cause: err,
          retryable: true,
        }),
      );
    };
    const onUnexpectedResponse = (_request: ClientRequest, response: IncomingMessage): void => {
      cleanup();
      socket.terminate();
      reject(
        new CommunicationError(`WebSocket upgrade rejected with HTTP ${response.statusCode ?? 0}`, {
          status_code: response.statusCode,
        }),
      );
    };
    const onAbort = (): void => {
      cleanup();
      socket.terminate();
      reject(new CanceledError("Operation canceled", { cause: options.signal?.reason }));
    };

    socket.on("open", onOpen);
    socket.on("error", onError);
    socket.on("unexpected-response", onUnexpectedResponse);
    options.signal?.addEventListener("abort", onAbort, { once: true });
  });
}
