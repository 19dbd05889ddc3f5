/**
 * A live realtime session over one transport connection.
 *
 * The session owns its transport. `receive()` reads until the connection
 * closes; `complete()` ends input without closing the read side, so the
 * provider can finish answering what was already sent.
 */

import { randomUUID } from "node:crypto";
import {
  CommunicationError,
  componentLogger,
  formatError,
  toGatewayError,
  type Logger,
} from "@llm-gateway/gateway";
import {
  SessionState,
  type AudioFrameMessage,
  type ErrorMessage,
  type InboundMessage,
  type OutboundMessage,
  type SessionConfig,
  type SessionUpdate,
} from "./messages.js";
import type { RealtimeTranslator, WireMessage } from "./translator.js";
import type { RealtimeTransport } from "./transport.js";

export interface RealtimeSessionOptions {
  translator: RealtimeTranslator;
  transport: RealtimeTransport;
  config: SessionConfig;
  id?: string;
  logger?: Logger;
}

export class RealtimeSession {
  readonly id: string;
  readonly provider: string;
  private _config: SessionConfig;
  private _state: SessionState = SessionState.CONNECTING;
  private inputComplete = false;
  private closing: Promise<void> | undefined;
  private readonly translator: RealtimeTranslator;
  private readonly transport: RealtimeTransport;
  private readonly logger: Logger;

  constructor(options: RealtimeSessionOptions) {
    this.id = options.id ?? `rt-${randomUUID()}`;
    this.translator = options.translator;
    this.transport = options.transport;
    this.provider = options.translator.provider;
    this._config = options.config;
    this.logger =
      options.logger ??
      componentLogger("realtime-session", { session: this.id, provider: this.provider });
  }

  get state(): SessionState {
    return this._state;
  }

  get config(): SessionConfig {
    return this._config;
  }

  get isConnected(): boolean {
    return (
      (this._state === SessionState.CONNECTED || this._state === SessionState.ACTIVE) &&
      this.transport.isOpen
    );
  }

  /** Send the provider's initialization frames and mark the session connected. */
  async initialize(): Promise<void> {
    await this.sendWire(this.translator.initializationMessages(this._config), "initialize");
    this._state = SessionState.CONNECTED;
    this.logger.info({ model: this._config.model }, "realtime session connected");
  }

  // -----------------------------------------------------------------------
  // Input
  // -----------------------------------------------------------------------

  /** Push one input audio frame. */
  async send(frame: AudioFrameMessage): Promise<void> {
    await this.sendMessage(frame);
  }

  async sendMessage(message: OutboundMessage): Promise<void> {
    this.assertWritable("send");
    await this.sendWire([this.translator.toProviderWire(message)], "send");
    if (this._state === SessionState.CONNECTED) {
      this._state = SessionState.ACTIVE;
    }
  }

  /** Signal end of input. Reading continues until the provider closes. */
  async complete(): Promise<void> {
    if (this.inputComplete) return;
    this.assertWritable("complete");
    this.inputComplete = true;
    await this.sendWire(this.translator.endOfInputMessages(), "complete");
  }

  async update(update: SessionUpdate): Promise<void> {
    if (!this.isConnected) {
      throw this.notConnected("update");
    }
    const next: SessionConfig = { ...this._config, ...update };
    await this.sendWire(this.translator.sessionUpdateMessages(next), "update");
    this._config = next;
  }

  // -----------------------------------------------------------------------
  // Output
  // -----------------------------------------------------------------------

  /**
   * Messages from the provider until the connection closes. Frames that
   * fail to translate are yielded as `translation_error` errors. A
   * terminal provider error closes the session after it is yielded.
   *
   * @throws {CanceledError} when `signal` fires
   */
  async *receive(signal?: AbortSignal): AsyncGenerator<InboundMessage, void, undefined> {
    try {
      for await (const frame of this.transport.frames(signal)) {
        for (const message of this.translate(frame)) {
          yield message;
          if (message.type === "error" && message.terminal) {
            this.logger.error({ code: message.code }, "terminal provider error; closing session");
            await this.close();
            return;
          }
        }
      }
    } catch (err: unknown) {
      throw toGatewayError(err, signal, { provider: this.provider, operation: "receive" });
    }

    if (this._state !== SessionState.CLOSED) {
      this.logger.info("transport closed");
      this._state = SessionState.CLOSED;
    }
  }

  // -----------------------------------------------------------------------
  // Close
  // -----------------------------------------------------------------------

  /** Graceful close. Safe to call more than once. */
  close(): Promise<void> {
    if (this._state === SessionState.CLOSED) return Promise.resolve();
    if (!this.closing) {
      this._state = SessionState.CLOSING;
      this.closing = this.transport.close(1000, "session closed").then(() => {
        this._state = SessionState.CLOSED;
        this.logger.info("realtime session closed");
      });
    }
    return this.closing;
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private translate(frame: string): InboundMessage[] {
    try {
      return this.translator.fromProviderWire(frame);
    } catch (err: unknown) {
      this.logger.error({ err: formatError(err) }, "untranslatable provider frame");
      const error: ErrorMessage = {
        type: "error",
        code: "translation_error",
        message: err instanceof Error ? err.message : String(err),
        severity: "error",
        terminal: false,
      };
      return [error];
    }
  }

  private async sendWire(messages: readonly WireMessage[], operation: string): Promise<void> {
    for (const message of messages) {
      try {
        await this.transport.send(JSON.stringify(message));
      } catch (err: unknown) {
        throw toGatewayError(err, undefined, { provider: this.provider, operation });
      }
    }
  }

  private assertWritable(operation: string): void {
    if (!this.isConnected) {
      throw this.notConnected(operation);
    }
    if (this.inputComplete) {
      throw new CommunicationError(`Session ${this.id} input is already complete`, {
        provider: this.provider,
        operation,
        retryable: false,
      });
    }
  }

  private notConnected(operation: string): CommunicationError {
    return new CommunicationError(`Session ${this.id} is not connected (state: ${this._state})`, {
      provider: this.provider,
      operation,
      retryable: false,
    });
  }
}
