import { describe, it, expect } from "vitest";
import {
  CommunicationError,
  ConfigurationError,
  ResiliencePolicy,
  UnsupportedOperationError,
  ValidationError,
} from "@llm-gateway/gateway";
import { RealtimeClient } from "../src/client.js";
import { audioFrame } from "../src/messages.js";
import { OpenAIRealtimeTranslator } from "../src/translators/openai.js";
import type { ConnectOptions } from "../src/transport.js";
import { FakeTransport, collect } from "./helpers.js";

function setup(failures: Error[] = []): {
  client: RealtimeClient;
  transport: FakeTransport;
  calls: ConnectOptions[];
} {
  const transport = new FakeTransport();
  const calls: ConnectOptions[] = [];
  const client = new RealtimeClient({
    translator: new OpenAIRealtimeTranslator(),
    credentials: { apiKey: "test-secret" },
    policy: new ResiliencePolicy({ maxRetries: 1, baseDelay: 1, maxDelay: 5, random: () => 0 }),
    connect: async (options) => {
      calls.push(options);
      const failure = failures.shift();
      if (failure) throw failure;
      return transport;
    },
  });
  return { client, transport, calls };
}

// ==========================================================================
// createSession
// ==========================================================================

describe("createSession", () => {
  it("connects with the translator's url, headers and subprotocol", async () => {
    const { client, transport, calls } = setup();
    const session = await client.createSession({ model: "gpt-4o-realtime-preview" });

    expect(calls).toHaveLength(1);
    expect(calls[0]).toMatchObject({
      url: "wss://api.openai.com/v1/realtime?model=gpt-4o-realtime-preview",
      headers: { Authorization: "Bearer test-secret", "OpenAI-Beta": "realtime=v1" },
      subprotocol: "openai-beta.realtime-v1",
    });
    expect(session.state).toBe("connected");
    expect(transport.sentTypes()).toEqual(["session.update"]);
  });

  it("rejects models without realtime audio before connecting", async () => {
    const { client, calls } = setup();
    const err = await client.createSession({ model: "gpt-4o" }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UnsupportedOperationError);
    expect(err).toMatchObject({
      message: 'Model "gpt-4o" on provider "openai-realtime" does not support realtime audio',
    });
    expect(calls).toHaveLength(0);
  });

  it("rejects configurations the translator refuses", async () => {
    const { client, calls } = setup();
    const err = await client
      .createSession({ model: "gpt-4o-realtime-preview", input_format: "g711_alaw" })
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({
      issues: ["Input format 'g711_alaw' is not supported by OpenAI"],
    });
    expect(calls).toHaveLength(0);
  });

  it("rejects structurally invalid configurations", async () => {
    const { client } = setup();
    await expect(client.createSession({ model: "" })).rejects.toThrow(
      "Invalid session config: model: Model is required",
    );
  });

  it("retries a transient connection failure", async () => {
    const { client, calls } = setup([
      new CommunicationError("WebSocket connection failed: ECONNRESET", { retryable: true }),
    ]);
    const session = await client.createSession({ model: "gpt-4o-realtime-preview" });
    expect(calls).toHaveLength(2);
    expect(session.isConnected).toBe(true);
  });

  it("does not retry a rejected upgrade", async () => {
    const { client, calls } = setup([
      new CommunicationError("WebSocket upgrade rejected with HTTP 401", { status_code: 401 }),
    ]);
    const err = await client
      .createSession({ model: "gpt-4o-realtime-preview" })
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CommunicationError);
    expect(err).toMatchObject({ status_code: 401 });
    expect(calls).toHaveLength(1);
  });
});

// ==========================================================================
// Streaming and lifecycle
// ==========================================================================

describe("streamAudio", () => {
  it("sends audio, ends input and reads provider messages", async () => {
    const { client, transport } = setup();
    const session = await client.createSession({ model: "gpt-4o-realtime-preview" });
    transport.sent.length = 0;
    const stream = client.streamAudio(session);

    expect(stream.isConnected).toBe(true);
    await stream.send(audioFrame(new Uint8Array([0, 1, 2])));
    await stream.complete();
    expect(transport.sentTypes()).toEqual([
      "input_audio_buffer.append",
      "input_audio_buffer.commit",
    ]);

    transport.deliver({ type: "response.text.delta", delta: "heard you" });
    transport.disconnect();
    await expect(collect(stream.receive())).resolves.toEqual([
      { type: "text_output", text: "heard you", delta: true },
    ]);
    expect(stream.isConnected).toBe(false);
  });
});

describe("updateSession and closeSession", () => {
  it("updates a live session and closes it", async () => {
    const { client, transport } = setup();
    const session = await client.createSession({ model: "gpt-4o-realtime-preview" });
    await client.updateSession(session, { voice: "echo" });
    expect(session.config.voice).toBe("echo");

    await client.closeSession(session);
    expect(session.state).toBe("closed");
    expect(transport.closeCalls).toBe(1);
  });
});

describe("constructor", () => {
  it("requires an API key", () => {
    expect(
      () =>
        new RealtimeClient({
          translator: new OpenAIRealtimeTranslator(),
          credentials: { apiKey: " " },
        }),
    ).toThrow(ConfigurationError);
  });
});
