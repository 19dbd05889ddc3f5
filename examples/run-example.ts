/**
 * Example: driving the gateway against in-process stand-ins.
 *
 * This script demonstrates how to:
 *   1. Build a Gateway from configuration
 *   2. Run a chat completion and a streamed completion
 *   3. Fold the streamed chunks back into a response
 *   4. Open a realtime session and exchange a few frames
 *
 * No API keys are needed: an HTTP server plays an OpenAI-compatible
 * upstream and a WebSocket server plays an Ultravox realtime endpoint,
 * both on ephemeral local ports.
 *
 * Usage:
 *   npm run example
 */

import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
import { WebSocketServer } from "ws";
import {
  ChunkAccumulator,
  Gateway,
  createMessage,
  formatError,
  loadConfig,
} from "@llm-gateway/gateway";
import { RealtimeClient, UltravoxRealtimeTranslator, audioFrame } from "@llm-gateway/realtime";

// ---------------------------------------------------------------------------
// Stub upstreams
// ---------------------------------------------------------------------------

function completionBody(stream: boolean): string {
  if (!stream) {
    return JSON.stringify({
      id: "chatcmpl-example",
      model: "gpt-4o-mini",
      choices: [
        { index: 0, message: { role: "assistant", content: "Paris." }, finish_reason: "stop" },
      ],
      usage: { prompt_tokens: 9, completion_tokens: 2, total_tokens: 11 },
    });
  }
  const deltas: Array<{ content?: string }> = ["The ", "capital ", "is ", "Paris."].map(
    (content) => ({ content }),
  );
  const events = [...deltas, {}].map((delta, i) => ({
    id: "chatcmpl-example",
    model: "gpt-4o-mini",
    choices: [{ index: 0, delta, finish_reason: i === deltas.length ? "stop" : null }],
  }));
  return events.map((event) => `data: ${JSON.stringify(event)}\n\n`).join("") + "data: [DONE]\n\n";
}

function handleChat(req: IncomingMessage, res: ServerResponse): void {
  let raw = "";
  req.setEncoding("utf8");
  req.on("data", (part: string) => {
    raw += part;
  });
  req.on("end", () => {
    const stream = raw.includes('"stream":true');
    res.writeHead(200, {
      "Content-Type": stream ? "text/event-stream" : "application/json",
    });
    res.end(completionBody(stream));
  });
}

async function listen(server: ReturnType<typeof createServer>): Promise<number> {
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === "string") throw new Error("server has no port");
  return address.port;
}

function startRealtimeStub(): Promise<WebSocketServer> {
  const wss = new WebSocketServer({ host: "127.0.0.1", port: 0 });
  wss.on("connection", (socket) => {
    socket.on("message", (data) => {
      const text = data.toString();
      if (text.includes('"session_config"')) {
        socket.send(JSON.stringify({ type: "session_started" }));
      } else if (text.includes('"audio"')) {
        socket.send(JSON.stringify({ type: "text_chunk", data: { text: "I heard you." } }));
        socket.send(JSON.stringify({ type: "generation_complete" }));
        socket.close();
      }
    });
  });
  return new Promise((resolve) => wss.once("listening", () => resolve(wss)));
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  console.log("=== LLM Gateway Example ===\n");

  const http = createServer(handleChat);
  const port = await listen(http);
  const wss = await startRealtimeStub();

  try {
    // 1. Configuration: defaults < env < overrides
    const config = loadConfig({
      env: {},
      overrides: {
        logging: { level: "warn" },
        providers: {
          local: {
            type: "openai-compatible",
            apiKey: "test-secret",
            baseUrl: `http://127.0.0.1:${port}/v1`,
            modelAliases: { fast: "gpt-4o-mini" },
          },
        },
      },
    });
    const gateway = Gateway.fromConfig(config);

    // 2. Chat completion through a model alias
    const question = [createMessage("user", "What is the capital of France?")];
    const response = await gateway.createChatCompletion({ model: "fast", messages: question });
    console.log("Chat completion:");
    console.log(`  model:  ${response.model} (alias ${response.original_model_alias ?? "none"})`);
    console.log(`  answer: ${JSON.stringify(response.choices[0]?.message.content)}`);
    console.log(`  usage:  ${response.usage.total_tokens} tokens\n`);

    // 3. Streaming, folded back into a response
    const accumulator = new ChunkAccumulator();
    process.stdout.write("Streamed: ");
    for await (const chunk of gateway.streamChatCompletion({ model: "fast", messages: question })) {
      accumulator.process(chunk);
      process.stdout.write(chunk.choices[0]?.delta.content ?? "");
    }
    console.log(`\n  finish reason: ${accumulator.response().choices[0]?.finish_reason}\n`);

    // 4. Realtime session
    const wssAddress = wss.address();
    if (wssAddress === null || typeof wssAddress === "string") {
      throw new Error("realtime stub has no port");
    }
    const realtime = new RealtimeClient({
      translator: new UltravoxRealtimeTranslator(),
      credentials: { apiKey: "test-secret", baseUrl: `http://127.0.0.1:${wssAddress.port}` },
    });
    const session = await realtime.createSession({
      model: "ultravox-v2",
      system_prompt: "You are a helpful assistant.",
      input_format: "pcm16_24k",
    });
    console.log(`Realtime session ${session.id}: ${session.state}`);

    const stream = realtime.streamAudio(session);
    await stream.send(audioFrame(new Uint8Array(480)));
    await stream.complete();
    for await (const message of stream.receive()) {
      switch (message.type) {
        case "text_output":
          console.log(`  text:   ${message.text}`);
          break;
        case "status":
          console.log(`  status: ${message.status}`);
          break;
        case "error":
          console.log(`  error:  ${message.code} ${message.message}`);
          break;
        default:
          break;
      }
    }
    console.log(`  final state: ${session.state}`);
  } finally {
    await new Promise<void>((resolve) => wss.close(() => resolve()));
    await new Promise<void>((resolve, reject) => http.close((err) => (err ? reject(err) : resolve())));
  }

  console.log("\nDone.");
}

main().catch((err: unknown) => {
  console.error(formatError(err));
  process.exit(1);
});
