/**
 * Server-Sent Events (SSE) stream parser.
 *
 * Parses a `ReadableStream<Uint8Array>` into an async iterable of SSE events:
 *   - `event:` lines set the event type
 *   - `data:` lines form the payload (multiple `data:` lines are joined with "\n")
 *   - `retry:` lines set a reconnection interval
 *   - Lines starting with `:` are comments (ignored)
 *   - A blank line dispatches the accumulated event
 *
 * Handles chunks that split mid-line. If the consumer stops early the
 * underlying stream is canceled so the connection is released.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SSEEvent {
  /** `undefined` if the event had no `event:` line. */
  event?: string;
  /** `data:` lines joined with newlines. */
  data: string;
  retry?: number;
}

interface SSEAccumulator {
  eventType: string | undefined;
  dataLines: string[];
  retry: number | undefined;
}

function processField(line: string, acc: SSEAccumulator): void {
  const colonIdx = line.indexOf(":");
  let field: string;
  let value: string;

  if (colonIdx === -1) {
    field = line;
    value = "";
  } else {
    field = line.slice(0, colonIdx);
    value = line.slice(colonIdx + 1);
    if (value.startsWith(" ")) {
      value = value.slice(1);
    }
  }

  switch (field) {
    case "event":
      acc.eventType = value;
      break;
    case "data":
      acc.dataLines.push(value);
      break;
    case "retry": {
      const parsed = parseInt(value, 10);
      if (!Number.isNaN(parsed)) {
        acc.retry = parsed;
      }
      break;
    }
  }
}

function takeEvent(acc: SSEAccumulator): SSEEvent | undefined {
  const event =
    acc.dataLines.length > 0
      ? { event: acc.eventType, data: acc.dataLines.join("\n"), retry: acc.retry }
      : undefined;
  acc.eventType = undefined;
  acc.dataLines = [];
  acc.retry = undefined;
  return event;
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

export async function* parseSSEStream(
  stream: ReadableStream<Uint8Array>,
): AsyncGenerator<SSEEvent, void, undefined> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let finished = false;
  const acc: SSEAccumulator = {
    eventType: undefined,
    dataLines: [],
    retry: undefined,
  };

  try {
    for (;;) {
      const { value, done } = await reader.read();

      if (done) {
        finished = true;
        // A trailing line without a final newline still counts.
        if (buffer !== "" && !buffer.startsWith(":")) {
          processField(buffer, acc);
        }
        const last = takeEvent(acc);
        if (last) yield last;
        return;
      }

      buffer += decoder.decode(value, { stream: true });

      // The last segment is either "" or a partial line awaiting more data.
      const lines = buffer.split(/\r\n|\r|\n/);
      buffer = lines.pop() ?? "";

      for (const line of lines) {
        if (line === "") {
          const event = takeEvent(acc);
          if (event) yield event;
          continue;
        }
        if (line.startsWith(":")) continue;
        processField(line, acc);
      }
    }
  } finally {
    if (!finished) {
      await reader.cancel().catch(() => undefined);
    }
    reader.releaseLock();
  }
}
