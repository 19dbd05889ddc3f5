import { FrameQueue, type RealtimeTransport } from "../src/transport.js";

/** In-memory transport: records sent frames, delivers scripted ones. */
export class FakeTransport implements RealtimeTransport {
  readonly sent: string[] = [];
  closeCalls = 0;
  private open = true;
  private readonly queue = new FrameQueue();

  get isOpen(): boolean {
    return this.open;
  }

  async send(data: string): Promise<void> {
    if (!this.open) throw new Error("fake transport is closed");
    this.sent.push(data);
  }

  async *frames(signal?: AbortSignal): AsyncGenerator<string, void, undefined> {
    for (;;) {
      const frame = await this.queue.next(signal);
      if (frame === undefined) return;
      yield frame;
    }
  }

  async close(): Promise<void> {
    this.closeCalls++;
    this.open = false;
    this.queue.end();
  }

  /** Queue an upstream frame; objects are JSON-encoded. */
  deliver(frame: unknown): void {
    this.queue.push(typeof frame === "string" ? frame : JSON.stringify(frame));
  }

  /** The provider hangs up. */
  disconnect(): void {
    this.open = false;
    this.queue.end();
  }

  sentJson(): unknown[] {
    return this.sent.map((frame): unknown => JSON.parse(frame));
  }

  /** The `type` of each sent frame. */
  sentTypes(): string[] {
    return this.sentJson().map((frame) =>
      typeof frame === "object" && frame !== null && "type" in frame && typeof frame.type === "string"
        ? frame.type
        : "",
    );
  }
}

export async function collect<T>(iter: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iter) items.push(item);
  return items;
}
