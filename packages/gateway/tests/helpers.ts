import { vi, type Mock } from "vitest";

type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export type FetchMock = Mock<FetchFn>;

export function jsonResponse(
  body: unknown,
  status = 200,
  headers: Record<string, string> = {},
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

/** An SSE response carrying one `data:` event per payload. */
export function sseResponse(payloads: Array<unknown>, events?: string[]): Response {
  const text = payloads
    .map((payload, i) => {
      const data = typeof payload === "string" ? payload : JSON.stringify(payload);
      const event = events?.[i];
      return `${event ? `event: ${event}\n` : ""}data: ${data}\n\n`;
    })
    .join("");
  return new Response(text, { status: 200, headers: { "Content-Type": "text/event-stream" } });
}

/** Stub global fetch with responses served in order. */
export function stubFetch(...responses: Response[]): FetchMock {
  const mock = vi.fn<FetchFn>();
  for (const response of responses) mock.mockResolvedValueOnce(response);
  vi.stubGlobal("fetch", mock);
  return mock;
}

/** URL and parsed JSON body of the nth fetch call. */
export function fetchCall(
  mock: FetchMock,
  n = 0,
): { url: string; method?: string; body: unknown; headers: Record<string, string> } {
  const call = mock.mock.calls[n];
  if (!call) throw new Error(`fetch was called ${mock.mock.calls.length} times`);
  const [input, init] = call;
  const rawBody = init?.body;
  const headers: Record<string, string> = {};
  new Headers(init?.headers).forEach((value, key) => {
    headers[key] = value;
  });
  return {
    url: String(input),
    method: init?.method,
    body: typeof rawBody === "string" ? JSON.parse(rawBody) : undefined,
    headers,
  };
}

export async function collect<T>(iter: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iter) items.push(item);
  return items;
}
