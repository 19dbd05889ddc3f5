/**
 * How a provider expects its API key.
 */
export type AuthScheme =
  | { readonly type: "bearer" }
  | { readonly type: "header"; readonly name: string; readonly prefix?: string }
  | { readonly type: "query"; readonly param: string };

export const bearerAuth: AuthScheme = { type: "bearer" };

/** Apply `apiKey` to an outgoing request's URL or headers. */
export function applyAuth(
  scheme: AuthScheme,
  apiKey: string,
  url: URL,
  headers: Record<string, string>,
): void {
  switch (scheme.type) {
    case "bearer":
      headers["Authorization"] = `Bearer ${apiKey}`;
      return;
    case "header":
      headers[scheme.name] = `${scheme.prefix ?? ""}${apiKey}`;
      return;
    case "query":
      url.searchParams.set(scheme.param, apiKey);
      return;
  }
}
