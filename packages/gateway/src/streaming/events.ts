/**
 * Provider-neutral upstream events.
 *
 * Adapters translate their native stream (SSE frames, or a finished job)
 * into this sequence; the normalizer turns it into ChatCompletionChunks.
 */

import type { FinishReason } from "../types/enums.js";
import type { Usage } from "../types/response.js";

export type UpstreamEvent =
  | {
      readonly type: "start";
      readonly id?: string;
      readonly model?: string;
      /** Emit a role-only chunk immediately. */
      readonly announce?: boolean;
    }
  | { readonly type: "content_delta"; readonly text: string }
  | {
      readonly type: "tool_call_delta";
      readonly index: number;
      readonly id?: string;
      readonly name?: string;
      /** Partial JSON. */
      readonly arguments?: string;
    }
  | { readonly type: "usage"; readonly usage: Usage }
  | { readonly type: "finish"; readonly reason: FinishReason };
