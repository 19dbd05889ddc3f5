/**
 * Message and Content types for the unified gateway.
 *
 * Message content is either plain text or an ordered list of blocks. Every
 * translation boundary switches on `content.kind`.
 */

import type { Role } from "./enums.js";

// ---------------------------------------------------------------------------
// Content
// ---------------------------------------------------------------------------

export interface TextBlock {
  readonly type: "text";
  readonly text: string;
}

export interface ImageBlock {
  readonly type: "image_url";
  /** http(s) URL or a `data:` URL carrying base64 bytes. */
  readonly url: string;
  /** Processing fidelity hint: "auto", "low", "high". */
  readonly detail?: string;
}

export type Block = TextBlock | ImageBlock;

export interface TextContent {
  readonly kind: "text";
  readonly text: string;
}

export interface BlocksContent {
  readonly kind: "blocks";
  readonly blocks: readonly Block[];
}

export type Content = TextContent | BlocksContent;

// ---------------------------------------------------------------------------
// Tool calls
// ---------------------------------------------------------------------------

/** A model-initiated tool invocation. Arguments stay a raw JSON string. */
export interface ToolCall {
  readonly id: string;
  readonly type: "function";
  readonly function: {
    readonly name: string;
    readonly arguments: string;
  };
}

// ---------------------------------------------------------------------------
// Message
// ---------------------------------------------------------------------------

export interface Message {
  readonly role: Role;
  readonly content: Content;
  /** Present on assistant messages that invoke tools. */
  readonly tool_calls?: readonly ToolCall[];
  /** Present on tool messages; answers the matching ToolCall.id. */
  readonly tool_call_id?: string;
  readonly name?: string;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function textContent(text: string): TextContent {
  return { kind: "text", text };
}

export function createMessage(role: Role, text: string): Message {
  return { role, content: textContent(text) };
}

/** Concatenate the text of a content value, ignoring non-text blocks. */
export function getContentText(content: Content): string {
  switch (content.kind) {
    case "text":
      return content.text;
    case "blocks":
      return content.blocks
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("");
  }
}

/** True when the content carries at least one image block. */
export function hasImageBlocks(content: Content): boolean {
  switch (content.kind) {
    case "text":
      return false;
    case "blocks":
      return content.blocks.some((block) => block.type === "image_url");
  }
}
