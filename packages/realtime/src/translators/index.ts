/**
 * Built-in realtime translators, keyed by provider.
 */

import type { RealtimeTranslator } from "../translator.js";
import { ElevenLabsRealtimeTranslator } from "./elevenlabs.js";
import { OpenAIRealtimeTranslator } from "./openai.js";
import { UltravoxRealtimeTranslator } from "./ultravox.js";

export type RealtimeProvider = "openai-realtime" | "ultravox" | "elevenlabs";

export function createTranslator(provider: RealtimeProvider): RealtimeTranslator {
  switch (provider) {
    case "openai-realtime":
      return new OpenAIRealtimeTranslator();
    case "ultravox":
      return new UltravoxRealtimeTranslator();
    case "elevenlabs":
      return new ElevenLabsRealtimeTranslator();
  }
}

export { ElevenLabsRealtimeTranslator, ELEVENLABS_ERRORS, voiceId } from "./elevenlabs.js";
export { OpenAIRealtimeTranslator, OPENAI_ERRORS } from "./openai.js";
export { UltravoxRealtimeTranslator, ULTRAVOX_ERRORS } from "./ultravox.js";
