/**
 * Replicate provider adapter.
 *
 * Every operation is an asynchronous prediction: submit, poll
 * `predictions/{id}` until terminal, cancel on timeout or caller abort.
 * Chat streaming is synthesized from the finished prediction.
 */

import type {
  AdapterContext,
  JobOperations,
  JobStrategy,
  ProviderAdapter,
} from "../../contract/adapter.js";
import type { PredictionJob } from "../../jobs/job.js";
import type { AuthScheme } from "../../transport/auth.js";
import { cancelPrediction, createPrediction, getPrediction } from "./predictions.js";
import {
  toChatInput,
  toChatResponse,
  toImageInput,
  toMediaResponse,
  toVideoInput,
} from "./translate.js";

function predictionStrategy<TRequest extends { model: string }, TResult>(
  toInput: (request: TRequest) => Record<string, unknown>,
  toResult: (job: PredictionJob, request: TRequest) => TResult,
): JobStrategy<TRequest, TResult> {
  return {
    submit: (request, ctx) => createPrediction(request.model, toInput(request), ctx),
    poll: getPrediction,
    cancel: cancelPrediction,
    toResult,
  };
}

export const REPLICATE_MODELS: readonly string[] = [
  "meta/meta-llama-3-70b-instruct",
  "meta/meta-llama-3-8b-instruct",
  "stability-ai/sdxl",
  "black-forest-labs/flux-schnell",
  "minimax/video-01",
];

export class ReplicateAdapter implements ProviderAdapter {
  readonly name = "replicate";
  readonly defaultBaseUrl = "https://api.replicate.com/v1";
  readonly auth: AuthScheme = { type: "header", name: "Authorization", prefix: "Token " };
  readonly fallbackModels = REPLICATE_MODELS;

  readonly jobs: JobOperations = {
    chat: predictionStrategy(toChatInput, toChatResponse),
    image: predictionStrategy(toImageInput, toMediaResponse),
    video: predictionStrategy(toVideoInput, toMediaResponse),
  };

  async verifyAuthentication(ctx: AdapterContext): Promise<void> {
    await ctx.http.getJson("account");
  }
}

export { toChatInput, toChatResponse, buildPrompt } from "./translate.js";
