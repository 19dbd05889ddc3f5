/**
 * Replicate prediction endpoints: create, get, cancel.
 */

import { z } from "zod";
import type { AdapterContext } from "../../contract/adapter.js";
import { normalizeJobStatus, type PredictionJob } from "../../jobs/job.js";
import { parseBody } from "../shared.js";

const predictionSchema = z.object({
  id: z.string(),
  status: z.string(),
  input: z.unknown().optional(),
  output: z.unknown().optional(),
  error: z.unknown().optional(),
  created_at: z.string().nullish(),
});

function errorText(error: unknown): string | undefined {
  if (error === undefined || error === null || error === "") return undefined;
  return typeof error === "string" ? error : JSON.stringify(error);
}

export function toJob(raw: unknown, ctx: AdapterContext): PredictionJob {
  const data = parseBody(predictionSchema, raw, ctx.http.provider, "prediction");
  const error = errorText(data.error);
  return {
    id: data.id,
    status: normalizeJobStatus(data.status, ctx.logger),
    input: data.input,
    output: data.output,
    ...(error !== undefined ? { error } : {}),
    ...(data.created_at ? { created_at: data.created_at } : {}),
  };
}

const OFFICIAL_MODEL = /^[\w.-]+\/[\w.-]+$/;

/**
 * Create a prediction. `owner/name` runs the model's latest version,
 * `owner/name:version` and bare version ids pin one.
 */
export async function createPrediction(
  model: string,
  input: Record<string, unknown>,
  ctx: AdapterContext,
): Promise<PredictionJob> {
  if (OFFICIAL_MODEL.test(model)) {
    return toJob(await ctx.http.postJson(`models/${model}/predictions`, { input }), ctx);
  }
  const colon = model.lastIndexOf(":");
  const version = colon >= 0 ? model.slice(colon + 1) : model;
  return toJob(await ctx.http.postJson("predictions", { version, input }), ctx);
}

export async function getPrediction(job: PredictionJob, ctx: AdapterContext): Promise<PredictionJob> {
  return toJob(await ctx.http.getJson(`predictions/${encodeURIComponent(job.id)}`), ctx);
}

export async function cancelPrediction(job: PredictionJob, ctx: AdapterContext): Promise<void> {
  await ctx.http.postJson(`predictions/${encodeURIComponent(job.id)}/cancel`, {});
}
