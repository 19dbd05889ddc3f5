/**
 * Asynchronous prediction jobs (submit, then poll until terminal).
 */

import type { Logger } from "pino";
import { JobStatus } from "../types/enums.js";

export interface PredictionJob {
  readonly id: string;
  readonly status: JobStatus;
  /** Input as echoed by the upstream. */
  readonly input?: unknown;
  /** Opaque until mapped by the adapter. */
  readonly output?: unknown;
  /** Upstream-supplied failure message. */
  readonly error?: string;
  /** ISO-8601 timestamp. */
  readonly created_at?: string;
}

const TERMINAL: ReadonlySet<JobStatus> = new Set([
  JobStatus.SUCCEEDED,
  JobStatus.FAILED,
  JobStatus.CANCELED,
]);

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL.has(status);
}

const KNOWN: ReadonlySet<string> = new Set(Object.values(JobStatus));

function isJobStatus(value: string): value is JobStatus {
  return KNOWN.has(value);
}

/**
 * Map an upstream status string onto JobStatus. Unknown values are treated
 * as still running.
 */
export function normalizeJobStatus(raw: string, logger?: Logger): JobStatus {
  const status = raw.toLowerCase();
  if (status === "cancelled") return JobStatus.CANCELED;
  if (isJobStatus(status)) return status;
  logger?.warn({ status: raw }, "unknown job status; treating as processing");
  return JobStatus.PROCESSING;
}

/** Unix seconds from the job's creation time, or now. */
export function jobCreatedSeconds(job: PredictionJob): number {
  const parsed = job.created_at ? Date.parse(job.created_at) : Number.NaN;
  return Math.floor((Number.isNaN(parsed) ? Date.now() : parsed) / 1000);
}
