/**
 * Job/poll execution engine.
 *
 * Drives `starting -> processing -> {succeeded | failed | canceled}`:
 * submit once, then wait a fixed interval and poll until the job is
 * terminal. The loop ends with OperationTimeoutError once the elapsed time
 * reaches the bound, even in the middle of a poll, and with CanceledError
 * as soon as the caller aborts.
 * In both cases the upstream job is asked to cancel, best effort.
 */

import type { Logger } from "pino";
import type { PollingConfig } from "../config/schema.js";
import { componentLogger } from "../logging/logger.js";
import { sleep, throwIfCanceled } from "../resilience/sleep.js";
import { JobStatus } from "../types/enums.js";
import {
  CanceledError,
  OperationTimeoutError,
  UpstreamJobCanceledError,
  UpstreamJobFailedError,
  type ErrorOrigin,
} from "../types/errors.js";
import { isTerminal, type PredictionJob } from "./job.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The three upstream calls a job-based operation needs. */
export interface JobSteps {
  submit(): Promise<PredictionJob>;
  /** `signal` fires on caller cancellation or when the polling bound runs out. */
  poll(job: PredictionJob, signal: AbortSignal): Promise<PredictionJob>;
  cancel?(job: PredictionJob): Promise<void>;
}

export interface JobEngineOptions {
  /** Milliseconds between polls. Default: 2000. */
  pollInterval: number;
  /** Wall-clock bound in milliseconds. Default: 600000. */
  maxPollingDuration: number;
  now?: () => number;
  logger?: Logger;
}

export interface JobRunOptions extends ErrorOrigin {
  signal?: AbortSignal;
  /** Called once the upstream has accepted the job. */
  onSubmitted?: (job: PredictionJob) => void;
}

const DEFAULT_OPTIONS: JobEngineOptions = {
  pollInterval: 2000,
  maxPollingDuration: 600000,
};

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class JobEngine {
  readonly options: Readonly<JobEngineOptions>;
  private readonly logger: Logger;

  constructor(options: Partial<JobEngineOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.logger = options.logger ?? componentLogger("jobs");
  }

  static fromConfig(config: PollingConfig, logger?: Logger): JobEngine {
    return new JobEngine({
      pollInterval: config.intervalMs,
      maxPollingDuration: config.maxDurationMs,
      logger,
    });
  }

  /** Submit, then wait for a successful terminal state. */
  async run(steps: JobSteps, options: JobRunOptions = {}): Promise<PredictionJob> {
    const job = await this.submit(steps, options);
    options.onSubmitted?.(job);
    return this.waitFor(job, steps, options);
  }

  /** The single submission call. Failure here is fatal for the operation. */
  async submit(steps: JobSteps, options: JobRunOptions = {}): Promise<PredictionJob> {
    throwIfCanceled(options.signal);
    const job = await steps.submit();
    this.logger.info(
      { provider: options.provider, operation: options.operation, jobId: job.id, status: job.status },
      "job submitted",
    );
    return job;
  }

  /**
   * Poll a submitted job until it is terminal.
   *
   * @param startedAt - start of the wall-clock bound; defaults to now
   */
  async waitFor(
    submitted: PredictionJob,
    steps: JobSteps,
    options: JobRunOptions = {},
    startedAt?: number,
  ): Promise<PredictionJob> {
    const { signal } = options;
    const origin: ErrorOrigin = { provider: options.provider, operation: options.operation };
    const now = this.options.now ?? Date.now;
    const started = startedAt ?? now();
    const log = this.logger.child({ ...origin });

    let job = submitted;
    let polls = 0;
    try {
      while (!isTerminal(job.status)) {
        await sleep(this.options.pollInterval, signal);

        const elapsed = now() - started;
        if (elapsed >= this.options.maxPollingDuration) {
          throw this.timedOut(job, elapsed, origin);
        }

        polls++;
        const previous = job.status;
        job = await this.pollWithin(steps, job, {
          remaining: this.options.maxPollingDuration - elapsed,
          signal,
          onDeadline: () => this.timedOut(job, now() - started, origin),
        });
        log.debug({ jobId: job.id, status: job.status, polls, elapsed }, "polled job");
        if (job.status !== previous) {
          log.info({ jobId: job.id, from: previous, to: job.status }, "job status changed");
        }
      }
    } catch (err: unknown) {
      if (err instanceof CanceledError || err instanceof OperationTimeoutError) {
        this.cancelUpstream(steps, job, log);
        throw err.tag(origin);
      }
      throw err;
    }

    return this.settle(job, origin);
  }

  /**
   * One poll bounded by the time left. A poll that outlives the deadline
   * or the caller's signal is abandoned; its signal is aborted so the
   * request behind it stops too.
   */
  private async pollWithin(
    steps: JobSteps,
    job: PredictionJob,
    bound: { remaining: number; signal?: AbortSignal; onDeadline: () => OperationTimeoutError },
  ): Promise<PredictionJob> {
    const deadline = new AbortController();
    const pollSignal = bound.signal
      ? AbortSignal.any([bound.signal, deadline.signal])
      : deadline.signal;

    let timer: ReturnType<typeof setTimeout> | undefined;
    let onAbort: (() => void) | undefined;
    const interrupted = new Promise<never>((_, reject) => {
      timer = setTimeout(() => deadline.abort(bound.onDeadline()), bound.remaining);
      onAbort = () => {
        reject(
          deadline.signal.aborted
            ? deadline.signal.reason
            : new CanceledError("Operation canceled", { cause: bound.signal?.reason }),
        );
      };
      if (pollSignal.aborted) onAbort();
      else pollSignal.addEventListener("abort", onAbort, { once: true });
    });

    try {
      return await Promise.race([steps.poll(job, pollSignal), interrupted]);
    } catch (err: unknown) {
      if (deadline.signal.aborted && deadline.signal.reason instanceof OperationTimeoutError) {
        throw deadline.signal.reason;
      }
      throw err;
    } finally {
      clearTimeout(timer);
      if (onAbort) pollSignal.removeEventListener("abort", onAbort);
    }
  }

  private timedOut(job: PredictionJob, elapsed: number, origin: ErrorOrigin): OperationTimeoutError {
    return new OperationTimeoutError(
      `Job ${job.id} did not finish within ${this.options.maxPollingDuration}ms`,
      { ...origin, elapsedMs: elapsed },
    );
  }

  private settle(job: PredictionJob, origin: ErrorOrigin): PredictionJob {
    switch (job.status) {
      case JobStatus.FAILED:
        throw new UpstreamJobFailedError(job.error ?? `Job ${job.id} failed`, {
          ...origin,
          jobId: job.id,
        });
      case JobStatus.CANCELED:
        throw new UpstreamJobCanceledError(`Job ${job.id} was canceled upstream`, {
          ...origin,
          jobId: job.id,
        });
      default:
        return job;
    }
  }

  /** Fire-and-forget: the caller already has its answer. */
  private cancelUpstream(steps: JobSteps, job: PredictionJob, log: Logger): void {
    if (!steps.cancel) return;
    void steps.cancel(job).then(
      () => log.info({ jobId: job.id }, "upstream job canceled"),
      (err: unknown) => log.warn({ jobId: job.id, err }, "failed to cancel upstream job"),
    );
  }
}
