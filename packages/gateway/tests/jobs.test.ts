import { describe, it, expect, vi, afterEach } from "vitest";
import { JobEngine, type JobSteps } from "../src/jobs/engine.js";
import { normalizeJobStatus, isTerminal, jobCreatedSeconds, type PredictionJob } from "../src/jobs/job.js";
import { JobStatus } from "../src/types/enums.js";
import {
  CanceledError,
  OperationTimeoutError,
  UpstreamJobCanceledError,
  UpstreamJobFailedError,
} from "../src/types/errors.js";

afterEach(() => {
  vi.useRealTimers();
});

function job(status: JobStatus, extra: Partial<PredictionJob> = {}): PredictionJob {
  return { id: "job-1", status, ...extra };
}

/** Steps whose poll answers come from `statuses`, in order. */
function scripted(submitted: PredictionJob, statuses: PredictionJob[]) {
  const poll = vi.fn(async () => {
    const next = statuses.shift();
    if (!next) throw new Error("polled too often");
    return next;
  });
  const cancel = vi.fn(async () => undefined);
  const steps: JobSteps = { submit: vi.fn(async () => submitted), poll, cancel };
  return { steps, poll, cancel };
}

describe("normalizeJobStatus", () => {
  it("maps known statuses case-insensitively", () => {
    expect(normalizeJobStatus("SUCCEEDED")).toBe(JobStatus.SUCCEEDED);
    expect(normalizeJobStatus("cancelled")).toBe(JobStatus.CANCELED);
    expect(normalizeJobStatus("starting")).toBe(JobStatus.STARTING);
  });

  it("treats unknown statuses as processing", () => {
    expect(normalizeJobStatus("queued")).toBe(JobStatus.PROCESSING);
  });

  it("identifies terminal statuses", () => {
    expect(isTerminal(JobStatus.SUCCEEDED)).toBe(true);
    expect(isTerminal(JobStatus.FAILED)).toBe(true);
    expect(isTerminal(JobStatus.CANCELED)).toBe(true);
    expect(isTerminal(JobStatus.PROCESSING)).toBe(false);
  });

  it("reads created_at as unix seconds", () => {
    expect(jobCreatedSeconds(job(JobStatus.STARTING, { created_at: "2024-01-01T00:00:00Z" }))).toBe(
      1704067200,
    );
  });
});

describe("JobEngine", () => {
  it("polls until succeeded and returns the finished job", async () => {
    vi.useFakeTimers();
    const { steps, poll } = scripted(job(JobStatus.STARTING), [
      job(JobStatus.PROCESSING),
      job(JobStatus.PROCESSING),
      job(JobStatus.SUCCEEDED, { output: ["do", "ne"] }),
    ]);
    const engine = new JobEngine({ pollInterval: 2000 });

    const result = engine.run(steps);
    await vi.advanceTimersByTimeAsync(6000);
    await expect(result).resolves.toEqual(job(JobStatus.SUCCEEDED, { output: ["do", "ne"] }));
    expect(poll).toHaveBeenCalledTimes(3);
  });

  it("does not poll a job that is terminal at submission", async () => {
    const { steps, poll } = scripted(job(JobStatus.SUCCEEDED, { output: "fast" }), []);
    await expect(new JobEngine().run(steps)).resolves.toMatchObject({ output: "fast" });
    expect(poll).not.toHaveBeenCalled();
  });

  it("waits the interval before each poll", async () => {
    vi.useFakeTimers();
    const { steps, poll } = scripted(job(JobStatus.STARTING), [job(JobStatus.SUCCEEDED)]);
    const result = new JobEngine({ pollInterval: 2000 }).run(steps);
    await vi.advanceTimersByTimeAsync(1999);
    expect(poll).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await result;
    expect(poll).toHaveBeenCalledTimes(1);
  });

  it("times out once the elapsed time reaches the bound and cancels upstream", async () => {
    vi.useFakeTimers();
    const forever = Array.from({ length: 20 }, () => job(JobStatus.PROCESSING));
    const { steps, poll, cancel } = scripted(job(JobStatus.STARTING), forever);
    const engine = new JobEngine({ pollInterval: 2000, maxPollingDuration: 10000 });

    const result = engine.run(steps, { provider: "replicate", operation: "createImage" });
    const assertion = expect(result).rejects.toMatchObject({
      provider: "replicate",
      operation: "createImage",
      elapsedMs: 10000,
    });
    await vi.advanceTimersByTimeAsync(12000);
    await assertion;
    await expect(result).rejects.toBeInstanceOf(OperationTimeoutError);
    expect(poll).toHaveBeenCalledTimes(4);
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it("cuts off a poll that never answers once the bound runs out", async () => {
    vi.useFakeTimers();
    let pollSignal: AbortSignal | undefined;
    const cancel = vi.fn(async () => undefined);
    const steps: JobSteps = {
      submit: async () => job(JobStatus.STARTING),
      poll: (_job, signal) => {
        pollSignal = signal;
        return new Promise<PredictionJob>(() => undefined);
      },
      cancel,
    };
    const engine = new JobEngine({ pollInterval: 20, maxPollingDuration: 100 });

    const result = engine.run(steps, { provider: "replicate", operation: "createChatCompletion" });
    const assertion = expect(result).rejects.toMatchObject({
      name: "OperationTimeoutError",
      elapsedMs: 100,
      provider: "replicate",
    });
    await vi.advanceTimersByTimeAsync(100);
    await assertion;
    expect(pollSignal?.aborted).toBe(true);
    expect(cancel).toHaveBeenCalledWith(job(JobStatus.STARTING));
  });

  it("abandons a hanging poll when the caller cancels", async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const steps: JobSteps = {
      submit: async () => job(JobStatus.STARTING),
      poll: () => new Promise<PredictionJob>(() => undefined),
    };

    const result = new JobEngine({ pollInterval: 20 }).run(steps, { signal: controller.signal });
    const assertion = expect(result).rejects.toBeInstanceOf(CanceledError);
    await vi.advanceTimersByTimeAsync(50);
    controller.abort();
    await assertion;
  });

  it("stops immediately on caller cancellation and cancels upstream", async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const { steps, poll, cancel } = scripted(job(JobStatus.STARTING), [job(JobStatus.PROCESSING)]);

    const result = new JobEngine({ pollInterval: 2000 }).run(steps, { signal: controller.signal });
    const assertion = expect(result).rejects.toBeInstanceOf(CanceledError);
    await vi.advanceTimersByTimeAsync(2500);
    controller.abort();
    await assertion;
    expect(poll).toHaveBeenCalledTimes(1);
    expect(cancel).toHaveBeenCalledWith(job(JobStatus.PROCESSING));
  });

  it("refuses to submit when already canceled", async () => {
    const { steps } = scripted(job(JobStatus.STARTING), []);
    await expect(new JobEngine().run(steps, { signal: AbortSignal.abort() })).rejects.toBeInstanceOf(
      CanceledError,
    );
    expect(steps.submit).not.toHaveBeenCalled();
  });

  it("maps a failed job to UpstreamJobFailedError with the upstream message", async () => {
    const { steps } = scripted(job(JobStatus.FAILED, { error: "CUDA out of memory" }), []);
    const error = await new JobEngine().run(steps).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(UpstreamJobFailedError);
    expect(error).toMatchObject({ message: "CUDA out of memory", jobId: "job-1" });
  });

  it("maps an upstream cancellation to UpstreamJobCanceledError", async () => {
    vi.useFakeTimers();
    const { steps, cancel } = scripted(job(JobStatus.STARTING), [job(JobStatus.CANCELED)]);
    const result = new JobEngine({ pollInterval: 100 }).run(steps);
    const assertion = expect(result).rejects.toBeInstanceOf(UpstreamJobCanceledError);
    await vi.advanceTimersByTimeAsync(100);
    await assertion;
    expect(cancel).not.toHaveBeenCalled();
  });

  it("propagates a failing submission without polling", async () => {
    const steps: JobSteps = {
      submit: async () => {
        throw new Error("submit rejected");
      },
      poll: vi.fn(),
    };
    await expect(new JobEngine().run(steps)).rejects.toThrow("submit rejected");
    expect(steps.poll).not.toHaveBeenCalled();
  });
});
