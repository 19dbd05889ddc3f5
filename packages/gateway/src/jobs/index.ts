export type { PredictionJob } from "./job.js";
export { isTerminal, normalizeJobStatus, jobCreatedSeconds } from "./job.js";
export { extractOutputText, extractOutputUrls, estimateTokens } from "./output.js";
export { JobEngine } from "./engine.js";
export type { JobSteps, JobEngineOptions, JobRunOptions } from "./engine.js";
