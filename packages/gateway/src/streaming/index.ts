export type { UpstreamEvent } from "./events.js";
export { normalizeStream } from "./normalizer.js";
export type { NormalizeOptions } from "./normalizer.js";
export { splitIntoChunks, syntheticEvents } from "./synthetic.js";
export type { SyntheticCadence } from "./synthetic.js";
export { ChunkAccumulator } from "./accumulator.js";
