export * from "./cooccurrence/index.js";
export { hashKey } from "./determinism/hash.js";
export { stableStringify } from "./determinism/StableJson.js";
export { stringCompareBinary, compareNumbers } from "./determinism/CanonicalOrder.js";
export { extractIdiomObservations } from "./parse/extractIdioms.js";
export type { IdiomObservation } from "./parse/extractIdioms.js";
export { fromSnapshot, loadSnapshot, saveSnapshot, toSnapshot, STRING_CODEC } from "./snapshot/store.js";
export { SnapshotError } from "./snapshot/types.js";
export type { CooccurrenceSnapshot, SnapshotCodec } from "./snapshot/types.js";
