export { createStateStore, StateStoreCorruptError } from "./store";
export { advanceState, compareOrderKeys, isAfterBoundary } from "./ordering";
export type { StateStore, CommitResult } from "./store";
