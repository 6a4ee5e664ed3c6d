// Publish Gate：指纹比对 + 原子落盘

export { publishOutputs, fingerprint } from "./gate.js";
export { acquireLock, LOCK_FILE } from "./lock.js";
export type { FileResult, GateOptions, GateResult, OutputFile, WriteStatus } from "./types.js";
