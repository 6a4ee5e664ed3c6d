// 库入口：表格 → RSS/OPML 生成与发布的公共 API

export { loadConfig } from "./config/index.js";
export type { CliOverrides, RunConfig } from "./config/index.js";
export {
  SheetFeedError,
  UnreadableSourceError,
  MalformedInputError,
  EmptyGroupError,
  WriteError,
  OutputLockedError,
  ConfigError,
} from "./errors/index.js";
export { openSheet, SheetSource } from "./extractor/index.js";
export type { ExtractorOptions } from "./extractor/index.js";
export { synthesize, groupRecords } from "./synthesizer/index.js";
export type { DeclaredFeed, FeedDocument, FeedIndex, Synthesis, SynthesizerOptions } from "./synthesizer/index.js";
export { publishOutputs, fingerprint } from "./gate/index.js";
export type { FileResult, GateResult, OutputFile, WriteStatus } from "./gate/index.js";
export { publishToGit, createGitRunner } from "./publisher/index.js";
export type { GitRunner, PublishResult } from "./publisher/index.js";
export { runFeeds } from "./pipeline/index.js";
export type { RunResult } from "./pipeline/index.js";
export type { FeedRecord } from "./types/feedRecord.js";
