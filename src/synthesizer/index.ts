// Synthesizer：FeedRecord → FeedDocument + OPML 索引

export { synthesize, groupRecords, feedUrl } from "./synthesizer.js";
export type { DeclaredFeed, FeedDocument, FeedGroup, FeedIndex, Synthesis, SynthesizerOptions } from "./types.js";
