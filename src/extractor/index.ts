// Extractor：表格 → FeedRecord 序列

export { openSheet, SheetSource, mapHeader } from "./extractor.js";
export { cellText, cellLink, cellDate, excelSerialToDate } from "./cells.js";
export type { ExtractorOptions, ColumnKey, ColumnMap } from "./types.js";
