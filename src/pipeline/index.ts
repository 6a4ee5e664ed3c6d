// Pipeline：表格 → FeedRecord → FeedDocument + 索引 → 落盘；只抛致命错误

import { stat } from "node:fs/promises";
import type { RunConfig } from "../config/types.js";
import { UnreadableSourceError } from "../errors/index.js";
import { openSheet } from "../extractor/index.js";
import { publishOutputs } from "../gate/index.js";
import type { GateResult, OutputFile } from "../gate/types.js";
import { logger } from "../logger/index.js";
import { synthesize } from "../synthesizer/index.js";
import type { FeedDocument, FeedIndex } from "../synthesizer/types.js";


export interface RunResult {
  records: number;
  documents: FeedDocument[];
  index: FeedIndex;
  gate: GateResult;
}


/** 表格的修改时间：无时间条目的默认发布时间，表格不变则输出不变 */
async function sourceTime(path: string): Promise<Date> {
  try {
    return (await stat(path)).mtime;
  } catch (err) {
    throw new UnreadableSourceError(path, { cause: err });
  }
}


/** 将合成结果整理为待写入的文件列表（索引在最后） */
export function toOutputFiles(documents: FeedDocument[], index: FeedIndex): OutputFile[] {
  return [
    ...documents.map((doc) => ({ name: doc.fileName, content: doc.xml })),
    { name: index.fileName, content: index.xml },
  ];
}


/** 执行一次完整生成；任一行非法则整次中止，不改动输出目录 */
export async function runFeeds(config: RunConfig): Promise<RunResult> {
  const fallbackDate = await sourceTime(config.source);
  const sheet = await openSheet(config.source, {
    sheet: config.sheet,
    fallbackDate,
    defaultGroup: config.defaultGroup,
  });
  const records = [...sheet.records()];
  logger.info("extractor", "表格已读取", { source: config.source, records: records.length });

  const { documents, index } = synthesize(records, {
    outDir: config.outDir,
    baseUrl: config.baseUrl,
    language: config.language,
    indexFile: config.indexFile,
    indexTitle: config.indexTitle,
    declared: config.feeds,
    rejectEmptyGroups: config.rejectEmptyGroups,
    dedupe: config.dedupe,
    source: config.source,
  });

  const gate = await publishOutputs(config.outDir, toOutputFiles(documents, index), { prune: config.prune });
  return { records: records.length, documents, index, gate };
}
