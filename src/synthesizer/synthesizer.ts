// Synthesizer：按分组聚合条目，每组生成一份 RSS，最后生成 OPML 索引

import { join } from "node:path";
import { pathToFileURL } from "node:url";
import { EmptyGroupError, MalformedInputError } from "../errors/index.js";
import { buildOpml, buildRssXml } from "../feed/index.js";
import type { OpmlOutline, RssChannel, RssEntry } from "../feed/types.js";
import { logger } from "../logger/index.js";
import type { FeedRecord } from "../types/feedRecord.js";
import { groupFileId } from "../utils/slugify.js";
import type { DeclaredFeed, FeedDocument, FeedGroup, FeedIndex, Synthesis, SynthesizerOptions } from "./types.js";


const DEFAULT_INDEX_FILE = "feeds.opml";
const DEFAULT_INDEX_TITLE = "Feeds export";


/**
 * 按分组名聚合，顺序为首次出现顺序；声明但无条目的分组排在最后。
 * 声明的 key 可写分组名或 id。两个不同分组名得到同一 id 时抛 MalformedInputError
 */
export function groupRecords(
  records: Iterable<FeedRecord>,
  declared: Record<string, DeclaredFeed> = {},
  source = "表格",
): FeedGroup[] {
  const declaredById = new Map<string, { label: string; feed: DeclaredFeed }>();
  for (const [key, feed] of Object.entries(declared)) {
    const id = groupFileId(key);
    if (!declaredById.has(id)) declaredById.set(id, { label: key.trim(), feed });
  }
  const groups = new Map<string, FeedGroup>();
  const labelOfId = new Map<string, string>();
  for (const record of records) {
    let group = groups.get(record.group);
    if (!group) {
      const owner = labelOfId.get(record.groupId);
      if (owner != null) {
        throw new MalformedInputError(
          `分组 "${record.group}" 与 "${owner}" 对应同一文件 ${record.groupId}.xml，请统一分组名`,
          { source, row: record.row, column: "group" },
        );
      }
      labelOfId.set(record.groupId, record.group);
      group = { id: record.groupId, label: record.group, records: [], declared: declaredById.get(record.groupId)?.feed };
      groups.set(record.group, group);
    }
    group.records.push(record);
  }
  for (const [id, { label, feed }] of declaredById) {
    if (!labelOfId.has(id) && !groups.has(label)) groups.set(label, { id, label, records: [], declared: feed });
  }
  return [...groups.values()];
}


/** 同一链接只保留行序中第一次出现的条目 */
function dedupeByLink(records: FeedRecord[]): FeedRecord[] {
  const seen = new Set<string>();
  const out: FeedRecord[] = [];
  for (const record of records) {
    if (seen.has(record.link)) continue;
    seen.add(record.link);
    out.push(record);
  }
  return out;
}


/** 时间倒序；Array.prototype.sort 稳定，同一时间保持行序 */
function sortNewestFirst(records: FeedRecord[]): FeedRecord[] {
  return [...records].sort((a, b) => b.pubDate.getTime() - a.pubDate.getTime());
}


/** feed 的订阅地址：有 baseUrl 用公网地址，否则 file:// 指向输出目录 */
export function feedUrl(fileName: string, options: Pick<SynthesizerOptions, "baseUrl" | "outDir">): string {
  if (options.baseUrl) return `${options.baseUrl.replace(/\/+$/, "")}/${fileName}`;
  return pathToFileURL(join(options.outDir, fileName)).href;
}


function toRssEntry(record: FeedRecord): RssEntry {
  return {
    title: record.title,
    link: record.link,
    description: record.description,
    guid: record.link,
    published: record.pubDate,
    author: record.author,
    categories: record.categories,
  };
}


/** 单个分组 → FeedDocument */
function buildDocument(group: FeedGroup, options: SynthesizerOptions): FeedDocument {
  if (group.records.length === 0 && options.rejectEmptyGroups) {
    throw new EmptyGroupError(group.id);
  }
  const records = options.dedupe === false ? group.records : dedupeByLink(group.records);
  if (records.length < group.records.length) {
    logger.debug("synthesizer", "组内重复链接已去除", { group: group.id, dropped: group.records.length - records.length });
  }
  const items = sortNewestFirst(records);
  const fileName = `${group.id}.xml`;
  const url = feedUrl(fileName, options);
  const title = group.declared?.title ?? group.label;
  const channel: RssChannel = {
    title,
    link: group.declared?.link ?? (options.baseUrl ? url : (items[0]?.link ?? "")),
    description: group.declared?.description ?? `${title} 的订阅`,
    language: options.language,
    lastBuildDate: items[0]?.pubDate,
  };
  return {
    groupId: group.id,
    fileName,
    url,
    channel,
    items,
    xml: buildRssXml(channel, items.map(toRssEntry)),
  };
}


/** 所有 FeedDocument → OPML 索引，按 groupId 升序（码元序，不受 locale 影响） */
function buildIndex(documents: FeedDocument[], options: SynthesizerOptions): FeedIndex {
  const sorted = [...documents].sort((a, b) => (a.groupId < b.groupId ? -1 : a.groupId > b.groupId ? 1 : 0));
  const outlines: OpmlOutline[] = sorted.map((doc) => ({
    text: doc.channel.title,
    xmlUrl: doc.url,
  }));
  return {
    fileName: options.indexFile ?? DEFAULT_INDEX_FILE,
    outlines,
    xml: buildOpml(options.indexTitle ?? DEFAULT_INDEX_TITLE, outlines),
  };
}


/** 条目 → 全部 FeedDocument + 索引 */
export function synthesize(records: Iterable<FeedRecord>, options: SynthesizerOptions): Synthesis {
  const groups = groupRecords(records, options.declared, options.source);
  const documents = groups.map((group) => buildDocument(group, options));
  const index = buildIndex(documents, options);
  logger.info("synthesizer", "feed 已生成", {
    feeds: documents.length,
    items: documents.reduce((n, doc) => n + doc.items.length, 0),
  });
  return { documents, index };
}
