// Synthesizer 配置与输出类型

import type { OpmlOutline, RssChannel } from "../feed/types.js";
import type { FeedRecord } from "../types/feedRecord.js";


/** 配置中声明的频道元数据（key 为分组名或分组 id） */
export interface DeclaredFeed {
  title?: string;
  link?: string;
  description?: string;
}


export interface SynthesizerOptions {
  /** 输出目录（绝对路径）；无 baseUrl 时 OPML 用 file:// 指向其中文件 */
  outDir: string;
  /** 发布后 feed 的公网前缀，如 https://example.org/feeds */
  baseUrl?: string;
  /** 频道语言，默认 zh-CN */
  language?: string;
  /** OPML 文件名，默认 feeds.opml */
  indexFile?: string;
  /** OPML 标题，默认 "Feeds export" */
  indexTitle?: string;
  /** 预先声明的分组：即使表格中没有条目也会生成 feed */
  declared?: Record<string, DeclaredFeed>;
  /** 为 true 时空分组抛 EmptyGroupError */
  rejectEmptyGroups?: boolean;
  /** 同组内按链接去重，默认 true */
  dedupe?: boolean;
  /** 表格路径，用于报错定位 */
  source?: string;
}


export interface FeedGroup {
  id: string;
  /** 分组原名（去首尾空白） */
  label: string;
  records: FeedRecord[];
  declared?: DeclaredFeed;
}


export interface FeedDocument {
  groupId: string;
  /** 输出文件名：<groupId>.xml */
  fileName: string;
  /** feed 的订阅地址（baseUrl 或 file://） */
  url: string;
  channel: RssChannel;
  /** 按时间倒序 */
  items: FeedRecord[];
  xml: string;
}


export interface FeedIndex {
  fileName: string;
  /** 按 groupId 升序 */
  outlines: OpmlOutline[];
  xml: string;
}


export interface Synthesis {
  documents: FeedDocument[];
  index: FeedIndex;
}
