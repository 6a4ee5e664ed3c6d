// Feed 输出：RSS 2.0 与 OPML 2.0 序列化

export { buildRssXml } from "./rss.js";
export { buildOpml } from "./opml.js";
export { escapeXml } from "./xml.js";
export type { RssChannel, RssEntry, OpmlOutline } from "./types.js";
