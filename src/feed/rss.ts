// 将频道 + 条目构建为 RSS 2.0 XML

import type { RssChannel, RssEntry } from "./types.js";
import { escapeXml, textOrCdata } from "./xml.js";


function buildItem(entry: RssEntry): string {
  const title = escapeXml(entry.title);
  const link = escapeXml(entry.link);
  const desc = textOrCdata(entry.description);
  const guid = escapeXml(entry.guid ?? entry.link);
  let buf = `    <item>\n      <title>${title}</title>\n      <link>${link}</link>\n      <description>${desc}</description>\n`;
  if (entry.author) buf += `      <dc:creator>${escapeXml(entry.author)}</dc:creator>\n`;
  for (const category of entry.categories ?? []) {
    buf += `      <category>${escapeXml(category)}</category>\n`;
  }
  if (entry.published) buf += `      <pubDate>${entry.published.toUTCString()}</pubDate>\n`;
  buf += `      <guid isPermaLink="true">${guid}</guid>\n`;
  buf += `    </item>\n`;
  return buf;
}


export function buildRssXml(channel: RssChannel, entries: RssEntry[]): string {
  const title = escapeXml(channel.title);
  const link = escapeXml(channel.link);
  const desc = escapeXml(channel.description ?? "");
  const lang = escapeXml(channel.language ?? "zh-CN");
  const buildDate = channel.lastBuildDate
    ? `    <lastBuildDate>${channel.lastBuildDate.toUTCString()}</lastBuildDate>\n`
    : "";
  const items = entries.map(buildItem).join("");
  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:dc="http://purl.org/dc/elements/1.1/">
  <channel>
    <title>${title}</title>
    <link>${link}</link>
    <description>${desc}</description>
    <language>${lang}</language>
${buildDate}
${items}  </channel>
</rss>
`;
}
