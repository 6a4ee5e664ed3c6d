// 将订阅列表构建为 OPML 2.0，供阅读器一次性导入

import type { OpmlOutline } from "./types.js";
import { escapeXml } from "./xml.js";


export function buildOpml(title: string, outlines: OpmlOutline[]): string {
  const lines = outlines.map((o) => {
    const html = o.htmlUrl ? ` htmlUrl="${escapeXml(o.htmlUrl)}"` : "";
    return `    <outline text="${escapeXml(o.text)}" title="${escapeXml(o.text)}" type="rss" xmlUrl="${escapeXml(o.xmlUrl)}"${html}/>\n`;
  });
  return `<?xml version="1.0" encoding="UTF-8"?>
<opml version="2.0">
  <head>
    <title>${escapeXml(title)}</title>
  </head>
  <body>
${lines.join("")}  </body>
</opml>
`;
}
