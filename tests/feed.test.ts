import { describe, expect, it } from "vitest";
import { buildOpml, buildRssXml, escapeXml } from "../src/feed/index.js";


describe("rss", () => {
  it("生成 RSS 2.0：转义标题，HTML 描述用 CDATA", () => {
    const xml = buildRssXml(
      {
        title: "Tech & Co",
        link: "http://x",
        description: "d",
        language: "it",
        lastBuildDate: new Date("2024-01-02T00:00:00Z"),
      },
      [
        {
          title: "A",
          link: "http://x/a",
          description: "<b>hi</b>",
          published: new Date("2024-01-02T00:00:00Z"),
          categories: ["ai"],
        },
      ],
    );
    expect(xml).toBe(`<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:dc="http://purl.org/dc/elements/1.1/">
  <channel>
    <title>Tech &amp; Co</title>
    <link>http://x</link>
    <description>d</description>
    <language>it</language>
    <lastBuildDate>Tue, 02 Jan 2024 00:00:00 GMT</lastBuildDate>

    <item>
      <title>A</title>
      <link>http://x/a</link>
      <description><![CDATA[<b>hi</b>]]></description>
      <category>ai</category>
      <pubDate>Tue, 02 Jan 2024 00:00:00 GMT</pubDate>
      <guid isPermaLink="true">http://x/a</guid>
    </item>
  </channel>
</rss>
`);
  });

  it("空 feed 省略 lastBuildDate", () => {
    const xml = buildRssXml({ title: "Empty", link: "" }, []);
    expect(xml).toBe(`<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:dc="http://purl.org/dc/elements/1.1/">
  <channel>
    <title>Empty</title>
    <link></link>
    <description></description>
    <language>zh-CN</language>

  </channel>
</rss>
`);
  });

  it("作者输出为 dc:creator，CDATA 结束符被拆分", () => {
    const xml = buildRssXml({ title: "T", link: "http://t" }, [
      { title: "A", link: "http://a", description: "<p>x]]>y</p>", author: "Ann <ann@example.org>" },
    ]);
    expect(xml).toContain("      <dc:creator>Ann &lt;ann@example.org&gt;</dc:creator>\n");
    expect(xml).toContain("<description><![CDATA[<p>x]]]]><![CDATA[>y</p>]]></description>");
  });
});


describe("opml", () => {
  it("每个 feed 一条 outline", () => {
    const xml = buildOpml("Feeds export", [
      { text: "Tech \"daily\"", xmlUrl: "https://e.org/tech.xml?a=1&b=2" },
      { text: "News", xmlUrl: "https://e.org/news.xml", htmlUrl: "https://e.org" },
    ]);
    expect(xml).toBe(`<?xml version="1.0" encoding="UTF-8"?>
<opml version="2.0">
  <head>
    <title>Feeds export</title>
  </head>
  <body>
    <outline text="Tech &quot;daily&quot;" title="Tech &quot;daily&quot;" type="rss" xmlUrl="https://e.org/tech.xml?a=1&amp;b=2"/>
    <outline text="News" title="News" type="rss" xmlUrl="https://e.org/news.xml" htmlUrl="https://e.org"/>
  </body>
</opml>
`);
  });

  it("escapeXml 转义五个实体", () => {
    expect(escapeXml(`<a href="x">'&'</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;&apos;&amp;&apos;&lt;/a&gt;");
  });
});
