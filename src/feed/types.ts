// RSS 2.0 / OPML 2.0 输出结构

export interface RssChannel {
  title: string;
  link: string;
  description?: string;
  language?: string;
  /** 最新条目时间；不传则省略 lastBuildDate，保证同输入同输出 */
  lastBuildDate?: Date;
}

export interface RssEntry {
  title: string;
  link: string;
  description: string;
  guid?: string;
  published?: Date;
  author?: string;
  categories?: string[];
}

/** OPML 中的一条订阅 */
export interface OpmlOutline {
  text: string;
  xmlUrl: string;
  htmlUrl?: string;
}
