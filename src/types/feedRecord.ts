/**
 * 表格中一行对应的条目
 * Extractor → Synthesizer → RSS Generator
 */

export interface FeedRecord {
    /** 标题（非空） */
    title: string;
    /** 原文链接（非空） */
    link: string;
    /** 描述，可含 HTML */
    description: string;
    /** 发布时间；单元格为空或无法解析时为提取时间 */
    pubDate: Date;
    /** 分组原始名称，用作频道标题 */
    group: string;
    /** 分组 id：由 group 派生（见 groupFileId），决定输出文件名 */
    groupId: string;
    /** 分类 / 标签 */
    categories: string[];
    /** 作者 */
    author?: string;
    /** 表格行号（1 起始，含表头），用于报错定位 */
    row: number;
  }
