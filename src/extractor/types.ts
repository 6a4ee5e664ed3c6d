// Extractor 选项与列定义


/** 识别的逻辑字段 */
export type ColumnKey = "title" | "link" | "description" | "pubDate" | "group" | "categories" | "author";


export interface ExtractorOptions {
  /** 工作表名；不传则取第一张表 */
  sheet?: string;
  /** 时间单元格为空或无法解析时使用的时间（提取时间） */
  fallbackDate: Date;
  /** 行内无分组时归入的分组，默认 "feed" */
  defaultGroup?: string;
}


/** 表头解析结果：逻辑字段 → 列号（1 起始） */
export type ColumnMap = Partial<Record<ColumnKey, number>>;
