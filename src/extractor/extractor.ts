// Extractor：打开表格，定位表头，逐行产出校验过的 FeedRecord（惰性、可重复遍历）

import { extname } from "node:path";
import ExcelJS from "exceljs";
import type { Row, Worksheet } from "exceljs";
import { z } from "zod";
import { MalformedInputError, UnreadableSourceError } from "../errors/index.js";
import { logger } from "../logger/index.js";
import type { FeedRecord } from "../types/feedRecord.js";
import { groupFileId, slugify } from "../utils/slugify.js";
import { cellDate, cellLink, cellText } from "./cells.js";
import type { ColumnKey, ColumnMap, ExtractorOptions } from "./types.js";


/** 表头别名（已小写、去首尾空白） */
const COLUMN_ALIASES = new Map<string, ColumnKey>([
  ["title", "title"],
  ["name", "title"],
  ["link", "link"],
  ["url", "link"],
  ["description", "description"],
  ["desc", "description"],
  ["summary", "description"],
  ["pubdate", "pubDate"],
  ["date", "pubDate"],
  ["published", "pubDate"],
  ["timestamp", "pubDate"],
  ["ts", "pubDate"],
  ["group", "group"],
  ["feed", "group"],
  ["category", "group"],
  ["categories", "categories"],
  ["tags", "categories"],
  ["author", "author"],
]);


const REQUIRED_COLUMNS: ColumnKey[] = ["title", "link"];


/** 单行字段校验；路径名即列名，用于报错 */
const rowSchema = z.object({
  title: z.string().min(1, "标题为空"),
  link: z.string().min(1, "链接为空"),
  description: z.string(),
  group: z.string().min(1),
  categories: z.array(z.string()),
  author: z.string().optional(),
});


/** 从表头行建立字段 → 列号映射，同一字段取第一次出现的列 */
export function mapHeader(headers: Map<number, string>): ColumnMap {
  const columns: ColumnMap = {};
  for (const [col, raw] of headers) {
    const key = COLUMN_ALIASES.get(raw.trim().toLowerCase());
    if (key && columns[key] == null) columns[key] = col;
  }
  return columns;
}


/** 行内所有非空单元格的文本，key 为列号 */
function rowTexts(row: Row): Map<number, string> {
  const out = new Map<number, string>();
  row.eachCell({ includeEmpty: false }, (cell, col) => {
    const text = cellText(cell.value);
    if (text) out.set(col, text);
  });
  return out;
}


function splitCategories(text: string): string[] {
  return text
    .split(/[,;]/)
    .map((s) => s.trim())
    .filter(Boolean);
}


export class SheetSource {
  private constructor(
    readonly path: string,
    private readonly worksheet: Worksheet,
    /** 表头所在行；表格全空时为 null */
    readonly headerRow: number | null,
    readonly columns: ColumnMap,
    private readonly options: ExtractorOptions,
  ) {}


  /** 打开表格并解析表头；缺少必需列时抛 MalformedInputError */
  static async open(path: string, options: ExtractorOptions): Promise<SheetSource> {
    const worksheet = await loadWorksheet(path, options.sheet);
    let headerRow: number | null = null;
    let columns: ColumnMap = {};
    for (let n = 1; n <= worksheet.rowCount; n++) {
      const texts = rowTexts(worksheet.getRow(n));
      if (texts.size === 0) continue;
      headerRow = n;
      columns = mapHeader(texts);
      break;
    }
    if (headerRow != null) {
      const missing = REQUIRED_COLUMNS.filter((key) => columns[key] == null);
      if (missing.length > 0) {
        throw new MalformedInputError(`缺少必需列: ${missing.join(", ")}`, { source: path, row: headerRow });
      }
    }
    logger.debug("extractor", "表头已解析", { path, headerRow, columns });
    return new SheetSource(path, worksheet, headerRow, columns, options);
  }


  /** 逐行产出条目；每次调用从头开始。空行跳过，必需字段为空抛 MalformedInputError */
  *records(): Generator<FeedRecord> {
    if (this.headerRow == null) return;
    const defaultGroup = this.options.defaultGroup ?? "feed";
    const mapped = Object.values(this.columns).filter((col): col is number => col != null);
    for (let n = this.headerRow + 1; n <= this.worksheet.rowCount; n++) {
      const row = this.worksheet.getRow(n);
      const read = (key: ColumnKey): unknown => {
        const col = this.columns[key];
        return col == null ? undefined : row.getCell(col).value;
      };
      if (mapped.every((col) => cellText(row.getCell(col).value) === "")) continue;

      const author = cellText(read("author"));
      const parsed = rowSchema.safeParse({
        title: cellText(read("title")),
        link: cellLink(read("link")),
        description: cellText(read("description")),
        group: cellText(read("group")) || defaultGroup,
        categories: splitCategories(cellText(read("categories"))),
        author: author || undefined,
      });
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const column = issue ? String(issue.path[0] ?? "") : "";
        throw new MalformedInputError(issue?.message ?? "字段非法", { source: this.path, row: n, column });
      }

      yield {
        ...parsed.data,
        groupId: groupFileId(parsed.data.group, slugify(defaultGroup)),
        pubDate: this.readDate(read("pubDate"), n),
        row: n,
      };
    }
  }


  private readDate(value: unknown, row: number): Date {
    const d = cellDate(value);
    if (d === null) {
      logger.warn("extractor", "时间无法解析，使用提取时间", { path: this.path, row, value: cellText(value) });
    }
    return d ?? this.options.fallbackDate;
  }
}


/** 读取工作簿并取目标工作表；文件不可读统一转为 UnreadableSourceError */
async function loadWorksheet(path: string, sheet?: string): Promise<Worksheet> {
  const workbook = new ExcelJS.Workbook();
  let worksheet: Worksheet | undefined;
  try {
    if (extname(path).toLowerCase() === ".csv") {
      // 单元格保持原始字符串，由 cellText / cellDate 解析
      worksheet = await workbook.csv.readFile(path, { map: (value: unknown) => value });
    } else {
      await workbook.xlsx.readFile(path);
      worksheet = sheet ? workbook.getWorksheet(sheet) : workbook.worksheets[0];
    }
  } catch (err) {
    throw new UnreadableSourceError(path, { cause: err });
  }
  if (!worksheet) {
    throw new MalformedInputError(sheet ? `工作表 "${sheet}" 不存在` : "工作簿中没有工作表", { source: path });
  }
  return worksheet;
}


/** 打开表格：openSheet(path, options).records() 即为条目序列 */
export function openSheet(path: string, options: ExtractorOptions): Promise<SheetSource> {
  return SheetSource.open(path, options);
}
