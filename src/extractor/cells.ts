// 单元格取值：把 exceljs 的各种单元格值（富文本、超链接、公式、日期）归一为字符串或时间


function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !(v instanceof Date);
}


/** Excel 序列日（1900 日期系统）→ Date；25569 为 1970-01-01 的序列号 */
export function excelSerialToDate(serial: number): Date {
  return new Date(Math.round((serial - 25569) * 86400000));
}


/** 单元格显示文本；错误值与空单元格为 "" */
export function cellText(value: unknown): string {
  if (value == null) return "";
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? "" : value.toISOString();
  if (!isRecord(value)) return "";
  if (Array.isArray(value.richText)) {
    return value.richText
      .map((part) => (isRecord(part) && typeof part.text === "string" ? part.text : ""))
      .join("")
      .trim();
  }
  if ("hyperlink" in value) {
    const text = cellText(value.text);
    return text || cellText(value.hyperlink);
  }
  if ("formula" in value || "sharedFormula" in value) return cellText(value.result);
  return "";
}


/** 链接列：超链接单元格取目标地址，否则取文本 */
export function cellLink(value: unknown): string {
  if (isRecord(value) && typeof value.hyperlink === "string" && value.hyperlink.trim()) {
    return value.hyperlink.trim();
  }
  return cellText(value);
}


/** 时间列：空单元格返回 undefined，无法解析返回 null */
export function cellDate(value: unknown): Date | null | undefined {
  if (value == null) return undefined;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  if (typeof value === "number") return Number.isFinite(value) ? excelSerialToDate(value) : null;
  if (isRecord(value) && ("formula" in value || "sharedFormula" in value)) return cellDate(value.result);
  const text = cellText(value);
  if (!text) return undefined;
  const d = new Date(text);
  return Number.isNaN(d.getTime()) ? null : d;
}
