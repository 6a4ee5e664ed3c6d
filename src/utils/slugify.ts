// slugify：分组名 → 稳定的文件名片段，供 extractor 与 synthesizer 共用

import { createHash } from "node:crypto";


/** 小写化，非 [a-z0-9] 连续段替换为 "-"，去掉首尾 "-"；结果为空时返回 fallback */
export function slugify(text: string, fallback = "feed"): string {
  const slug = text
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug || fallback;
}


/**
 * 分组名 → 输出文件 id。纯 ASCII 名称直接用 slug；含非 ASCII 字符（如中文）时 slug 会丢信息，
 * 追加名称 sha256 的前 8 位，保证不同名称得到不同 id 且跨运行不变
 */
export function groupFileId(label: string, fallback = "feed"): string {
  const name = label.trim();
  const slug = slugify(name, fallback);
  if (!/[\u0080-\uffff]/.test(name)) return slug;
  const hash = createHash("sha256").update(name).digest("hex").slice(0, 8);
  return `${slug}-${hash}`;
}
