// 测试辅助：在临时目录中生成表格

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import ExcelJS from "exceljs";


export type CellInput = string | number | Date | null | { text: string; hyperlink: string };


/** 按行号写入表格；rows 的 key 为 1 起始行号，便于制造空行 */
export async function writeSheet(path: string, rows: Record<number, CellInput[]>, sheetName = "feeds"): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const ws = workbook.addWorksheet(sheetName);
  for (const [n, values] of Object.entries(rows)) {
    const row = ws.getRow(Number(n));
    values.forEach((v, i) => {
      row.getCell(i + 1).value = v;
    });
  }
  await workbook.xlsx.writeFile(path);
}


/** 连续行（从第 1 行开始）的便捷写法 */
export async function writeRows(path: string, rows: CellInput[][]): Promise<void> {
  const byRow: Record<number, CellInput[]> = {};
  rows.forEach((r, i) => {
    byRow[i + 1] = r;
  });
  await writeSheet(path, byRow);
}


export async function makeTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), "sheetfeed-"));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}
