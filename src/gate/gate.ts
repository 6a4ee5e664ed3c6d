// Publish Gate：按内容指纹决定是否落盘；先全部写入临时文件，再逐个 rename 覆盖，失败时不替换任何已有文件

import { createHash } from "node:crypto";
import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { WriteError } from "../errors/index.js";
import { errMessage, logger } from "../logger/index.js";
import { isErrno } from "../utils/errno.js";
import { acquireLock } from "./lock.js";
import type { FileResult, GateOptions, GateResult, OutputFile, WriteStatus } from "./types.js";


/** 内容指纹：sha256 hex */
export function fingerprint(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}


/** 读取磁盘上现有文件的指纹；文件不存在返回 null */
async function readFingerprint(path: string): Promise<string | null> {
  try {
    return fingerprint(await readFile(path));
  } catch (err) {
    if (isErrno(err, "ENOENT")) return null;
    throw new WriteError(path, { cause: err });
  }
}


interface PlannedWrite {
  name: string;
  path: string;
  tmpPath: string;
  content: string;
  status: WriteStatus;
  fingerprint: string;
}


function tmpPathFor(dir: string, name: string): string {
  return join(dir, `.${name}.${process.pid}.tmp`);
}


/** 清理临时文件；逐个执行，单个失败只记日志，不掩盖调用方正在抛出的错误 */
async function removeQuietly(paths: string[]): Promise<void> {
  await Promise.all(
    paths.map((p) =>
      rm(p, { force: true }).catch((err: unknown) => {
        logger.warn("gate", "临时文件清理失败", { path: p, err: errMessage(err) });
      }),
    ),
  );
}


/** 比对指纹，得出每个文件的状态 */
async function plan(outDir: string, files: OutputFile[]): Promise<PlannedWrite[]> {
  const planned: PlannedWrite[] = [];
  for (const file of files) {
    const path = join(outDir, file.name);
    const next = fingerprint(file.content);
    const prev = await readFingerprint(path);
    const status: WriteStatus = prev == null ? "created" : prev === next ? "unchanged" : "updated";
    planned.push({ name: file.name, path, tmpPath: tmpPathFor(outDir, file.name), content: file.content, status, fingerprint: next });
  }
  return planned;
}


/** 写临时文件；任一失败则清理已写的临时文件并抛 WriteError */
async function stage(writes: PlannedWrite[]): Promise<void> {
  const staged: string[] = [];
  for (const w of writes) {
    try {
      await writeFile(w.tmpPath, w.content, "utf-8");
      staged.push(w.tmpPath);
    } catch (err) {
      await removeQuietly([...staged, w.tmpPath]);
      throw new WriteError(w.path, { cause: err });
    }
  }
}


/** 逐个 rename 覆盖目标；单个 rename 是原子的 */
async function swap(writes: PlannedWrite[]): Promise<void> {
  for (let i = 0; i < writes.length; i++) {
    const w = writes[i];
    try {
      await rename(w.tmpPath, w.path);
    } catch (err) {
      await removeQuietly(writes.slice(i).map((r) => r.tmpPath));
      throw new WriteError(w.path, { cause: err });
    }
  }
}


/** 输出目录中本次未生成的 feed 文件名 */
async function staleFeeds(outDir: string, keep: Set<string>): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(outDir);
  } catch (err) {
    throw new WriteError(outDir, { cause: err });
  }
  return entries.filter((name) => name.toLowerCase().endsWith(".xml") && !keep.has(name)).sort();
}


async function removeFeeds(outDir: string, names: string[]): Promise<FileResult[]> {
  const removed: FileResult[] = [];
  for (const name of names) {
    const path = join(outDir, name);
    try {
      await rm(path, { force: true });
    } catch (err) {
      throw new WriteError(path, { cause: err });
    }
    removed.push({ name, path, status: "removed", fingerprint: null });
  }
  return removed;
}


function toResult(p: PlannedWrite): FileResult {
  return { name: p.name, path: p.path, status: p.status, fingerprint: p.fingerprint };
}


/** 落盘全部输出文件：内容未变的不写；无任何变化时不加锁、不产生任何写入 */
export async function publishOutputs(outDir: string, files: OutputFile[], options: GateOptions = {}): Promise<GateResult> {
  try {
    await mkdir(outDir, { recursive: true });
  } catch (err) {
    throw new WriteError(outDir, { cause: err });
  }
  const keep = new Set(files.map((f) => f.name));
  const findStale = (): Promise<string[]> => (options.prune === false ? Promise.resolve([]) : staleFeeds(outDir, keep));

  const preview = await plan(outDir, files);
  if (preview.every((p) => p.status === "unchanged") && (await findStale()).length === 0) {
    logger.info("gate", "输出无变化", { outDir, unchanged: preview.length });
    return { files: preview.map(toResult), changed: false, bytesWritten: 0 };
  }

  const release = await acquireLock(outDir, options.lockStaleMs);
  try {
    // 加锁后重新比对，期间可能有其他进程写过
    const planned = await plan(outDir, files);
    const writes = planned.filter((p) => p.status !== "unchanged");
    await stage(writes);
    await swap(writes);
    const removed = await removeFeeds(outDir, await findStale());

    const results: FileResult[] = [...planned.map(toResult), ...removed];
    const bytesWritten = writes.reduce((n, w) => n + Buffer.byteLength(w.content, "utf-8"), 0);
    for (const r of results) {
      if (r.status !== "unchanged") logger.debug("gate", `${r.status} ${r.name}`);
    }
    logger.info("gate", "输出已同步", {
      outDir,
      written: writes.length,
      removed: removed.length,
      unchanged: planned.length - writes.length,
    });
    return { files: results, changed: writes.length > 0 || removed.length > 0, bytesWritten };
  } finally {
    await release();
  }
}
