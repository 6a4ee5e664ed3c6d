// 输出目录互斥：独占创建锁文件，进程结束前释放；超时残留的锁会被接管

import { rm, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { OutputLockedError, WriteError } from "../errors/index.js";
import { logger } from "../logger/index.js";
import { isErrno } from "../utils/errno.js";


export const LOCK_FILE = ".sheetfeed.lock";
const DEFAULT_STALE_MS = 10 * 60 * 1000;


async function isStale(path: string, staleMs: number): Promise<boolean> {
  try {
    const s = await stat(path);
    return Date.now() - s.mtimeMs > staleMs;
  } catch (err) {
    if (isErrno(err, "ENOENT")) return true;
    throw new WriteError(path, { cause: err });
  }
}


async function createLockFile(path: string): Promise<void> {
  const body = JSON.stringify({ pid: process.pid, at: new Date().toISOString() }) + "\n";
  await writeFile(path, body, { encoding: "utf-8", flag: "wx" });
}


/** 获取目录锁，返回释放函数 */
export async function acquireLock(dir: string, staleMs: number = DEFAULT_STALE_MS): Promise<() => Promise<void>> {
  const path = join(dir, LOCK_FILE);
  try {
    await createLockFile(path);
  } catch (err) {
    if (!isErrno(err, "EEXIST")) throw new WriteError(path, { cause: err });
    if (!(await isStale(path, staleMs))) throw new OutputLockedError(path);
    logger.warn("gate", "接管过期的锁文件", { path });
    await rm(path, { force: true });
    try {
      await createLockFile(path);
    } catch (retryErr) {
      if (isErrno(retryErr, "EEXIST")) throw new OutputLockedError(path);
      throw new WriteError(path, { cause: retryErr });
    }
  }
  return async () => {
    await rm(path, { force: true });
  };
}
