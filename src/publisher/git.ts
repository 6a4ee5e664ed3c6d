// git 发布：只暂存本次生成/删除的文件，有变更才提交，每次都尝试推送；推送失败不视为运行失败

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { logger } from "../logger/index.js";
import type { GitResult, GitRunner, PublishOptions, PublishResult } from "./types.js";

const execFileAsync = promisify(execFile);


function outputOf(err: Error, key: "stdout" | "stderr"): string {
  if (key in err) {
    const v: unknown = Reflect.get(err, key);
    if (typeof v === "string") return v;
  }
  return "";
}


/** 基于 child_process 的 GitRunner；命令失败（含找不到 git）以非零 code 返回而不抛出 */
export function createGitRunner(bin: string, cwd: string): GitRunner {
  return async (args: string[]): Promise<GitResult> => {
    try {
      const { stdout, stderr } = await execFileAsync(bin, args, { cwd, encoding: "utf-8" });
      return { code: 0, stdout, stderr };
    } catch (err) {
      if (!(err instanceof Error)) return { code: 1, stdout: "", stderr: String(err) };
      const code = "code" in err && typeof err.code === "number" ? err.code : 127;
      return { code, stdout: outputOf(err, "stdout"), stderr: outputOf(err, "stderr") || err.message };
    }
  };
}


/** 本地时间 YYYY-MM-DD HH:MM:SS */
function formatTimestamp(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}


export function commitMessage(now: Date): string {
  return `Auto-update feeds ${formatTimestamp(now)}`;
}


function failure(result: GitResult): string {
  return (result.stderr || result.stdout).trim() || `exit ${result.code}`;
}


/** git 能暂存的路径：已跟踪（含工作区已删除）或未被忽略的新文件；从未提交过又被删除的路径不在其中 */
async function stageablePaths(git: GitRunner, paths: string[]): Promise<GitResult & { paths: string[] }> {
  const result = await git(["ls-files", "-z", "--cached", "--others", "--exclude-standard", "--", ...paths]);
  const listed = result.code === 0 ? result.stdout.split("\0").filter(Boolean) : [];
  return { ...result, paths: [...new Set(listed)] };
}


/** 有变更则暂存并提交，返回提交信息；无可提交内容返回 null */
async function commitChanges(paths: string[], options: PublishOptions): Promise<{ message: string | null } | { error: string }> {
  const { git } = options;
  const listed = await stageablePaths(git, paths);
  if (listed.code !== 0) {
    const error = failure(listed);
    logger.error("publisher", "git ls-files 失败", { err: error });
    return { error };
  }
  if (listed.paths.length === 0) return { message: null };

  const add = await git(["add", "-A", "--", ...listed.paths]);
  if (add.code !== 0) {
    const error = failure(add);
    logger.error("publisher", "git add 失败", { err: error });
    return { error };
  }

  // exit 0 表示暂存区与 HEAD 无差异
  const diff = await git(["diff", "--cached", "--quiet", "--", ...listed.paths]);
  if (diff.code === 0) return { message: null };
  if (diff.code !== 1) {
    const error = failure(diff);
    logger.error("publisher", "git diff 失败", { err: error });
    return { error };
  }

  const message = commitMessage(options.now ?? new Date());
  const commit = await git(["commit", "-m", message, "--", ...listed.paths]);
  if (commit.code !== 0) {
    const error = failure(commit);
    logger.error("publisher", "git commit 失败", { err: error });
    return { error };
  }
  logger.info("publisher", "已提交", { message });
  return { message };
}


/** 暂存并提交指定文件（相对 runner cwd 的路径），然后推送；无新提交时也推送，带上之前未推送成功的提交 */
export async function publishToGit(paths: string[], options: PublishOptions): Promise<PublishResult> {
  const { git, remote, branch } = options;
  const committed = paths.length > 0 ? await commitChanges(paths, options) : { message: null };
  if ("error" in committed) return { status: "commit-failed", error: committed.error };
  const { message } = committed;
  if (message == null) logger.info("publisher", "没有需要提交的变更");

  const push = await git(["push", remote, branch]);
  if (push.code !== 0) {
    const error = failure(push);
    logger.warn("publisher", "推送失败，提交保留在本地，下次运行会再次推送", { remote, branch, err: error });
    return message == null ? { status: "push-failed", error } : { status: "push-failed", message, error };
  }
  logger.info("publisher", "已推送", { remote, branch });
  return message == null ? { status: "unchanged" } : { status: "updated", message };
}
