import { describe, expect, it } from "vitest";
import { commitMessage, publishToGit } from "../src/publisher/index.js";
import type { GitResult, GitRunner } from "../src/publisher/index.js";


const PATHS = ["output_feeds/tech.xml", "output_feeds/feeds.opml"];
const NOW = new Date(2024, 2, 5, 9, 7, 3);
const MESSAGE = "Auto-update feeds 2024-03-05 09:07:03";
const OK: GitResult = { code: 0, stdout: "", stderr: "" };
const LS_FILES = ["ls-files", "-z", "--cached", "--others", "--exclude-standard", "--"];


/** ls-files -z 的输出 */
function listed(paths: string[]): GitResult {
  return { code: 0, stdout: paths.map((p) => `${p}\0`).join(""), stderr: "" };
}


/** 内存 GitRunner：按子命令返回预设结果并记录调用 */
function fakeGit(responses: Partial<Record<string, GitResult>>): { git: GitRunner; calls: string[][] } {
  const calls: string[][] = [];
  const git: GitRunner = async (args) => {
    calls.push(args);
    return responses[args[0] ?? ""] ?? OK;
  };
  return { git, calls };
}


const options = (git: GitRunner) => ({ git, remote: "origin", branch: "main", now: NOW });


describe("publisher", () => {
  it("提交信息带本地时间戳", () => {
    expect(commitMessage(NOW)).toBe(MESSAGE);
  });

  it("有变化时只暂存生成的文件，提交并推送", async () => {
    const { git, calls } = fakeGit({ "ls-files": listed(PATHS), diff: { code: 1, stdout: "", stderr: "" } });
    expect(await publishToGit(PATHS, options(git))).toEqual({ status: "updated", message: MESSAGE });
    expect(calls).toEqual([
      [...LS_FILES, ...PATHS],
      ["add", "-A", "--", ...PATHS],
      ["diff", "--cached", "--quiet", "--", ...PATHS],
      ["commit", "-m", MESSAGE, "--", ...PATHS],
      ["push", "origin", "main"],
    ]);
  });

  it("无可提交内容时仍然推送，补上之前未推送的提交", async () => {
    const { git, calls } = fakeGit({});
    expect(await publishToGit(["out/a.xml"], options(git))).toEqual({ status: "unchanged" });
    expect(calls).toEqual([
      [...LS_FILES, "out/a.xml"],
      ["push", "origin", "main"],
    ]);
  });

  it("暂存后与 HEAD 无差异：不提交，但推送", async () => {
    const { git, calls } = fakeGit({ "ls-files": listed(PATHS), diff: OK });
    expect(await publishToGit(PATHS, options(git))).toEqual({ status: "unchanged" });
    expect(calls.map((c) => c[0])).toEqual(["ls-files", "add", "diff", "push"]);
  });

  it("无新提交且推送失败时报 push-failed", async () => {
    const { git } = fakeGit({ push: { code: 1, stdout: "", stderr: "fatal: unable to access remote\n" } });
    expect(await publishToGit(PATHS, options(git))).toEqual({
      status: "push-failed",
      error: "fatal: unable to access remote",
    });
  });

  it("从未提交过又被删除的 feed 不进入暂存路径", async () => {
    const paths = ["output_feeds/new.xml", "output_feeds/old.xml", "output_feeds/feeds.opml"];
    const { git, calls } = fakeGit({
      "ls-files": listed(["output_feeds/new.xml", "output_feeds/feeds.opml"]),
      diff: { code: 1, stdout: "", stderr: "" },
    });
    expect(await publishToGit(paths, options(git))).toEqual({ status: "updated", message: MESSAGE });
    expect(calls[1]).toEqual(["add", "-A", "--", "output_feeds/new.xml", "output_feeds/feeds.opml"]);
    expect(calls[3]).toEqual(["commit", "-m", MESSAGE, "--", "output_feeds/new.xml", "output_feeds/feeds.opml"]);
  });

  it("提交失败与无变化区分开，且不推送", async () => {
    const { git, calls } = fakeGit({
      "ls-files": listed(PATHS),
      diff: { code: 1, stdout: "", stderr: "" },
      commit: { code: 128, stdout: "", stderr: "fatal: unable to auto-detect email address\n" },
    });
    expect(await publishToGit(PATHS, options(git))).toEqual({
      status: "commit-failed",
      error: "fatal: unable to auto-detect email address",
    });
    expect(calls.map((c) => c[0])).toEqual(["ls-files", "add", "diff", "commit"]);
  });

  it("提交后推送失败返回 push-failed 而不抛错", async () => {
    const { git } = fakeGit({
      "ls-files": listed(PATHS),
      diff: { code: 1, stdout: "", stderr: "" },
      push: { code: 1, stdout: "", stderr: "fatal: unable to access remote\n" },
    });
    expect(await publishToGit(PATHS, options(git))).toEqual({
      status: "push-failed",
      message: MESSAGE,
      error: "fatal: unable to access remote",
    });
  });

  it("不在 git 仓库中时报 commit-failed，不推送", async () => {
    const { git, calls } = fakeGit({ "ls-files": { code: 128, stdout: "", stderr: "fatal: not a git repository\n" } });
    expect(await publishToGit(PATHS, options(git))).toEqual({
      status: "commit-failed",
      error: "fatal: not a git repository",
    });
    expect(calls.map((c) => c[0])).toEqual(["ls-files"]);
  });

  it("没有文件时只推送", async () => {
    const { git, calls } = fakeGit({});
    expect(await publishToGit([], options(git))).toEqual({ status: "unchanged" });
    expect(calls).toEqual([["push", "origin", "main"]]);
  });
});
