import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/index.js";
import type { RunConfig } from "../src/config/types.js";
import { MalformedInputError, UnreadableSourceError } from "../src/errors/index.js";
import { runFeeds } from "../src/pipeline/index.js";
import { makeTempDir, writeRows } from "./helpers.js";


const ROWS = [
  ["title", "link", "group", "date"],
  ["A", "http://x", "tech", "2024-01-02"],
  ["B", "http://y", "tech", "2024-01-01"],
  ["C", "http://z", "World News", null],
];


async function snapshotDir(dir: string): Promise<Record<string, string>> {
  const out: Record<string, string> = {};
  for (const name of (await readdir(dir)).sort()) {
    out[name] = await readFile(join(dir, name), "utf-8");
  }
  return out;
}


describe("pipeline", () => {
  let cwd: string;
  let cleanup: () => Promise<void>;
  let config: RunConfig;

  beforeEach(async () => {
    ({ dir: cwd, cleanup } = await makeTempDir());
    config = await loadConfig({ cwd, env: {} });
  });

  afterEach(async () => {
    await cleanup();
  });

  it("每组一个 feed 加一个索引", async () => {
    await writeRows(config.source, ROWS);
    const result = await runFeeds(config);
    expect(result.records).toBe(3);
    expect(result.gate.files.map((f) => [f.name, f.status])).toEqual([
      ["tech.xml", "created"],
      ["world-news.xml", "created"],
      ["feeds.opml", "created"],
    ]);
    expect(result.index.outlines.map((o) => o.text)).toEqual(["tech", "World News"]);

    const tech = await readFile(join(config.outDir, "tech.xml"), "utf-8");
    expect(tech.indexOf("<title>A</title>")).toBeGreaterThan(-1);
    expect(tech.indexOf("<title>A</title>")).toBeLessThan(tech.indexOf("<title>B</title>"));
    expect(tech).toContain("<lastBuildDate>Tue, 02 Jan 2024 00:00:00 GMT</lastBuildDate>");

    const opml = await readFile(join(config.outDir, "feeds.opml"), "utf-8");
    expect(opml).toContain(`xmlUrl="file://${join(config.outDir, "tech.xml")}"`);
  });

  it("输入不变时重跑输出逐字节相同，全部 unchanged", async () => {
    await writeRows(config.source, ROWS);
    await runFeeds(config);
    const before = await snapshotDir(config.outDir);

    const again = await runFeeds(config);
    expect(again.gate.files.map((f) => f.status)).toEqual(["unchanged", "unchanged", "unchanged"]);
    expect(again.gate.bytesWritten).toBe(0);
    expect(await snapshotDir(config.outDir)).toEqual(before);
  });

  it("非法行中止整次运行，输出目录保持原样", async () => {
    await writeRows(config.source, ROWS);
    await runFeeds(config);
    const before = await snapshotDir(config.outDir);

    await writeRows(config.source, [...ROWS, [null, "http://broken", "sports", "2024-05-01"]]);
    await expect(runFeeds(config)).rejects.toThrow(MalformedInputError);
    await expect(runFeeds(config)).rejects.toThrow(/第 5 行: 标题为空/);
    expect(await snapshotDir(config.outDir)).toEqual(before);
  });

  it("空输入：没有 feed，索引存在且为空", async () => {
    await writeRows(config.source, [["title", "link"]]);
    const result = await runFeeds(config);
    expect(result.documents).toEqual([]);
    expect(result.gate.files.map((f) => [f.name, f.status])).toEqual([["feeds.opml", "created"]]);
    expect(result.index.outlines).toEqual([]);
    expect(await readdir(config.outDir)).toEqual(["feeds.opml"]);
  });

  it("表格不存在", async () => {
    await expect(runFeeds(config)).rejects.toBeInstanceOf(UnreadableSourceError);
  });
});
