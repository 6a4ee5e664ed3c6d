// CLI：sheetfeed [表格] [--out 目录] [--base-url URL] [--sheet 表名] [--no-publish]

import { relative } from "node:path";
import { parseArgs } from "node:util";
import { loadConfig } from "../config/index.js";
import type { CliOverrides } from "../config/types.js";
import { SheetFeedError } from "../errors/index.js";
import { errMessage, logger } from "../logger/index.js";
import { runFeeds } from "../pipeline/index.js";
import { createGitRunner, publishToGit } from "../publisher/index.js";
import type { GitRunner, PublishResult } from "../publisher/types.js";
import { feedUrl } from "../synthesizer/index.js";


export const USAGE = `用法: sheetfeed [表格文件] [选项]

  表格文件             .xlsx 或 .csv，默认 feeds.xlsx
  -o, --out <目录>     输出目录，默认 output_feeds
  --base-url <URL>     feed 发布后的公网前缀（写入 OPML）
  --sheet <表名>       工作表名，默认第一张
  --no-publish         只生成文件，不执行 git 提交与推送
  -h, --help           显示帮助`;


export interface ParsedArgs {
  help: boolean;
  overrides: CliOverrides;
}


/** 解析命令行；未知选项或多余参数抛错 */
export function parseCliArgs(argv: string[]): ParsedArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      out: { type: "string", short: "o" },
      "base-url": { type: "string" },
      sheet: { type: "string" },
      "no-publish": { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  });
  if (positionals.length > 1) {
    throw new Error(`只接受一个表格文件参数，收到 ${positionals.length} 个`);
  }
  return {
    help: values.help === true,
    overrides: {
      source: positionals[0],
      outDir: values.out,
      baseUrl: values["base-url"],
      sheet: values.sheet,
      publish: values["no-publish"] === true ? false : undefined,
    },
  };
}


export interface CliDeps {
  cwd: string;
  env: Record<string, string | undefined>;
  /** 替换默认的 child_process git 调用 */
  git?: GitRunner;
  now?: Date;
}


export interface CliOutcome {
  code: number;
  publish?: PublishResult;
}


/** 执行一次 CLI；发布失败不影响退出码，生成失败返回 1 */
export async function run(argv: string[], deps: CliDeps): Promise<CliOutcome> {
  let parsed: ParsedArgs;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    logger.error("app", errMessage(err));
    console.error(USAGE);
    return { code: 1 };
  }
  if (parsed.help) {
    console.log(USAGE);
    return { code: 0 };
  }

  try {
    const config = await loadConfig({ cwd: deps.cwd, env: deps.env, overrides: parsed.overrides, now: deps.now });
    logger.info("app", "开始生成", { source: relative(config.cwd, config.source) || config.source });
    const result = await runFeeds(config);
    for (const file of result.gate.files) {
      logger.info("app", `${file.status} ${relative(config.cwd, file.path)}`);
    }

    let publish: PublishResult | undefined;
    if (config.git.enabled) {
      const paths = result.gate.files.map((file) => relative(config.cwd, file.path));
      publish = await publishToGit(paths, {
        git: deps.git ?? createGitRunner(config.git.bin, config.cwd),
        remote: config.git.remote,
        branch: config.git.branch,
        now: config.now,
      });
    }

    logger.info("app", `OPML: ${feedUrl(config.indexFile, config)}`);
    return { code: 0, publish };
  } catch (err) {
    if (err instanceof SheetFeedError) {
      logger.error("app", err.message);
    } else {
      logger.error("app", "未预期的错误", { err: errMessage(err) });
    }
    return { code: 1 };
  }
}
