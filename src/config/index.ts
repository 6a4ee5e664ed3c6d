// 配置加载：命令行 > 环境变量 > .sheetfeed/config.json > 默认值，结果为只读 RunConfig

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigError } from "../errors/index.js";
import { logger } from "../logger/index.js";
import { isErrno } from "../utils/errno.js";
import { configFilePath, DEFAULT_OUT_DIR, DEFAULT_SOURCE, resolveFrom } from "./paths.js";
import type { LoadConfigInput, RunConfig } from "./types.js";

export { configFilePath, CONFIG_DIR_NAME, DEFAULT_OUT_DIR, DEFAULT_SOURCE } from "./paths.js";
export type { CliOverrides, LoadConfigInput, RunConfig } from "./types.js";


const baseUrlSchema = z.string().url();


const declaredFeedSchema = z.object({
  title: z.string().min(1).optional(),
  link: z.string().min(1).optional(),
  description: z.string().optional(),
});


/** config.json 结构；所有字段可选 */
export const fileConfigSchema = z.object({
  source: z.string().min(1).optional(),
  outDir: z.string().min(1).optional(),
  indexFile: z.string().regex(/^[^/\\]+$/, "只能是文件名").optional(),
  indexTitle: z.string().optional(),
  baseUrl: baseUrlSchema.optional(),
  sheet: z.string().min(1).optional(),
  language: z.string().min(1).optional(),
  defaultGroup: z.string().min(1).optional(),
  rejectEmptyGroups: z.boolean().optional(),
  dedupe: z.boolean().optional(),
  prune: z.boolean().optional(),
  feeds: z.record(declaredFeedSchema).optional(),
  git: z
    .object({
      enabled: z.boolean().optional(),
      bin: z.string().min(1).optional(),
      remote: z.string().min(1).optional(),
      branch: z.string().min(1).optional(),
    })
    .optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;


/** 读取并校验 config.json；文件不存在返回空配置 */
export async function readFileConfig(path: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isErrno(err, "ENOENT")) return {};
    throw new ConfigError(path, "无法读取", { cause: err });
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(path, "不是合法的 JSON", { cause: err });
  }
  const result = fileConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.join(".") || "(root)";
    throw new ConfigError(path, `${where}: ${issue?.message ?? "字段非法"}`);
  }
  return result.data;
}


/** "0"/"false" → false，"1"/"true" → true，其余视为未设置 */
export function parseFlag(v: string | undefined): boolean | undefined {
  if (v === "0" || v === "false") return false;
  if (v === "1" || v === "true") return true;
  return undefined;
}


function nonEmpty(v: string | undefined): string | undefined {
  return v != null && v.trim() !== "" ? v.trim() : undefined;
}


/** 校验命令行或环境变量给出的 baseUrl，与 config.json 同一规则；origin 用于报错 */
function checkBaseUrl(value: string | undefined, origin: string): string | undefined {
  if (value == null) return undefined;
  const result = baseUrlSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(origin, `baseUrl: ${result.error.issues[0]?.message ?? "不是合法的 URL"}`);
  }
  return result.data;
}


/** 解析完整运行配置 */
export async function loadConfig(input: LoadConfigInput): Promise<RunConfig> {
  const { cwd, env, overrides = {} } = input;
  const path = configFilePath(cwd);
  const file = await readFileConfig(path);

  const source = overrides.source ?? nonEmpty(env.SHEETFEED_SOURCE) ?? file.source ?? DEFAULT_SOURCE;
  const outDir = overrides.outDir ?? nonEmpty(env.SHEETFEED_OUT_DIR) ?? file.outDir ?? DEFAULT_OUT_DIR;
  const baseUrl =
    checkBaseUrl(overrides.baseUrl, "--base-url") ??
    checkBaseUrl(nonEmpty(env.SHEETFEED_BASE_URL), "SHEETFEED_BASE_URL") ??
    file.baseUrl;

  const config: RunConfig = {
    cwd,
    source: resolveFrom(cwd, source),
    outDir: resolveFrom(cwd, outDir),
    indexFile: file.indexFile ?? "feeds.opml",
    indexTitle: file.indexTitle ?? "Feeds export",
    baseUrl,
    sheet: overrides.sheet ?? file.sheet,
    language: file.language ?? "zh-CN",
    defaultGroup: file.defaultGroup ?? "feed",
    rejectEmptyGroups: file.rejectEmptyGroups ?? false,
    dedupe: file.dedupe ?? true,
    prune: file.prune ?? true,
    feeds: file.feeds ?? {},
    git: {
      enabled: overrides.publish ?? parseFlag(env.SHEETFEED_PUBLISH) ?? file.git?.enabled ?? true,
      bin: nonEmpty(env.SHEETFEED_GIT) ?? file.git?.bin ?? "git",
      remote: nonEmpty(env.SHEETFEED_GIT_REMOTE) ?? file.git?.remote ?? "origin",
      branch: nonEmpty(env.SHEETFEED_GIT_BRANCH) ?? file.git?.branch ?? "main",
    },
    now: input.now ?? new Date(),
  };
  logger.debug("config", "配置已加载", { source: config.source, outDir: config.outDir, baseUrl: config.baseUrl, git: config.git });
  return config;
}
