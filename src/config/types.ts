// 运行配置：启动时一次性解析，整个运行过程只读

import type { GitConfig } from "../publisher/types.js";
import type { DeclaredFeed } from "../synthesizer/types.js";


export interface RunConfig {
  /** 启动时的工作目录 */
  cwd: string;
  /** 表格文件（绝对路径） */
  source: string;
  /** 输出目录（绝对路径） */
  outDir: string;
  indexFile: string;
  indexTitle: string;
  baseUrl?: string;
  sheet?: string;
  language: string;
  defaultGroup: string;
  rejectEmptyGroups: boolean;
  dedupe: boolean;
  prune: boolean;
  feeds: Record<string, DeclaredFeed>;
  git: GitConfig;
  /** 本次运行时间，用于提交信息 */
  now: Date;
}


/** 命令行参数，优先级最高 */
export interface CliOverrides {
  source?: string;
  outDir?: string;
  baseUrl?: string;
  sheet?: string;
  publish?: boolean;
}


export interface LoadConfigInput {
  cwd: string;
  env: Record<string, string | undefined>;
  overrides?: CliOverrides;
  now?: Date;
}
