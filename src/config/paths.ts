// 路径配置：配置目录与默认文件名集中在此，均相对启动时的工作目录解析

import { isAbsolute, join, resolve } from "node:path";


/** 用户配置目录名：<cwd>/.sheetfeed/ */
export const CONFIG_DIR_NAME = ".sheetfeed";


/** 配置文件：<cwd>/.sheetfeed/config.json */
export function configFilePath(cwd: string): string {
  return join(cwd, CONFIG_DIR_NAME, "config.json");
}


/** 默认表格文件 */
export const DEFAULT_SOURCE = "feeds.xlsx";


/** 默认输出目录 */
export const DEFAULT_OUT_DIR = "output_feeds";


/** 相对路径按 cwd 解析 */
export function resolveFrom(cwd: string, p: string): string {
  return isAbsolute(p) ? p : resolve(cwd, p);
}
