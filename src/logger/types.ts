// 日志类型与结构化条目
// 设计原则：控制台由 LOG_LEVEL 过滤（默认 info），一次运行一屏输出，按分类定位问题。

/** 日志级别：debug < info < warn < error */
export type LogLevel = "error" | "warn" | "info" | "debug";

/** 日志分类：按模块筛选 */
export type LogCategory =
  | "extractor"   // 表格读取与行校验
  | "synthesizer" // 分组、排序与 RSS/OPML 生成
  | "gate"        // 指纹比对与落盘
  | "publisher"   // git 提交与推送
  | "config"      // 配置加载
  | "app";        // CLI 入口

/** 单条日志的结构化数据 */
export interface LogEntry {
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** 可选上下文（err、row、file 等） */
  payload?: Record<string, unknown>;
  created_at: string;
}
