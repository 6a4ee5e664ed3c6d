// 错误分类：致命错误一律抛出，由 app 入口捕获后以非零码退出；发布失败不在此列（见 publisher 的结果值）


export class SheetFeedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SheetFeedError";
  }
}


/** 表格文件不存在、无法打开或不是合法工作簿 */
export class UnreadableSourceError extends SheetFeedError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`无法读取表格 ${path}${reason}`, options);
    this.name = "UnreadableSourceError";
    this.path = path;
  }
}


/** 缺少必需列，或某行必需字段为空；row 为表格中的 1 起始行号 */
export class MalformedInputError extends SheetFeedError {
  readonly source: string;
  readonly row?: number;
  readonly column?: string;

  constructor(detail: string, where: { source: string; row?: number; column?: string }) {
    const loc = where.row != null ? `${where.source} 第 ${where.row} 行` : where.source;
    super(`${loc}: ${detail}`);
    this.name = "MalformedInputError";
    this.source = where.source;
    this.row = where.row;
    this.column = where.column;
  }
}


/** 配置了 rejectEmptyGroups 时，声明的分组没有任何条目 */
export class EmptyGroupError extends SheetFeedError {
  readonly groupId: string;

  constructor(groupId: string) {
    super(`分组 "${groupId}" 没有任何条目`);
    this.name = "EmptyGroupError";
    this.groupId = groupId;
  }
}


/** 输出目录或文件不可写 */
export class WriteError extends SheetFeedError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`写入失败 ${path}${reason}`, options);
    this.name = "WriteError";
    this.path = path;
  }
}


/** 输出目录已被另一次运行锁定 */
export class OutputLockedError extends SheetFeedError {
  readonly path: string;

  constructor(path: string) {
    super(`输出目录已被锁定（${path}），可能有另一个进程正在生成`);
    this.name = "OutputLockedError";
    this.path = path;
  }
}


/** 配置文件无法解析或字段非法 */
export class ConfigError extends SheetFeedError {
  readonly path: string;

  constructor(path: string, detail: string, options?: { cause?: unknown }) {
    super(`配置无效 ${path}: ${detail}`, options);
    this.name = "ConfigError";
    this.path = path;
  }
}
