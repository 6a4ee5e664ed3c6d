// Publish Gate 输入输出类型


/** 单个输出文件的落盘结果 */
export type WriteStatus = "unchanged" | "created" | "updated" | "removed";


/** 待写入的一个文件：name 为输出目录下的文件名 */
export interface OutputFile {
  name: string;
  content: string;
}


export interface FileResult {
  name: string;
  /** 绝对路径 */
  path: string;
  status: WriteStatus;
  /** 写入后内容的 sha256；removed 时为 null */
  fingerprint: string | null;
}


export interface GateResult {
  files: FileResult[];
  /** 是否有任一文件被创建、更新或删除 */
  changed: boolean;
  bytesWritten: number;
}


export interface GateOptions {
  /** 删除输出目录中本次未生成的 *.xml，默认 true */
  prune?: boolean;
  /** 锁文件超过该时长视为残留并接管，默认 10 分钟 */
  lockStaleMs?: number;
}
