// Publisher 类型：git 调用抽象与发布结果


/** 一次 git 调用的结果；非零 code 表示失败 */
export interface GitResult {
  code: number;
  stdout: string;
  stderr: string;
}


/** 执行 git 子命令；测试中以内存实现替换 */
export type GitRunner = (args: string[]) => Promise<GitResult>;


export interface PublishOptions {
  git: GitRunner;
  remote: string;
  branch: string;
  /** 提交信息中的时间，默认当前时间 */
  now?: Date;
}


/**
 * 发布结果：
 *   unchanged     → 无新提交，推送成功（正常情况）
 *   updated       → 已提交并推送
 *   commit-failed → 暂存或提交本身失败（需要关注），不推送
 *   push-failed   → 推送失败（离线、被拒等）；message 为本次新提交，下次运行会再次推送
 */
export type PublishResult =
  | { status: "unchanged" }
  | { status: "updated"; message: string }
  | { status: "commit-failed"; error: string }
  | { status: "push-failed"; message?: string; error: string };


export interface GitConfig {
  enabled: boolean;
  /** git 可执行文件，可指向独立安装的版本 */
  bin: string;
  remote: string;
  branch: string;
}
