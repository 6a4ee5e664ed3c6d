// Publisher：把输出文件提交并推送到 git 远端

export { publishToGit, createGitRunner, commitMessage } from "./git.js";
export type { GitConfig, GitResult, GitRunner, PublishOptions, PublishResult } from "./types.js";
