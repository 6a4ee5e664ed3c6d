#!/usr/bin/env node
// App 入口：加载 .env 后执行一次 CLI，退出码由生成结果决定

import "dotenv/config";
import { run } from "./cli.js";


run(process.argv.slice(2), { cwd: process.cwd(), env: process.env })
  .then(({ code }) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
