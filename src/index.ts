#!/usr/bin/env node
// CLI 入口：加载 .env 后运行，退出码由 main 决定

import "dotenv/config";
import { main } from "./cli/main.js";
import { errorMessage } from "./errors/index.js";
import { logger } from "./logger/index.js";

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.error("cli", errorMessage(err));
    process.exitCode = 1;
  },
);
