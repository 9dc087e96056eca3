// CLI 主流程：解析参数 → 生成并写出 feed，返回进程退出码

import { parseCliArgs, HELP, PROGRAM, VERSION } from "./args.js";
import { runFeed } from "../feeder/feeder.js";
import { nodeFs } from "../fs/index.js";
import { UsageError, errorMessage } from "../errors/index.js";
import { logger, setConsoleLevel } from "../logger/index.js";
import type { FsAccessor } from "../fs/types.js";
import type { CliCommand } from "./args.js";


export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;


export async function main(argv: string[], fs: FsAccessor = nodeFs): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`${PROGRAM}: ${err.message}\nTry '${PROGRAM} --help' for more information.`);
      return EXIT_USAGE;
    }
    logger.error("config", errorMessage(err));
    return EXIT_FAILURE;
  }
  if (command.kind === "help") {
    console.log(HELP);
    return EXIT_OK;
  }
  if (command.kind === "version") {
    console.log(`${PROGRAM} ${VERSION}`);
    return EXIT_OK;
  }

  const site = command.config;
  setConsoleLevel(site.quiet ? "error" : null);
  logger.info("cli", `root dir: ${site.rootDir}, n: ${site.limit}, output: ${site.outputPath}, base: ${site.baseUrl}`, {
    categories: site.categories.map((c) => `${c.dir}:${c.scheme}`),
  });
  try {
    await runFeed(site, fs);
    return EXIT_OK;
  } catch (err) {
    logger.error("cli", errorMessage(err));
    return EXIT_FAILURE;
  }
}
