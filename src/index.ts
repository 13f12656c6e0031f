import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";

import { registerMatchImages } from "./app/MatchImages";

const logger = createDefaultLoggerFromEnv();
const cli = cac("match-images");

registerMatchImages(cli, logger);

cli.help();

if (process.argv.length <= 2) {
  cli.outputHelp();
  process.exit(0);
}

cli.parse(process.argv, { run: false });

try {
  await cli.runMatchedCommand();
} catch (error) {
  logger.error({ error }, "執行命令時發生錯誤");
  process.exit(1);
}
