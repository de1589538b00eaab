import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";

import { registerImportSd } from "./app/ImportSd";
import { registerMigrateNames } from "./app/MigrateNames";
import { registerOrganize } from "./app/Organize";

const logger = createDefaultLoggerFromEnv();
const cli = cac("card-import");

registerImportSd(cli, logger);
registerOrganize(cli, logger);
registerMigrateNames(cli, logger);

cli.help();
cli.parse(process.argv, { run: false });

if (!cli.matchedCommand) {
  cli.outputHelp();
  process.exit(0);
}

try {
  await cli.runMatchedCommand();
} catch (error) {
  logger.error({ error }, "執行命令時發生錯誤");
  await logger.dispose();
  process.exit(1);
}
await logger.dispose();
