import type { CAC } from "cac";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { loadImportConfig } from "@/config";
import { NameMigrationService } from "@/services/NameMigration";
import { expandHome } from "@/utils/helper";

import { buildServices } from "./buildServices";

export function registerMigrateNames(cli: CAC, baseLogger: Logger) {
  cli
    .command("migrate-names <rawRoot>", "將舊命名的 RAW 改為目前的命名格式")
    .option("--dry-run", "只顯示將改名的檔案")
    .action(async (rawRoot: string, options: { dryRun?: boolean }) => {
      const logger = baseLogger.extend("migrate-names");
      const env = loadImportConfig();
      const config = { ...env, dryRun: Boolean(options.dryRun) || env.dryRun };
      const root = expandHome(rawRoot);

      const services = buildServices(logger, config, root);
      const service = new NameMigrationService({
        logger,
        scanner: services.scanner,
        recordFactory: services.recordFactory,
        pathBuilder: services.pathBuilder,
        rawExtension: config.rawExtension,
        dryRun: config.dryRun,
      });

      let failed = false;
      try {
        const result = await service.migrate(root);
        if (isErr(result)) {
          logger.error({ emoji: "❌", error: result.error })`改名失敗`;
          failed = true;
        } else {
          await new DumpWriterDefault(logger).dump("migrate-names", result.value);
          failed = result.value.failed.length > 0;
        }
      } finally {
        await services.exifService.end();
      }
      if (failed) process.exitCode = 1;
    });
}
