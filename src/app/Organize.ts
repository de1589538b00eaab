import type { CAC } from "cac";
import path from "node:path";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { loadImportConfig } from "@/config";
import { expandHome } from "@/utils/helper";

import { buildServices } from "./buildServices";

type OrganizeOptions = {
  raw?: string;
  dryRun?: boolean;
};

export function registerOrganize(cli: CAC, baseLogger: Logger) {
  cli
    .command(
      "organize <bucket>",
      "將暫存區的 RAW 依 EXIF 歸檔到 {YYYY}/{YYYY-MM-DD}/ 之下"
    )
    .option("--raw <path>", "RAW 歸檔根目錄，預設為暫存區的上一層")
    .option("--dry-run", "只顯示將搬移的檔案")
    .action(async (bucket: string, options: OrganizeOptions) => {
      const logger = baseLogger.extend("organize");
      const env = loadImportConfig();
      const config = { ...env, dryRun: Boolean(options.dryRun) || env.dryRun };
      const stagingRoot = expandHome(bucket);
      const rawRoot = expandHome(
        options.raw ?? config.rawPath ?? path.dirname(stagingRoot)
      );

      const services = buildServices(logger, config, rawRoot);
      let failed = false;
      try {
        const result = await services.reorganizer.organize(stagingRoot, rawRoot);
        if (isErr(result)) {
          logger.error({ emoji: "❌", error: result.error })`整理失敗`;
          failed = true;
        } else {
          await new DumpWriterDefault(logger).dump("organize", result.value);
          failed = result.value.issues.length > 0;
        }
      } finally {
        await services.exifService.end();
      }
      if (failed) process.exitCode = 1;
    });
}
