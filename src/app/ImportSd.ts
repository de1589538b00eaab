import type { CAC } from "cac";
import path from "node:path";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { loadImportConfig } from "@/config";
import { bucketDirName } from "@/constants";
import {
  CommandRunnerSpawn,
  CopyExecutorDefault,
} from "@/services/CopyExecutor";
import { CopyQueueBuilder } from "@/services/CopyQueue";
import { ImportWorkflowDefault } from "@/services/ImportWorkflow";
import { OperatorPromptReadline } from "@/services/OperatorPrompt";
import { VolumeLocatorDefault } from "@/services/VolumeLocator";
import { expandHome } from "@/utils/helper";

import { buildServices } from "./buildServices";

type ImportSdOptions = {
  raw?: string;
  jpg?: string;
  backup?: string;
  rawExt?: string;
  dryRun?: boolean;
  yes?: boolean;
  reportDir?: string;
};

export function registerImportSd(cli: CAC, baseLogger: Logger) {
  cli
    .command(
      "import-sd [source]",
      "從記憶卡匯入：RAW 進暫存區後歸檔、JPG 另存、整張卡備份"
    )
    .option("--raw <path>", "RAW 歸檔根目錄（IMPORT_RAW_PATH）")
    .option("--jpg <path>", "JPG 目的地（IMPORT_JPG_PATH）")
    .option("--backup <path>", "備份目的地（IMPORT_BACKUP_PATH）")
    .option("--raw-ext <ext>", "RAW 副檔名（IMPORT_RAW_EXTENSION）")
    .option("--dry-run", "只顯示將執行的動作")
    .option("--yes", "失敗時不詢問，直接繼續")
    .option("--report-dir <path>", "報告輸出目錄", { default: "reports" })
    .action(async (source: string | undefined, options: ImportSdOptions) => {
      const logger = baseLogger.extend("import-sd");
      const env = loadImportConfig();
      const config = {
        ...env,
        rawExtension: options.rawExt ?? env.rawExtension,
        dryRun: Boolean(options.dryRun) || env.dryRun,
      };

      const rawRoot = options.raw ?? config.rawPath;
      const jpgRoot = options.jpg ?? config.jpgPath;
      const backupRoot = options.backup ?? config.backupPath;
      if (!rawRoot || !jpgRoot || !backupRoot) {
        logger.error({
          emoji: "❌",
        })`需要 --raw、--jpg、--backup（或對應的環境變數）`;
        process.exitCode = 1;
        return;
      }

      let sourceRoot: string;
      if (source) {
        sourceRoot = expandHome(source);
      } else {
        const located = await new VolumeLocatorDefault({ logger }).locate();
        if (isErr(located)) {
          logger.error({ emoji: "❌" })`${located.error.message}`;
          process.exitCode = 1;
          return;
        }
        sourceRoot = located.value;
      }

      const raw = expandHome(rawRoot);
      const services = buildServices(logger, config, raw);
      const reporter = new DumpWriterDefault(logger, options.reportDir);
      const workflow = new ImportWorkflowDefault({
        logger,
        queueBuilder: new CopyQueueBuilder({
          logger,
          scanner: services.scanner,
          recordFactory: services.recordFactory,
          pathBuilder: services.pathBuilder,
          destinations: {
            rawRoot: raw,
            bucket: path.join(raw, bucketDirName),
            jpgRoot: expandHome(jpgRoot),
            backupRoot: expandHome(backupRoot),
          },
          rawExtension: config.rawExtension,
        }),
        executor: new CopyExecutorDefault({
          logger,
          runner: new CommandRunnerSpawn(),
          options: {
            maxRetries: config.maxRetries,
            retryDelayMs: config.retryDelayMs,
            dryRun: config.dryRun,
          },
        }),
        validator: services.validator,
        reorganizer: services.reorganizer,
        prompt: new OperatorPromptReadline({ logger, assumeYes: options.yes }),
        reporter,
        config: {
          sourceRoot,
          rawRoot: raw,
          jpgRoot: expandHome(jpgRoot),
          backupRoot: expandHome(backupRoot),
          dryRun: config.dryRun,
        },
      });

      let state: "done" | "failed";
      try {
        state = (await workflow.run()).state;
      } finally {
        await services.exifService.end();
      }
      if (state === "failed") process.exitCode = 1;
    });
}
