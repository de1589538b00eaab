import { rename } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import type { FileSystemScanner, ScanError } from "@/services/FileSystemScanner";
import type { PathBuilder } from "@/services/PathBuilder";
import type { PhotoRecordFactory } from "@/services/PhotoRecord";
import { normalizeExtension } from "@/services/PhotoRecord";
import type { PathNotFoundError } from "@/types";
import { exists } from "@/utils/helper";

export type MigrationResult = {
  /** 舊路徑 → 新路徑（dry-run 時為預計的新路徑） */
  renamed: Map<string, string>;
  /** 目標已存在而略過 */
  skipped: string[];
  failed: string[];
};

/**
 * 舊命名：20230805-a7r4-1935--7-10 EV-8.27B-ISO 800-SAMYANG AF 12mm F2.0.arw
 * 序號沿用舊檔名中的值，其餘欄位重新從 EXIF 產生。
 */
export function legacyNamePattern(rawExtension: string) {
  const ext = normalizeExtension(rawExtension).replace(
    /[.*+?^${}()|[\]\\]/g,
    "\\$&"
  );
  return new RegExp(
    `^\\d{8}-\\w+-(\\d{3,}|unknown)-.*EV-.*B-ISO \\d+-.*\\.${ext}$`,
    "i"
  );
}

export class NameMigrationService {
  private readonly logger: Logger;
  private readonly scanner: FileSystemScanner;
  private readonly recordFactory: PhotoRecordFactory;
  private readonly pathBuilder: PathBuilder;
  private readonly pattern: RegExp;
  private readonly dryRun: boolean;

  constructor(deps: {
    logger: Logger;
    scanner: FileSystemScanner;
    recordFactory: PhotoRecordFactory;
    pathBuilder: PathBuilder;
    rawExtension: string;
    dryRun?: boolean;
  }) {
    this.logger = deps.logger.extend("NameMigration", { emoji: "🏷️" });
    this.scanner = deps.scanner;
    this.recordFactory = deps.recordFactory;
    this.pathBuilder = deps.pathBuilder;
    this.pattern = legacyNamePattern(deps.rawExtension);
    this.dryRun = deps.dryRun ?? false;
  }

  async migrate(
    rawRoot: string
  ): Promise<Result<MigrationResult, PathNotFoundError | ScanError>> {
    if (!(await exists(rawRoot))) {
      return err({
        type: "PATH_NOT_FOUND",
        message: `RAW 目錄不存在: ${rawRoot}`,
        path: rawRoot,
      });
    }
    const scanned = await this.scanner.scan(rawRoot);
    if (!scanned.ok) return err(scanned.error);

    const result: MigrationResult = {
      renamed: new Map(),
      skipped: [],
      failed: [],
    };
    for (const filePath of scanned.value) {
      const m = this.pattern.exec(path.basename(filePath));
      if (!m) continue;

      const record = await this.recordFactory.create(filePath, {
        withExif: true,
      });
      const target = path.join(
        path.dirname(filePath),
        this.pathBuilder.generateName(record, { overrides: { number: m[1] } })
      );
      if (await exists(target)) {
        this.logger.warn({ event: "exists" })`目標已存在，略過 ${target}`;
        result.skipped.push(filePath);
        continue;
      }

      if (this.dryRun) {
        this.logger.info({ event: "dry-run" })`將改名 ${filePath} → ${target}`;
      } else {
        try {
          await rename(filePath, target);
        } catch (error) {
          this.logger.error({ error })`改名失敗 ${filePath}`;
          result.failed.push(filePath);
          continue;
        }
        this.logger.debug({ event: "rename" })`${filePath} → ${target}`;
      }
      result.renamed.set(filePath, target);
    }

    this.logger.info({
      event: "done",
    })`改名 ${result.renamed.size} 個，略過 ${result.skipped.length} 個`;
    return ok(result);
  }
}
