import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import type { ChecksumCache } from "@/services/Checksum/ChecksumCache";
import type { ChecksumFailure, ChecksumMismatchError } from "@/types";
import { exists } from "@/utils/helper";

import type { ChecksumValidator } from "./ChecksumValidator";

export class ChecksumValidatorDefault implements ChecksumValidator {
  private readonly logger: Logger;
  private readonly cache: ChecksumCache;

  constructor(deps: { logger: Logger; cache: ChecksumCache }) {
    this.logger = deps.logger.extend("ChecksumValidator");
    this.cache = deps.cache;
  }

  validateChecksums(
    before: ReadonlyMap<string, string>,
    sourceRoot: string,
    destinationRoot: string
  ): Promise<Result<void, ChecksumMismatchError>> {
    const mapping = new Map<string, string>();
    for (const source of before.keys()) {
      mapping.set(
        source,
        path.join(destinationRoot, path.relative(sourceRoot, source))
      );
    }
    return this.check(before, mapping, destinationRoot);
  }

  validateChecksumList(
    before: ReadonlyMap<string, string>,
    mapping: ReadonlyMap<string, string>
  ): Promise<Result<void, ChecksumMismatchError>> {
    return this.check(before, mapping);
  }

  async compareChecksums(pathA: string, pathB: string): Promise<boolean> {
    const [a, b] = await Promise.all([
      this.cache.hash(pathA),
      this.cache.hash(pathB),
    ]);
    return a === b;
  }

  private async check(
    before: ReadonlyMap<string, string>,
    mapping: ReadonlyMap<string, string>,
    destinationRoot?: string
  ): Promise<Result<void, ChecksumMismatchError>> {
    const failures: ChecksumFailure[] = [];
    for (const [source, expected] of before) {
      const destination = mapping.get(source);
      if (destination === undefined || !(await exists(destination))) {
        const failure: ChecksumFailure = {
          source,
          destination: destination ?? "",
          reason: "MISSING",
          expected,
        };
        failures.push(failure);
        this.logger.error({
          event: "missing",
          ...failure,
        })`目的檔不存在: ${source} → ${failure.destination}`;
        continue;
      }

      // 目的檔是剛複製來的，不能沿用舊的快取
      this.cache.invalidate(destination);
      const actual = await this.cache.hash(destination);
      if (actual !== expected) {
        const failure: ChecksumFailure = {
          source,
          destination,
          reason: "MISMATCH",
          expected,
          actual,
        };
        failures.push(failure);
        this.logger.error({
          event: "mismatch",
          ...failure,
        })`雜湊不符: ${source} → ${destination}`;
      }
    }

    const where = destinationRoot ?? "重新歸檔的檔案";
    if (failures.length > 0) {
      this.logger.error({
        event: "checksum-failed",
        destinationRoot,
      })`${where}: ${failures.length}/${before.size} 個檔案校驗失敗`;
      return err({
        type: "CHECKSUM_MISMATCH",
        message: `${where}: ${failures.length} 個檔案校驗失敗`,
        destinationRoot,
        failures,
      });
    }
    this.logger.info({
      emoji: "✅",
      event: "checksum-ok",
    })`${where}: ${before.size} 個檔案校驗通過`;
    return ok();
  }
}
