import { setTimeout as delay } from "node:timers/promises";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import { defaultMaxRetries, defaultRetryDelayMs } from "@/constants";
import { exists } from "@/utils/helper";

import { type BulkCopy, ListBasedBulkCopy, LocalBulkCopy } from "./BulkCopy";
import type { CommandRunner } from "./CommandRunner";
import type { CopyError, CopyExecutor } from "./CopyExecutor";

export type CopyExecutorOptions = {
  maxRetries?: number;
  retryDelayMs?: number;
  dryRun?: boolean;
};

export class CopyExecutorDefault implements CopyExecutor {
  private readonly logger: Logger;
  private readonly runner: CommandRunner;
  private readonly local: BulkCopy;
  private readonly list: BulkCopy;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly dryRun: boolean;
  private readonly sleep: (ms: number) => Promise<unknown>;

  constructor(deps: {
    logger: Logger;
    runner: CommandRunner;
    options?: CopyExecutorOptions;
    local?: BulkCopy;
    list?: BulkCopy;
    sleep?: (ms: number) => Promise<unknown>;
  }) {
    this.logger = deps.logger.extend("CopyExecutor", { emoji: "🚚" });
    this.runner = deps.runner;
    this.local = deps.local ?? new LocalBulkCopy();
    this.list = deps.list ?? new ListBasedBulkCopy();
    this.maxRetries = Math.max(1, deps.options?.maxRetries ?? defaultMaxRetries);
    this.retryDelayMs = deps.options?.retryDelayMs ?? defaultRetryDelayMs;
    this.dryRun = deps.options?.dryRun ?? false;
    this.sleep = deps.sleep ?? ((ms) => delay(ms));
  }

  async copy(
    sourceRoot: string,
    destinationRoot: string
  ): Promise<Result<void, CopyError>> {
    const argv = this.local.command(sourceRoot, destinationRoot);
    if (this.dryRun) {
      this.logger.info({ event: "dry-run" })`略過執行: ${argv.join(" ")}`;
      return ok();
    }
    return this.runWithRetry(argv, sourceRoot, destinationRoot);
  }

  async copyFromList(
    listPath: string,
    destination: string
  ): Promise<Result<void, CopyError>> {
    if (this.dryRun) {
      return err({
        type: "UNSUPPORTED_OPERATION",
        message: `dry-run 不支援清單複製: ${listPath} → ${destination}`,
      });
    }
    if (!(await exists(listPath))) {
      this.logger.error({ event: "list-missing" })`清單檔不存在 ${listPath}`;
      return err({
        type: "PATH_NOT_FOUND",
        message: `清單檔不存在: ${listPath}`,
        path: listPath,
      });
    }
    return this.runWithRetry(
      this.list.command(listPath, destination),
      listPath,
      destination
    );
  }

  private async runWithRetry(
    argv: string[],
    source: string,
    destinationRoot: string
  ): Promise<Result<void, CopyError>> {
    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      this.logger.info({
        event: "exec",
        attempt,
      })`執行命令: ${argv.join(" ")}`;
      const result = await this.runner.run(argv);
      if (result.code === 0) return ok();

      this.logger.warn({
        event: "retry",
        attempt,
        code: result.code,
        stderr: result.stderr.trim().split("\n").slice(-5),
      })`複製失敗 (${attempt}/${this.maxRetries}) ${source} → ${destinationRoot}`;
      if (attempt < this.maxRetries) await this.sleep(this.retryDelayMs);
    }

    this.logger.error({
      event: "copy-failed",
      source,
      destinationRoot,
    })`重試 ${this.maxRetries} 次仍失敗`;
    return err({
      type: "COPY_FAILED",
      message: `複製失敗（${this.maxRetries} 次）: ${source} → ${destinationRoot}`,
      source,
      destinationRoot,
      attempts: this.maxRetries,
    });
  }
}
