import { mkdir, mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { DumpWriter } from "~shared/DumpWriter/DumpWriter";
import type { Logger } from "~shared/Logger";

import { bucketDirName } from "@/constants";
import type { ChecksumValidator } from "@/services/ChecksumValidator";
import type { CopyExecutor } from "@/services/CopyExecutor";
import type { CopyQueue, CopyQueueBuilder } from "@/services/CopyQueue";
import type { OperatorPrompt } from "@/services/OperatorPrompt";
import type { OrganizeResult, Reorganizer } from "@/services/Reorganizer";
import type { NameCollisionUnresolvedError } from "@/types";
import { exists, isWritable } from "@/utils/helper";

import type {
  ImportFailure,
  ImportWorkflowConfig,
  WorkflowReport,
  WorkflowState,
} from "./ImportWorkflow";

/**
 * validating-paths → queuing → copying → reorganizing → validating-checksums → done | failed
 *
 * 複製階段會嘗試所有目的地後再彙整錯誤；整理階段失敗則立即中止，
 * 因為暫存區的檔案位置可能已與佇列不一致。
 */
export class ImportWorkflowDefault {
  private readonly logger: Logger;
  private readonly queueBuilder: CopyQueueBuilder;
  private readonly executor: CopyExecutor;
  private readonly validator: ChecksumValidator;
  private readonly reorganizer: Reorganizer;
  private readonly prompt: OperatorPrompt;
  private readonly reporter?: DumpWriter;
  private readonly config: ImportWorkflowConfig;

  private readonly transitions: WorkflowState[] = [];
  private readonly errors: ImportFailure[] = [];
  private aborted = false;

  constructor(deps: {
    logger: Logger;
    queueBuilder: CopyQueueBuilder;
    executor: CopyExecutor;
    validator: ChecksumValidator;
    reorganizer: Reorganizer;
    prompt: OperatorPrompt;
    reporter?: DumpWriter;
    config: ImportWorkflowConfig;
  }) {
    this.logger = deps.logger.extend("ImportWorkflow", { emoji: "📥" });
    this.queueBuilder = deps.queueBuilder;
    this.executor = deps.executor;
    this.validator = deps.validator;
    this.reorganizer = deps.reorganizer;
    this.prompt = deps.prompt;
    this.reporter = deps.reporter;
    this.config = deps.config;
  }

  get bucket() {
    return path.join(this.config.rawRoot, bucketDirName);
  }

  async run(): Promise<WorkflowReport> {
    if (this.transitions.length > 0) {
      throw new Error("ImportWorkflow 只能執行一次");
    }

    this.enter("validating-paths");
    if (!(await this.validatePaths())) return this.finish("failed");

    this.enter("queuing");
    const queue = await this.buildQueue();
    if (!queue) return this.finish("failed");
    const summary = queue.summary();
    if (this.reporter) await this.reporter.dump("import-plan", summary);

    this.enter("copying");
    if (!(await this.copyAll(queue))) {
      return this.finish("failed", { queue: summary });
    }

    this.enter("reorganizing");
    const organized = await this.reorganize();
    if (!organized) return this.finish("failed", { queue: summary });

    this.enter("validating-checksums");
    await this.validateOrganized(queue, organized);

    return this.finish(this.errors.length === 0 ? "done" : "failed", {
      queue: summary,
      organized,
    });
  }

  private async validatePaths() {
    const { sourceRoot, rawRoot, jpgRoot, backupRoot } = this.config;
    if (!(await exists(sourceRoot))) {
      this.record({
        type: "PATH_NOT_FOUND",
        message: `來源不存在: ${sourceRoot}`,
        path: sourceRoot,
      });
    }
    for (const root of [rawRoot, jpgRoot, backupRoot]) {
      if (!(await exists(root))) {
        this.record({
          type: "PATH_NOT_FOUND",
          message: `目的地不存在: ${root}`,
          path: root,
        });
      } else if (!(await isWritable(root))) {
        this.record({
          type: "NOT_WRITABLE",
          message: `目的地無法寫入: ${root}`,
          path: root,
        });
      }
    }
    return this.errors.length === 0;
  }

  private async buildQueue(): Promise<CopyQueue | undefined> {
    const bucket = this.bucket;
    if (!this.config.dryRun) {
      try {
        await mkdir(bucket, { recursive: true });
      } catch (e) {
        this.logger.error({ error: e })`無法建立暫存區 ${bucket}`;
      }
      if (!(await isWritable(bucket))) {
        this.record({
          type: "NOT_WRITABLE",
          message: `暫存區無法寫入: ${bucket}`,
          path: bucket,
        });
        return undefined;
      }
    }

    const built = await this.queueBuilder.build(this.config.sourceRoot);
    if (!built.ok) {
      this.record(built.error);
      return undefined;
    }
    return built.value;
  }

  /** 回傳 false 表示必須立即中止 */
  private async copyAll(queue: CopyQueue): Promise<boolean> {
    if (this.config.listDir !== undefined) {
      return this.copyWithLists(queue, this.config.listDir);
    }
    const listDir = await mkdtemp(path.join(os.tmpdir(), "card-import-"));
    try {
      return await this.copyWithLists(queue, listDir);
    } finally {
      await rm(listDir, { recursive: true, force: true });
    }
  }

  private async copyWithLists(
    queue: CopyQueue,
    listDir: string
  ): Promise<boolean> {
    for (const root of queue.destinations()) {
      for (const targetDir of queue.targets(root).keys()) {
        if (!this.config.dryRun) {
          try {
            await mkdir(targetDir, { recursive: true });
          } catch (e) {
            this.logger.error({ error: e })`無法建立資料夾 ${targetDir}`;
            this.record({
              type: "NOT_WRITABLE",
              message: `無法建立資料夾: ${targetDir}`,
              path: targetDir,
            });
            const proceed = await this.askToContinue(`無法建立 ${targetDir}。`);
            if (!proceed) return false;
            continue;
          }
        }

        const listPath = await queue.write(root, targetDir, listDir);
        const copied = await this.executor.copyFromList(listPath, targetDir);
        if (copied.ok) continue;
        this.record(copied.error);
        // 模式不支援時重試或詢問都沒有意義
        if (copied.error.type === "UNSUPPORTED_OPERATION") return false;
        const proceed = await this.askToContinue(`複製到 ${targetDir} 失敗。`);
        if (!proceed) return false;
      }

      const validated = await this.validator.validateChecksums(
        queue.checksumsFor(root),
        queue.sourceRoot,
        root
      );
      if (!validated.ok) {
        this.record(validated.error);
        const details = validated.error.failures.map(
          (f) => `${f.reason}: ${f.source} → ${f.destination}`
        );
        if (!(await this.askToContinue(`${root} 校驗失敗。`, details)))
          return false;
      }
    }
    return true;
  }

  private async reorganize(): Promise<OrganizeResult | undefined> {
    const organized = await this.reorganizer.organize(
      this.bucket,
      this.config.rawRoot
    );
    if (!organized.ok) {
      this.record(organized.error);
      return undefined;
    }

    for (const issue of organized.value.issues) this.record(issue);
    const unresolved = organized.value.issues.filter(
      (i): i is NameCollisionUnresolvedError =>
        i.type === "NAME_COLLISION_UNRESOLVED"
    );
    if (unresolved.length > 0) {
      const details = unresolved.map(
        (i) => `${i.sourcePath} → ${i.targetPath}`
      );
      const proceed = await this.askToContinue(
        `${unresolved.length} 個檔案無法決定檔名。`,
        details
      );
      if (!proceed) return undefined;
    }
    return organized.value;
  }

  /** 暫存檔對回原始來源，再以複製前的雜湊驗證最終位置 */
  private async validateOrganized(queue: CopyQueue, organized: OrganizeResult) {
    const before = new Map<string, string>();
    const mapping = new Map<string, string>();
    for (const [staged, finalPath] of organized.mapping) {
      if (finalPath === null) continue;
      const source = path.join(
        queue.sourceRoot,
        path.relative(this.bucket, staged)
      );
      const expected = queue.checksums.get(source);
      if (expected === undefined) {
        this.logger.warn({
          event: "untracked",
        })`暫存區有不在本次佇列中的檔案 ${staged}`;
        continue;
      }
      before.set(source, expected);
      // dry-run 時檔案還在暫存區
      mapping.set(source, this.config.dryRun ? staged : finalPath);
    }

    const validated = await this.validator.validateChecksumList(before, mapping);
    if (!validated.ok) this.record(validated.error);
  }

  private async askToContinue(message: string, details?: readonly string[]) {
    const answer = await this.prompt.askToContinue(message, details);
    if (!answer) {
      this.aborted = true;
      this.logger.warn({ event: "aborted" })`操作者選擇中止`;
    }
    return answer;
  }

  private enter(state: WorkflowState) {
    this.transitions.push(state);
    this.logger.info({ event: "state" })`→ ${state}`;
  }

  private record(error: ImportFailure) {
    this.errors.push(error);
    this.logger.error({ event: error.type, detail: error })`${error.message}`;
  }

  private async finish(
    state: "done" | "failed",
    extra?: Pick<WorkflowReport, "queue" | "organized">
  ): Promise<WorkflowReport> {
    this.enter(state);
    const report: WorkflowReport = {
      state,
      transitions: [...this.transitions],
      errors: [...this.errors],
      aborted: this.aborted,
      ...extra,
    };
    if (this.reporter) await this.reporter.dump("import-result", report);
    if (state === "done") {
      this.logger.info({ emoji: "🎉", event: "done" })`匯入完成`;
    } else {
      this.logger.error({
        event: "failed",
      })`匯入失敗，共 ${this.errors.length} 個錯誤，請依報告手動處理`;
    }
    return report;
  }
}
