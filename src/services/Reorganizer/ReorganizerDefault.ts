import { mkdir, rename } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { defaultMaxNameAttempts } from "@/constants";
import type { ChecksumCache } from "@/services/Checksum/ChecksumCache";
import type { ChecksumValidator } from "@/services/ChecksumValidator";
import type { FileSystemScanner } from "@/services/FileSystemScanner";
import type { PathBuilder } from "@/services/PathBuilder";
import type { PhotoRecordFactory } from "@/services/PhotoRecord";
import { exists } from "@/utils/helper";

import type {
  OrganizeError,
  OrganizeIssue,
  OrganizeResult,
  Reorganizer,
} from "./Reorganizer";

type Placement =
  | { kind: "free"; targetPath: string }
  | { kind: "identical"; targetPath: string }
  | { kind: "exhausted" };

export class ReorganizerDefault implements Reorganizer {
  private readonly logger: Logger;
  private readonly scanner: FileSystemScanner;
  private readonly recordFactory: PhotoRecordFactory;
  private readonly pathBuilder: PathBuilder;
  private readonly validator: ChecksumValidator;
  private readonly cache: ChecksumCache;
  private readonly maxNameAttempts: number;
  private readonly dryRun: boolean;

  constructor(deps: {
    logger: Logger;
    scanner: FileSystemScanner;
    recordFactory: PhotoRecordFactory;
    pathBuilder: PathBuilder;
    validator: ChecksumValidator;
    cache: ChecksumCache;
    options?: { maxNameAttempts?: number; dryRun?: boolean };
  }) {
    this.logger = deps.logger.extend("Reorganizer", { emoji: "🗂️" });
    this.scanner = deps.scanner;
    this.recordFactory = deps.recordFactory;
    this.pathBuilder = deps.pathBuilder;
    this.validator = deps.validator;
    this.cache = deps.cache;
    this.maxNameAttempts =
      deps.options?.maxNameAttempts ?? defaultMaxNameAttempts;
    this.dryRun = deps.options?.dryRun ?? false;
  }

  async organize(
    stagingRoot: string,
    archiveRoot?: string
  ): Promise<Result<OrganizeResult, OrganizeError>> {
    if (!(await exists(stagingRoot))) {
      return err({
        type: "PATH_NOT_FOUND",
        message: `暫存區不存在: ${stagingRoot}`,
        path: stagingRoot,
      });
    }
    const scanned = await this.scanner.scan(stagingRoot);
    if (isErr(scanned)) return err(scanned.error);

    const result: OrganizeResult = {
      mapping: new Map(),
      issues: [],
      moved: 0,
      alreadyOrganized: 0,
    };
    this.logger.info({
      event: "start",
    })`整理 ${scanned.value.length} 個檔案：${stagingRoot}`;

    for (const staged of scanned.value) {
      const issue = await this.organizeOne(staged, archiveRoot, result);
      if (issue) {
        result.mapping.set(staged, null);
        result.issues.push(issue);
        this.logger.error({ event: issue.type, sourcePath: staged })`${issue.message}`;
      }
    }

    this.logger.info({
      event: "done",
      issues: result.issues.length,
    })`搬移 ${result.moved}，已存在 ${result.alreadyOrganized}，問題 ${result.issues.length}`;
    return ok(result);
  }

  private async organizeOne(
    staged: string,
    archiveRoot: string | undefined,
    result: OrganizeResult
  ): Promise<OrganizeIssue | undefined> {
    const record = await this.recordFactory.create(staged, { withExif: true });
    const canonical = this.pathBuilder.generatePath(record, archiveRoot);
    if (isErr(canonical)) return canonical.error;

    const dir = path.dirname(canonical.value);
    if (!this.dryRun) {
      try {
        await mkdir(dir, { recursive: true });
      } catch (e) {
        return {
          type: "MKDIR_FAILED",
          message: `無法建立資料夾 ${dir}: ${errorMessage(e)}`,
          sourcePath: staged,
          targetPath: canonical.value,
        };
      }
    }

    let placement: Placement;
    try {
      placement = await this.place(staged, canonical.value);
    } catch (e) {
      return {
        type: "MOVE_FAILED",
        message: `比對既有檔案失敗 ${canonical.value}: ${errorMessage(e)}`,
        sourcePath: staged,
        targetPath: canonical.value,
      };
    }

    if (placement.kind === "exhausted") {
      return {
        type: "NAME_COLLISION_UNRESOLVED",
        message: `嘗試 ${this.maxNameAttempts} 個編號仍無可用檔名: ${canonical.value}`,
        sourcePath: staged,
        targetPath: canonical.value,
      };
    }

    if (placement.kind === "identical") {
      this.logger.debug({
        event: "identical",
      })`已有相同內容 ${placement.targetPath}`;
      result.mapping.set(staged, placement.targetPath);
      result.alreadyOrganized++;
      return undefined;
    }

    const target = placement.targetPath;
    if (this.dryRun) {
      this.logger.info({ event: "dry-run" })`將搬移 ${staged} → ${target}`;
    } else {
      try {
        await rename(staged, target);
      } catch (e) {
        return {
          type: "MOVE_FAILED",
          message: `搬移失敗 ${staged} → ${target}: ${errorMessage(e)}`,
          sourcePath: staged,
          targetPath: target,
        };
      }
      this.cache.invalidate(staged);
      this.cache.invalidate(target);
      this.logger.debug({ event: "move" })`${staged} → ${target}`;
    }
    result.mapping.set(staged, target);
    result.moved++;
    return undefined;
  }

  /**
   * 目標已存在時：內容相同即視為已整理；不同則依序試 ` (1)`、` (2)`…
   */
  private async place(staged: string, targetPath: string): Promise<Placement> {
    const ext = path.extname(targetPath);
    const base = targetPath.slice(0, targetPath.length - ext.length);
    for (let i = 0; i <= this.maxNameAttempts; i++) {
      const candidate = i === 0 ? targetPath : `${base} (${i})${ext}`;
      if (!(await exists(candidate))) return { kind: "free", targetPath: candidate };
      if (await this.validator.compareChecksums(staged, candidate)) {
        return { kind: "identical", targetPath: candidate };
      }
    }
    return { kind: "exhausted" };
  }
}

function errorMessage(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}
