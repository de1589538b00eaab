import crypto from "node:crypto";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import type { PathBuilder } from "@/services/PathBuilder";
import type { PhotoRecord } from "@/services/PhotoRecord";
import type { ReadFailedError } from "@/types";
import { exists } from "@/utils/helper";

export type ImportDestinations = {
  /** RAW 歸檔根目錄 */
  rawRoot: string;
  /** RAW 暫存區，複製後再由 Reorganizer 歸檔 */
  bucket: string;
  jpgRoot: string;
  backupRoot: string;
};

export type QueueEntry = {
  record: PhotoRecord;
  /** 來源檔所在資料夾相對於來源根目錄的路徑 */
  subpath: string;
};

export type CopyQueueSummary = {
  sourceRoot: string;
  destinations: Record<string, number>;
  skipped: string[];
  mismatched: Record<string, string>;
  unknown: string[];
};

/**
 * 複製計畫：目的根目錄 → 依序要複製過去的來源檔。
 * 建好後呼叫 seal()，之後只能讀。
 */
export class CopyQueue {
  private readonly logger: Logger;
  private readonly pathBuilder: PathBuilder;
  private readonly queue = new Map<string, QueueEntry[]>();
  private readonly enqueued = new Set<string>();
  private readonly unknown: string[] = [];
  private sealed = false;

  readonly sourceRoot: string;
  readonly dests: ImportDestinations;
  readonly rawExtension: string;

  private readonly skippedSources = new Set<string>();
  private readonly mismatchedPaths = new Map<string, string>();
  private readonly snapshot = new Map<string, string>();

  constructor(deps: {
    logger: Logger;
    pathBuilder: PathBuilder;
    sourceRoot: string;
    destinations: ImportDestinations;
    rawExtension: string;
  }) {
    this.logger = deps.logger.extend("CopyQueue");
    this.pathBuilder = deps.pathBuilder;
    this.sourceRoot = deps.sourceRoot;
    this.dests = deps.destinations;
    this.rawExtension = deps.rawExtension;
  }

  /** 最終位置已有相同內容，不需複製到暫存區的 RAW */
  get skipped(): ReadonlySet<string> {
    return this.skippedSources;
  }

  /** 最終位置 → 來源：同名但內容不同 */
  get mismatched(): ReadonlyMap<string, string> {
    return this.mismatchedPaths;
  }

  /** 來源 → 複製前的雜湊 */
  get checksums(): ReadonlyMap<string, string> {
    return this.snapshot;
  }

  /**
   * 分派一個來源檔。讀取失敗時不加入任何目的地，回傳 READ_FAILED。
   */
  async enqueue(record: PhotoRecord): Promise<Result<void, ReadFailedError>> {
    if (this.sealed) {
      throw new Error(`CopyQueue 已封存，不可再加入: ${record.sourcePath}`);
    }
    const source = record.sourcePath;
    if (this.enqueued.has(source)) {
      this.logger.warn({ event: "duplicate" })`重複加入，略過 ${source}`;
      return ok();
    }

    const isRaw = record.isRaw(this.rawExtension);
    if (!isRaw && !record.isJpg()) {
      this.logger.warn({ event: "unknown-type" })`未知檔案類型，不複製 ${source}`;
      this.unknown.push(source);
      return ok();
    }

    let hash: string;
    let archived = false;
    try {
      hash = await record.contentHash();
      if (isRaw) archived = await this.isArchived(record);
    } catch (e) {
      this.logger.error({ event: "read-failed", error: e })`無法讀取 ${source}`;
      return err({
        type: "READ_FAILED",
        message: `無法讀取來源檔: ${source}: ${e instanceof Error ? e.message : String(e)}`,
        path: source,
      });
    }

    this.enqueued.add(source);
    this.snapshot.set(source, hash);
    const subpath = path.relative(this.sourceRoot, path.dirname(source));

    if (isRaw) {
      if (archived) {
        this.skippedSources.add(source);
      } else {
        this.push(this.dests.bucket, { record, subpath });
      }
    } else {
      this.push(this.dests.jpgRoot, { record, subpath });
    }
    this.push(this.dests.backupRoot, { record, subpath });
    return ok();
  }

  /** 最終位置已有同內容檔案時回傳 true；內容不同則記為 mismatched */
  private async isArchived(record: PhotoRecord) {
    const finalPath = this.pathBuilder.generatePath(record, this.dests.rawRoot);
    if (!finalPath.ok) {
      // 暫存後由 Reorganizer 回報
      this.logger.warn({ event: "path-too-long" })`${finalPath.error.message}`;
      return false;
    }
    if (!(await exists(finalPath.value))) return false;
    if (await record.matches(finalPath.value)) {
      this.logger.debug({
        event: "skip",
      })`已歸檔且內容相同，略過 ${record.sourcePath}`;
      return true;
    }
    this.mismatchedPaths.set(finalPath.value, record.sourcePath);
    this.logger.warn({
      event: "mismatch",
      source: record.sourcePath,
    })`已歸檔的同名檔內容不同 ${finalPath.value}`;
    return false;
  }

  private push(root: string, entry: QueueEntry) {
    const list = this.queue.get(root);
    if (list) list.push(entry);
    else this.queue.set(root, [entry]);
  }

  seal() {
    this.sealed = true;
  }

  get isSealed() {
    return this.sealed;
  }

  destinations(): string[] {
    return [...this.queue.keys()];
  }

  entries(root: string): readonly QueueEntry[] {
    return this.queue.get(root) ?? [];
  }

  /** 依實際目的資料夾（root/subpath）分組 */
  targets(root: string): Map<string, QueueEntry[]> {
    const groups = new Map<string, QueueEntry[]>();
    for (const entry of this.entries(root)) {
      const dir = path.join(root, entry.subpath);
      const group = groups.get(dir);
      if (group) group.push(entry);
      else groups.set(dir, [entry]);
    }
    return groups;
  }

  /** 某個目的根目錄的 before-snapshot */
  checksumsFor(root: string): Map<string, string> {
    const map = new Map<string, string>();
    for (const { record } of this.entries(root)) {
      const hash = this.snapshot.get(record.sourcePath);
      if (hash !== undefined) map.set(record.sourcePath, hash);
    }
    return map;
  }

  count(root?: string) {
    if (root !== undefined) return this.entries(root).length;
    let total = 0;
    for (const list of this.queue.values()) total += list.length;
    return total;
  }

  /**
   * 將某個目的根目錄下、某個目的資料夾的來源清單寫成一行一個絕對路徑的檔案。
   * 同一組 root + 目的資料夾固定寫到同一個檔名，重寫會覆蓋。
   */
  async write(
    root: string,
    targetDir: string,
    listDir: string
  ): Promise<string> {
    const lines = this.entries(root)
      .filter((e) => path.join(root, e.subpath) === targetDir)
      .map((e) => e.record.sourcePath);
    // 根目錄可能互相巢狀，不同 root 可能有相同的目的資料夾
    const id = crypto
      .createHash("sha1")
      .update(`${root}\0${targetDir}`)
      .digest("hex")
      .slice(0, 16);
    await mkdir(listDir, { recursive: true });
    const listPath = path.join(listDir, `${id}.txt`);
    await writeFile(listPath, lines.map((l) => `${l}\n`).join(""), "utf8");
    this.logger.debug({
      event: "write-list",
      targetDir,
    })`寫入 ${lines.length} 筆清單 ${listPath}`;
    return listPath;
  }

  summary(): CopyQueueSummary {
    return {
      sourceRoot: this.sourceRoot,
      destinations: Object.fromEntries(
        [...this.queue].map(([root, list]) => [root, list.length])
      ),
      skipped: [...this.skippedSources],
      mismatched: Object.fromEntries(this.mismatchedPaths),
      unknown: [...this.unknown],
    };
  }
}
