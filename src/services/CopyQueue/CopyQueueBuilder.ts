import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { FileSystemScanner, ScanError } from "@/services/FileSystemScanner";
import type { PathBuilder } from "@/services/PathBuilder";
import {
  type PhotoRecordFactory,
  extensionOf,
  normalizeExtension,
} from "@/services/PhotoRecord";
import type { ReadFailedError } from "@/types";

import { CopyQueue, type ImportDestinations } from "./CopyQueue";

export class CopyQueueBuilder {
  private readonly logger: Logger;
  private readonly scanner: FileSystemScanner;
  private readonly recordFactory: PhotoRecordFactory;
  private readonly pathBuilder: PathBuilder;
  private readonly destinations: ImportDestinations;
  private readonly rawExtension: string;

  constructor(deps: {
    logger: Logger;
    scanner: FileSystemScanner;
    recordFactory: PhotoRecordFactory;
    pathBuilder: PathBuilder;
    destinations: ImportDestinations;
    rawExtension: string;
  }) {
    this.logger = deps.logger.extend("CopyQueueBuilder");
    this.scanner = deps.scanner;
    this.recordFactory = deps.recordFactory;
    this.pathBuilder = deps.pathBuilder;
    this.destinations = deps.destinations;
    this.rawExtension = normalizeExtension(deps.rawExtension);
  }

  /**
   * 掃描來源，逐一分派後封存。只讀取來源，不寫入任何目的地。
   * 任一來源檔無法讀取時停止並回傳 READ_FAILED。
   */
  async build(
    sourceRoot: string
  ): Promise<Result<CopyQueue, ScanError | ReadFailedError>> {
    const scanned = await this.scanner.scan(sourceRoot);
    if (isErr(scanned)) return err(scanned.error);

    const queue = new CopyQueue({
      logger: this.logger,
      pathBuilder: this.pathBuilder,
      sourceRoot,
      destinations: this.destinations,
      rawExtension: this.rawExtension,
    });

    this.logger.info({
      emoji: "🔎",
      event: "scan",
    })`來源共有 ${scanned.value.length} 個檔案`;

    for (const filePath of scanned.value) {
      // 只有 RAW 需要 EXIF 來算最終路徑
      const record = await this.recordFactory.create(filePath, {
        withExif: extensionOf(filePath) === this.rawExtension,
      });
      const queued = await queue.enqueue(record);
      if (isErr(queued)) return err(queued.error);
    }
    queue.seal();

    for (const root of queue.destinations()) {
      this.logger.info({
        emoji: "📋",
        event: "queued",
      })`${root}: ${queue.count(root)} 個檔案`;
    }
    if (queue.skipped.size > 0) {
      this.logger.info({
        event: "skipped",
      })`${queue.skipped.size} 個 RAW 已歸檔，略過`;
    }
    return ok(queue);
  }
}
