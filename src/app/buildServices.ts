import type { Logger } from "~shared/Logger";

import type { ImportConfig } from "@/config";
import { ChecksumCache } from "@/services/Checksum/ChecksumCache";
import { ChecksumValidatorDefault } from "@/services/ChecksumValidator";
import { type ExifService, ExifServiceExifTool } from "@/services/ExifService";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { PathBuilderDefault } from "@/services/PathBuilder";
import { PhotoRecordFactory } from "@/services/PhotoRecord";
import { ReorganizerDefault } from "@/services/Reorganizer";

/** 各命令共用的服務組合；用完必須呼叫 exifService.end() */
export function buildServices(
  logger: Logger,
  config: ImportConfig,
  rawRoot: string
) {
  const exifService: ExifService = new ExifServiceExifTool();
  const cache = new ChecksumCache();
  const scanner = new FileSystemScannerDefault();
  const recordFactory = new PhotoRecordFactory({
    logger,
    exifService,
    hasher: cache,
  });
  const pathBuilder = new PathBuilderDefault({
    archiveRoot: rawRoot,
    pathLimit: config.pathLimit,
  });
  const validator = new ChecksumValidatorDefault({ logger, cache });
  const reorganizer = new ReorganizerDefault({
    logger,
    scanner,
    recordFactory,
    pathBuilder,
    validator,
    cache,
    options: {
      maxNameAttempts: config.maxNameAttempts,
      dryRun: config.dryRun,
    },
  });
  return {
    exifService,
    cache,
    scanner,
    recordFactory,
    pathBuilder,
    validator,
    reorganizer,
  };
}
