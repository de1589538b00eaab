import type { Logger } from "~shared/Logger";

import type { Hasher } from "@/services/Checksum/ChecksumCache";
import type { ExifService } from "@/services/ExifService";

import { PhotoRecord, type PhotoMetadata } from "./PhotoRecord";

export class PhotoRecordFactory {
  private readonly logger: Logger;
  private readonly exifService: ExifService;
  private readonly hasher: Hasher;

  constructor(deps: {
    logger: Logger;
    exifService: ExifService;
    hasher: Hasher;
  }) {
    this.logger = deps.logger.extend("PhotoRecordFactory");
    this.exifService = deps.exifService;
    this.hasher = deps.hasher;
  }

  /**
   * 建立紀錄；withExif 時讀 EXIF，讀不到就當作沒有中繼資料。
   */
  async create(
    sourcePath: string,
    options?: { withExif?: boolean }
  ): Promise<PhotoRecord> {
    let metadata: PhotoMetadata | undefined;
    if (options?.withExif) {
      const result = await this.exifService.readExif(sourcePath);
      if (result.ok) {
        const { filePath: _filePath, ...fields } = result.value;
        metadata = fields;
      } else {
        this.logger.warn({
          event: "exif-missing",
          sourcePath,
          reason: result.error.type,
        })`讀不到 EXIF，使用預設值: ${result.error.message}`;
      }
    }
    return new PhotoRecord({
      sourcePath,
      hasher: this.hasher,
      metadata,
    });
  }
}
