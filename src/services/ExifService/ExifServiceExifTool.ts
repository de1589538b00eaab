import { ExifDateTime, ExifTool } from "exiftool-vendored";

import { type Result, err, ok } from "~shared/utils/Result";

import type { Exif, ReadError } from "./Exif";
import { getCaptureDate } from "./ExifDateTimeHelper";
import type { ExifService } from "./ExifService";

export class ExifServiceExifTool implements ExifService {
  private readonly exiftool: ExifTool;

  constructor(exiftool?: ExifTool) {
    this.exiftool = exiftool ?? new ExifTool({ taskTimeoutMillis: 120_000 });
  }

  async readExif(filePath: string): Promise<Result<Exif, ReadError>> {
    try {
      const tags = await this.exiftool.read(filePath);
      if (!tags) {
        return err({
          type: "NO_EXIF_DATA",
          message: `無 EXIF 資料: ${filePath}`,
        });
      }

      // 以一般物件讀取，部分欄位（LightValue、ShutterSpeed）是 composite tag
      const fields: Record<string, unknown> = { ...tags };
      const dateTime = fields.DateTimeOriginal ?? fields.CreateDate;
      const exif: Exif = {
        filePath,
        captureDate:
          dateTime instanceof ExifDateTime || typeof dateTime === "string"
            ? getCaptureDate(dateTime)
            : undefined,
        camera: text(fields.Model),
        lens: text(fields.LensModel) ?? text(fields.LensID),
        exposureBias: numberOrText(fields.ExposureCompensation),
        exposureValue: numberOrText(fields.LightValue),
        brightness: numberOrText(fields.BrightnessValue),
        iso: typeof fields.ISO === "number" ? fields.ISO : undefined,
        shutterSpeed:
          numberOrText(fields.ShutterSpeed) ??
          numberOrText(fields.ExposureTime),
      };

      return ok(exif);
    } catch (e) {
      return err({
        type: "READ_FAILED",
        message: `讀取 EXIF 失敗: ${filePath}: ${e instanceof Error ? e.message : String(e)}`,
      });
    }
  }

  async end() {
    await this.exiftool.end();
  }
}

function text(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function numberOrText(value: unknown): number | string | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  return text(value);
}
