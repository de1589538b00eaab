import type { Result } from "~shared/utils/Result";

import type { PhotoRecord } from "@/services/PhotoRecord";
import type { PathTooLongError } from "@/types";

/** 檔名各欄位，覆寫時可個別指定 */
export type NameFields = {
  date: string;
  camera: string;
  number: string;
  exposureBias: string;
  exposureValue: string;
  brightness: string;
  iso: string;
  shutterSpeed: string;
  lens: string;
  extension: string;
};

export type GenerateNameOptions = {
  /** 只留序號與曝光欄位，僅在路徑過長時使用 */
  short?: boolean;
  overrides?: Partial<NameFields>;
};

export interface PathBuilder {
  generateName(record: PhotoRecord, options?: GenerateNameOptions): string;

  /**
   * 產生 `{root}/{YYYY}/{YYYY-MM-DD}/{name}`，總長不超過路徑上限。
   */
  generatePath(
    record: PhotoRecord,
    archiveRoot?: string
  ): Result<string, PathTooLongError>;
}
