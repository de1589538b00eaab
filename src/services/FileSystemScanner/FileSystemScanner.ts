import type { Result } from "~shared/utils/Result";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

export type ScanOptions = {
  recursive?: boolean;
  allowExts?: readonly string[];
  /** 預設略過 . 開頭的檔案與資料夾（.Trashes、._DSC0001.ARW 等） */
  includeHidden?: boolean;
};

export interface FileSystemScanner {
  /** 回傳排序過的完整路徑 */
  scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>>;
}
