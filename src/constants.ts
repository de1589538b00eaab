export const jpgExtensions = ["jpg", "jpeg"] as const;

/** 預設 RAW 副檔名（Sony） */
export const defaultRawExtension = "arw";

/** 暫存區資料夾名稱，位於 RAW 根目錄下 */
export const bucketDirName = "Import Bucket";

/** 檔案系統路徑長度上限（bytes） */
export const defaultPathLimit = 254;

/** 「/YYYY/YYYY-MM-DD/」 */
export const dateFolderOverhead = 17;

/** 截斷時加在副檔名前的記號 */
export const truncationMarker = "---";

export const defaultMaxRetries = 3;
export const defaultRetryDelayMs = 1000;

/** 同名不同內容時 ` (n)` 的嘗試上限 */
export const defaultMaxNameAttempts = 1000;
