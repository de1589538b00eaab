export type Exif = {
  /** 檔案完整路徑 */
  filePath: string;

  /** 拍攝時間（相機當地時間） */
  captureDate?: Date;

  /** 相機型號 */
  camera?: string;

  /** 鏡頭名稱 */
  lens?: string;

  /** 曝光補償，例如 -0.7 或 "-2/3" */
  exposureBias?: number | string;

  /** 曝光值 EV（LightValue） */
  exposureValue?: number | string;

  /** 亮度值 BV */
  brightness?: number | string;

  /** ISO */
  iso?: number;

  /** 快門速度，例如 "1/250" */
  shutterSpeed?: number | string;
};

export type ReadError =
  | { type: "FILE_NOT_FOUND"; message: string }
  | { type: "READ_FAILED"; message: string }
  | { type: "NO_EXIF_DATA"; message: string };
