import path from "node:path";

import { jpgExtensions } from "@/constants";
import type { Hasher } from "@/services/Checksum/ChecksumCache";

export type PhotoMetadata = {
  captureDate?: Date;
  camera?: string;
  lens?: string;
  exposureBias?: number | string;
  exposureValue?: number | string;
  brightness?: number | string;
  iso?: number;
  shutterSpeed?: number | string;
};

export type PhotoRecordInit = {
  sourcePath: string;
  hasher: Hasher;
  metadata?: PhotoMetadata;
  /** 指定序號，例如舊命名遷移時已知的序號 */
  sequenceNumber?: string;
};

/**
 * 一個相片檔的唯讀描述。
 * 建立後不再改變；雜湊在第一次需要時才算，之後沿用同一個結果。
 */
export class PhotoRecord {
  readonly sourcePath: string;
  readonly extension: string;
  readonly sequenceNumber: string;
  readonly metadata: Readonly<PhotoMetadata>;

  private readonly hasher: Hasher;
  private hashTask?: Promise<string>;

  constructor(init: PhotoRecordInit) {
    this.sourcePath = init.sourcePath;
    this.extension = extensionOf(init.sourcePath);
    this.sequenceNumber =
      init.sequenceNumber ?? parseSequenceNumber(init.sourcePath);
    const captureDate = init.metadata?.captureDate;
    this.metadata = Object.freeze({
      ...init.metadata,
      // Date 本身可變，留一份自己的
      captureDate: captureDate ? new Date(captureDate.getTime()) : undefined,
    });
    this.hasher = init.hasher;
  }

  get captureDate() {
    const d = this.metadata.captureDate;
    return d ? new Date(d.getTime()) : undefined;
  }

  contentHash(): Promise<string> {
    if (!this.hashTask) {
      const task = this.hasher.hash(this.sourcePath);
      this.hashTask = task;
      // 讀取失敗時不留住錯誤，下次呼叫重試
      void task.catch(() => {
        if (this.hashTask === task) this.hashTask = undefined;
      });
    }
    return this.hashTask;
  }

  /** 與另一個檔案內容是否相同 */
  async matches(otherPath: string): Promise<boolean> {
    const [mine, other] = await Promise.all([
      this.contentHash(),
      this.hasher.hash(otherPath),
    ]);
    return mine === other;
  }

  isRaw(rawExtension: string) {
    return this.extension === normalizeExtension(rawExtension);
  }

  isJpg() {
    return jpgExtensions.some((e) => e === this.extension);
  }
}

export function normalizeExtension(ext: string) {
  return ext.replace(/^\./, "").toLowerCase();
}

export function extensionOf(filePath: string) {
  return normalizeExtension(path.extname(filePath));
}

/**
 * 取檔名（不含副檔名）最後一段數字的末四碼：
 *   DSC01234.ARW → "1234"
 *   _DSC0007.ARW → "0007"
 * 沒有數字時為 "unknown"。
 */
export function parseSequenceNumber(filePath: string) {
  const stem = path.basename(filePath, path.extname(filePath));
  const runs = stem.match(/\d+/g);
  if (!runs) return "unknown";
  return runs[runs.length - 1].slice(-4);
}
