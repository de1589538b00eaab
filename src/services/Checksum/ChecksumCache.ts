import crypto from "node:crypto";
import { createReadStream } from "node:fs";
import { Writable } from "node:stream";
import { pipeline } from "node:stream/promises";

export interface Hasher {
  hash(filePath: string): Promise<string>;
}

/**
 * 以串流計算檔案雜湊（預設 sha256），回傳 hex。
 */
export async function hashFile(
  filePath: string,
  algo = "sha256"
): Promise<string> {
  const hash = crypto.createHash(algo);
  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      hash.update(chunk);
      callback();
    },
  });
  await pipeline(createReadStream(filePath), sink);
  return hash.digest("hex");
}

/**
 * 每個路徑只算一次雜湊；同時間的重複請求共用同一個 Promise。
 * 檔案被搬移或覆寫後須呼叫 invalidate。
 */
export class ChecksumCache implements Hasher {
  private readonly tasks = new Map<string, Promise<string>>();
  private computeCount = 0;

  constructor(
    private readonly compute: (filePath: string) => Promise<string> = hashFile
  ) {}

  hash(filePath: string): Promise<string> {
    const cached = this.tasks.get(filePath);
    if (cached) return cached;
    this.computeCount++;
    const task = this.compute(filePath);
    this.tasks.set(filePath, task);
    // 失敗的結果不快取，下次重算
    void task.catch(() => {
      if (this.tasks.get(filePath) === task) this.tasks.delete(filePath);
    });
    return task;
  }

  invalidate(filePath: string) {
    this.tasks.delete(filePath);
  }

  /** 實際計算次數（含失敗） */
  get computed() {
    return this.computeCount;
  }
}
