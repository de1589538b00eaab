import { type Options, type RotatingFileStream, createStream } from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./Logger";

/**
 * 以 JSON lines 寫入可輪替的日誌檔。
 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;

  constructor(options: { filename: string; rfs?: Options }) {
    this.stream = createStream(options.filename, {
      size: "10M",
      interval: "1d",
      ...options.rfs,
    });
  }

  write(record: LogRecord) {
    this.stream.write(JSON.stringify(record) + "\n");
  }

  close() {
    return new Promise<void>((resolve) => {
      this.stream.end(() => resolve());
    });
  }
}
