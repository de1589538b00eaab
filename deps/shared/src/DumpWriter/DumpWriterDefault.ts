import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "../Logger";
import type { DumpWriter } from "./DumpWriter";

export class DumpWriterDefault implements DumpWriter {
  private readonly logger: Logger;

  constructor(
    logger: Logger,
    private readonly outputDir = "reports"
  ) {
    this.logger = logger.extend("DumpWriter");
  }

  async dump(name: string, data: unknown): Promise<string> {
    await mkdir(this.outputDir, { recursive: true });
    const safeName = name.replace(/[\\/:*?"<>|\s]+/g, "_");
    const filePath = path.join(
      this.outputDir,
      `${format(new Date(), "yyyyMMdd-HHmmss-SSS")}-${safeName}.json`
    );
    await writeFile(filePath, JSON.stringify(data, jsonReplacer, 2), "utf8");
    this.logger.info({ emoji: "📝", filePath })`報告已輸出 ${filePath}`;
    return filePath;
  }
}

function jsonReplacer(_key: string, value: unknown) {
  if (value instanceof Map) return Object.fromEntries(value);
  if (value instanceof Set) return [...value];
  return value;
}
