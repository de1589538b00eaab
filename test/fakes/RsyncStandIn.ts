import { copyFile, mkdir, readFile, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";

import type { CommandResult } from "@/services/CopyExecutor";
import { exists } from "@/utils/helper";

/**
 * 在行程內模擬 `rsync --files-from=<list> / <dst>/`：把清單中的檔案攤平複製到 dst。
 * 帶 --ignore-existing 時略過 dst 已有的檔案。
 * corrupt 回傳 true 的目的檔會寫入錯誤內容。
 */
export function rsyncStandIn(options?: {
  fail?: (destination: string) => boolean;
  corrupt?: (destinationFile: string) => boolean;
}) {
  return async (argv: readonly string[]): Promise<CommandResult> => {
    const listArg = argv.find((a) => a.startsWith("--files-from="));
    const destination = argv[argv.length - 1];
    if (!listArg) return { code: 1, stdout: "", stderr: "no list" };
    if (options?.fail?.(destination)) {
      return { code: 23, stdout: "", stderr: "partial transfer" };
    }

    const ignoreExisting = argv.includes("--ignore-existing");
    const listPath = listArg.slice("--files-from=".length);
    const sources = (await readFile(listPath, "utf8"))
      .split("\n")
      .filter((l) => l !== "");
    await mkdir(destination, { recursive: true });
    for (const source of sources) {
      const target = join(destination, basename(source));
      if (ignoreExisting && (await exists(target))) continue;
      if (options?.corrupt?.(target)) await writeFile(target, "corrupted");
      else await copyFile(source, target);
    }
    return { code: 0, stdout: `${sources.length} files`, stderr: "" };
  };
}
