import { spawn } from "node:child_process";

import type { CommandResult, CommandRunner } from "./CommandRunner";

export class CommandRunnerSpawn implements CommandRunner {
  run(argv: readonly string[]): Promise<CommandResult> {
    const [cmd, ...args] = argv;
    return new Promise<CommandResult>((resolve) => {
      const child = spawn(cmd, args, { stdio: ["ignore", "pipe", "pipe"] });

      const outChunks: Buffer[] = [];
      const errChunks: Buffer[] = [];

      child.stdout.on("data", (b: Buffer) => outChunks.push(b));
      child.stderr.on("data", (b: Buffer) => errChunks.push(b));

      // 找不到執行檔等啟動失敗也視為一次失敗的執行
      child.on("error", (e) => {
        resolve({ code: -1, stdout: "", stderr: e.message });
      });
      child.on("close", (code) => {
        resolve({
          code: typeof code === "number" ? code : 1,
          stdout: Buffer.concat(outChunks).toString("utf8"),
          stderr: Buffer.concat(errChunks).toString("utf8"),
        });
      });
    });
  }
}
