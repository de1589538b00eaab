export type CommandResult = Readonly<{
  code: number;
  stdout: string;
  stderr: string;
}>;

export interface CommandRunner {
  /** 執行外部命令；結束碼非 0 不會拋出，由呼叫端判斷 */
  run(argv: readonly string[]): Promise<CommandResult>;
}
