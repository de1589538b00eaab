import type { Result } from "~shared/utils/Result";

import type { ChecksumMismatchError } from "@/types";

export interface ChecksumValidator {
  /**
   * 以 before-snapshot 比對目的地：目的檔 = destinationRoot/relative(sourceRoot, source)。
   */
  validateChecksums(
    before: ReadonlyMap<string, string>,
    sourceRoot: string,
    destinationRoot: string
  ): Promise<Result<void, ChecksumMismatchError>>;

  /** 以明確的 來源 → 目的檔 對應比對 */
  validateChecksumList(
    before: ReadonlyMap<string, string>,
    mapping: ReadonlyMap<string, string>
  ): Promise<Result<void, ChecksumMismatchError>>;

  compareChecksums(pathA: string, pathB: string): Promise<boolean>;
}
