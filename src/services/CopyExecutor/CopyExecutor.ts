import type { Result } from "~shared/utils/Result";

import type {
  CopyFailedError,
  PathNotFoundError,
  UnsupportedOperationError,
} from "@/types";

export type CopyError =
  | CopyFailedError
  | PathNotFoundError
  | UnsupportedOperationError;

export interface CopyExecutor {
  /** 複製整個資料夾內容 */
  copy(
    sourceRoot: string,
    destinationRoot: string
  ): Promise<Result<void, CopyError>>;

  /** 依清單檔複製到 destination */
  copyFromList(
    listPath: string,
    destination: string
  ): Promise<Result<void, CopyError>>;
}
