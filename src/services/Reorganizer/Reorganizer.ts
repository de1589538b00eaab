import type { Result } from "~shared/utils/Result";

import type { ScanError } from "@/services/FileSystemScanner";
import type {
  NameCollisionUnresolvedError,
  PathNotFoundError,
  PathTooLongError,
} from "@/types";

export type FileOperationError = {
  type: "MKDIR_FAILED" | "MOVE_FAILED";
  message: string;
  sourcePath: string;
  targetPath: string;
};

/** 單一檔案的問題，不影響其他檔案 */
export type OrganizeIssue =
  | PathTooLongError
  | NameCollisionUnresolvedError
  | FileOperationError;

export type OrganizeResult = {
  /** 暫存檔 → 最終位置；無法歸檔時為 null */
  mapping: Map<string, string | null>;
  issues: OrganizeIssue[];
  moved: number;
  /** 最終位置已有相同內容 */
  alreadyOrganized: number;
};

export type OrganizeError = PathNotFoundError | ScanError;

export interface Reorganizer {
  organize(
    stagingRoot: string,
    archiveRoot?: string
  ): Promise<Result<OrganizeResult, OrganizeError>>;
}
