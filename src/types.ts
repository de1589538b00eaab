export type PathNotFoundError = {
  type: "PATH_NOT_FOUND";
  message: string;
  path: string;
};

export type NotWritableError = {
  type: "NOT_WRITABLE";
  message: string;
  path: string;
};

export type PathTooLongError = {
  type: "PATH_TOO_LONG";
  message: string;
  sourcePath: string;
  archiveRoot: string;
};

export type CopyFailedError = {
  type: "COPY_FAILED";
  message: string;
  source: string;
  destinationRoot: string;
  attempts: number;
};

export type ChecksumMismatchError = {
  type: "CHECKSUM_MISMATCH";
  message: string;
  destinationRoot?: string;
  /** source → 找不到或內容不符的目的檔 */
  failures: ChecksumFailure[];
};

export type NameCollisionUnresolvedError = {
  type: "NAME_COLLISION_UNRESOLVED";
  message: string;
  sourcePath: string;
  targetPath: string;
};

/** 來源檔在建立佇列時無法讀取（掃描後被移除、權限不足等） */
export type ReadFailedError = {
  type: "READ_FAILED";
  message: string;
  path: string;
};

export type UnsupportedOperationError = {
  type: "UNSUPPORTED_OPERATION";
  message: string;
};

export type WorkflowError =
  | PathNotFoundError
  | NotWritableError
  | PathTooLongError
  | CopyFailedError
  | ChecksumMismatchError
  | NameCollisionUnresolvedError
  | ReadFailedError
  | UnsupportedOperationError;

export type ChecksumFailure = {
  source: string;
  destination: string;
  reason: "MISSING" | "MISMATCH";
  expected: string;
  actual?: string;
};
