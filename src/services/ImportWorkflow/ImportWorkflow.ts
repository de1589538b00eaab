import type { CopyQueueSummary } from "@/services/CopyQueue";
import type { ScanError } from "@/services/FileSystemScanner";
import type { FileOperationError, OrganizeResult } from "@/services/Reorganizer";
import type { WorkflowError } from "@/types";

export const workflowStates = [
  "validating-paths",
  "queuing",
  "copying",
  "reorganizing",
  "validating-checksums",
  "done",
  "failed",
] as const;

export type WorkflowState = (typeof workflowStates)[number];

export type ImportFailure = WorkflowError | ScanError | FileOperationError;

export type ImportWorkflowConfig = {
  sourceRoot: string;
  rawRoot: string;
  jpgRoot: string;
  backupRoot: string;
  dryRun?: boolean;
  /** 清單檔存放處，預設為系統暫存資料夾下的新資料夾 */
  listDir?: string;
};

export type WorkflowReport = {
  state: "done" | "failed";
  /** 依序經過的狀態，最後一個即 state */
  transitions: WorkflowState[];
  errors: ImportFailure[];
  /** 操作者選擇中止 */
  aborted: boolean;
  queue?: CopyQueueSummary;
  organized?: OrganizeResult;
};
