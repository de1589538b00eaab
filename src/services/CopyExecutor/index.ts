export * from "./BulkCopy";
export type * from "./CommandRunner";
export * from "./CommandRunnerSpawn";
export type * from "./CopyExecutor";
export * from "./CopyExecutorDefault";
