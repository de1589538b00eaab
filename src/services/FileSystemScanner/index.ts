export type * from "./FileSystemScanner";
export * from "./FileSystemScannerDefault";
