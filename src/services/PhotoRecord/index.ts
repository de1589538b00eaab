export * from "./PhotoRecord";
export * from "./PhotoRecordFactory";
