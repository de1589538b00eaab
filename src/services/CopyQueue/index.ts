export * from "./CopyQueue";
export * from "./CopyQueueBuilder";
