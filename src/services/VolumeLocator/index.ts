export type * from "./VolumeLocator";
export * from "./VolumeLocatorDefault";
