export type * from "./Reorganizer";
export * from "./ReorganizerDefault";
