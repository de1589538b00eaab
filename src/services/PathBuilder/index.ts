export type * from "./PathBuilder";
export * from "./PathBuilderDefault";
