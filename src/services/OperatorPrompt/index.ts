export type * from "./OperatorPrompt";
export * from "./OperatorPromptReadline";
