export * from "./ImportWorkflow";
export * from "./ImportWorkflowDefault";
