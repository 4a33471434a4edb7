export type { Stage, StageContext, StageDefinition, StageRequirements } from "./context";
export { formatReport, runPipeline, type PipelineReport } from "./driver";
export { execute, executeAll, timed, verifyOutputs } from "./execute";
export { createLayout, OUTPUT_SUBDIRECTORIES, type OutputLayout } from "./layout";
export * from "./stages";
