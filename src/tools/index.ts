export { biomToTsv } from "./biom";
export { directory, file, formatCommandLine, THREAD_FLAGS, threadArgument } from "./invocation";
export * as qiime from "./qiime";
export { ToolRunner, type ToolRunnerOptions, type ToolRunnerShape } from "./runner";
export { bam2fq } from "./samtools";
