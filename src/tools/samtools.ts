import type { ToolInvocation } from "../types";
import { file } from "./invocation";

/**
 * `samtools bam2fq <bam> > <fastq>`
 */
export function bam2fq(bamPath: string, fastqPath: string): ToolInvocation {
  return {
    tool: "samtools",
    args: ["bam2fq", bamPath],
    stdoutPath: fastqPath,
    outputs: [file(fastqPath)],
  };
}
