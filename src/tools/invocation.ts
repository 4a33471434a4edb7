/**
 * Helpers for declaring invocation outputs and rendering command lines
 */

import type { ArtifactRef, ToolInvocation } from "../types";

export const file = (path: string): ArtifactRef => ({ path, kind: "file" });
export const directory = (path: string): ArtifactRef => ({ path, kind: "directory" });

/**
 * Render an invocation for logs, quoting arguments that need it
 *
 * @example
 * ```typescript
 * formatCommandLine(bam2fq("a.bam", "a.fastq"));
 * // samtools bam2fq a.bam > a.fastq
 * ```
 */
export function formatCommandLine(invocation: ToolInvocation, executable?: string): string {
  const quote = (arg: string): string =>
    /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, "'\\''")}'`;
  const line = [executable ?? invocation.tool, ...invocation.args].map(quote).join(" ");
  return invocation.stdoutPath !== undefined ? `${line} > ${quote(invocation.stdoutPath)}` : line;
}

/**
 * Flags through which a tool receives its thread or job count
 */
export const THREAD_FLAGS = ["--p-n-threads", "--p-n-jobs", "--p-n-jobs-or-threads"] as const;

const THREAD_FLAG_SET: ReadonlySet<string> = new Set(THREAD_FLAGS);

/**
 * Value passed to the thread flag of an invocation, if it has one
 */
export function threadArgument(invocation: ToolInvocation): string | undefined {
  const index = invocation.args.findIndex((arg) => THREAD_FLAG_SET.has(arg));
  return index >= 0 ? invocation.args[index + 1] : undefined;
}
