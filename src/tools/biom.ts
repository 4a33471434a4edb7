import type { ToolInvocation } from "../types";
import { file } from "./invocation";

/**
 * `biom convert -i <table.biom> -o <table.tsv> --to-tsv`
 */
export function biomToTsv(biomPath: string, tsvPath: string): ToolInvocation {
  return {
    tool: "biom",
    args: ["convert", "-i", biomPath, "-o", tsvPath, "--to-tsv"],
    outputs: [file(tsvPath)],
  };
}
