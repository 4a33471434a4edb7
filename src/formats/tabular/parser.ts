/**
 * @module formats/tabular/parser
 * @description Tab-separated table reader shared by manifest and metadata
 *
 * Blank lines and "#" comment lines (including QIIME 2 "#q2:" directives)
 * are skipped. The header may itself start with "#", as in "#SampleID".
 */

import { ManifestError } from "../../errors";
import { hasBalancedQuotes, parseRow } from "./state-machine";
import { isCommentLine, normalizeLineEndings, padRow, removeBOM } from "./utils";

export interface TabularRow {
  readonly fields: readonly string[];
  /** 1-based line where the row starts */
  readonly lineNumber: number;
}

export interface TabularTable {
  readonly header: readonly string[];
  readonly headerLine: number;
  readonly rows: readonly TabularRow[];
}

/**
 * Maximum physical lines one quoted field may span before we give up
 */
const MAX_FIELD_LINES = 100;

/**
 * Parse a tab-separated table
 *
 * Fields are trimmed. Rows shorter than the header are padded with empty
 * fields; longer rows are rejected.
 *
 * @param text - Whole file contents
 * @param file - Label used in error messages
 * @throws {ManifestError} when there is no header, a quote is unclosed, or a row is too wide
 */
export function parseTabular(text: string, file: string): TabularTable {
  const lines = normalizeLineEndings(removeBOM(text)).split("\n");

  let header: string[] | null = null;
  let headerLine = 0;
  const rows: TabularRow[] = [];

  let index = 0;
  while (index < lines.length) {
    const lineNumber = index + 1;
    let logical = lines[index] ?? "";
    index++;

    if (logical.trim() === "" || isCommentLine(logical)) {
      continue;
    }

    let spanned = 1;
    while (!hasBalancedQuotes(logical) && index < lines.length) {
      if (spanned >= MAX_FIELD_LINES) {
        throw new ManifestError(
          `Quoted field spans more than ${MAX_FIELD_LINES} lines`,
          file,
          lineNumber
        );
      }
      logical += `\n${lines[index] ?? ""}`;
      index++;
      spanned++;
    }

    const fields = parseRow(logical, file, lineNumber).map((field) => field.trim());

    if (header === null) {
      header = fields;
      headerLine = lineNumber;
      continue;
    }

    if (fields.length > header.length) {
      throw new ManifestError(
        `Row has ${fields.length} columns, header has ${header.length}`,
        file,
        lineNumber
      );
    }

    rows.push({ fields: padRow(fields, header.length), lineNumber });
  }

  if (header === null) {
    throw new ManifestError("No header row found", file);
  }

  return { header, headerLine, rows };
}
