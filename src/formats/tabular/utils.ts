/**
 * Text normalisation helpers for tabular input
 */

/**
 * Remove a leading byte order mark
 */
export function removeBOM(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Normalize line endings to LF (handles CRLF and bare CR)
 */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}

/**
 * Id column headers QIIME 2 accepts in metadata, matched ignoring case
 */
export const CASE_INSENSITIVE_ID_HEADERS = [
  "id",
  "sampleid",
  "sample id",
  "sample-id",
  "featureid",
  "feature id",
  "feature-id",
] as const;

/**
 * Id column headers QIIME 2 accepts only with this exact spelling
 */
export const CASE_SENSITIVE_ID_HEADERS = [
  "#SampleID",
  "#Sample ID",
  "#OTUID",
  "#OTU ID",
  "sample_name",
] as const;

const INSENSITIVE_SET: ReadonlySet<string> = new Set(CASE_INSENSITIVE_ID_HEADERS);
const SENSITIVE_SET: ReadonlySet<string> = new Set(CASE_SENSITIVE_ID_HEADERS);

export function isIdHeader(name: string): boolean {
  return SENSITIVE_SET.has(name) || INSENSITIVE_SET.has(name.toLowerCase());
}

/**
 * "#" lines are comments unless their first cell is an id header such as "#SampleID"
 */
export function isCommentLine(line: string): boolean {
  if (!line.startsWith("#")) {
    return false;
  }
  return !isIdHeader(line.split("\t")[0]?.trim() ?? "");
}

/**
 * Pad a short row with empty fields; longer rows are left for the caller to reject
 */
export function padRow(fields: string[], expectedColumns: number): string[] {
  while (fields.length < expectedColumns) {
    fields.push("");
  }
  return fields;
}
