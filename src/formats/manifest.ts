/**
 * @module formats/manifest
 * @description Single-end FASTQ manifest and sample metadata readers
 *
 * The manifest defines the sample universe of a run; the metadata table
 * annotates those samples for the visualization and statistics steps.
 * Both are checked before the first QIIME 2 invocation.
 */

import { type } from "arktype";
import { ManifestError } from "../errors";
import { type ManifestEntry, ReadDirectionSchema, type SampleMetadata } from "../types";
import { isIdHeader, parseTabular } from "./tabular";

const MANIFEST_COLUMNS = {
  filePath: "absolute-filepath",
  direction: "direction",
} as const;

function requireColumn(header: readonly string[], name: string, file: string, line: number): number {
  const index = header.findIndex((column) => column.toLowerCase() === name);
  if (index < 0) {
    throw new ManifestError(`Missing required column "${name}"`, file, line);
  }
  return index;
}

/**
 * Parse a single-end manifest (sample-id, absolute-filepath, direction)
 *
 * Columns are matched by name, in any order.
 *
 * @throws {ManifestError} on missing columns, empty or duplicate ids, bad directions, or no rows
 */
export function parseManifest(text: string, file: string = "manifest"): ManifestEntry[] {
  const table = parseTabular(text, file);

  const idIndex = table.header.findIndex(isIdHeader);
  if (idIndex < 0) {
    throw new ManifestError('Missing required column "sample-id"', file, table.headerLine);
  }
  const pathIndex = requireColumn(table.header, MANIFEST_COLUMNS.filePath, file, table.headerLine);
  const directionIndex = requireColumn(
    table.header,
    MANIFEST_COLUMNS.direction,
    file,
    table.headerLine
  );

  const seen = new Set<string>();
  const entries: ManifestEntry[] = [];

  for (const row of table.rows) {
    const sampleId = row.fields[idIndex] ?? "";
    const filePath = row.fields[pathIndex] ?? "";
    const rawDirection = row.fields[directionIndex] ?? "";

    if (sampleId === "") {
      throw new ManifestError("Empty sample id", file, row.lineNumber, "sample-id");
    }
    if (seen.has(sampleId)) {
      throw new ManifestError(`Duplicate sample id "${sampleId}"`, file, row.lineNumber, "sample-id");
    }
    if (filePath === "") {
      throw new ManifestError(
        `Empty file path for sample "${sampleId}"`,
        file,
        row.lineNumber,
        MANIFEST_COLUMNS.filePath
      );
    }

    const direction = ReadDirectionSchema(rawDirection.toLowerCase());
    if (direction instanceof type.errors) {
      throw new ManifestError(
        `Invalid direction "${rawDirection}" for sample "${sampleId}"; expected forward or reverse`,
        file,
        row.lineNumber,
        MANIFEST_COLUMNS.direction
      );
    }

    seen.add(sampleId);
    entries.push({ sampleId, filePath, direction, lineNumber: row.lineNumber });
  }

  if (entries.length === 0) {
    throw new ManifestError("Manifest lists no samples", file);
  }

  return entries;
}

/**
 * Parse a QIIME 2 sample metadata table
 *
 * The first column holds the sample id; "#q2:" directive rows are skipped
 * along with other comments.
 *
 * @throws {ManifestError} when the first column is not an id column, or ids are empty or repeated
 */
export function parseMetadata(text: string, file: string = "metadata"): SampleMetadata {
  const table = parseTabular(text, file);

  const idColumn = table.header[0] ?? "";
  if (!isIdHeader(idColumn)) {
    throw new ManifestError(
      `First column must be a sample id column, found "${idColumn}"`,
      file,
      table.headerLine,
      idColumn
    );
  }

  const columns = table.header.slice(1);
  const samples = new Map<string, Record<string, string>>();

  for (const row of table.rows) {
    const sampleId = row.fields[0] ?? "";
    if (sampleId === "") {
      throw new ManifestError("Empty sample id", file, row.lineNumber, idColumn);
    }
    if (samples.has(sampleId)) {
      throw new ManifestError(`Duplicate sample id "${sampleId}"`, file, row.lineNumber, idColumn);
    }

    const annotations: Record<string, string> = {};
    columns.forEach((column, offset) => {
      annotations[column] = row.fields[offset + 1] ?? "";
    });
    samples.set(sampleId, annotations);
  }

  return { idColumn, columns, samples };
}

/**
 * Every manifest sample must have a metadata row
 *
 * @throws {ManifestError} listing the samples without metadata
 */
export function checkSampleCoverage(
  manifest: readonly ManifestEntry[],
  metadata: SampleMetadata,
  file: string = "metadata"
): void {
  const missing = manifest
    .map((entry) => entry.sampleId)
    .filter((sampleId) => !metadata.samples.has(sampleId));

  if (missing.length > 0) {
    throw new ManifestError(
      `No metadata for ${missing.length} manifest sample(s): ${missing.join(", ")}`,
      file
    );
  }
}
