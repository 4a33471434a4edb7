export { checkSampleCoverage, parseManifest, parseMetadata } from "./manifest";
export {
  CASE_INSENSITIVE_ID_HEADERS,
  CASE_SENSITIVE_ID_HEADERS,
  isIdHeader,
  parseTabular,
  type TabularRow,
  type TabularTable,
} from "./tabular";
