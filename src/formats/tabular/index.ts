export { parseTabular, type TabularRow, type TabularTable } from "./parser";
export { countUnescapedQuotes, hasBalancedQuotes, parseRow } from "./state-machine";
export {
  CASE_INSENSITIVE_ID_HEADERS,
  CASE_SENSITIVE_ID_HEADERS,
  isCommentLine,
  isIdHeader,
  normalizeLineEndings,
  padRow,
  removeBOM,
} from "./utils";
