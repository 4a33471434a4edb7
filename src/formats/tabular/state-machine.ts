/**
 * Row tokenizer for tab-separated tables
 *
 * RFC 4180 quoting rules applied to a tab delimiter: a quoted field may
 * contain tabs, newlines and doubled quotes.
 */

import { ManifestError } from "../../errors";

enum FieldState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}

/**
 * Count unescaped quotes in a line (doubled quotes count as escaped)
 */
export function countUnescapedQuotes(line: string, quote: string = '"'): number {
  let count = 0;
  for (let i = 0; i < line.length; i++) {
    if (line[i] === quote) {
      if (line[i + 1] === quote) {
        i++;
      } else {
        count++;
      }
    }
  }
  return count;
}

/**
 * A row whose quotes are unbalanced continues on the next line
 */
export function hasBalancedQuotes(line: string, quote: string = '"'): boolean {
  return countUnescapedQuotes(line, quote) % 2 === 0;
}

/**
 * Split one logical row into fields
 *
 * @throws {ManifestError} on an unclosed quoted field
 */
export function parseRow(
  line: string,
  file: string,
  lineNumber: number,
  delimiter: string = "\t",
  quote: string = '"'
): string[] {
  const fields: string[] = [];
  let currentField = "";
  let state = FieldState.FIELD_START;

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);

    switch (state) {
      case FieldState.FIELD_START:
        if (char === quote) {
          state = FieldState.QUOTED_FIELD;
        } else if (char === delimiter) {
          fields.push("");
        } else {
          currentField = char;
          state = FieldState.UNQUOTED_FIELD;
        }
        break;

      case FieldState.UNQUOTED_FIELD:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = FieldState.FIELD_START;
        } else {
          currentField += char;
        }
        break;

      case FieldState.QUOTED_FIELD:
        if (char === quote) {
          if (line.charAt(i + 1) === quote) {
            currentField += quote;
            i++;
          } else {
            state = FieldState.QUOTE_IN_QUOTED;
          }
        } else {
          currentField += char;
        }
        break;

      case FieldState.QUOTE_IN_QUOTED:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = FieldState.FIELD_START;
        } else {
          // Text after a closing quote stays part of the field
          currentField += char;
          state = FieldState.UNQUOTED_FIELD;
        }
        break;
    }
  }

  if (state === FieldState.QUOTED_FIELD) {
    throw new ManifestError("Unclosed quote in field", file, lineNumber);
  }
  if (state === FieldState.UNQUOTED_FIELD || state === FieldState.QUOTE_IN_QUOTED) {
    fields.push(currentField);
  } else if (line.endsWith(delimiter)) {
    fields.push("");
  }

  return fields;
}
