/**
 * Minimal RFC 4180 reader that keeps physical line numbers so rejected rows
 * can be traced back to the uploaded file.
 */

export interface CsvRow {
  /** 1-based physical line on which the row starts. */
  line: number;
  fields: string[];
  raw: string;
  /** Set when the row is not well-formed CSV. */
  error?: string;
}

const BOM = 0xfeff;

export function readCsvRows(input: string): CsvRow[] {
  const text = input.charCodeAt(0) === BOM ? input.slice(1) : input;
  const rows: CsvRow[] = [];

  let fields: string[] = [];
  let field = "";
  let inQuotes = false;
  let closedQuote = false;
  let error: string | undefined;
  let line = 1;
  let rowLine = 1;
  let rowStart = 0;

  const endRow = (end: number) => {
    fields.push(field);
    const raw = text.slice(rowStart, end);
    if (raw.trim() !== "") {
      rows.push(
        error === undefined
          ? { line: rowLine, fields, raw }
          : { line: rowLine, fields, raw, error }
      );
    }
    fields = [];
    field = "";
    closedQuote = false;
    error = undefined;
  };

  let i = 0;
  while (i < text.length) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
        closedQuote = true;
        i += 1;
        continue;
      }
      if (ch === "\n") line += 1;
      field += ch;
      i += 1;
      continue;
    }

    if (ch === '"' && field.length === 0 && !closedQuote) {
      inQuotes = true;
      i += 1;
      continue;
    }

    if (ch === ",") {
      fields.push(field);
      field = "";
      closedQuote = false;
      i += 1;
      continue;
    }

    if (ch === "\n" || (ch === "\r" && text[i + 1] === "\n")) {
      endRow(i);
      i += ch === "\r" ? 2 : 1;
      line += 1;
      rowLine = line;
      rowStart = i;
      continue;
    }

    if (ch === '"') {
      error ??= `unexpected quote in column ${fields.length + 1}`;
    } else if (closedQuote) {
      error ??= `unexpected text after closing quote in column ${fields.length + 1}`;
    }
    field += ch;
    i += 1;
  }

  if (inQuotes) {
    error ??= "unterminated quoted field";
  }
  if (rowStart < text.length) {
    endRow(text.length);
  }
  return rows;
}
