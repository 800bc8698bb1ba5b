// ─── CSV Document Parser ───────────────────────────────────────────────────
// Turns raw CSV into a header list and rows tagged with their physical line.
// RFC 4180 quoting, read leniently; blank lines are skipped but still counted.

import { CsvParseError } from '../reliability/ValidatorError';

const FIELD_SEPARATOR = ',';
const QUOTE = '"';

export type DocumentRow = {
  /** 1-based line in the raw file where this record starts. */
  rowNumber: number;
  /** Raw field values in file order. */
  fields: readonly string[];
  /** Header → raw value for the fields that are present (first occurrence wins). */
  values: Readonly<Record<string, string>>;
};

export type CsvDocument = {
  headers: readonly string[];
  /** 1-based line of the header row. */
  headerRow: number;
  rows: readonly DocumentRow[];
};

type RawRecord = {
  line: number;
  fields: string[];
  sawQuote: boolean;
};

const decodeInput = (raw: string | Uint8Array): string => {
  if (typeof raw === 'string') return raw;
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(raw);
  } catch (err) {
    throw new CsvParseError('File is not valid UTF-8 text.', undefined, err);
  }
};

const stripBom = (text: string) =>
  text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

const isBlankRecord = (record: RawRecord) =>
  !record.sawQuote && record.fields.length === 1 && record.fields[0].trim() === '';

type TokenizeOutcome =
  | { kind: 'records'; records: RawRecord[] }
  | { kind: 'unterminated'; quoteAt: number };

/**
 * Split the whole text into records, tracking where each one starts.
 *
 * A quote opens a quoted section only as the first character of a field;
 * anywhere else it is literal text. Quotes at offsets in `literalQuotes`
 * are literal even at the start of a field.
 */
function tokenize(text: string, literalQuotes: ReadonlySet<number>): TokenizeOutcome {
  const records: RawRecord[] = [];

  let fields: string[] = [];
  let field = '';
  let fieldStarted = false;
  let inQuotes = false;
  let sawQuote = false;
  let line = 1;
  let recordStartLine = 1;
  let quoteAt = 0;

  const endField = () => {
    fields.push(field);
    field = '';
    fieldStarted = false;
  };

  const endRecord = () => {
    endField();
    records.push({ line: recordStartLine, fields, sawQuote });
    fields = [];
    sawQuote = false;
  };

  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === QUOTE) {
        if (text[i + 1] === QUOTE) {
          field += QUOTE;
          i += 1;
        } else {
          inQuotes = false;
        }
        continue;
      }
      if (ch === '\r' || ch === '\n') {
        // Embedded line breaks are kept as "\n" and still advance the line count.
        if (ch === '\r' && text[i + 1] === '\n') i += 1;
        field += '\n';
        line += 1;
        continue;
      }
      field += ch;
      continue;
    }

    if (ch === QUOTE && !fieldStarted && !literalQuotes.has(i)) {
      inQuotes = true;
      fieldStarted = true;
      sawQuote = true;
      quoteAt = i;
      continue;
    }

    if (ch === FIELD_SEPARATOR) {
      endField();
      continue;
    }

    if (ch === '\r' || ch === '\n') {
      if (ch === '\r' && text[i + 1] === '\n') i += 1;
      endRecord();
      line += 1;
      recordStartLine = line;
      continue;
    }

    field += ch;
    fieldStarted = true;
  }

  if (inQuotes) return { kind: 'unterminated', quoteAt };

  // Text that ends with a line break leaves an empty final record; blank
  // filtering below drops it.
  endRecord();
  return { kind: 'records', records };
}

/**
 * An opening quote that is never closed is read as a literal character, so
 * it cannot swallow the rest of the file.
 */
function splitRecords(text: string): RawRecord[] {
  const literalQuotes = new Set<number>();
  for (;;) {
    const outcome = tokenize(text, literalQuotes);
    if (outcome.kind === 'records') return outcome.records;
    literalQuotes.add(outcome.quoteAt);
  }
}

const lineOfOffset = (text: string, offset: number) =>
  text.slice(0, offset).split('\n').length;

/**
 * Parse CSV text (or UTF-8 bytes) into a document.
 *
 * - Header row is the first non-blank line; header text is kept verbatim.
 * - Rows with the wrong number of fields are kept for the engine to report.
 * - Quotes inside an unquoted field, and a quote that is never closed, are
 *   kept as literal text.
 * - Fails only when the input is not text.
 */
export function parseCsv(raw: string | Uint8Array): CsvDocument {
  const text = stripBom(decodeInput(raw));

  const nul = text.indexOf('\u0000');
  if (nul !== -1) {
    throw new CsvParseError('File appears to be binary, not CSV text.', lineOfOffset(text, nul));
  }

  const records = splitRecords(text).filter((record) => !isBlankRecord(record));
  const header = records.shift();
  if (!header) {
    throw new CsvParseError('CSV content has no header row.');
  }

  const headers = header.fields;
  const rows: DocumentRow[] = records.map((record) => {
    const seen = new Set<string>();
    const entries: Array<[string, string]> = [];
    const present = Math.min(headers.length, record.fields.length);
    for (let j = 0; j < present; j += 1) {
      const key = headers[j];
      if (seen.has(key)) continue;
      seen.add(key);
      entries.push([key, record.fields[j]]);
    }
    return {
      rowNumber: record.line,
      fields: record.fields,
      values: Object.fromEntries(entries),
    };
  });

  return { headers, headerRow: header.line, rows };
}
