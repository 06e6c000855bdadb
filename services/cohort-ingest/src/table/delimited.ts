import type { CellValue } from '../types';

export type Delimiter = '\t' | ',';

export type DelimitedTable = {
  delimiter: Delimiter;
  header: string[];
  rows: string[][];
};

export class DelimitedParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DelimitedParseError';
  }
}

function isSkippableLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.length === 0 || trimmed.startsWith('#');
}

export function detectDelimiter(text: string): Delimiter {
  for (const line of text.split(/\r?\n/)) {
    if (isSkippableLine(line)) {
      continue;
    }
    if (line.includes('\t')) {
      return '\t';
    }
    if (line.includes(',')) {
      return ',';
    }
    throw new DelimitedParseError('Header has neither tab nor comma delimiters');
  }
  throw new DelimitedParseError('No header line found');
}

/**
 * Splits text into records. Quoted fields may contain delimiters, doubled
 * quotes and line breaks. Blank lines and lines starting with `#` are
 * skipped when they begin outside a quoted field.
 */
export function parseRecords(text: string, delimiter: Delimiter): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;
  let fieldQuoted = false;
  let atLineStart = true;
  let index = 0;

  const endField = () => {
    record.push(field);
    field = '';
    fieldQuoted = false;
  };
  const endRecord = () => {
    endField();
    const blank = record.length === 1 && record[0] === '';
    if (!blank) {
      records.push(record);
    }
    record = [];
    atLineStart = true;
  };

  while (index < text.length) {
    const char = text[index];

    if (atLineStart && !inQuotes) {
      const lineEnd = text.indexOf('\n', index);
      const line = text.slice(index, lineEnd === -1 ? text.length : lineEnd);
      if (isSkippableLine(line)) {
        index = lineEnd === -1 ? text.length : lineEnd + 1;
        continue;
      }
      atLineStart = false;
    }

    if (inQuotes) {
      if (char === '"') {
        if (text[index + 1] === '"') {
          field += '"';
          index += 2;
          continue;
        }
        inQuotes = false;
      } else {
        field += char;
      }
      index += 1;
      continue;
    }

    if (char === '"' && field.length === 0 && !fieldQuoted) {
      inQuotes = true;
      fieldQuoted = true;
    } else if (char === delimiter) {
      endField();
    } else if (char === '\n') {
      endRecord();
    } else if (char === '\r') {
      if (text[index + 1] !== '\n') {
        endRecord();
      }
    } else {
      field += char;
    }
    index += 1;
  }

  if (inQuotes) {
    throw new DelimitedParseError('Unterminated quoted field');
  }
  if (!atLineStart) {
    endRecord();
  }
  return records;
}

export function parseDelimited(text: string): DelimitedTable {
  if (text.includes('\u0000')) {
    throw new DelimitedParseError('Payload contains NUL bytes');
  }
  const delimiter = detectDelimiter(text);
  const [header, ...rows] = parseRecords(text, delimiter);
  if (!header || header.length < 2) {
    throw new DelimitedParseError('Header must have at least two columns');
  }
  rows.forEach((row, index) => {
    if (row.length !== header.length) {
      throw new DelimitedParseError(
        `Row ${index + 1} has ${row.length} fields, expected ${header.length}`
      );
    }
  });
  return { delimiter, header: header.map((name) => name.trim()), rows };
}

function formatCell(value: CellValue, delimiter: Delimiter): string {
  if (value === null) {
    return '';
  }
  const text = typeof value === 'number' ? (Number.isFinite(value) ? String(value) : '') : value;
  if (text.includes('"') || text.includes(delimiter) || text.includes('\n') || text.includes('\r')) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function formatDelimited(
  header: readonly string[],
  rows: readonly (readonly CellValue[])[],
  delimiter: Delimiter = ','
): string {
  const lines = [header.map((name) => formatCell(name, delimiter)).join(delimiter)];
  for (const row of rows) {
    lines.push(row.map((value) => formatCell(value, delimiter)).join(delimiter));
  }
  return `${lines.join('\n')}\n`;
}
