/**
 * CSV conversion between datasets and the text bodies exchanged with the Bulk API.
 */

/**
 * One row of a dataset, keyed by column name.
 */
export type DataRow = Record<string, unknown>;

/**
 * An ordered sequence of rows.
 */
export type Dataset = DataRow[];

/**
 * Converts an array of records to CSV format.
 *
 * Columns appear in the order they are first seen across all rows.
 *
 * @returns CSV string with header row and data rows, or "" for no rows
 */
export function recordsToCSV(records: readonly DataRow[]): string {
  if (records.length === 0) {
    return '';
  }

  const fieldSet = new Set<string>();
  for (const record of records) {
    for (const field of Object.keys(record)) {
      fieldSet.add(field);
    }
  }
  const fields = Array.from(fieldSet);

  const header = fields.map(escapeCSVField).join(',');
  const rows = records.map((record) => fields.map((field) => escapeCSVField(record[field])).join(','));

  return [header, ...rows].join('\n') + '\n';
}

/**
 * Parses CSV results into an array of records.
 *
 * Handles quoted delimiters, doubled quotes, quoted line breaks and CRLF.
 * Empty cells become null; booleans and numeric literals are converted.
 */
export function parseCSVResults(csv: string): Dataset {
  if (!csv || csv.trim().length === 0) {
    return [];
  }

  const lines = splitCSV(csv);
  if (lines.length === 0) {
    return [];
  }

  const headers = lines[0];
  const records: Dataset = [];
  for (let i = 1; i < lines.length; i++) {
    const values = lines[i];
    // Skip blank lines
    if (values.length === 1 && values[0] === '') {
      continue;
    }

    const record: DataRow = {};
    for (let j = 0; j < headers.length; j++) {
      const value = j < values.length ? values[j] : '';
      record[headers[j]] = value === '' ? null : parseValue(value);
    }
    records.push(record);
  }

  return records;
}

/**
 * Escapes a field value for CSV format.
 */
function escapeCSVField(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }

  const str = value instanceof Date ? value.toISOString() : String(value);

  if (str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`;
  }

  return str;
}

/**
 * Splits CSV text into rows of raw cell values.
 */
function splitCSV(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      row.push(current);
      current = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') {
        i++;
      }
      row.push(current);
      rows.push(row);
      row = [];
      current = '';
    } else {
      current += char;
    }
  }

  // Last row without trailing newline
  if (current.length > 0 || row.length > 0) {
    row.push(current);
    rows.push(row);
  }

  return rows;
}

/**
 * Parses a string value to its appropriate type.
 */
function parseValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;

  if (/^-?\d+$/.test(value) && Number.isSafeInteger(Number(value))) {
    return parseInt(value, 10);
  }
  if (/^-?\d+\.\d+$/.test(value)) {
    return parseFloat(value);
  }

  return value;
}
