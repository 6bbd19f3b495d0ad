import { createReadStream } from 'fs';
import { writeFile } from 'fs/promises';
import { pipeline } from 'stream/promises';
import { Writable } from 'stream';
import { CsvParser } from './CsvParser.js';

export interface CsvTable {
  /** Header names with any byte-order mark and surrounding whitespace removed. */
  headers: string[];
  /** Data rows keyed by header. Missing trailing cells read as `''`. */
  rows: Record<string, string>[];
}

const BOM = /\uFEFF/g;

/** Strips byte-order marks and surrounding whitespace from a header name. */
export function normalizeHeader(name: string): string {
  return name.replace(BOM, '').trim();
}

/**
 * Reads a UTF-8 CSV file whose first record is the header row.
 * Cells beyond the header width are ignored.
 */
export async function readTable(filePath: string): Promise<CsvTable> {
  const records: string[][] = [];

  await pipeline(
    createReadStream(filePath, { encoding: 'utf8' }),
    new CsvParser(),
    new Writable({
      objectMode: true,
      write(record: string[], encoding, callback) {
        records.push(record);
        callback();
      },
    })
  );

  const [headerRecord, ...dataRecords] = records;
  const headers = (headerRecord ?? []).map(normalizeHeader);

  const rows = dataRecords.map((record) => {
    const row: Record<string, string> = {};
    headers.forEach((header, index) => {
      row[header] = record[index] ?? '';
    });
    return row;
  });

  return { headers, rows };
}

/** Quotes a field, doubling its quotes, when it holds a quote, comma or line break. */
function escapeField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Serializes rows to CSV text with CRLF line endings, quoting only the
 * fields that need it.
 */
export function formatCsv(headers: readonly string[], rows: readonly string[][]): string {
  return [headers, ...rows]
    .map((record) => `${record.map(escapeField).join(',')}\r\n`)
    .join('');
}

/**
 * Writes a CSV file, replacing whatever was at `filePath`.
 */
export async function writeTable(
  filePath: string,
  headers: readonly string[],
  rows: readonly string[][]
): Promise<void> {
  await writeFile(filePath, formatCsv(headers, rows), 'utf8');
}
