import { Transform } from 'stream';
import type { TransformCallback } from 'stream';

/**
 * A Transform stream that parses comma-separated text into records,
 * emitting each record as a `string[]`.
 *
 * Quoted fields may contain commas, line breaks and doubled quotes (`""`).
 * Lines may end in `\n` or `\r\n`. Blank lines are skipped. State is kept
 * across chunks, so a record may be split anywhere in the input.
 *
 * @example
 * // Input: 'URL,Note\r\nhttps://a.com/,"one, two"\r\n'
 * // Output (records): ['URL', 'Note'], ['https://a.com/', 'one, two']
 */
export class CsvParser extends Transform {
  private field = '';
  private record: string[] = [];
  private inQuotes = false;
  private afterClosingQuote = false;
  private recordHasQuotes = false;
  private line = 1;
  private atStart = true;

  constructor() {
    super({ readableObjectMode: true, writableObjectMode: false });
  }

  /**
   * Feeds one chunk through the parser, pushing every record it completes.
   * A byte-order mark at the very start of the stream is dropped.
   * @param chunk The chunk of text to parse.
   * @param encoding The encoding of the chunk.
   * @param callback A function to call when the chunk has been consumed.
   */
  _transform(
    chunk: Buffer | string,
    encoding: BufferEncoding,
    callback: TransformCallback
  ): void {
    let str = chunk.toString();
    if (this.atStart && str.length > 0) {
      this.atStart = false;
      if (str.startsWith('\uFEFF')) {
        str = str.slice(1);
      }
    }

    for (const char of str) {
      if (this.inQuotes) {
        if (char === '"') {
          // Either the end of the field or the first half of an escaped quote.
          this.inQuotes = false;
          this.afterClosingQuote = true;
        } else {
          if (char === '\n') this.line++;
          this.field += char;
        }
        continue;
      }

      if (this.afterClosingQuote) {
        this.afterClosingQuote = false;
        if (char === '"') {
          this.field += '"';
          this.inQuotes = true;
          continue;
        }
      }

      if (char === '"') {
        if (this.field === '') {
          this.inQuotes = true;
          this.recordHasQuotes = true;
        } else {
          // A stray quote in the middle of an unquoted field is kept as is.
          this.field += char;
        }
      } else if (char === ',') {
        this.endField();
      } else if (char === '\n') {
        this.endRecord();
        this.line++;
      } else if (char !== '\r') {
        this.field += char;
      }
    }

    callback();
  }

  /**
   * Called when the input ends. Emits the last record when the input did not
   * end with a line break, and fails on a quoted field left open.
   * @param callback A function to call when the flush is complete.
   */
  _flush(callback: TransformCallback): void {
    if (this.inQuotes) {
      callback(new Error(`Unterminated quoted field starting before line ${this.line}`));
      return;
    }
    if (this.field !== '' || this.record.length > 0 || this.recordHasQuotes) {
      this.endRecord();
    }
    callback();
  }

  /**
   * Closes the current field and appends it to the record.
   */
  private endField(): void {
    this.record.push(this.field);
    this.field = '';
  }

  /**
   * Closes the current record and pushes it, unless the line was blank.
   */
  private endRecord(): void {
    this.endField();

    const isBlankLine =
      this.record.length === 1 && this.record[0] === '' && !this.recordHasQuotes;
    if (!isBlankLine) {
      this.push(this.record);
    }

    this.record = [];
    this.recordHasQuotes = false;
  }
}
