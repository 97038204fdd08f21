import Papa from 'papaparse';
import { sourceReadError } from '@rowbind/core';
import type { Row } from '@rowbind/core';

const DELIMITER = ',';
const NEWLINE = '\n';

/**
 * CSV framing adapter using PapaParse. Splits text into rows of cells and joins
 * rows back into text. Cells are never coerced; every value stays a string.
 */
export class CsvTokenizer {
  /**
   * Split CSV text into rows. Blank lines are skipped.
   *
   * @throws {RowbindError} `SOURCE_READ_ERROR` on malformed quoting.
   */
  parse(content: string): Row[] {
    const result = Papa.parse<string[]>(content, {
      delimiter: DELIMITER,
      header: false,
      skipEmptyLines: true,
      dynamicTyping: false,
    });

    const [first] = result.errors;
    if (first) {
      const line = first.row === undefined ? '' : ` in row ${String(first.row + 1)}`;
      throw sourceReadError(new Error(`${first.message}${line} (${first.code})`));
    }

    return result.data;
  }

  /** Join rows into CSV text with `\n` line endings and a trailing newline. */
  serialize(rows: readonly Row[]): string {
    if (rows.length === 0) return '';
    const text = Papa.unparse(
      rows.map((row) => [...row]),
      { delimiter: DELIMITER, newline: NEWLINE },
    );
    return text + NEWLINE;
  }
}
