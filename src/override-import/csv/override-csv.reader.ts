import { TextDecoder } from 'util';
import * as XLSX from 'xlsx';
import { CSV_DELIMITERS, CsvDelimiterName } from '../override-import.constants';
import { OverrideCsvCells } from '../override-import.types';

export class CsvLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CsvLoadError';
  }
}

/**
 * Forward-only reader over delimited text. The first non-blank line is the
 * header; blank lines are skipped. Cell values are kept as literal text.
 */
export class OverrideCsvReader {
  private cursor = 0;

  private constructor(
    private readonly header: string[],
    private readonly records: string[][],
  ) {}

  static decode(buffer: Buffer, encoding = 'utf-8'): string {
    let decoder: TextDecoder;
    try {
      decoder = new TextDecoder(encoding, { fatal: true });
    } catch {
      throw new CsvLoadError(`Unsupported encoding '${encoding}'`);
    }
    try {
      return decoder.decode(buffer);
    } catch {
      throw new CsvLoadError(`The file is not valid ${encoding} text`);
    }
  }

  static fromContent(content: string, delimiter: CsvDelimiterName = 'comma'): OverrideCsvReader {
    const text = content.replace(/^\uFEFF/, '');
    if (!text.trim()) {
      return new OverrideCsvReader([], []);
    }

    // FS is honoured by the DSV parser but missing from the published option types
    const options: XLSX.ParsingOptions & { FS: string } = {
      type: 'string',
      raw: true,
      cellFormula: false,
      FS: CSV_DELIMITERS[delimiter],
    };
    const workbook = XLSX.read(text, options);
    const sheetName = workbook.SheetNames[0];
    if (!sheetName) {
      return new OverrideCsvReader([], []);
    }

    const rows = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[sheetName], {
      header: 1,
      raw: true,
      defval: '',
      blankrows: false,
    });
    const [header = [], ...records] = rows.map((row) => row.map(cellText));
    return new OverrideCsvReader(header, records);
  }

  static fromBuffer(buffer: Buffer, delimiter: CsvDelimiterName = 'comma', encoding = 'utf-8'): OverrideCsvReader {
    return OverrideCsvReader.fromContent(OverrideCsvReader.decode(buffer, encoding), delimiter);
  }

  /** Rewinds to the first data row. */
  init(): void {
    this.cursor = 0;
  }

  columns(): string[] {
    return [...this.header];
  }

  next(): string[] | null {
    if (this.cursor >= this.records.length) return null;
    return [...this.records[this.cursor++]];
  }

  get rowCount(): number {
    return this.records.length;
  }
}

function cellText(value: unknown): string {
  return value === undefined || value === null ? '' : String(value);
}

export function toOverrideCells(record: readonly string[]): OverrideCsvCells {
  const cell = (index: number) => record[index] ?? '';
  return {
    subjectId: cell(0),
    subjectIdNumber: cell(1),
    subjectName: cell(2),
    timeOpen: cell(3),
    timeClose: cell(4),
    timeLimit: cell(5),
    attempts: cell(6),
    password: cell(7),
    generate: cell(8),
  };
}
