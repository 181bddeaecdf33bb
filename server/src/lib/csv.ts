import { parse } from 'csv-parse';

export type CsvRecord = Record<string, string>;

export interface CsvTable {
  header: string[];
  records: CsvRecord[];
}

export interface CsvReadOptions {
  /** Rewrites each header cell before it becomes a record key. */
  mapHeader?: (name: string) => string;
}

function isCsvRecord(value: unknown): value is CsvRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.values(value).every((cell) => typeof cell === 'string')
  );
}

/**
 * Parses delimited text with a header row. Blank lines are skipped and a
 * leading byte-order mark is dropped; cells are kept as strings.
 */
export function readCsv(text: string, options?: CsvReadOptions): Promise<CsvTable> {
  const clean = text.replace(/^\uFEFF/, '');
  const mapHeader = options?.mapHeader ?? ((name: string) => name.trim());
  let header: string[] = [];

  return new Promise((resolve, reject) =>
    parse(
      clean,
      {
        columns: (cells: string[]) => {
          header = cells.map(mapHeader);
          return header;
        },
        skip_empty_lines: true,
        trim: true
      },
      (err: Error | undefined, output: unknown) => {
        if (err) {
          reject(err);
          return;
        }
        const rows = Array.isArray(output) ? output : [];
        resolve({ header, records: rows.filter(isCsvRecord) });
      }
    )
  );
}
