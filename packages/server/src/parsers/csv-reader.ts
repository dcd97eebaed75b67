import * as XLSX from 'xlsx';

/**
 * Reads CSV (or tab-separated) text into trimmed string cells.
 * Values are kept as text so statement dates and amounts are parsed by us.
 * Blank lines stay in place: `rows[i]` is line `i + 1` of the file.
 */
export function readCsvRows(text: string): string[][] {
  const workbook = XLSX.read(text, { type: 'string', raw: true });
  const sheetName = workbook.SheetNames[0];
  if (!sheetName) return [];
  const sheet = workbook.Sheets[sheetName];

  const rawData = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: '', raw: false, blankrows: true });

  return rawData.map((row) => row.map((cell) => (cell === null || cell === undefined ? '' : String(cell).trim())));
}

export function isBlankRow(row: string[]): boolean {
  return row.every((cell) => cell === '');
}

export interface HeaderMatch<K extends string> {
  index: number;
  column: (key: K) => number;
}

/**
 * Finds the header row among the first `maxScan` rows. `aliases` lists the
 * accepted header names per column, in order of preference; `column(key)`
 * is -1 for a column the header does not have.
 */
export function findHeaderRow<K extends string>(
  rows: string[][],
  aliases: Record<K, string[]>,
  required: K[],
  maxScan = 10
): HeaderMatch<K> | null {
  for (let i = 0; i < Math.min(rows.length, maxScan); i++) {
    const cells = rows[i].map((cell) => cell.toLowerCase().trim());

    const column = (key: K): number => {
      for (const alias of aliases[key]) {
        const idx = cells.indexOf(alias);
        if (idx !== -1) return idx;
      }
      return -1;
    };

    if (required.every((key) => column(key) !== -1)) {
      return { index: i, column };
    }
  }
  return null;
}

export function cellAt(row: string[], index: number): string {
  return index >= 0 && index < row.length ? row[index] : '';
}
