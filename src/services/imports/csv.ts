/**
 * Small RFC4180 reader/writer: quoted fields, commas, CRLF/LF, escaped quotes,
 * line breaks inside quotes. Each parsed row keeps the line it started on so
 * callers can point at the offending line.
 */
import { ValidationError } from '../../utils/errors';

export type CsvRow = { line: number; cells: string[] };
export type ParsedCsv = { headers: string[]; rows: CsvRow[] };

export function parseCsv(text: string, source = 'csv'): ParsedCsv {
  const out: CsvRow[] = [];
  const src = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  let cells: string[] = [];
  let cell = '';
  let inQ = false;
  let line = 1;
  let rowStart = 1;

  const endRow = () => {
    cells.push(cell);
    // blank lines are skipped, except a (blank) header
    const nonEmpty = cells.some((c) => c.trim().length > 0);
    if (out.length === 0 || nonEmpty) out.push({ line: rowStart, cells });
    cells = [];
    cell = '';
  };

  for (let i = 0; i < src.length; i++) {
    const ch = src[i];
    if (inQ) {
      if (ch === '"') {
        if (src[i + 1] === '"') { cell += '"'; i++; }
        else { inQ = false; }
      } else {
        if (ch === '\n') line++;
        cell += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQ = true;
    } else if (ch === ',') {
      cells.push(cell);
      cell = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && src[i + 1] === '\n') i++;
      endRow();
      line++;
      rowStart = line;
    } else {
      cell += ch;
    }
  }

  if (inQ) {
    throw new ValidationError(`${source} line ${rowStart}: unterminated quoted field`);
  }
  if (cell.length || cells.length) endRow();

  const header = out.shift();
  const headers = header ? header.cells.map((h) => h.trim()) : [];
  return { headers, rows: out };
}

/** Cell at `index`, or '' when the column is absent or the row is short. */
export function cellAt(row: CsvRow, index: number): string {
  return index >= 0 && index < row.cells.length ? row.cells[index] : '';
}

export function normHeader(s: string): string {
  return String(s || '').toLowerCase().replace(/\s+/g, '').replace(/[_-]/g, '');
}

/**
 * Index of the column called `wanted` (ignoring case, spaces, `_` and `-`),
 * falling back to the first alias present. -1 when nothing matches.
 */
export function findHeader(headers: string[], wanted: string, aliases: readonly string[] = []): number {
  const normed = headers.map(normHeader);
  const direct = normed.indexOf(normHeader(wanted));
  if (direct >= 0) return direct;
  for (const alias of aliases) {
    const hit = normed.indexOf(normHeader(alias));
    if (hit >= 0) return hit;
  }
  return -1;
}

export function escapeCell(cell: string | number | null | undefined): string {
  if (cell == null) return '';
  const s = String(cell);
  return /[",\r\n]/.test(s) ? '"' + s.replace(/"/g, '""') + '"' : s;
}

export function formatCsvRow(cells: Array<string | number | null | undefined>): string {
  return cells.map(escapeCell).join(',');
}

/** Header plus rows, newline-terminated. */
export function formatCsv(headers: string[], rows: Array<Array<string | number | null | undefined>>): string {
  return [formatCsvRow(headers), ...rows.map(formatCsvRow)].join('\n') + '\n';
}
