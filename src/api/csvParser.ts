import Encoding from 'encoding-japanese';
import type { ExpenseInput } from '../domain/types';
import { validateExpense, type RejectReason } from '../domain/validation';

export const CSV_COLUMNS = ['date', 'category', 'amount', 'note'] as const;

export const CSV_HEADER = CSV_COLUMNS.join(',');

export interface RejectedRow {
  line: number;        // 1-based, header is line 1
  reason: RejectReason;
}

export interface CsvParseResult {
  rows: ExpenseInput[];
  rejected: RejectedRow[];
  error?: string;
}

/**
 * Decode file bytes to string, trying UTF-8 first, then Shift_JIS/CP932
 */
export function decodeFileContent(bytes: Uint8Array): string {
  try {
    const decoder = new TextDecoder('utf-8', { fatal: true });
    const text = decoder.decode(bytes);
    if (!text.includes('\uFFFD')) {
      return text.replace(/^\uFEFF/, '');
    }
  } catch {
    // not UTF-8, fall through to Shift_JIS
  }

  const detected = Encoding.detect(bytes);
  const unicodeArray = Encoding.convert(bytes, {
    to: 'UNICODE',
    from: detected === 'UTF8' ? 'UTF8' : 'SJIS',
  });
  return Encoding.codeToString(unicodeArray);
}

/**
 * Parse CSV text into rows (handles quoted fields, including quoted newlines).
 * Blank lines are dropped; each row carries the line it started on.
 * Cells are kept untrimmed.
 */
export function parseCsvRows(text: string): { line: number; cells: string[] }[] {
  const rows: { line: number; cells: string[] }[] = [];
  let row: string[] = [];
  let current = '';
  let inQuotes = false;
  let line = 1;
  let rowStart = 1;

  const endRow = () => {
    row.push(current);
    if (row.length > 1 || row[0].trim() !== '') {
      rows.push({ line: rowStart, cells: row });
    }
    row = [];
    current = '';
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (char === '"') {
      if (inQuotes && text[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (char === ',' && !inQuotes) {
      row.push(current);
      current = '';
    } else if ((char === '\n' || char === '\r') && !inQuotes) {
      if (char === '\r' && text[i + 1] === '\n') i++;
      endRow();
      line++;
      rowStart = line;
    } else {
      if (char === '\n') line++;
      current += char;
    }
  }
  if (current !== '' || row.length > 0) endRow();

  return rows;
}

/**
 * Parse the date,category,amount,note layout. Columns are located by header
 * name; rows with a missing date or an unparseable amount are rejected and
 * the rest still come through.
 */
export function parseExpenseCsv(text: string): CsvParseResult {
  const rows = parseCsvRows(text);
  if (rows.length === 0) {
    return { rows: [], rejected: [], error: 'CSV is empty' };
  }

  const header = rows[0].cells.map((col) => col.trim().toLowerCase());
  const dateIdx = header.indexOf('date');
  const categoryIdx = header.indexOf('category');
  const amountIdx = header.indexOf('amount');
  const noteIdx = header.indexOf('note');

  if (dateIdx === -1 || amountIdx === -1) {
    return {
      rows: [],
      rejected: [],
      error: 'Unrecognized CSV header. Expected columns: date,category,amount,note',
    };
  }

  const cell = (cells: string[], idx: number): string | undefined =>
    idx === -1 ? undefined : cells[idx];

  const parsed: ExpenseInput[] = [];
  const rejected: RejectedRow[] = [];

  for (const { line, cells } of rows.slice(1)) {
    const result = validateExpense({
      date: cell(cells, dateIdx),
      category: cell(cells, categoryIdx),
      amount: cell(cells, amountIdx),
      note: cell(cells, noteIdx),
    });
    if (result.ok) {
      parsed.push(result.value);
    } else {
      rejected.push({ line, reason: result.reason });
    }
  }

  return { rows: parsed, rejected };
}

// 1e21 -> "1000000000000000000000", 1.5e-7 -> "0.00000015"
export function plainNumeral(value: number): string {
  const text = String(value);
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;

  const [, sign, lead, fraction = '', exponent] = match;
  const digits = lead + fraction;
  const point = lead.length + Number(exponent);
  if (point <= 0) return `${sign}0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) return sign + digits + '0'.repeat(point - digits.length);
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

function escapeCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Serialize records to the file layout, header first, one row per line */
export function serializeExpenseCsv(records: ExpenseInput[]): string {
  const lines = [CSV_HEADER];
  for (const r of records) {
    lines.push([r.date, r.category, plainNumeral(r.amount), r.note].map(escapeCell).join(','));
  }
  return lines.join('\n') + '\n';
}
