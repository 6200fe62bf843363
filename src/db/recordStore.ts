/**
 * Record store: the ordered expense list, mirrored to a CSV file.
 *
 * Every mutation rewrites the whole file synchronously. The file is not
 * locked; a second writer is clobbered by the next save.
 */
import fs from 'fs';
import path from 'path';
import type { ExpenseInput, ExpenseRecord, MonthFilter } from '../domain/types';
import { forMonth } from '../domain/computations';
import { validateExpense, describeRejection, tidyExpense, type RejectReason } from '../domain/validation';
import {
  CSV_HEADER,
  decodeFileContent,
  parseExpenseCsv,
  serializeExpenseCsv,
  type CsvParseResult,
} from '../api/csvParser';

export class RecordNotFoundError extends Error {
  constructor(ref: string | number) {
    super(typeof ref === 'number' ? `No record at index ${ref}` : `No record with id ${ref}`);
    this.name = 'RecordNotFoundError';
  }
}

export class InvalidRecordError extends Error {
  readonly reason: RejectReason;

  constructor(reason: RejectReason) {
    super(describeRejection(reason));
    this.name = 'InvalidRecordError';
    this.reason = reason;
  }
}

export type LoadResult = { loaded: number; skipped: number };
export type ImportResult = { imported: number; skipped: number; error?: string };
export type StoreListener = () => void;

// --- ID generation ---

export function generateId(): string {
  const timestamp = Date.now().toString(36);
  const randomPart = Math.random().toString(36).substring(2, 9);
  return `c${timestamp}${randomPart}`;
}

export class RecordStore {
  readonly filePath: string;
  private rows: ExpenseRecord[] = [];
  private listeners = new Set<StoreListener>();

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  /** Read the backing file, creating it header-only when absent */
  load(): LoadResult {
    if (!fs.existsSync(this.filePath)) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, CSV_HEADER + '\n', 'utf8');
      console.log(`[store] Created ${this.filePath}`);
      this.rows = [];
      return { loaded: 0, skipped: 0 };
    }

    const text = decodeFileContent(fs.readFileSync(this.filePath));
    if (text.trim() === '') {
      this.rows = [];
      return { loaded: 0, skipped: 0 };
    }

    const parsed = parseExpenseCsv(text);
    if (parsed.error) {
      throw new Error(`${this.filePath}: ${parsed.error}`);
    }
    for (const r of parsed.rejected) {
      console.warn(`[store] Skipping line ${r.line} of ${this.filePath}: ${r.reason}`);
    }

    this.rows = parsed.rows.map((input) => ({ id: generateId(), ...input }));
    console.log(`[store] Loaded ${this.rows.length} records`);
    return { loaded: this.rows.length, skipped: parsed.rejected.length };
  }

  fetchAll(): ExpenseRecord[] {
    return this.rows.map((r) => ({ ...r }));
  }

  fetchByMonth(year?: number, month?: number): ExpenseRecord[] {
    const filter: MonthFilter = { year, month };
    return forMonth(this.rows, filter).map((r) => ({ ...r }));
  }

  get size(): number {
    return this.rows.length;
  }

  indexOf(id: string): number {
    return this.rows.findIndex((r) => r.id === id);
  }

  add(input: ExpenseInput): ExpenseRecord {
    const record: ExpenseRecord = { id: generateId(), ...normalize(input) };
    this.rows.push(record);
    this.commit();
    return { ...record };
  }

  update(id: string, input: ExpenseInput): ExpenseRecord {
    const index = this.indexOf(id);
    if (index === -1) throw new RecordNotFoundError(id);
    return this.updateAt(index, input);
  }

  /** Replace by position in the full, unfiltered list */
  updateAt(index: number, input: ExpenseInput): ExpenseRecord {
    const existing = this.rows[index];
    if (!Number.isInteger(index) || existing === undefined) throw new RecordNotFoundError(index);

    const record: ExpenseRecord = { id: existing.id, ...normalize(input) };
    this.rows[index] = record;
    this.commit();
    return { ...record };
  }

  delete(id: string): void {
    const index = this.indexOf(id);
    if (index === -1) throw new RecordNotFoundError(id);
    this.deleteAt(index);
  }

  deleteAt(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.rows.length) {
      throw new RecordNotFoundError(index);
    }
    this.rows.splice(index, 1);
    this.commit();
  }

  /** Drop every record; returns how many were removed */
  clear(): number {
    const removed = this.rows.length;
    this.rows = [];
    this.commit();
    return removed;
  }

  /** Append the valid rows of a CSV file, with blank categories filed as Other */
  importCsv(filePath: string): ImportResult {
    return this.importText(decodeFileContent(fs.readFileSync(filePath)));
  }

  importText(text: string): ImportResult {
    return this.importParsed(parseExpenseCsv(text));
  }

  importParsed(parsed: CsvParseResult): ImportResult {
    if (parsed.error) {
      return { imported: 0, skipped: 0, error: parsed.error };
    }
    for (const input of parsed.rows) {
      this.rows.push({ id: generateId(), ...tidyExpense(input) });
    }
    if (parsed.rows.length > 0) this.commit();

    console.log(`[store] Imported ${parsed.rows.length} records, skipped ${parsed.rejected.length}`);
    return { imported: parsed.rows.length, skipped: parsed.rejected.length };
  }

  /** Write the full record set, unfiltered, to another file */
  exportCsv(filePath: string): number {
    fs.writeFileSync(filePath, this.toCsv(), 'utf8');
    console.log(`[store] Exported ${this.rows.length} records to ${filePath}`);
    return this.rows.length;
  }

  toCsv(): string {
    return serializeExpenseCsv(this.rows);
  }

  /** Called after every mutation; returns the unsubscribe function */
  subscribe(listener: StoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private commit(): void {
    fs.writeFileSync(this.filePath, this.toCsv(), 'utf8');
    for (const listener of this.listeners) listener();
  }
}

// Date and amount are checked; category and note are stored as given
function normalize(input: ExpenseInput): ExpenseInput {
  const result = validateExpense(input);
  if (!result.ok) throw new InvalidRecordError(result.reason);
  return result.value;
}
