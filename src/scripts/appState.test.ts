/**
 * Application state reducer and controller tests.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  AppController,
  applyCommand,
  initialState,
  parseFilter,
  reduce,
  tableRows,
  type AppState,
} from '../ui/appState';
import { RecordStore } from '../db/recordStore';
import type { ExpenseRecord } from '../domain/types';

const TODAY = '2024-06-01';

function filledState(form: Partial<AppState['form']> = {}): AppState {
  const state = initialState(TODAY);
  return { ...state, form: { ...state.form, ...form } };
}

const record: ExpenseRecord = { id: 'r1', date: '2024-05-02', category: 'Food', amount: 1234.5, note: 'dinner' };

describe('reduce', () => {
  it('edits form fields', () => {
    const { state, command } = reduce(initialState(TODAY), { type: 'edit-field', field: 'amount', value: '9' }, TODAY);
    expect(state.form).toEqual({ date: TODAY, category: '', amount: '9', note: '' });
    expect(command).toBeUndefined();
  });

  it('blocks an add with a bad date', () => {
    const start = filledState({ date: '2024-13-01', amount: '5' });
    const { state, command } = reduce(start, { type: 'submit-add' }, TODAY);
    expect(command).toBeUndefined();
    expect(state.notice).toEqual({ level: 'error', title: 'Invalid', message: 'Date must be YYYY-MM-DD' });
    expect(state.form).toEqual(start.form);
  });

  it('blocks an add with a non-numeric amount', () => {
    const { state, command } = reduce(filledState({ amount: 'ten' }), { type: 'submit-add' }, TODAY);
    expect(command).toBeUndefined();
    expect(state.notice?.message).toBe('Enter a valid amount');
  });

  it('emits an add command and resets the form', () => {
    const start = filledState({ category: '', amount: ' 7.5 ', note: ' snack ' });
    const { state, command } = reduce(start, { type: 'submit-add' }, '2024-06-02');
    expect(command).toEqual({
      type: 'add',
      input: { date: TODAY, category: 'Other', amount: 7.5, note: 'snack' },
    });
    expect(state.form).toEqual({ date: '2024-06-02', category: '', amount: '', note: '' });
  });

  it('fills the form from the selected record', () => {
    const { state } = reduce(initialState(TODAY), { type: 'select', record }, TODAY);
    expect(state.selectedId).toBe('r1');
    expect(state.form).toEqual({ date: '2024-05-02', category: 'Food', amount: '1234.5', note: 'dinner' });
  });

  it('asks for a selection before updating', () => {
    const { state, command } = reduce(filledState({ amount: '1' }), { type: 'submit-update' }, TODAY);
    expect(command).toBeUndefined();
    expect(state.notice).toEqual({ level: 'info', title: 'No selection', message: 'Select a transaction' });
  });

  it('emits an update command for the selected id', () => {
    const selected = reduce(initialState(TODAY), { type: 'select', record }, TODAY).state;
    const edited = reduce(selected, { type: 'edit-field', field: 'amount', value: '20' }, TODAY).state;
    const { state, command } = reduce(edited, { type: 'submit-update' }, TODAY);
    expect(command).toEqual({
      type: 'update',
      id: 'r1',
      input: { date: '2024-05-02', category: 'Food', amount: 20, note: 'dinner' },
    });
    expect(state.selectedId).toBeNull();
  });

  it('asks for a selection before deleting', () => {
    const { state } = reduce(initialState(TODAY), { type: 'request-delete' }, TODAY);
    expect(state.pendingConfirm).toBeNull();
    expect(state.notice?.title).toBe('No selection');
  });

  it('only deletes after confirmation', () => {
    const selected = reduce(initialState(TODAY), { type: 'select', record }, TODAY).state;
    const asked = reduce(selected, { type: 'request-delete' }, TODAY);
    expect(asked.command).toBeUndefined();
    expect(asked.state.pendingConfirm).toEqual({ kind: 'delete', id: 'r1' });

    const cancelled = reduce(asked.state, { type: 'cancel' }, TODAY);
    expect(cancelled.command).toBeUndefined();
    expect(cancelled.state.pendingConfirm).toBeNull();

    const confirmed = reduce(asked.state, { type: 'confirm' }, TODAY);
    expect(confirmed.command).toEqual({ type: 'delete', id: 'r1' });
    expect(confirmed.state.selectedId).toBeNull();
  });

  it('only clears everything after confirmation', () => {
    const asked = reduce(initialState(TODAY), { type: 'request-clear-all' }, TODAY);
    expect(asked.command).toBeUndefined();
    expect(reduce(asked.state, { type: 'confirm' }, TODAY).command).toEqual({ type: 'clear' });
  });

  it('ignores a confirm with nothing pending', () => {
    const start = initialState(TODAY);
    expect(reduce(start, { type: 'confirm' }, TODAY)).toEqual({ state: start });
  });

  it('edits and clears the filter', () => {
    const withYear = reduce(initialState(TODAY), { type: 'edit-filter', field: 'year', value: '2024' }, TODAY).state;
    expect(withYear.filter).toEqual({ year: '2024', month: '' });
    expect(reduce(withYear, { type: 'clear-filter' }, TODAY).state.filter).toEqual({ year: '', month: '' });
  });

  it('dismisses a notice', () => {
    const noticed = reduce(initialState(TODAY), { type: 'submit-update' }, TODAY).state;
    expect(reduce(noticed, { type: 'dismiss-notice' }, TODAY).state.notice).toBeNull();
  });
});

describe('parseFilter', () => {
  it('reads integers and ignores anything else', () => {
    expect(parseFilter({ year: '2024', month: ' 3 ' })).toEqual({ year: 2024, month: 3 });
    expect(parseFilter({ year: 'abc', month: '3.5' })).toEqual({ year: undefined, month: undefined });
    expect(parseFilter({ year: '', month: '' })).toEqual({ year: undefined, month: undefined });
  });
});

describe('tableRows', () => {
  it('formats amounts for display', () => {
    expect(tableRows([record])).toEqual([
      { id: 'r1', date: '2024-05-02', category: 'Food', amount: '1,234.50', note: 'dinner' },
    ]);
  });
});

describe('applyCommand', () => {
  it('routes each command to the matching store call', () => {
    const store = { add: vi.fn(), update: vi.fn(), delete: vi.fn(), clear: vi.fn() };
    const input = { date: TODAY, category: 'Food', amount: 1, note: '' };
    applyCommand(store, { type: 'add', input });
    applyCommand(store, { type: 'update', id: 'r1', input });
    applyCommand(store, { type: 'delete', id: 'r1' });
    applyCommand(store, { type: 'clear' });
    expect(store.add).toHaveBeenCalledWith(input);
    expect(store.update).toHaveBeenCalledWith('r1', input);
    expect(store.delete).toHaveBeenCalledWith('r1');
    expect(store.clear).toHaveBeenCalledTimes(1);
  });
});

describe('AppController', () => {
  let dir: string;
  let store: RecordStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'expenses-ui-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    store = new RecordStore(path.join(dir, 'expenses.csv'));
    store.load();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function enter(app: AppController, date: string, category: string, amount: string): void {
    app.dispatch({ type: 'edit-field', field: 'date', value: date });
    app.dispatch({ type: 'edit-field', field: 'category', value: category });
    app.dispatch({ type: 'edit-field', field: 'amount', value: amount });
    app.dispatch({ type: 'submit-add' });
  }

  it('adds through the form and shows the filtered view', () => {
    const app = new AppController(store, () => TODAY);
    enter(app, '2024-05-02', 'Food', '1234.5');
    enter(app, '2024-06-01', 'Rent', '800');

    expect(app.rows().map((r) => r.amount)).toEqual(['1,234.50', '800.00']);
    expect(app.totalLabel()).toBe('2,034.50');

    app.dispatch({ type: 'edit-filter', field: 'month', value: '6' });
    expect(app.rows().map((r) => r.category)).toEqual(['Rent']);
    expect(app.charts().category).toEqual({ status: 'ok', buckets: [{ category: 'Rent', total: 800 }] });

    app.dispatch({ type: 'edit-filter', field: 'year', value: '2023' });
    expect(app.rows()).toEqual([]);
    expect(app.charts().trend).toEqual({ status: 'empty' });
  });

  it('deletes the selected record once confirmed', () => {
    const app = new AppController(store, () => TODAY);
    enter(app, '2024-05-02', 'Food', '12');
    enter(app, '2024-05-03', 'Gifts', '30');

    const [first] = store.fetchAll();
    app.dispatch({ type: 'select', record: first });
    app.dispatch({ type: 'request-delete' });
    expect(store.size).toBe(2);
    app.dispatch({ type: 'confirm' });
    expect(store.fetchAll().map((r) => r.category)).toEqual(['Gifts']);
  });
});
