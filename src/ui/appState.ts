/**
 * Application state for the expense screen.
 *
 * The form, filter, selection and dialogs live in one plain struct; `reduce`
 * is pure and hands back the store command (if any) that an action implies.
 * `AppController` wires the reducer to a RecordStore.
 */
import type { Charts, ExpenseInput, ExpenseRecord, MonthFilter } from '../domain/types';
import { buildCharts, today, totalSpent } from '../domain/computations';
import { describeRejection, formatCurrency, tidyExpense, validateExpense } from '../domain/validation';
import type { RecordStore } from '../db/recordStore';

export interface FormFields {
  date: string;
  category: string;
  amount: string;
  note: string;
}

export interface FilterFields {
  year: string;
  month: string;
}

export type PendingConfirm =
  | { kind: 'delete'; id: string }
  | { kind: 'clear-all' };

export interface Notice {
  level: 'error' | 'info';
  title: string;
  message: string;
}

export interface AppState {
  filter: FilterFields;
  form: FormFields;
  selectedId: string | null;
  pendingConfirm: PendingConfirm | null;
  notice: Notice | null;
}

export type StoreCommand =
  | { type: 'add'; input: ExpenseInput }
  | { type: 'update'; id: string; input: ExpenseInput }
  | { type: 'delete'; id: string }
  | { type: 'clear' };

export type AppAction =
  | { type: 'edit-field'; field: keyof FormFields; value: string }
  | { type: 'edit-filter'; field: keyof FilterFields; value: string }
  | { type: 'clear-filter' }
  | { type: 'select'; record: ExpenseRecord }
  | { type: 'submit-add' }
  | { type: 'submit-update' }
  | { type: 'request-delete' }
  | { type: 'request-clear-all' }
  | { type: 'confirm' }
  | { type: 'cancel' }
  | { type: 'dismiss-notice' };

export interface ReduceResult {
  state: AppState;
  command?: StoreCommand;
}

export interface TableRow {
  id: string;
  date: string;
  category: string;
  amount: string;
  note: string;
}

export function emptyForm(date: string = today()): FormFields {
  return { date, category: '', amount: '', note: '' };
}

export function initialState(date: string = today()): AppState {
  return {
    filter: { year: '', month: '' },
    form: emptyForm(date),
    selectedId: null,
    pendingConfirm: null,
    notice: null,
  };
}

function parseInteger(value: string): number | undefined {
  const trimmed = value.trim();
  return /^[+-]?\d+$/.test(trimmed) ? Number(trimmed) : undefined;
}

/** Filter text fields to numbers; anything that is not an integer is ignored */
export function parseFilter(filter: FilterFields): MonthFilter {
  return { year: parseInteger(filter.year), month: parseInteger(filter.month) };
}

/** Validate and tidy the form; a rejection becomes a blocking notice */
function formInput(form: FormFields): { input: ExpenseInput } | { notice: Notice } {
  const result = validateExpense(form);
  if (!result.ok) {
    return { notice: { level: 'error', title: 'Invalid', message: describeRejection(result.reason) } };
  }
  return { input: tidyExpense(result.value) };
}

const NO_SELECTION: Notice = { level: 'info', title: 'No selection', message: 'Select a transaction' };

export function reduce(state: AppState, action: AppAction, now: string = today()): ReduceResult {
  switch (action.type) {
    case 'edit-field':
      return { state: { ...state, form: { ...state.form, [action.field]: action.value } } };

    case 'edit-filter':
      return { state: { ...state, filter: { ...state.filter, [action.field]: action.value } } };

    case 'clear-filter':
      return { state: { ...state, filter: { year: '', month: '' } } };

    case 'select': {
      const { id, date, category, amount, note } = action.record;
      return {
        state: {
          ...state,
          selectedId: id,
          form: { date, category, amount: String(amount), note },
        },
      };
    }

    case 'submit-add': {
      const checked = formInput(state.form);
      if ('notice' in checked) return { state: { ...state, notice: checked.notice } };
      return {
        state: { ...state, form: emptyForm(now), notice: null },
        command: { type: 'add', input: checked.input },
      };
    }

    case 'submit-update': {
      if (!state.selectedId) return { state: { ...state, notice: NO_SELECTION } };
      const checked = formInput(state.form);
      if ('notice' in checked) return { state: { ...state, notice: checked.notice } };
      return {
        state: { ...state, form: emptyForm(now), selectedId: null, notice: null },
        command: { type: 'update', id: state.selectedId, input: checked.input },
      };
    }

    case 'request-delete':
      if (!state.selectedId) return { state: { ...state, notice: NO_SELECTION } };
      return { state: { ...state, pendingConfirm: { kind: 'delete', id: state.selectedId } } };

    case 'request-clear-all':
      return { state: { ...state, pendingConfirm: { kind: 'clear-all' } } };

    case 'confirm': {
      const pending = state.pendingConfirm;
      if (!pending) return { state };
      const cleared: AppState = { ...state, pendingConfirm: null, selectedId: null, form: emptyForm(now) };
      return pending.kind === 'delete'
        ? { state: cleared, command: { type: 'delete', id: pending.id } }
        : { state: cleared, command: { type: 'clear' } };
    }

    case 'cancel':
      return { state: { ...state, pendingConfirm: null } };

    case 'dismiss-notice':
      return { state: { ...state, notice: null } };
  }
}

type CommandTarget = Pick<RecordStore, 'add' | 'update' | 'delete' | 'clear'>;

export function applyCommand(store: CommandTarget, command: StoreCommand): void {
  switch (command.type) {
    case 'add':
      store.add(command.input);
      break;
    case 'update':
      store.update(command.id, command.input);
      break;
    case 'delete':
      store.delete(command.id);
      break;
    case 'clear':
      store.clear();
      break;
  }
}

/** Display rows with amounts formatted for the table */
export function tableRows(records: ExpenseRecord[]): TableRow[] {
  return records.map((r) => ({ ...r, amount: formatCurrency(r.amount) }));
}

export class AppController {
  state: AppState;

  constructor(
    private readonly store: RecordStore,
    private readonly clock: () => string = today,
  ) {
    this.state = initialState(clock());
  }

  dispatch(action: AppAction): void {
    const { state, command } = reduce(this.state, action, this.clock());
    this.state = state;
    if (command) applyCommand(this.store, command);
  }

  /** Records in the current filtered view */
  visibleRecords(): ExpenseRecord[] {
    const { year, month } = parseFilter(this.state.filter);
    return this.store.fetchByMonth(year, month);
  }

  rows(): TableRow[] {
    return tableRows(this.visibleRecords());
  }

  /** Total of the filtered view, formatted */
  totalLabel(): string {
    return formatCurrency(totalSpent(this.visibleRecords()));
  }

  charts(): Charts {
    return buildCharts(this.visibleRecords());
  }
}
