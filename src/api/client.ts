import type { Charts, ExpenseInput, ExpenseRecord, MonthFilter } from '../domain/types';

export interface ImportResult {
  imported: number;
  skipped: number;
}

export interface ClearResult {
  ok: boolean;
  deleted: number;
}

async function errorMessage(response: Response, fallback: string): Promise<string> {
  try {
    const body: unknown = await response.json();
    if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
      return body.error;
    }
  } catch {
    // non-JSON error body
  }
  return fallback;
}

function query(filter: MonthFilter = {}): string {
  const params = new URLSearchParams();
  if (filter.year !== undefined) params.set('year', String(filter.year));
  if (filter.month !== undefined) params.set('month', String(filter.month));
  const qs = params.toString();
  return qs ? `?${qs}` : '';
}

/** Typed fetch client for the expense API */
export function createClient(apiBase: string) {
  return {
    async getExpenses(filter?: MonthFilter): Promise<ExpenseRecord[]> {
      const response = await fetch(`${apiBase}/expenses${query(filter)}`);
      if (!response.ok) throw new Error('Failed to fetch expenses');
      return response.json();
    },

    async createExpense(data: ExpenseInput): Promise<ExpenseRecord> {
      const response = await fetch(`${apiBase}/expenses`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(data),
      });
      if (!response.ok) throw new Error(await errorMessage(response, 'Failed to create expense'));
      return response.json();
    },

    async updateExpense(id: string, data: ExpenseInput): Promise<ExpenseRecord> {
      const response = await fetch(`${apiBase}/expenses/${encodeURIComponent(id)}`, {
        method: 'PUT',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(data),
      });
      if (!response.ok) throw new Error(await errorMessage(response, 'Failed to update expense'));
      return response.json();
    },

    async deleteExpense(id: string): Promise<void> {
      const response = await fetch(`${apiBase}/expenses/${encodeURIComponent(id)}`, {
        method: 'DELETE',
      });
      if (!response.ok) throw new Error(await errorMessage(response, 'Failed to delete expense'));
    },

    async clearExpenses(): Promise<ClearResult> {
      const response = await fetch(`${apiBase}/expenses`, { method: 'DELETE' });
      if (!response.ok) throw new Error('Failed to clear expenses');
      return response.json();
    },

    async importCsv(csv: string): Promise<ImportResult> {
      const response = await fetch(`${apiBase}/expenses/import`, {
        method: 'POST',
        headers: { 'Content-Type': 'text/csv' },
        body: csv,
      });
      if (!response.ok) throw new Error(await errorMessage(response, 'Failed to import expenses'));
      return response.json();
    },

    async exportCsv(): Promise<string> {
      const response = await fetch(`${apiBase}/expenses/export`);
      if (!response.ok) throw new Error('Failed to export expenses');
      return response.text();
    },

    async getAnalytics(filter?: MonthFilter): Promise<Charts> {
      const response = await fetch(`${apiBase}/analytics${query(filter)}`);
      if (!response.ok) throw new Error('Failed to fetch analytics');
      return response.json();
    },

    async getCategories(): Promise<string[]> {
      const response = await fetch(`${apiBase}/categories`);
      if (!response.ok) throw new Error('Failed to fetch categories');
      return response.json();
    },

    async health(): Promise<boolean> {
      const response = await fetch(`${apiBase}/health`);
      return response.ok;
    },
  };
}

export type ExpenseClient = ReturnType<typeof createClient>;
