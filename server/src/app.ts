import express, { type Request } from 'express';
import cors from 'cors';
import { RecordStore, RecordNotFoundError } from '../../src/db/recordStore';
import { buildCharts } from '../../src/domain/computations';
import { validateExpense, describeRejection, type RawExpenseFields } from '../../src/domain/validation';
import { decodeFileContent, parseExpenseCsv } from '../../src/api/csvParser';
import { getAllCategories } from '../../src/api/categorizer';
import type { MonthFilter } from '../../src/domain/types';

// year/month query params; anything that is not an integer is ignored
function monthFilter(req: Request): MonthFilter {
  const read = (key: string): number | undefined => {
    const raw = req.query[key];
    if (typeof raw !== 'string' || !/^\d+$/.test(raw.trim())) return undefined;
    return Number(raw.trim());
  };
  return { year: read('year'), month: read('month') };
}

// Pick the expense fields out of a JSON body, dropping values of the wrong type
function expenseFields(body: unknown): RawExpenseFields {
  const fields = new Map<string, unknown>(
    typeof body === 'object' && body !== null ? Object.entries(body) : [],
  );
  const text = (key: string): string | undefined => {
    const value = fields.get(key);
    return typeof value === 'string' ? value : undefined;
  };
  const amount = fields.get('amount');
  return {
    date: text('date'),
    category: text('category'),
    amount: typeof amount === 'number' || typeof amount === 'string' ? amount : undefined,
    note: text('note'),
  };
}

export function createApp(store: RecordStore): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/categories', (_req, res) => {
    res.json(getAllCategories());
  });

  // GET /expenses - All records in storage order, optionally filtered by year/month
  app.get('/expenses', (req, res) => {
    try {
      const { year, month } = monthFilter(req);
      res.json(store.fetchByMonth(year, month));
    } catch (error) {
      console.error('[api] Error fetching expenses:', error);
      res.status(500).json({ error: 'Failed to fetch expenses' });
    }
  });

  // POST /expenses - Validate and append a record
  app.post('/expenses', (req, res) => {
    try {
      const result = validateExpense(expenseFields(req.body));
      if (!result.ok) {
        res.status(400).json({ error: describeRejection(result.reason), reason: result.reason });
        return;
      }
      res.status(201).json(store.add(result.value));
    } catch (error) {
      console.error('[api] Error creating expense:', error);
      res.status(500).json({ error: 'Failed to create expense' });
    }
  });

  // GET /expenses/export - Full, unfiltered record set as CSV
  app.get('/expenses/export', (_req, res) => {
    try {
      res.type('text/csv').attachment('expenses.csv').send(store.toCsv());
    } catch (error) {
      console.error('[api] Error exporting expenses:', error);
      res.status(500).json({ error: 'Failed to export expenses' });
    }
  });

  // POST /expenses/import - CSV body (UTF-8 or Shift_JIS); bad rows are skipped
  app.post('/expenses/import', express.raw({ type: 'text/csv', limit: '10mb' }), (req, res) => {
    try {
      if (!Buffer.isBuffer(req.body)) {
        res.status(415).json({ error: 'Expected a text/csv body' });
        return;
      }
      const parsed = parseExpenseCsv(decodeFileContent(req.body));
      const result = store.importParsed(parsed);
      if (result.error) {
        res.status(400).json(result);
        return;
      }
      res.json(result);
    } catch (error) {
      console.error('[api] Error importing expenses:', error);
      res.status(500).json({ error: 'Failed to import expenses' });
    }
  });

  // PUT /expenses/:id - Replace a record's fields
  app.put('/expenses/:id', (req, res) => {
    try {
      const result = validateExpense(expenseFields(req.body));
      if (!result.ok) {
        res.status(400).json({ error: describeRejection(result.reason), reason: result.reason });
        return;
      }
      res.json(store.update(req.params.id, result.value));
    } catch (error) {
      if (error instanceof RecordNotFoundError) {
        res.status(404).json({ error: 'Expense not found' });
        return;
      }
      console.error('[api] Error updating expense:', error);
      res.status(500).json({ error: 'Failed to update expense' });
    }
  });

  // DELETE /expenses/:id
  app.delete('/expenses/:id', (req, res) => {
    try {
      store.delete(req.params.id);
      res.json({ ok: true });
    } catch (error) {
      if (error instanceof RecordNotFoundError) {
        res.status(404).json({ error: 'Expense not found' });
        return;
      }
      console.error('[api] Error deleting expense:', error);
      res.status(500).json({ error: 'Failed to delete expense' });
    }
  });

  // DELETE /expenses - Remove everything
  app.delete('/expenses', (_req, res) => {
    try {
      const deleted = store.clear();
      res.json({ ok: true, deleted });
    } catch (error) {
      console.error('[api] Error clearing expenses:', error);
      res.status(500).json({ error: 'Failed to clear expenses' });
    }
  });

  // GET /analytics?year=YYYY&month=M - Trend, monthly and category series
  app.get('/analytics', (req, res) => {
    try {
      const { year, month } = monthFilter(req);
      res.json(buildCharts(store.fetchByMonth(year, month)));
    } catch (error) {
      console.error('[api] Error computing analytics:', error);
      res.status(500).json({ error: 'Failed to compute analytics' });
    }
  });

  return app;
}
