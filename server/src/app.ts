import express from 'express';
import cors from 'cors';

import type { BotSnapshot } from './bot.js';
import { LayoutError } from './errors.js';
import { colToA1 } from './grid.js';
import type { LedgerWriter } from './ledger.js';
import type { LedgerBook } from './store.js';

export type AppDeps = {
  book: LedgerBook;
  writer: LedgerWriter;
  snapshot: () => BotSnapshot;
};

/** Read-only status surface; nothing here writes to a ledger. */
export function createApp(deps: AppDeps) {
  const app = express();
  app.use(cors());
  app.use(express.json());

  /* ================= Status ================= */

  app.get('/api/health', (_req, res) => res.json({ ok: true }));

  app.get('/api/state', (_req, res) => res.json(deps.snapshot()));

  /* ================= Ledger inspection ================= */

  app.get('/api/ledgers/:symbol/layout', async (req, res) => {
    const symbol = String(req.params.symbol || '').toUpperCase();
    try {
      const sheet = await deps.book.open(symbol);
      const { anchor, totalQtyCol } = await deps.writer.loadLayout(sheet);
      res.json({
        ok: true,
        symbol,
        title: sheet.title,
        anchor,
        columns: {
          date: colToA1(anchor.dateCol),
          avg: colToA1(anchor.avgCol),
          high: colToA1(anchor.highCol),
          totalQty: colToA1(totalQtyCol),
        },
      });
    } catch (e) {
      const status = e instanceof LayoutError ? 400 : 500;
      res.status(status).json({ ok: false, error: e instanceof Error ? e.message : String(e) });
    }
  });

  return app;
}
