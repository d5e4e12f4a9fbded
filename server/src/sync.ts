import { fetchTradeHistory, type TradeHistorySource } from './exchange.js';
import type { BackupHook, LedgerWriter } from './ledger.js';
import { boundSeenIds, reconcile } from './reconcile.js';
import type { BotState, CalendarDate, LedgerSummary } from './types.js';

export type ExchangeSyncOptions = {
  ledgerSymbol: string;
  targetDate: CalendarDate;
  explicit: boolean;
  timeZone: string;
  asset: string;
  market?: string;
  maxPages: number;
};

export type ExchangeSyncResult = {
  processed: number;
  written: number;
  lastSummary: LedgerSummary | null;
};

/**
 * Pulls the exchange's closed orders, keeps the target day's unseen buys and
 * applies them oldest first. `state.processedFillIds` is updated in place.
 */
export async function runExchangeSync(args: {
  source: TradeHistorySource;
  writer: LedgerWriter;
  state: BotState;
  options: ExchangeSyncOptions;
  backup?: BackupHook;
}): Promise<ExchangeSyncResult> {
  const { source, writer, state, options, backup } = args;

  const { orders, pages } = await fetchTradeHistory(source, options.maxPages);
  const { events, seen, stats } = reconcile(orders, state.processedFillIds, {
    targetDate: options.targetDate,
    timeZone: options.timeZone,
    asset: options.asset,
    market: options.market,
    explicitTarget: options.explicit,
  });
  const s = stats.skipped;
  console.log(
    `[sync] fetch_done target_date=${options.targetDate} explicit=${options.explicit} pages=${pages} rows=${stats.rows} ` +
    `fills=${stats.fills} forwarded=${stats.forwarded} skip_date=${s.date} skip_market=${s.market} skip_side=${s.side} ` +
    `skip_qty=${s.qty} skip_amount=${s.amount} skip_seen=${s.seen}`,
  );

  const completed: string[] = [];
  let written = 0;
  let lastSummary: LedgerSummary | null = null;

  try {
    for (const event of events) {
      const outcome = await writer.applyExchangeFill(options.ledgerSymbol, event, backup);
      completed.push(event.id);
      if (outcome.status === 'written') {
        written++;
        lastSummary = outcome.summary;
      }
    }
  } catch (err) {
    // Fills applied before the failure stay seen.
    state.processedFillIds = boundSeenIds([...state.processedFillIds, ...completed]);
    throw err;
  }

  state.processedFillIds = seen;
  console.log(`[sync] done processed=${completed.length} written=${written}`);
  return { processed: completed.length, written, lastSummary };
}
