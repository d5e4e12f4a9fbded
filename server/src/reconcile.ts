import { calendarDateIn, parseInstant } from './dates.js';
import type { ClosedOrder } from './exchange.js';
import type { CalendarDate, FillEvent } from './types.js';

export const SEEN_LIMIT = 1000;

export type ReconcileOptions = {
  targetDate: CalendarDate;
  timeZone: string;
  asset: string;
  /** Exact market (e.g. 'KRW-BTC'); any market of `asset` when unset. */
  market?: string;
  /** A pinned date replays every matching fill, seen or not. */
  explicitTarget: boolean;
  seenLimit?: number;
};

export type SkipReason = 'date' | 'market' | 'side' | 'qty' | 'amount';

export type ReconcileStats = {
  rows: number;
  fills: number;
  forwarded: number;
  skipped: Record<SkipReason | 'seen', number>;
};

export type ReconcileResult = { events: FillEvent[]; seen: string[]; stats: ReconcileStats };

const num = (v: string | number | null | undefined): number => {
  const n = typeof v === 'number' ? v : parseFloat(v ?? '');
  return Number.isFinite(n) ? n : 0;
};

function baseAsset(market: string): string {
  return (market.includes('-') ? market.slice(market.lastIndexOf('-') + 1) : market).toUpperCase();
}

/** Maps one closed order to a buy fill on the target date, or names why it was dropped. */
export function toExchangeFill(order: ClosedOrder, opts: Pick<ReconcileOptions, 'targetDate' | 'timeZone' | 'asset' | 'market'>): { fill: FillEvent } | { skip: SkipReason } {
  const done = parseInstant(order.done_at);
  const created = parseInstant(order.created_at);
  const onTarget = [done, created].some(d => d !== null && calendarDateIn(d, opts.timeZone) === opts.targetDate);
  if (!onTarget) return { skip: 'date' };

  const asset = baseAsset(order.market);
  if (asset !== opts.asset.toUpperCase()) return { skip: 'market' };
  if (opts.market && order.market !== opts.market) return { skip: 'market' };

  if (order.side !== 'bid') return { skip: 'side' };

  const qty = num(order.executed_volume);
  if (qty <= 0) return { skip: 'qty' };

  // A market buy ('price' order type) reports its total spend in `price`, not a unit price.
  const marketBuy = order.ord_type === 'price';
  const rawPrice = num(order.price);
  const funds = num(order.executed_funds);
  let amount: number;
  if (marketBuy && rawPrice > 0) amount = rawPrice;
  else if (funds > 0) amount = funds;
  else amount = rawPrice > 0 ? rawPrice * qty : 0;
  if (amount <= 0) return { skip: 'amount' };

  const price = marketBuy || rawPrice <= 0 ? amount / qty : rawPrice;
  const eventTime = done ?? created;
  if (!eventTime) return { skip: 'date' };

  return {
    fill: {
      source: 'exchange',
      symbol: asset,
      market: order.market,
      side: 'buy',
      price,
      qty,
      amount,
      eventTime,
      tradeDate: calendarDateIn(eventTime, opts.timeZone),
      id: order.uuid || `${order.market}:${eventTime.toISOString()}:${qty}:${price}`,
    },
  };
}

/** Unique ids, sorted, keeping the last `limit` in lexicographic order. */
export function boundSeenIds(ids: Iterable<string>, limit: number = SEEN_LIMIT): string[] {
  const sorted = [...new Set(ids)].sort();
  return sorted.slice(Math.max(0, sorted.length - limit));
}

/**
 * Turns one trade-history fetch into the fills still to be applied, in
 * chronological order, together with the seen-set that includes them.
 */
export function reconcile(orders: readonly ClosedOrder[], seenIds: readonly string[], opts: ReconcileOptions): ReconcileResult {
  const stats: ReconcileStats = {
    rows: orders.length,
    fills: 0,
    forwarded: 0,
    skipped: { date: 0, market: 0, side: 0, qty: 0, amount: 0, seen: 0 },
  };
  const seen = new Set(seenIds);
  const batch = new Set<string>();
  const events: FillEvent[] = [];

  for (const order of orders) {
    const mapped = toExchangeFill(order, opts);
    if ('skip' in mapped) {
      stats.skipped[mapped.skip]++;
      continue;
    }
    stats.fills++;
    // Paging can return the same order twice while new orders arrive.
    if (batch.has(mapped.fill.id) || (!opts.explicitTarget && seen.has(mapped.fill.id))) {
      stats.skipped.seen++;
      continue;
    }
    batch.add(mapped.fill.id);
    events.push(mapped.fill);
  }

  events.sort((a, b) => a.eventTime.getTime() - b.eventTime.getTime());
  stats.forwarded = events.length;

  return {
    events,
    seen: boundSeenIds([...seenIds, ...events.map(e => e.id)], opts.seenLimit ?? SEEN_LIMIT),
    stats,
  };
}
