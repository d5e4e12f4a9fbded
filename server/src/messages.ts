import { currentYearIn, calendarDateIn, formatCalendarDate, isValidDay } from './dates.js';
import { ParseError } from './errors.js';
import { formatMoney, parseNumber } from './numbers.js';
import type { CalendarDate, FillEvent, LedgerSummary, Side } from './types.js';

/* ---------- Brokerage fill notice ---------- */

// Wire format of the brokerage's overseas-stock fill notification.
const BROKER_NOTICE = {
  title: '[메리츠증권] 해외주식 주문체결 안내',
  stockName: '종목명',
  side: '매매구분',
  price: '체결단가',
  qty: '체결수량',
  date: '체결일자',
} as const;

const BROKER_SIDES: Record<string, Side> = { 매수: 'buy', 매도: 'sell' };

export function parseKeyValueLines(text: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    const i = line.indexOf(':');
    if (!line || i < 0) continue;
    out[line.slice(0, i).trim()] = line.slice(i + 1).trim();
  }
  return out;
}

/** "ProShares UltraPro QQQ(TQQQ)" -> "TQQQ" */
export function parseSymbol(stockName: string): string {
  const m = stockName.match(/\(([^)]+)\)/);
  if (!m) throw new ParseError(`symbol not found in stock name: ${stockName}`);
  return m[1].trim().toUpperCase();
}

/** "MM/DD" of the fill; the year is the current one in `timeZone`. */
export function parseFillDay(mmdd: string, timeZone: string, now: Date = new Date()): CalendarDate {
  const m = mmdd.match(/(\d{1,2})\s*\/\s*(\d{1,2})/);
  if (!m) throw new ParseError(`invalid fill date: ${mmdd}`);
  const year = currentYearIn(timeZone, now);
  const [month, day] = [Number(m[1]), Number(m[2])];
  if (!isValidDay(year, month, day)) throw new ParseError(`invalid fill date: ${mmdd}`);
  return formatCalendarDate(year, month, day);
}

/**
 * Fill event from a brokerage notice, or null when the text is some other
 * message or lacks a field. Present but malformed values throw ParseError.
 */
export function parseBrokerFillMessage(text: string, opts: { timeZone: string; now?: Date }): FillEvent | null {
  if (!text.includes(BROKER_NOTICE.title)) return null;

  const kv = parseKeyValueLines(text);
  const stockName = kv[BROKER_NOTICE.stockName] ?? '';
  const sideText = kv[BROKER_NOTICE.side] ?? '';
  const priceText = kv[BROKER_NOTICE.price] ?? '';
  const qtyText = kv[BROKER_NOTICE.qty] ?? '';
  const dateText = kv[BROKER_NOTICE.date] ?? '';
  if (!stockName || !sideText || !priceText || !qtyText || !dateText) return null;

  const side = BROKER_SIDES[sideText];
  if (!side) throw new ParseError(`unknown trade side: ${sideText}`);
  const symbol = parseSymbol(stockName);
  const price = parseNumber(priceText);
  const qty = parseNumber(qtyText);
  if (price <= 0) throw new ParseError(`fill price must be positive: ${priceText}`);
  if (qty < 0) throw new ParseError(`fill quantity must not be negative: ${qtyText}`);
  const now = opts.now ?? new Date();
  const tradeDate = parseFillDay(dateText, opts.timeZone, now);

  return {
    source: 'broker',
    symbol,
    side,
    price,
    qty,
    amount: price * qty,
    eventTime: now,
    tradeDate,
    id: `broker:${symbol}:${tradeDate}:${side}:${price}:${qty}`,
  };
}

/* ---------- Exchange sync command ---------- */

export type SyncCommand = { date: CalendarDate; explicit: boolean };

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * `<command>` syncs today; `<command>: 2026-03-04` (or `26-03-04`) pins a day
 * and replays it in full.
 */
export function parseSyncCommand(text: string, command: string, opts: { timeZone: string; now?: Date }): SyncCommand | null {
  const re = new RegExp(`^\\s*${escapeRegExp(command)}(?:\\s*:\\s*(\\d{2}|\\d{4})-(\\d{2})-(\\d{2}))?\\s*$`);
  const m = text.trim().match(re);
  if (!m) return null;
  if (!m[1]) return { date: calendarDateIn(opts.now ?? new Date(), opts.timeZone), explicit: false };

  const year = Number(m[1].length === 2 ? `20${m[1]}` : m[1]);
  const [month, day] = [Number(m[2]), Number(m[3])];
  if (!isValidDay(year, month, day)) throw new ParseError(`invalid sync date: ${m[1]}-${m[2]}-${m[3]}`);
  return { date: formatCalendarDate(year, month, day), explicit: true };
}

/* ---------- Replies ---------- */

export function buildLedgerReply(s: LedgerSummary): string {
  const money = (v: number) => formatMoney(v, s.currency);
  return [
    `Ledger updated (${s.title})`,
    `Average price: ${money(s.avgPrice)}`,
    `Current price: ${money(s.currentPrice)}`,
    '',
    'Buy orders for today',
    `LOC avg: ${money(s.avgZoneTarget)}`,
    `LOC high: ${money(s.highZoneTarget)}`,
    '',
    'Sell orders for today',
    `Limit price: ${money(s.sellTarget)}`,
    `Quantity: ${s.sellQtyCurrentRound}`,
  ].join('\n');
}

export function buildSyncReply(processed: number, written: number, last: LedgerSummary | null): string {
  const head = ['Exchange sync finished', `- fills processed: ${processed}`, `- ledger writes: ${written}`].join('\n');
  if (written === 0 || !last) return head;
  return `${head}\n\n${buildLedgerReply(last)}`;
}
