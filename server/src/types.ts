export type CellValue = string | number | null;

/** 1-based sheet coordinate. */
export type CellCoord = { row: number; col: number };

/** Row-major display text of a worksheet; rows may be ragged. */
export type Grid = readonly (readonly string[])[];

/** Calendar date text, always 'YYYY-MM-DD'. */
export type CalendarDate = string;

/** The two parallel price/quantity column pairs of a ledger. */
export type Zone = 'avg' | 'high';

export type Anchor = {
  headerRow: number;
  dateCol: number;
  avgCol: number;   // quantity lives in avgCol + 1
  highCol: number;  // quantity lives in highCol + 1
};

export type Side = 'buy' | 'sell';
export type FillSource = 'broker' | 'exchange';

export type FillEvent = {
  source: FillSource;
  symbol: string;
  side: Side;
  price: number;
  qty: number;
  amount: number;
  eventTime: Date;
  tradeDate: CalendarDate;
  id: string; // idempotency key
  market?: string;
};

export type Currency = 'USD' | 'KRW';

/** Summary fields read back from a ledger after a write. */
export type LedgerSummary = {
  title: string;
  currency: Currency;
  avgPrice: number;
  currentPrice: number;
  avgZoneTarget: number;
  highZoneTarget: number;
  sellTarget: number;
  sellQtyCurrentRound: number;
};

/** A1 addresses of the fixed reference and summary cells. */
export type LedgerCells = {
  avgPrice: string;
  currentPrice: string;
  halfUnit: string;
  avgZoneTarget: string;
  highZoneTarget: string;
  sellTarget: string;
};

export type WriteOutcome =
  | { status: 'written'; mode: 'single'; zone: Zone; row: number; summary: LedgerSummary }
  | { status: 'written'; mode: 'dual'; row: number; summary: LedgerSummary }
  | { status: 'skipped'; reason: string };

export type BotState = {
  lastUpdateId: number;
  processedFillIds: string[];
  defaultChatId?: number;
};
