import { formatCalendarDate, isValidDay } from './dates.js';
import { cellText } from './grid.js';
import type { LedgerSheet } from './store.js';
import type { Anchor, CalendarDate, CellValue, Grid } from './types.js';

// Tried in order; month and day may be one or two digits.
const LEDGER_DATE_FORMATS: readonly RegExp[] = [
  /^(\d{4})-(\d{1,2})-(\d{1,2})$/,
  /^(\d{4})-(\d{1,2})-(\d{1,2}) \d{1,2}:\d{2}:\d{2}$/,
  /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/,
  /^(\d{4})\.(\d{1,2})\.(\d{1,2})$/,
];

export function parseLedgerDate(value: CellValue): CalendarDate | null {
  const text = String(value ?? '').trim();
  if (!text) return null;
  for (const re of LEDGER_DATE_FORMATS) {
    const m = text.match(re);
    if (!m) continue;
    const [y, mo, d] = [Number(m[1]), Number(m[2]), Number(m[3])];
    if (isValidDay(y, mo, d)) return formatCalendarDate(y, mo, d);
  }
  return null;
}

/** Row below the header whose date cell reads as `date`, from the snapshot only. */
export function findDateRow(grid: Grid, anchor: Anchor, date: CalendarDate): number | null {
  for (let r = anchor.headerRow + 1; r <= grid.length; r++) {
    if (parseLedgerDate(cellText(grid, r, anchor.dateCol)) === date) return r;
  }
  return null;
}

/**
 * Row for `date`, appending one when the snapshot has none: the live date
 * column is walked down from the header and `date` is written into the first
 * blank cell. Not safe against a concurrent writer on the same ledger.
 */
export async function findOrCreateDateRow(sheet: LedgerSheet, grid: Grid, anchor: Anchor, date: CalendarDate): Promise<number> {
  const existing = findDateRow(grid, anchor, date);
  if (existing !== null) return existing;

  for (let row = anchor.headerRow + 1; ; row++) {
    const ref = { row, col: anchor.dateCol };
    const raw = await sheet.getCell(ref);
    if (String(raw ?? '').trim()) continue;
    await sheet.updateCell(ref, date);
    console.log(`[rows] created row=${row} date=${date} sheet=${sheet.title}`);
    return row;
  }
}
