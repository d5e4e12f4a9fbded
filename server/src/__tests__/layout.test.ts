/**
 * Anchor resolution, date rows and zone decisions.
 */

import { findTotalQtyColumn, resolveAnchor } from '../anchor.js';
import { ClassificationError, LayoutError } from '../errors.js';
import { findDateRow, findOrCreateDateRow, parseLedgerDate } from '../rows.js';
import { MemoryLedgerSheet } from '../store.js';
import type { Anchor, Grid } from '../types.js';
import { classifyByAmount, classifyByPrice, unitRatios } from '../zones.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

type Cell = [row: number, col: number, text: string];

/** Grid with the given 1-based cells set and everything else blank. */
function gridOf(cells: Cell[], rows = 0, cols = 0): Grid {
  const height = Math.max(rows, ...cells.map(c => c[0]));
  const width = Math.max(cols, ...cells.map(c => c[1]));
  const out = Array.from({ length: height }, () => Array.from({ length: width }, () => ''));
  for (const [r, c, text] of cells) out[r - 1][c - 1] = text;
  return out;
}

function anchorOf(grid: Grid): Anchor {
  const res = resolveAnchor(grid);
  if (!res.ok) throw res.error;
  return res.anchor;
}

// ---------------------------------------------------------------------------
// AnchorResolver
// ---------------------------------------------------------------------------

describe('resolveAnchor', () => {
  test('labels on one row', () => {
    const grid = gridOf([[2, 1, '날짜'], [2, 3, 'LOC 평단'], [2, 5, 'LOC 고가']]);
    expect(anchorOf(grid)).toEqual({ headerRow: 2, dateCol: 1, avgCol: 3, highCol: 5 });
  });

  test('zone label one row below the date label moves the header down', () => {
    const grid = gridOf([[5, 2, 'Date'], [5, 4, 'LOC 평단'], [6, 8, 'LOC 고가']]);
    expect(anchorOf(grid)).toEqual({ headerRow: 6, dateCol: 2, avgCol: 4, highCol: 8 });
  });

  test('both zone labels in one column are rejected', () => {
    const grid = gridOf([[5, 2, 'Date'], [5, 4, 'LOC 평단'], [6, 4, 'LOC 고가']]);
    const res = resolveAnchor(grid);
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error).toBeInstanceOf(LayoutError);
      expect(res.error.message).toBe('anchor not found');
    }
  });

  test('an unrelated date label is passed over for one with zone labels', () => {
    const grid = gridOf([
      [1, 1, '체결일자'],
      [4, 1, '날짜'], [4, 3, 'LOC 평단'], [4, 5, 'LOC 고가'],
    ]);
    expect(anchorOf(grid)).toEqual({ headerRow: 4, dateCol: 1, avgCol: 3, highCol: 5 });
  });

  test('zone labels beyond the scan window are found by the fallback', () => {
    const grid = gridOf([[3, 1, '날짜'], [3, 20, 'LOC 평단'], [3, 22, 'LOC 고가']]);
    expect(anchorOf(grid)).toEqual({ headerRow: 3, dateCol: 1, avgCol: 20, highCol: 22 });
  });

  test('fallback accepts a date label on the row above the zone labels', () => {
    const grid = gridOf([[3, 1, '날짜'], [4, 20, 'LOC 평단'], [4, 22, 'LOC 고가']]);
    expect(anchorOf(grid)).toEqual({ headerRow: 4, dateCol: 1, avgCol: 20, highCol: 22 });
  });

  test('both phases agree on the same header', () => {
    const near = anchorOf(gridOf([[3, 1, '날짜'], [3, 4, 'LOC 평단'], [3, 6, 'LOC 고가']]));
    const far = anchorOf(gridOf([[3, 1, '날짜'], [3, 24, 'LOC 평단'], [3, 26, 'LOC 고가']]));
    expect(far.headerRow).toBe(near.headerRow);
    expect(far.dateCol).toBe(near.dateCol);
    expect(far.highCol - far.avgCol).toBe(near.highCol - near.avgCol);
  });

  test('zone labels above the date label resolve to the same anchor as one header row', () => {
    const oneRow = anchorOf(gridOf([[4, 1, '날짜'], [4, 4, 'LOC 평단'], [4, 6, 'LOC 고가']]));
    const split = anchorOf(gridOf([[3, 4, 'LOC 평단'], [3, 6, 'LOC 고가'], [4, 1, '날짜']]));
    expect(oneRow).toEqual({ headerRow: 4, dateCol: 1, avgCol: 4, highCol: 6 });
    expect(split).toEqual(oneRow);
  });

  test('unrelated cells do not move the anchor', () => {
    const labels: Cell[] = [[5, 2, 'Date'], [5, 4, 'LOC 평단'], [6, 8, 'LOC 고가']];
    const noise: Cell[] = [
      [1, 1, 'TQQQ ledger'], [2, 1, 'Current price'], [2, 2, '52.3'],
      [7, 2, '2026-03-02'], [7, 4, '49.1'], [7, 5, '2'], [9, 12, 'memo'],
    ];
    expect(anchorOf(gridOf([...labels, ...noise]))).toEqual(anchorOf(gridOf(labels)));
  });

  test('missing or empty layouts', () => {
    const empty = resolveAnchor([]);
    expect(empty.ok).toBe(false);
    if (!empty.ok) expect(empty.error.message).toBe('ledger grid is empty');

    const noZones = resolveAnchor(gridOf([[1, 1, '날짜'], [1, 2, 'price']]));
    expect(noZones.ok).toBe(false);
  });
});

describe('findTotalQtyColumn', () => {
  test('label on the header row', () => {
    const grid = gridOf([[2, 1, '날짜'], [2, 3, 'LOC 평단'], [2, 5, 'LOC 고가'], [2, 12, '총수량']]);
    expect(findTotalQtyColumn(grid, anchorOf(grid))).toBe(12);
  });

  test('falls back to four columns right of the high zone', () => {
    const grid = gridOf([[2, 1, '날짜'], [2, 3, 'LOC 평단'], [2, 5, 'LOC 고가']]);
    expect(findTotalQtyColumn(grid, anchorOf(grid))).toBe(9);
  });
});

// ---------------------------------------------------------------------------
// RowResolver
// ---------------------------------------------------------------------------

describe('parseLedgerDate', () => {
  test('accepted formats', () => {
    expect(parseLedgerDate('2026-3-4')).toBe('2026-03-04');
    expect(parseLedgerDate('2026-03-04 0:00:00')).toBe('2026-03-04');
    expect(parseLedgerDate('2026/03/04')).toBe('2026-03-04');
    expect(parseLedgerDate(' 2026.3.4 ')).toBe('2026-03-04');
  });

  test('everything else is null', () => {
    expect(parseLedgerDate('2026-02-30')).toBeNull();
    expect(parseLedgerDate('03/04')).toBeNull();
    expect(parseLedgerDate('memo')).toBeNull();
    expect(parseLedgerDate(46085)).toBeNull();
    expect(parseLedgerDate(null)).toBeNull();
  });
});

describe('findOrCreateDateRow', () => {
  const anchor: Anchor = { headerRow: 2, dateCol: 1, avgCol: 3, highCol: 5 };

  function makeSheet() {
    return new MemoryLedgerSheet('sheet-1', 'TQQQ ledger', [
      ['TQQQ ledger'],
      ['날짜', null, 'LOC 평단', null, 'LOC 고가'],
      ['2026-03-02', null, 49.1, 2],
      ['2026/03/03', null, null, null, 51.2, 1],
    ]);
  }

  test('finds an existing row without writing', async () => {
    const sheet = makeSheet();
    const grid = await sheet.getAllCells();
    expect(findDateRow(grid, anchor, '2026-03-03')).toBe(4);
    expect(await findOrCreateDateRow(sheet, grid, anchor, '2026-03-03')).toBe(4);
    expect(sheet.writes).toHaveLength(0);
  });

  test('appends a missing date once', async () => {
    const sheet = makeSheet();
    const first = await findOrCreateDateRow(sheet, await sheet.getAllCells(), anchor, '2026-03-04');
    expect(first).toBe(5);
    expect(sheet.writes).toHaveLength(1);
    expect(sheet.writes[0]).toMatchObject({ ref: { row: 5, col: 1 }, before: null, value: '2026-03-04' });

    const second = await findOrCreateDateRow(sheet, await sheet.getAllCells(), anchor, '2026-03-04');
    expect(second).toBe(5);
    expect(sheet.writes).toHaveLength(1);
  });

  test('takes the first blank date cell under the header', async () => {
    const sheet = makeSheet();
    sheet.set({ row: 3, col: 1 }, null);
    const row = await findOrCreateDateRow(sheet, await sheet.getAllCells(), anchor, '2026-03-04');
    expect(row).toBe(3);
    expect(await sheet.getCell({ row: 3, col: 1 })).toBe('2026-03-04');
  });
});

// ---------------------------------------------------------------------------
// ZoneClassifier
// ---------------------------------------------------------------------------

describe('classifyByPrice', () => {
  test('at or below the reference is the avg zone', () => {
    expect(classifyByPrice(10, 10)).toBe('avg');
    expect(classifyByPrice(9.5, 10)).toBe('avg');
    expect(classifyByPrice(10.0001, 10)).toBe('high');
  });

  test('reference must be positive', () => {
    expect(() => classifyByPrice(10, 0)).toThrow(ClassificationError);
    expect(() => classifyByPrice(10, -1)).toThrow(ClassificationError);
    expect(() => classifyByPrice(10, NaN)).toThrow(ClassificationError);
  });
});

describe('classifyByAmount', () => {
  const base = { price: 95, halfUnit: 100, referenceAvg: 100 };

  test('about two half units splits across both zones', () => {
    const d = classifyByAmount({ ...base, amount: 180 });
    expect(d).toEqual({ kind: 'dual', ratioHalf: 1.8, ratioFull: 0.9 });
  });

  test('about one half unit goes to the price zone', () => {
    expect(classifyByAmount({ ...base, amount: 90 })).toMatchObject({ kind: 'single', zone: 'avg' });
    expect(classifyByAmount({ ...base, amount: 90, price: 101 })).toMatchObject({ kind: 'single', zone: 'high' });
  });

  test('anything else is skipped', () => {
    expect(classifyByAmount({ ...base, amount: 50 })).toEqual({
      kind: 'skip', reason: 'amount outside unit bands', ratioHalf: 0.5, ratioFull: 0.25,
    });
    expect(classifyByAmount({ ...base, amount: 130 })).toMatchObject({ kind: 'skip' });
  });

  test('band edges are inclusive', () => {
    expect(classifyByAmount({ ...base, amount: 80 })).toMatchObject({ kind: 'single' });
    expect(classifyByAmount({ ...base, amount: 120 })).toMatchObject({ kind: 'single' });
    expect(classifyByAmount({ ...base, amount: 160 })).toMatchObject({ kind: 'dual' });
    expect(classifyByAmount({ ...base, amount: 240 })).toMatchObject({ kind: 'dual' });
  });

  test('a non-positive half unit skips', () => {
    expect(unitRatios(100, 0)).toEqual({ ratioHalf: 0, ratioFull: 0 });
    expect(classifyByAmount({ ...base, amount: 100, halfUnit: 0 })).toMatchObject({ kind: 'skip' });
  });

  test('a bad reference price turns a single write into a skip', () => {
    expect(classifyByAmount({ ...base, amount: 100, referenceAvg: 0 })).toEqual({
      kind: 'skip',
      reason: 'reference average price must be positive, got 0',
      ratioHalf: 1,
      ratioFull: 0.5,
    });
  });
});
