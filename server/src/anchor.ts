import { LayoutError } from './errors.js';
import { cellText, gridWidth } from './grid.js';
import { matchesLabel, type LabelClass } from './labels.js';
import type { Anchor, Grid } from './types.js';

export type AnchorResult = { ok: true; anchor: Anchor } | { ok: false; error: LayoutError };

type Hit = { row: number; col: number };

/** Rows (starting at the date label's row) and columns (after it) searched for zone labels. */
const ZONE_SCAN_ROWS = 2;
const ZONE_SCAN_COLS = 13;

/** Fallback distance from the high-zone price column to the running total. */
const TOTAL_QTY_OFFSET = 4;

/**
 * Locates the header row and the date/avg/high columns of a ledger.
 *
 * Tries the date label first, looking right and down for both zone labels;
 * then falls back to the first zone labels anywhere in the grid with a date
 * label on the same or an adjacent row. Zone columns must differ.
 */
export function resolveAnchor(grid: Grid): AnchorResult {
  if (grid.length === 0) return { ok: false, error: new LayoutError('ledger grid is empty') };
  const anchor = scanFromDateLabel(grid) ?? scanFromZoneLabels(grid);
  if (!anchor) return { ok: false, error: new LayoutError('anchor not found') };
  return { ok: true, anchor };
}

function scanFromDateLabel(grid: Grid): Anchor | null {
  const width = gridWidth(grid);
  for (let r = 1; r <= grid.length; r++) {
    const row = grid[r - 1];
    for (let c = 1; c <= row.length; c++) {
      if (!matchesLabel('date', row[c - 1])) continue;

      let avg: Hit | null = null;
      let high: Hit | null = null;
      const lastRow = Math.min(r + ZONE_SCAN_ROWS - 1, grid.length);
      const lastCol = Math.min(c + ZONE_SCAN_COLS, width);
      for (let rr = r; rr <= lastRow; rr++) {
        for (let cc = c + 1; cc <= lastCol; cc++) {
          const text = cellText(grid, rr, cc);
          if (!avg && matchesLabel('avg', text)) avg = { row: rr, col: cc };
          if (!high && matchesLabel('high', text)) high = { row: rr, col: cc };
        }
      }
      if (avg && high && avg.col !== high.col) {
        return { headerRow: Math.max(r, avg.row, high.row), dateCol: c, avgCol: avg.col, highCol: high.col };
      }
    }
  }
  return null;
}

function firstHit(grid: Grid, cls: LabelClass): Hit | null {
  for (let r = 1; r <= grid.length; r++) {
    const row = grid[r - 1];
    for (let c = 1; c <= row.length; c++) if (matchesLabel(cls, row[c - 1])) return { row: r, col: c };
  }
  return null;
}

function scanFromZoneLabels(grid: Grid): Anchor | null {
  const avg = firstHit(grid, 'avg');
  const high = firstHit(grid, 'high');
  if (!avg || !high || avg.col === high.col) return null;

  for (const base of [avg.row, high.row]) {
    for (const rr of [base, base - 1, base + 1]) {
      if (rr < 1 || rr > grid.length) continue;
      const row = grid[rr - 1];
      for (let c = 1; c <= row.length; c++) {
        if (matchesLabel('date', row[c - 1])) {
          return { headerRow: Math.max(rr, avg.row, high.row), dateCol: c, avgCol: avg.col, highCol: high.col };
        }
      }
    }
  }
  return null;
}

/** Column of the running total quantity, near the header or at a fixed offset. */
export function findTotalQtyColumn(grid: Grid, anchor: Anchor): number {
  for (const rr of [anchor.headerRow, anchor.headerRow - 1, anchor.headerRow + 1]) {
    if (rr < 1 || rr > grid.length) continue;
    const row = grid[rr - 1];
    for (let c = 1; c <= row.length; c++) if (matchesLabel('totalQty', row[c - 1])) return c;
  }
  return anchor.highCol + TOTAL_QTY_OFFSET;
}
