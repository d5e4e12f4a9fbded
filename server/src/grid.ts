import type { CellCoord, CellValue, Grid } from './types.js';

export function colToA1(col: number): string {
  let n = col, s = '';
  while (n > 0) { const rem = (n - 1) % 26; s = String.fromCharCode(65 + rem) + s; n = Math.floor((n - 1) / 26); }
  return s;
}

export function toA1({ row, col }: CellCoord): string {
  return colToA1(col) + row;
}

export function fromA1(ref: string): CellCoord {
  const m = ref.trim().match(/^([A-Za-z]+)([0-9]+)$/);
  if (!m) throw new Error(`Bad A1 ref: ${ref}`);
  const colStr = m[1].toUpperCase();
  let col = 0;
  for (let i = 0; i < colStr.length; i++) col = col * 26 + (colStr.charCodeAt(i) - 64);
  return { row: parseInt(m[2], 10), col };
}

/** Text of a 1-based cell; anything outside the ragged grid is ''. */
export function cellText(grid: Grid, row: number, col: number): string {
  if (row < 1 || col < 1) return '';
  return grid[row - 1]?.[col - 1] ?? '';
}

export function gridWidth(grid: Grid): number {
  return grid.reduce((m, r) => Math.max(m, r.length), 0);
}

export function displayText(value: CellValue | boolean | Date | undefined): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) {
    const mm = String(value.getMonth() + 1).padStart(2, '0');
    const dd = String(value.getDate()).padStart(2, '0');
    return `${value.getFullYear()}-${mm}-${dd}`;
  }
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  return String(value);
}

export function toGrid(rows: readonly (readonly unknown[])[]): Grid {
  return rows.map(row => row.map(v => {
    if (v === null || v === undefined || typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean' || v instanceof Date) {
      return displayText(v);
    }
    return String(v);
  }));
}
