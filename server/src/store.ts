import path from 'path';
import * as XLSX from 'xlsx';

import { displayText, toA1, toGrid } from './grid.js';
import type { CellCoord, CellValue, Grid } from './types.js';

/** 'formatted' is the display text; 'computed' the underlying value, which may be a raw formula string. */
export type CellRender = 'formatted' | 'computed';

export interface LedgerSheet {
  readonly id: string;
  readonly title: string;
  getAllCells(): Promise<Grid>;
  getCell(ref: CellCoord, render?: CellRender): Promise<CellValue>;
  updateCell(ref: CellCoord, value: string | number): Promise<void>;
}

export interface LedgerBook {
  open(symbol: string): Promise<LedgerSheet>;
}

export type CellWrite = { ts: number; ref: CellCoord; before: CellValue; value: string | number };

type PersistCell = (ref: CellCoord, value: string | number) => void | Promise<void>;

export class MemoryLedgerSheet implements LedgerSheet {
  readonly writes: CellWrite[] = [];
  private rows: CellValue[][];

  constructor(readonly id: string, readonly title: string, rows: readonly (readonly CellValue[])[] = [], private persist?: PersistCell) {
    this.rows = rows.map(r => [...r]);
  }

  // ===== Helpers =====
  private ensureSize(rows: number, cols: number) {
    while (this.rows.length < rows) this.rows.push([]);
    const r = this.rows[rows - 1];
    while (r.length < cols) r.push(null);
  }

  private valueAt({ row, col }: CellCoord): CellValue {
    return this.rows[row - 1]?.[col - 1] ?? null;
  }

  // ===== LedgerSheet =====
  async getAllCells(): Promise<Grid> {
    return toGrid(this.rows);
  }

  async getCell(ref: CellCoord, render: CellRender = 'formatted'): Promise<CellValue> {
    const v = this.valueAt(ref);
    if (v === null) return null;
    return render === 'computed' ? v : displayText(v);
  }

  async updateCell(ref: CellCoord, value: string | number): Promise<void> {
    if (ref.row < 1 || ref.col < 1) throw new Error(`Bad cell ${ref.row},${ref.col}`);
    const before = this.valueAt(ref);
    this.ensureSize(ref.row, ref.col);
    this.rows[ref.row - 1][ref.col - 1] = value;
    this.writes.push({ ts: Date.now(), ref, before, value });
    if (this.persist) await this.persist(ref, value);
  }

  /** Direct edit that bypasses the write log, for staging a ledger. */
  set(ref: CellCoord, value: CellValue) {
    this.ensureSize(ref.row, ref.col);
    this.rows[ref.row - 1][ref.col - 1] = value;
  }
}

export class MemoryLedgerBook implements LedgerBook {
  private sheets = new Map<string, MemoryLedgerSheet>();

  add(symbol: string, sheet: MemoryLedgerSheet) {
    this.sheets.set(symbol.toUpperCase(), sheet);
    return sheet;
  }

  async open(symbol: string): Promise<LedgerSheet> {
    const s = this.sheets.get(symbol.toUpperCase());
    if (!s) throw new Error(`Ledger not found: ${symbol}`);
    return s;
  }
}

function toCellValue(v: unknown): CellValue {
  if (v === null || v === undefined) return null;
  if (typeof v === 'string' || typeof v === 'number') return v;
  if (typeof v === 'boolean' || v instanceof Date) return displayText(v);
  return String(v);
}

/**
 * Ledgers kept as local workbooks, one `<SYMBOL>.xlsx` per symbol. Every cell
 * write is saved straight back to the file. Formulas survive the round trip
 * but their cached values are not recalculated.
 */
export class XlsxLedgerBook implements LedgerBook {
  constructor(private dir: string, private worksheet?: string) {}

  async open(symbol: string): Promise<LedgerSheet> {
    const file = path.join(this.dir, `${symbol.toUpperCase()}.xlsx`);
    const wb = XLSX.readFile(file, { cellDates: true });
    const name = this.worksheet || wb.SheetNames[0];
    const ws = name ? wb.Sheets[name] : undefined;
    if (!name || !ws) throw new Error(`Sheet not found: ${this.worksheet ?? '(first)'} in ${file}`);

    // Read from A1 so grid coordinates match the sheet's even when the used range starts later.
    const used = ws['!ref'];
    const raw = used
      ? XLSX.utils.sheet_to_json<unknown[]>(ws, { header: 1, raw: true, defval: null, blankrows: true, range: { s: { r: 0, c: 0 }, e: XLSX.utils.decode_range(used).e } })
      : [];
    const rows = raw.map(r => r.map(toCellValue));
    const title = path.basename(file, '.xlsx');

    return new MemoryLedgerSheet(file, title, rows, (ref, value) => {
      XLSX.utils.sheet_add_aoa(ws, [[value]], { origin: toA1(ref) });
      XLSX.writeFile(wb, file);
    });
  }
}
