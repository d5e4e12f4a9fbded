import { findTotalQtyColumn, resolveAnchor } from './anchor.js';
import { ParseError } from './errors.js';
import { colToA1, fromA1 } from './grid.js';
import { parseNumber, currencyForSymbol } from './numbers.js';
import { findOrCreateDateRow } from './rows.js';
import type { LedgerBook, LedgerSheet } from './store.js';
import type { Anchor, FillEvent, Grid, LedgerCells, LedgerSummary, WriteOutcome, Zone } from './types.js';
import { classifyByAmount, classifyByPrice } from './zones.js';

export const DEFAULT_LEDGER_CELLS: LedgerCells = {
  avgPrice: 'R6',
  currentPrice: 'B2',
  halfUnit: 'B3',
  avgZoneTarget: 'R9',
  highZoneTarget: 'R10',
  sellTarget: 'R11',
};

/** Called once the snapshot is taken and before anything is written. */
export type BackupHook = (sheet: LedgerSheet, grid: Grid) => Promise<void>;

export type LedgerLayout = { grid: Grid; anchor: Anchor; totalQtyCol: number };

/** Computed value of a cell as a number; formulas that come back as text, blanks and words are rejected. */
export async function readNumber(sheet: LedgerSheet, a1: string): Promise<number> {
  const raw = await sheet.getCell(fromA1(a1), 'computed');
  if (typeof raw === 'number') return raw;
  if (typeof raw === 'string') {
    const s = raw.trim();
    if (s.startsWith('=')) throw new ParseError(`${a1} returned a formula instead of a value: ${s}`);
    return parseNumber(s);
  }
  throw new ParseError(`${a1} has no numeric value`);
}

async function readNumberOrNull(sheet: LedgerSheet, a1: string): Promise<number | null> {
  try {
    return await readNumber(sheet, a1);
  } catch (err) {
    if (err instanceof ParseError) return null;
    throw err;
  }
}

const zoneCol = (anchor: Anchor, zone: Zone) => (zone === 'avg' ? anchor.avgCol : anchor.highCol);

/**
 * Applies single fills to ledgers. Layout is resolved again on every call, so
 * manual edits between runs are picked up.
 */
export class LedgerWriter {
  private cells: LedgerCells;

  constructor(private book: LedgerBook, opts: { cells?: Partial<LedgerCells> } = {}) {
    this.cells = { ...DEFAULT_LEDGER_CELLS, ...opts.cells };
  }

  async loadLayout(sheet: LedgerSheet, backup?: BackupHook): Promise<LedgerLayout> {
    const grid = await sheet.getAllCells();
    if (backup) await backup(sheet, grid);
    const resolved = resolveAnchor(grid);
    if (!resolved.ok) throw resolved.error;
    return { grid, anchor: resolved.anchor, totalQtyCol: findTotalQtyColumn(grid, resolved.anchor) };
  }

  async applyBrokerFill(fill: FillEvent, backup?: BackupHook): Promise<WriteOutcome> {
    if (fill.side !== 'buy') return { status: 'skipped', reason: `side ${fill.side} is not recorded` };
    if (fill.qty < 0) return { status: 'skipped', reason: 'negative quantity' };

    const sheet = await this.book.open(fill.symbol);
    const { grid, anchor, totalQtyCol } = await this.loadLayout(sheet, backup);
    const avgPrice = await readNumber(sheet, this.cells.avgPrice);
    const zone = classifyByPrice(fill.price, avgPrice);
    const priceCol = zoneCol(anchor, zone);
    const row = await findOrCreateDateRow(sheet, grid, anchor, fill.tradeDate);

    console.log(`[ledger] write symbol=${fill.symbol} row=${row} zone=${zone} price_col=${colToA1(priceCol)} qty_col=${colToA1(priceCol + 1)}`);
    await sheet.updateCell({ row, col: priceCol }, fill.price);
    await sheet.updateCell({ row, col: priceCol + 1 }, fill.qty);

    return { status: 'written', mode: 'single', zone, row, summary: await this.readSummary(sheet, row, totalQtyCol, fill.symbol) };
  }

  async applyExchangeFill(ledgerSymbol: string, fill: FillEvent, backup?: BackupHook): Promise<WriteOutcome> {
    if (fill.side !== 'buy') return { status: 'skipped', reason: `side ${fill.side} is not recorded` };

    const sheet = await this.book.open(ledgerSymbol);
    const { grid, anchor, totalQtyCol } = await this.loadLayout(sheet, backup);

    const halfUnit = await readNumber(sheet, this.cells.halfUnit);
    const avgPrice = await readNumber(sheet, this.cells.avgPrice);
    const decision = classifyByAmount({ amount: fill.amount, price: fill.price, halfUnit, referenceAvg: avgPrice });
    const ratios = `ratio_half=${decision.ratioHalf.toFixed(4)} ratio_full=${decision.ratioFull.toFixed(4)}`;
    console.log(`[ledger] ratio_check fill_id=${fill.id} amount=${fill.amount.toFixed(4)} half_unit=${halfUnit.toFixed(4)} ${ratios}`);

    if (decision.kind === 'skip') {
      console.log(`[ledger] fill_skipped fill_id=${fill.id} reason="${decision.reason}" ${ratios}`);
      return { status: 'skipped', reason: decision.reason };
    }

    const row = await findOrCreateDateRow(sheet, grid, anchor, fill.tradeDate);

    if (decision.kind === 'dual') {
      const halfQty = fill.qty / 2;
      console.log(`[ledger] write mode=dual symbol=${ledgerSymbol} row=${row} price=${fill.price} qty_half=${halfQty}`);
      for (const zone of ['avg', 'high'] as const) {
        const col = zoneCol(anchor, zone);
        await sheet.updateCell({ row, col }, fill.price);
        await sheet.updateCell({ row, col: col + 1 }, halfQty);
      }
      return { status: 'written', mode: 'dual', row, summary: await this.readSummary(sheet, row, totalQtyCol, ledgerSymbol) };
    }

    const col = zoneCol(anchor, decision.zone);
    console.log(`[ledger] write mode=single symbol=${ledgerSymbol} row=${row} zone=${decision.zone} price=${fill.price} qty=${fill.qty}`);
    await sheet.updateCell({ row, col }, fill.price);
    await sheet.updateCell({ row, col: col + 1 }, fill.qty);
    return { status: 'written', mode: 'single', zone: decision.zone, row, summary: await this.readSummary(sheet, row, totalQtyCol, ledgerSymbol) };
  }

  async readSummary(sheet: LedgerSheet, row: number, totalQtyCol: number, symbol: string): Promise<LedgerSummary> {
    const sellQty = await readNumberOrNull(sheet, `${colToA1(totalQtyCol)}${row}`);
    return {
      title: sheet.title,
      currency: currencyForSymbol(symbol),
      avgPrice: await readNumber(sheet, this.cells.avgPrice),
      currentPrice: await readNumber(sheet, this.cells.currentPrice),
      avgZoneTarget: await readNumber(sheet, this.cells.avgZoneTarget),
      highZoneTarget: await readNumber(sheet, this.cells.highZoneTarget),
      sellTarget: await readNumber(sheet, this.cells.sellTarget),
      sellQtyCurrentRound: sellQty ?? 0,
    };
  }
}
