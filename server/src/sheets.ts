import { google, sheets_v4 } from 'googleapis';

import { httpError, TransportError } from './errors.js';
import { toA1, toGrid } from './grid.js';
import type { CellRender, LedgerBook, LedgerSheet } from './store.js';
import type { CellCoord, CellValue, Grid } from './types.js';

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];
const TIMEOUT_MS = 60_000;

/** "TQQQ:abc, BTC:def" -> { TQQQ: 'abc', BTC: 'def' }; malformed pairs are ignored. */
export function parseSpreadsheetIdMap(raw: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const item of raw.split(',')) {
    const pair = item.trim();
    const i = pair.indexOf(':');
    if (i < 0) continue;
    const symbol = pair.slice(0, i).trim().toUpperCase();
    const id = pair.slice(i + 1).trim();
    if (symbol && id) out[symbol] = id;
  }
  return out;
}

function quoteSheet(name: string): string {
  return `'${name.replace(/'/g, "''")}'`;
}

function statusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('status' in err && typeof err.status === 'number') return err.status;
  if ('response' in err && typeof err.response === 'object' && err.response !== null
    && 'status' in err.response && typeof err.response.status === 'number') return err.response.status;
  return undefined;
}

async function call<T>(what: string, fn: () => Promise<{ data: T }>): Promise<T> {
  try {
    return (await fn()).data;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    const text = `Sheets ${what} failed: ${msg.slice(0, 200)}`;
    const status = statusOf(err);
    throw status === undefined ? new TransportError(text, { cause: err }) : httpError(text, status, { cause: err });
  }
}

class GoogleLedgerSheet implements LedgerSheet {
  constructor(private api: sheets_v4.Sheets, readonly id: string, readonly title: string, private worksheet: string) {}

  private range(ref?: CellCoord) {
    return ref ? `${quoteSheet(this.worksheet)}!${toA1(ref)}` : quoteSheet(this.worksheet);
  }

  async getAllCells(): Promise<Grid> {
    const data = await call('values.get', () =>
      this.api.spreadsheets.values.get({ spreadsheetId: this.id, range: this.range() }, { timeout: TIMEOUT_MS }));
    return toGrid(data.values ?? []);
  }

  async getCell(ref: CellCoord, render: CellRender = 'formatted'): Promise<CellValue> {
    const data = await call('values.get', () =>
      this.api.spreadsheets.values.get({
        spreadsheetId: this.id,
        range: this.range(ref),
        valueRenderOption: render === 'computed' ? 'UNFORMATTED_VALUE' : 'FORMATTED_VALUE',
      }, { timeout: TIMEOUT_MS }));
    const v: unknown = data.values?.[0]?.[0];
    if (typeof v === 'number' || typeof v === 'string') return v;
    if (typeof v === 'boolean') return v ? 'TRUE' : 'FALSE';
    return null;
  }

  async updateCell(ref: CellCoord, value: string | number): Promise<void> {
    await call('values.update', () =>
      this.api.spreadsheets.values.update({
        spreadsheetId: this.id,
        range: this.range(ref),
        valueInputOption: 'RAW',
        requestBody: { values: [[value]] },
      }, { timeout: TIMEOUT_MS }));
  }
}

/** Ledgers in Google Sheets, addressed by symbol through a spreadsheet id map. */
export class GoogleSheetsLedgerBook implements LedgerBook {
  private api: sheets_v4.Sheets;
  private spreadsheetIds: Record<string, string>;
  private worksheet?: string;

  constructor(opts: { keyFile: string; spreadsheetIds: Record<string, string>; worksheet?: string }) {
    const auth = new google.auth.GoogleAuth({ keyFile: opts.keyFile, scopes: SCOPES });
    this.api = google.sheets({ version: 'v4', auth });
    this.spreadsheetIds = opts.spreadsheetIds;
    this.worksheet = opts.worksheet;
  }

  async open(symbol: string): Promise<LedgerSheet> {
    const id = this.spreadsheetIds[symbol.toUpperCase()];
    if (!id) throw new Error(`SPREADSHEET_ID_MAP has no entry for ${symbol} (e.g. SPREADSHEET_ID_MAP=${symbol.toUpperCase()}:<spreadsheet_id>)`);

    const meta = await call('spreadsheets.get', () =>
      this.api.spreadsheets.get({ spreadsheetId: id, fields: 'properties.title,sheets.properties.title' }, { timeout: TIMEOUT_MS }));
    const worksheet = this.worksheet || meta.sheets?.[0]?.properties?.title;
    if (!worksheet) throw new Error(`Spreadsheet ${id} has no worksheets`);
    return new GoogleLedgerSheet(this.api, id, meta.properties?.title ?? symbol, worksheet);
  }
}
