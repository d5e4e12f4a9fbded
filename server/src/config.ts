import { z } from 'zod';

import { ConfigError } from './errors.js';
import { GoogleSheetsLedgerBook, parseSpreadsheetIdMap } from './sheets.js';
import { XlsxLedgerBook, type LedgerBook } from './store.js';

const TRUE_WORDS = new Set(['1', 'true', 'yes', 'on']);

const flag = (fallback: boolean) =>
  z.string().optional().transform(v => (v === undefined || v.trim() === '' ? fallback : TRUE_WORDS.has(v.trim().toLowerCase())));

const text = (fallback = '') => z.string().optional().transform(v => (v ?? '').trim() || fallback);

const int = (fallback: number, min: number) =>
  z.string().optional().transform((v, ctx) => {
    if (v === undefined || v.trim() === '') return fallback;
    const n = Number(v);
    if (!Number.isInteger(n) || n < min) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected an integer >= ${min}, got "${v}"` });
      return z.NEVER;
    }
    return n;
  });

const EnvSchema = z.object({
  TIMEZONE: text('Asia/Seoul'),
  TELEGRAM_BOT_TOKEN: text(),
  TELEGRAM_POLL_TIMEOUT: int(30, 0),
  TELEGRAM_POLL_INTERVAL: int(2, 0),
  STATE_FILE: text('./data/state.json'),
  START_FROM_LATEST_ON_FIRST_RUN: flag(true),

  LEDGER_BACKEND: z.string().optional().transform(v => (v ?? '').trim().toLowerCase() || 'google').pipe(z.enum(['google', 'xlsx'])),
  GOOGLE_SERVICE_ACCOUNT_FILE: text(),
  SPREADSHEET_ID_MAP: text(),
  LEDGER_XLSX_DIR: text(),
  WORKSHEET_NAME: text(),
  SPREADSHEET_BACKUP_DIR: z.string().optional().transform(v => (v === undefined ? './data/backups' : v.trim())),

  UPBIT_ENABLED: flag(false),
  UPBIT_ACCESS_KEY: text(),
  UPBIT_SECRET_KEY: text(),
  UPBIT_MARKET: text().transform(v => v.toUpperCase()),
  UPBIT_MARKET_ASSET: text('BTC').transform(v => v.toUpperCase()),
  UPBIT_SHEET_SYMBOL: text('BTC').transform(v => v.toUpperCase()),
  UPBIT_BASE_URL: text('https://api.upbit.com'),
  UPBIT_ORDERS_PATH: text('/v1/orders'),
  UPBIT_MAX_PAGES: int(30, 1),
  UPBIT_COMMAND_TEXT: text('upbit sync'),

  PORT: int(3000, 1),
});

export type AppConfig = {
  timeZone: string;
  telegram: { token: string; pollTimeout: number; pollInterval: number };
  stateFile: string;
  startFromLatestOnFirstRun: boolean;
  ledger:
    | { backend: 'google'; keyFile: string; spreadsheetIds: Record<string, string>; worksheet?: string }
    | { backend: 'xlsx'; dir: string; worksheet?: string };
  /** Empty disables backups. */
  backupDir: string;
  upbit: {
    enabled: boolean;
    accessKey: string;
    secretKey: string;
    market?: string;
    asset: string;
    sheetSymbol: string;
    baseUrl: string;
    ordersPath: string;
    maxPages: number;
    commandText: string;
  };
  port: number;
};

function isTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

/** Validates the environment; every problem is reported in one ConfigError. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`);
  }
  const e = parsed.data;

  const problems: string[] = [];
  if (!e.TELEGRAM_BOT_TOKEN) problems.push('TELEGRAM_BOT_TOKEN is required');
  if (!isTimeZone(e.TIMEZONE)) problems.push(`TIMEZONE is not a known time zone: ${e.TIMEZONE}`);
  if (e.LEDGER_BACKEND === 'google' && !e.GOOGLE_SERVICE_ACCOUNT_FILE) problems.push('GOOGLE_SERVICE_ACCOUNT_FILE is required for LEDGER_BACKEND=google');
  if (e.LEDGER_BACKEND === 'xlsx' && !e.LEDGER_XLSX_DIR) problems.push('LEDGER_XLSX_DIR is required for LEDGER_BACKEND=xlsx');
  if (problems.length) throw new ConfigError(`Invalid environment: ${problems.join('; ')}`);

  const worksheet = e.WORKSHEET_NAME || undefined;
  return {
    timeZone: e.TIMEZONE,
    telegram: { token: e.TELEGRAM_BOT_TOKEN, pollTimeout: e.TELEGRAM_POLL_TIMEOUT, pollInterval: e.TELEGRAM_POLL_INTERVAL },
    stateFile: e.STATE_FILE,
    startFromLatestOnFirstRun: e.START_FROM_LATEST_ON_FIRST_RUN,
    ledger: e.LEDGER_BACKEND === 'google'
      ? { backend: 'google', keyFile: e.GOOGLE_SERVICE_ACCOUNT_FILE, spreadsheetIds: parseSpreadsheetIdMap(e.SPREADSHEET_ID_MAP), worksheet }
      : { backend: 'xlsx', dir: e.LEDGER_XLSX_DIR, worksheet },
    backupDir: e.SPREADSHEET_BACKUP_DIR,
    upbit: {
      enabled: e.UPBIT_ENABLED,
      accessKey: e.UPBIT_ACCESS_KEY,
      secretKey: e.UPBIT_SECRET_KEY,
      market: e.UPBIT_MARKET || undefined,
      asset: e.UPBIT_MARKET_ASSET,
      sheetSymbol: e.UPBIT_SHEET_SYMBOL,
      baseUrl: e.UPBIT_BASE_URL,
      ordersPath: e.UPBIT_ORDERS_PATH,
      maxPages: e.UPBIT_MAX_PAGES,
      commandText: e.UPBIT_COMMAND_TEXT,
    },
    port: e.PORT,
  };
}

export function createLedgerBook(ledger: AppConfig['ledger']): LedgerBook {
  if (ledger.backend === 'google') {
    return new GoogleSheetsLedgerBook({ keyFile: ledger.keyFile, spreadsheetIds: ledger.spreadsheetIds, worksheet: ledger.worksheet });
  }
  return new XlsxLedgerBook(ledger.dir, ledger.worksheet);
}
