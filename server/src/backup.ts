import { mkdir } from 'fs/promises';
import path from 'path';
import * as XLSX from 'xlsx';

import type { BackupHook } from './ledger.js';
import type { LedgerSheet } from './store.js';
import type { Grid } from './types.js';

function safeName(s: string, fallback: string): string {
  return s.replace(/[^0-9A-Za-z._-]+/g, '_').replace(/^_+|_+$/g, '') || fallback;
}

function stamp(d: Date): string {
  const p = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}${p(d.getMonth() + 1)}${p(d.getDate())}_${p(d.getHours())}${p(d.getMinutes())}${p(d.getSeconds())}`;
}

/** Writes the snapshot as a one-sheet workbook and returns its path. */
export async function writeLedgerBackup(dir: string, sheet: LedgerSheet, grid: Grid, context: string, bucket: string, now = new Date()): Promise<string> {
  const targetDir = path.join(dir, safeName(bucket, 'misc'));
  await mkdir(targetDir, { recursive: true });
  const file = path.join(
    targetDir,
    `${stamp(now)}_${safeName(sheet.title, 'spreadsheet')}_${safeName(sheet.id, 'ledger')}_${safeName(context, 'run')}.xlsx`,
  );

  const book = XLSX.utils.book_new();
  const aoa = grid.map(row => [...row]);
  XLSX.utils.book_append_sheet(book, XLSX.utils.aoa_to_sheet(aoa), safeName(sheet.title, 'ledger').slice(0, 31));
  XLSX.writeFile(book, file);
  return file;
}

/**
 * Backs each ledger up at most once for the lifetime of the hook; callers
 * create one hook per handled update.
 */
export function createBackupHook(dir: string, context: string, bucket: string): BackupHook {
  const done = new Set<string>();
  return async (sheet, grid) => {
    const key = `${sheet.id}:${context}:${bucket}`;
    if (done.has(key)) return;
    const file = await writeLedgerBackup(dir, sheet, grid, context, bucket);
    done.add(key);
    console.log(`[backup] done path=${file}`);
  };
}
