import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';

import { describeError } from './errors.js';
import type { BotState } from './types.js';

const StateSchema = z.object({
  lastUpdateId: z.number().int().default(0),
  processedFillIds: z.array(z.string()).default([]),
  defaultChatId: z.number().optional(),
});

// fs errors may come from another realm (e.g. under a test VM), so no instanceof.
function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

export function emptyState(): BotState {
  return { lastUpdateId: 0, processedFillIds: [] };
}

/**
 * Reads the bot state. A missing file means first run (`existed: false`);
 * an unreadable or malformed one is reset to empty.
 */
export async function loadState(file: string): Promise<{ state: BotState; existed: boolean }> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (err) {
    if (isNotFound(err)) return { state: emptyState(), existed: false };
    throw err;
  }

  try {
    const parsed = StateSchema.safeParse(JSON.parse(text));
    if (parsed.success) return { state: parsed.data, existed: true };
    console.warn(`[state] invalid state file, resetting path=${file} error="${parsed.error.issues[0]?.message ?? 'invalid'}"`);
  } catch (err) {
    console.warn(`[state] unreadable state file, resetting path=${file} error="${describeError(err)}"`);
  }
  return { state: emptyState(), existed: true };
}

export async function saveState(file: string, state: BotState): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, JSON.stringify(state, null, 2), 'utf8');
}
