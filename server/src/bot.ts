import { setTimeout as sleep } from 'timers/promises';

import { createBackupHook } from './backup.js';
import type { AppConfig } from './config.js';
import { describeError, isEventLocal, TransportError } from './errors.js';
import type { TradeHistorySource } from './exchange.js';
import type { BackupHook, LedgerWriter } from './ledger.js';
import { buildLedgerReply, buildSyncReply, parseBrokerFillMessage, parseSyncCommand } from './messages.js';
import { emptyState, loadState, saveState } from './state.js';
import { runExchangeSync } from './sync.js';
import { updateChatId, updateText, type Notifier, type TelegramUpdate, type UpdateSource } from './telegram.js';
import type { BotState } from './types.js';

export type BotConfig = Pick<AppConfig, 'timeZone' | 'telegram' | 'stateFile' | 'startFromLatestOnFirstRun' | 'backupDir' | 'upbit'>;

export type FillBotDeps = {
  chat: UpdateSource & Notifier;
  writer: LedgerWriter;
  tradeSource: (upbit: AppConfig['upbit']) => TradeHistorySource;
  config: BotConfig;
  now?: () => Date;
};

export type BotSnapshot = { lastUpdateId: number; processedFillIds: number; defaultChatId: number | null };

const ERROR_BACKOFF_SEC = 3;

/**
 * Long-polls the chat, turning brokerage notices and sync commands into
 * ledger writes. Updates are handled one at a time, in id order.
 */
export class FillBot {
  private state: BotState = emptyState();
  private readonly now: () => Date;

  constructor(private deps: FillBotDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  snapshot(): BotSnapshot {
    return {
      lastUpdateId: this.state.lastUpdateId,
      processedFillIds: this.state.processedFillIds.length,
      defaultChatId: this.state.defaultChatId ?? null,
    };
  }

  /** Loads state; on a first run the pending backlog can be skipped. */
  async start(): Promise<void> {
    const { stateFile, startFromLatestOnFirstRun } = this.deps.config;
    const { state, existed } = await loadState(stateFile);
    this.state = state;
    console.log(`[bot] start last_update_id=${state.lastUpdateId} seen=${state.processedFillIds.length}`);

    if (existed || !startFromLatestOnFirstRun) return;
    const backlog = await this.deps.chat.getUpdates(0, 0);
    if (backlog.length === 0) return;
    this.state.lastUpdateId = Math.max(...backlog.map(u => u.update_id));
    await saveState(stateFile, this.state);
    console.log(`[bot] warmup_skip count=${backlog.length} last_update_id=${this.state.lastUpdateId}`);
  }

  /** One fetch-and-handle cycle. A TransportError aborts it before the failing update is committed; other failures are logged and passed over. */
  async pollOnce(): Promise<number> {
    const { config } = this.deps;
    const updates = await this.deps.chat.getUpdates(this.state.lastUpdateId + 1, config.telegram.pollTimeout);
    if (updates.length) console.log(`[bot] updates_received count=${updates.length}`);

    let handled = 0;
    for (const update of [...updates].sort((a, b) => a.update_id - b.update_id)) {
      if (update.update_id <= this.state.lastUpdateId) continue;
      try {
        await this.handleUpdate(update);
      } catch (err) {
        if (err instanceof TransportError) {
          await saveState(config.stateFile, this.state);
          throw err;
        }
        const event = isEventLocal(err) ? 'update_skipped' : 'update_failed';
        console.error(`[bot] ${event} update_id=${update.update_id} error="${describeError(err)}"`);
      }
      this.state.lastUpdateId = update.update_id;
      await saveState(config.stateFile, this.state);
      handled++;
    }
    return handled;
  }

  async handleUpdate(update: TelegramUpdate): Promise<void> {
    const text = updateText(update);
    if (!text) return;
    const chatId = updateChatId(update);
    if (chatId !== null) this.state.defaultChatId = chatId;
    console.log(`[bot] update_processing update_id=${update.update_id}`);

    const { config } = this.deps;
    const opts = { timeZone: config.timeZone, now: this.now() };

    const command = parseSyncCommand(text, config.upbit.commandText, opts);
    if (command) {
      if (!config.upbit.enabled) {
        console.log('[bot] sync_ignored reason=disabled');
        await this.reply(chatId, 'Exchange sync is disabled (UPBIT_ENABLED=false).');
        return;
      }
      if (!config.upbit.accessKey || !config.upbit.secretKey) {
        console.log('[bot] sync_ignored reason=missing_keys');
        await this.reply(chatId, 'Exchange API keys are not configured.');
        return;
      }
      const result = await runExchangeSync({
        source: this.deps.tradeSource(config.upbit),
        writer: this.deps.writer,
        state: this.state,
        options: {
          ledgerSymbol: config.upbit.sheetSymbol,
          targetDate: command.date,
          explicit: command.explicit,
          timeZone: config.timeZone,
          asset: config.upbit.asset,
          market: config.upbit.market,
          maxPages: config.upbit.maxPages,
        },
        backup: this.backupHook(`exchange_update_${update.update_id}_${command.date}`, config.upbit.sheetSymbol),
      });
      await saveState(config.stateFile, this.state);
      console.log(`[bot] sync_done date=${command.date} processed=${result.processed} written=${result.written}`);
      await this.reply(chatId, buildSyncReply(result.processed, result.written, result.lastSummary));
      return;
    }

    const fill = parseBrokerFillMessage(text, opts);
    if (!fill) return;
    console.log(`[bot] fill_parsed update_id=${update.update_id} symbol=${fill.symbol} side=${fill.side} price=${fill.price} qty=${fill.qty}`);
    const outcome = await this.deps.writer.applyBrokerFill(fill, this.backupHook(`broker_update_${update.update_id}`, fill.symbol));
    if (outcome.status === 'skipped') {
      console.log(`[bot] fill_skipped update_id=${update.update_id} reason="${outcome.reason}"`);
      return;
    }
    await this.reply(chatId, buildLedgerReply(outcome.summary));
  }

  async runForever(signal?: AbortSignal): Promise<void> {
    const { pollInterval } = this.deps.config.telegram;
    while (!signal?.aborted) {
      let pause = pollInterval;
      try {
        await this.pollOnce();
      } catch (err) {
        console.error(`[bot] cycle_failed error="${describeError(err)}"`);
        pause = Math.max(ERROR_BACKOFF_SEC, pollInterval);
      }
      if (signal?.aborted) break;
      await sleep(pause * 1000);
    }
  }

  private backupHook(context: string, bucket: string): BackupHook | undefined {
    const dir = this.deps.config.backupDir;
    return dir ? createBackupHook(dir, context, bucket) : undefined;
  }

  // Reply failures are logged; the update still counts as handled.
  private async reply(chatId: number | null, text: string): Promise<void> {
    if (chatId === null) return;
    try {
      await this.deps.chat.sendMessage(chatId, text);
    } catch (err) {
      console.warn(`[bot] reply_failed chat_id=${chatId} error="${describeError(err)}"`);
    }
  }
}
