import dotenv from 'dotenv';

import { createApp } from './app.js';
import { FillBot } from './bot.js';
import { createLedgerBook, loadConfig } from './config.js';
import { describeError } from './errors.js';
import { UpbitClient } from './exchange.js';
import { LedgerWriter } from './ledger.js';
import { TelegramClient } from './telegram.js';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const book = createLedgerBook(config.ledger);
  const writer = new LedgerWriter(book);
  const bot = new FillBot({
    chat: new TelegramClient(config.telegram.token),
    writer,
    tradeSource: upbit => new UpbitClient(upbit),
    config,
  });

  await bot.start();

  const app = createApp({ book, writer, snapshot: () => bot.snapshot() });
  app.listen(config.port, () => {
    console.log(`[server] listening on http://localhost:${config.port} backend=${config.ledger.backend}`);
    if (!config.upbit.enabled) console.warn('[server] exchange sync disabled (UPBIT_ENABLED=false)');
  });

  await bot.runForever();
}

main().catch(err => {
  console.error(`[server] fatal error="${describeError(err)}"`);
  process.exit(1);
});
