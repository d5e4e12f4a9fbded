/**
 * Telegram Bot API transport: long-polls updates and sends replies.
 */

import { z } from 'zod';

import { TransportError } from './errors.js';

const MessagePart = z.object({
  text: z.string().optional(),
  chat: z.object({ id: z.number() }).optional(),
}).passthrough();

export const UpdateSchema = z.object({
  update_id: z.number().int(),
  message: MessagePart.optional(),
  edited_message: MessagePart.optional(),
  channel_post: MessagePart.optional(),
  edited_channel_post: MessagePart.optional(),
}).passthrough();

export type TelegramUpdate = z.infer<typeof UpdateSchema>;

const UpdatesResponse = z.object({
  ok: z.boolean(),
  result: z.array(UpdateSchema).optional(),
  description: z.string().optional(),
});

const PARTS = ['message', 'edited_message', 'channel_post', 'edited_channel_post'] as const;

export function updateText(update: TelegramUpdate): string | null {
  for (const key of PARTS) {
    const text = update[key]?.text;
    if (text) return text;
  }
  return null;
}

export function updateChatId(update: TelegramUpdate): number | null {
  for (const key of PARTS) {
    const id = update[key]?.chat?.id;
    if (id !== undefined) return id;
  }
  return null;
}

export interface UpdateSource {
  getUpdates(offset: number, timeoutSec: number): Promise<TelegramUpdate[]>;
}

export interface Notifier {
  sendMessage(chatId: number, text: string): Promise<void>;
}

const SEND_TIMEOUT_MS = 15_000;

export class TelegramClient implements UpdateSource, Notifier {
  constructor(private token: string, private baseUrl = 'https://api.telegram.org') {}

  private async post(method: string, body: unknown, timeoutMs: number): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/bot${this.token}/${method}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (err) {
      // The token is part of the URL, so only the method name is reported.
      throw new TransportError(`Telegram ${method} failed`, { cause: err });
    } finally {
      clearTimeout(timer);
    }
    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new TransportError(`Telegram ${method} ${res.status}: ${text.slice(0, 200)}`);
    }
    return res.json();
  }

  async getUpdates(offset: number, timeoutSec: number): Promise<TelegramUpdate[]> {
    const raw = await this.post('getUpdates', { offset, timeout: timeoutSec }, (timeoutSec + 10) * 1000);
    const body = UpdatesResponse.safeParse(raw);
    if (!body.success || !body.data.ok) {
      throw new TransportError(`Telegram getUpdates error: ${body.success ? body.data.description ?? 'not ok' : body.error.message}`);
    }
    return body.data.result ?? [];
  }

  async sendMessage(chatId: number, text: string): Promise<void> {
    await this.post('sendMessage', { chat_id: chatId, text }, SEND_TIMEOUT_MS);
    console.log(`[telegram] reply_sent chat_id=${chatId}`);
  }
}
