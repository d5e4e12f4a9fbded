/**
 * Upbit closed-order client.
 *
 * READ-ONLY: lists finished orders for reconciliation, never places any.
 * Each request carries a JWT whose query_hash covers the exact query string.
 */

import { createHash } from 'crypto';
import jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import { httpError, ParseError, TransportError } from './errors.js';

// =============================================================================
// Raw shapes
// =============================================================================

const Numeric = z.union([z.string(), z.number()]).nullish();

export const ClosedOrderSchema = z.object({
  uuid: z.string().nullish(),
  market: z.string().default(''),
  side: z.string().default(''),
  ord_type: z.string().nullish(),
  price: Numeric,
  executed_volume: Numeric,
  executed_funds: Numeric,
  created_at: z.string().nullish(),
  done_at: z.string().nullish(),
});

export type ClosedOrder = z.infer<typeof ClosedOrderSchema>;

export interface TradeHistorySource {
  fetchPage(page: number): Promise<ClosedOrder[]>;
}

// =============================================================================
// Auth
// =============================================================================

/** Unescaped `k=v&k=v` form the server hashes ("states[]=done", not "states%5B%5D=done"). */
export function rawQuery(params: readonly (readonly [string, string])[]): string {
  return params.map(([k, v]) => `${k}=${v}`).join('&');
}

export function authHeaders(accessKey: string, secretKey: string, query: string): Record<string, string> {
  const payload = {
    access_key: accessKey,
    nonce: uuidv4(),
    query_hash: createHash('sha512').update(query, 'utf8').digest('hex'),
    query_hash_alg: 'SHA512',
  };
  const token = jwt.sign(payload, secretKey, { algorithm: 'HS512', noTimestamp: true });
  return { Authorization: `Bearer ${token}` };
}

// =============================================================================
// Client
// =============================================================================

export type UpbitConfig = {
  accessKey: string;
  secretKey: string;
  baseUrl: string;
  ordersPath: string;
  pageSize?: number;
};

const TIMEOUT_MS = 20_000;
const LEGACY_ORDERS_PATH = '/v1/orders';

export class UpbitClient implements TradeHistorySource {
  constructor(private cfg: UpbitConfig) {}

  async fetchPage(page: number): Promise<ClosedOrder[]> {
    const params: [string, string][] = [
      ['states[]', 'done'],
      ['states[]', 'cancel'],
      ['page', String(page)],
      ['limit', String(this.cfg.pageSize ?? 100)],
      ['order_by', 'desc'],
    ];
    const headers = { ...authHeaders(this.cfg.accessKey, this.cfg.secretKey, rawQuery(params)), Accept: 'application/json' };

    let res = await this.get(this.cfg.ordersPath, params, headers);
    if ((res.status === 404 || res.status === 405) && this.cfg.ordersPath !== LEGACY_ORDERS_PATH) {
      res = await this.get(LEGACY_ORDERS_PATH, params, headers);
    }
    if (!res.ok) {
      const body = await res.text().catch(() => '');
      throw httpError(`Upbit ${res.status}: ${body.slice(0, 200)}`, res.status);
    }

    const body: unknown = await res.json();
    if (!Array.isArray(body)) throw new ParseError('Upbit orders response is not a list');

    const out: ClosedOrder[] = [];
    let invalid = 0;
    for (const row of body) {
      const parsed = ClosedOrderSchema.safeParse(row);
      if (parsed.success) out.push(parsed.data);
      else invalid++;
    }
    if (invalid > 0) console.warn(`[exchange] dropped invalid rows=${invalid} page=${page}`);
    return out;
  }

  private async get(pathname: string, params: [string, string][], headers: Record<string, string>): Promise<Response> {
    const url = new URL(pathname, this.cfg.baseUrl);
    url.search = new URLSearchParams(params).toString();

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), TIMEOUT_MS);
    try {
      return await fetch(url.toString(), { method: 'GET', headers, signal: controller.signal });
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new TransportError(`Upbit request timed out after ${TIMEOUT_MS}ms: ${pathname}`);
      }
      throw new TransportError(`Upbit request failed: ${pathname}`, { cause: err });
    } finally {
      clearTimeout(timer);
    }
  }
}

/** Pages from 1 until an empty page or `maxPages`, whichever comes first. */
export async function fetchTradeHistory(source: TradeHistorySource, maxPages: number): Promise<{ orders: ClosedOrder[]; pages: number }> {
  const orders: ClosedOrder[] = [];
  let pages = 0;
  for (let page = 1; page <= maxPages; page++) {
    const rows = await source.fetchPage(page);
    pages = page;
    if (rows.length === 0) break;
    orders.push(...rows);
  }
  return { orders, pages };
}
