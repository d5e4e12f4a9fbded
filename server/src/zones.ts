import { ClassificationError } from './errors.js';
import type { Zone } from './types.js';

/** Tolerance around one (or two) planned order units. */
export const RATIO_MIN = 0.8;
export const RATIO_MAX = 1.2;

export type UnitRatios = { ratioHalf: number; ratioFull: number };

export type ZoneDecision =
  | ({ kind: 'dual' } & UnitRatios)
  | ({ kind: 'single'; zone: Zone } & UnitRatios)
  | ({ kind: 'skip'; reason: string } & UnitRatios);

/** Fills at or below the reference average go to the avg zone. */
export function classifyByPrice(price: number, referenceAvg: number): Zone {
  if (!Number.isFinite(referenceAvg) || referenceAvg <= 0) {
    throw new ClassificationError(`reference average price must be positive, got ${referenceAvg}`);
  }
  return price <= referenceAvg ? 'avg' : 'high';
}

export function unitRatios(amount: number, halfUnit: number): UnitRatios {
  if (!Number.isFinite(halfUnit) || halfUnit <= 0 || !Number.isFinite(amount)) return { ratioHalf: 0, ratioFull: 0 };
  return { ratioHalf: amount / halfUnit, ratioFull: amount / (halfUnit * 2) };
}

const inBand = (r: number) => r >= RATIO_MIN && r <= RATIO_MAX;

/**
 * Exchange fills only carry a spend amount, so the zone is inferred from how
 * close that amount is to one half unit (single write) or two (split across
 * both zones).
 */
export function classifyByAmount(input: { amount: number; price: number; halfUnit: number; referenceAvg: number }): ZoneDecision {
  const ratios = unitRatios(input.amount, input.halfUnit);
  if (inBand(ratios.ratioFull)) return { kind: 'dual', ...ratios };
  if (!inBand(ratios.ratioHalf)) return { kind: 'skip', reason: 'amount outside unit bands', ...ratios };
  try {
    return { kind: 'single', zone: classifyByPrice(input.price, input.referenceAvg), ...ratios };
  } catch (err) {
    if (err instanceof ClassificationError) return { kind: 'skip', reason: err.message, ...ratios };
    throw err;
  }
}
