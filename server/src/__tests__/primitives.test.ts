/**
 * Grid addressing, calendar dates, number parsing and label matching.
 */

import { calendarDateIn, currentYearIn, isValidDay, parseInstant } from '../dates.js';
import { ParseError } from '../errors.js';
import { cellText, colToA1, fromA1, gridWidth, toA1, toGrid } from '../grid.js';
import { matchesLabel, normalizeLabel } from '../labels.js';
import { currencyForSymbol, formatMoney, parseNumber } from '../numbers.js';

// =============================================================================
// Grid
// =============================================================================

describe('grid addressing', () => {
  test('column letters', () => {
    expect(colToA1(1)).toBe('A');
    expect(colToA1(18)).toBe('R');
    expect(colToA1(26)).toBe('Z');
    expect(colToA1(27)).toBe('AA');
    expect(colToA1(52)).toBe('AZ');
  });

  test('A1 refs both ways', () => {
    expect(fromA1('R6')).toEqual({ row: 6, col: 18 });
    expect(fromA1(' b3 ')).toEqual({ row: 3, col: 2 });
    expect(toA1({ row: 11, col: 18 })).toBe('R11');
    expect(() => fromA1('6R')).toThrow('Bad A1 ref: 6R');
  });

  test('cells outside a ragged grid read as empty', () => {
    const grid = [['a', 'b'], ['c']];
    expect(cellText(grid, 2, 1)).toBe('c');
    expect(cellText(grid, 2, 2)).toBe('');
    expect(cellText(grid, 5, 1)).toBe('');
    expect(cellText(grid, 0, 1)).toBe('');
    expect(gridWidth(grid)).toBe(2);
  });

  test('toGrid renders display text', () => {
    expect(toGrid([[1.5, null, true, 'x', undefined]])).toEqual([['1.5', '', 'TRUE', 'x', '']]);
  });
});

// =============================================================================
// Dates
// =============================================================================

describe('calendar dates', () => {
  test('an instant falls on different days in different zones', () => {
    const t = new Date('2026-03-03T16:30:00Z');
    expect(calendarDateIn(t, 'Asia/Seoul')).toBe('2026-03-04');
    expect(calendarDateIn(t, 'America/New_York')).toBe('2026-03-03');
    expect(calendarDateIn(t, 'UTC')).toBe('2026-03-03');
  });

  test('current year follows the zone at new year', () => {
    const t = new Date('2025-12-31T20:00:00Z');
    expect(currentYearIn('Asia/Seoul', t)).toBe(2026);
    expect(currentYearIn('UTC', t)).toBe(2025);
  });

  test('invalid instants are rejected', () => {
    expect(() => calendarDateIn(new Date('nope'), 'UTC')).toThrow(ParseError);
  });

  test('isValidDay', () => {
    expect(isValidDay(2024, 2, 29)).toBe(true);
    expect(isValidDay(2026, 2, 29)).toBe(false);
    expect(isValidDay(2026, 13, 1)).toBe(false);
    expect(isValidDay(2026, 4, 31)).toBe(false);
  });

  test('parseInstant keeps the offset', () => {
    expect(parseInstant('2026-03-04T10:00:00+09:00')?.getTime()).toBe(Date.UTC(2026, 2, 4, 1, 0, 0));
    expect(parseInstant('not a date')).toBeNull();
    expect(parseInstant(null)).toBeNull();
    expect(parseInstant('')).toBeNull();
  });
});

// =============================================================================
// Numbers
// =============================================================================

describe('numbers', () => {
  test('parseNumber takes the first decimal and drops separators', () => {
    expect(parseNumber('$1,234.50')).toBe(1234.5);
    expect(parseNumber('3주')).toBe(3);
    expect(parseNumber('-3 shares')).toBe(-3);
    expect(parseNumber('₩95,000,000원')).toBe(95000000);
    expect(() => parseNumber('n/a')).toThrow(ParseError);
  });

  test('currency by symbol', () => {
    expect(currencyForSymbol('btc')).toBe('KRW');
    expect(currencyForSymbol('TQQQ')).toBe('USD');
  });

  test('formatMoney', () => {
    expect(formatMoney(1234.5, 'USD')).toBe('$1,234.50');
    expect(formatMoney(95000000, 'KRW')).toBe('₩95,000,000.00');
  });
});

// =============================================================================
// Labels
// =============================================================================

describe('label matching', () => {
  test('normalizeLabel lowercases and drops whitespace', () => {
    expect(normalizeLabel('  LOC  평단 ')).toBe('loc평단');
    expect(normalizeLabel('Total\tQty')).toBe('totalqty');
  });

  test('zone labels need both parts', () => {
    expect(matchesLabel('avg', 'LOC 평단')).toBe(true);
    expect(matchesLabel('avg', 'LOC 평단 매수')).toBe(true);
    expect(matchesLabel('avg', '평단')).toBe(false);
    expect(matchesLabel('high', 'loc 고가')).toBe(true);
    expect(matchesLabel('high', 'LOC High')).toBe(true);
    expect(matchesLabel('high', 'LOC 평단')).toBe(false);
  });

  test('date and total quantity labels', () => {
    expect(matchesLabel('date', '날짜')).toBe(true);
    expect(matchesLabel('date', '체결일자')).toBe(true);
    expect(matchesLabel('date', 'Trade Date')).toBe(true);
    expect(matchesLabel('totalQty', '총수량')).toBe(true);
    expect(matchesLabel('totalQty', 'Total Quantity')).toBe(true);
  });

  test('empty text never matches', () => {
    expect(matchesLabel('date', '')).toBe(false);
    expect(matchesLabel('date', '   ')).toBe(false);
  });
});
