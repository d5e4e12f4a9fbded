export type LabelClass = 'date' | 'avg' | 'high' | 'totalQty';

/**
 * A class matches when every substring of any one of its patterns occurs in
 * the normalized cell text. Ledgers are written in Korean or English.
 */
const LABEL_PATTERNS: Record<LabelClass, readonly (readonly string[])[]> = {
  date: [['날짜'], ['체결일자'], ['date']],
  avg: [['loc', '평단'], ['loc', 'avg']],
  high: [['loc', '고가'], ['loc', 'high']],
  totalQty: [['총수량'], ['totalqty'], ['totalquantity']],
};

/** Whitespace is removed, punctuation kept: " LOC  평단 " -> "loc평단". */
export function normalizeLabel(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, '');
}

export function matchesLabel(cls: LabelClass, text: string): boolean {
  const n = normalizeLabel(text);
  if (!n) return false;
  return LABEL_PATTERNS[cls].some(parts => parts.every(p => n.includes(p)));
}
