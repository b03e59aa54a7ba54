/**
 * Amount normalization for colloquial Spanish money notation.
 * Handles multipliers ("5k", "5 mil", "2 lucas", "1,5m", "2 palos"),
 * thousands separators ("12.000", "12,000") and currency markers ("$", "usd", "€").
 */

const MULTIPLIERS: Record<string, number> = {
  k: 1_000,
  mil: 1_000,
  luca: 1_000,
  lucas: 1_000,
  luka: 1_000,
  lukas: 1_000,
  m: 1_000_000,
  palo: 1_000_000,
  palos: 1_000_000,
  millon: 1_000_000,
  millón: 1_000_000,
  millones: 1_000_000,
};

const SYMBOL_CURRENCY: Record<string, string> = {
  "us$": "USD",
  "€": "EUR",
};

const WORD_CURRENCY: Record<string, string> = {
  cop: "COP",
  peso: "COP",
  pesos: "COP",
  usd: "USD",
  dolar: "USD",
  dolares: "USD",
  dólar: "USD",
  dólares: "USD",
  eur: "EUR",
  euro: "EUR",
  euros: "EUR",
};

/** Currency a bare "$" stands for, by the region of the user's locale. */
const DOLLAR_SIGN_BY_REGION: Record<string, string> = {
  CO: "COP",
  US: "USD",
  MX: "MXN",
  AR: "ARS",
  CL: "CLP",
};

const GROUPED_THOUSANDS = /^\d{1,3}([.,])\d{3}(?:\1\d{3})*$/;
const DECIMAL_TAIL = /^(\d+(?:[.,]\d{3})*)[.,](\d{1,2})$/;

/** Minimum value for an unmarked bare number to count when other amounts exist */
const MIN_BARE_AMOUNT = 100;

/**
 * Parse the numeric part of an amount.
 * Groups of three digits after a separator are thousands; one or two digits are decimals.
 */
export function parseNumber(raw: string): number | null {
  const s = raw.trim();
  if (!s) return null;
  if (/^\d+$/.test(s)) return Number(s);
  if (GROUPED_THOUSANDS.test(s)) return Number(s.replace(/[.,]/g, ""));

  const match = s.match(DECIMAL_TAIL);
  if (!match) return null;
  const value = Number(`${match[1].replace(/[.,]/g, "")}.${match[2]}`);
  return Number.isFinite(value) ? value : null;
}

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

export function currencyForDollarSign(locale: string, fallback: string): string {
  const region = locale.split(/[-_]/)[1]?.toUpperCase() ?? "";
  return DOLLAR_SIGN_BY_REGION[region] ?? fallback;
}

/**
 * Normalize an amount string to a positive number.
 *   "5k" → 5000, "200k" → 200000, "12000" → 12000, "$ 45.000" → 45000,
 *   "1,5m" → 1500000, "5 mil" → 5000
 * Returns null if the string cannot be parsed.
 */
export function normalizeAmount(raw: string): number | null {
  if (!raw || typeof raw !== "string") return null;

  let cleaned = raw.trim().toLowerCase();
  cleaned = cleaned.replace(/^(?:us\$|\$|€)\s*/, "");
  cleaned = cleaned.replace(/\s*(?:cop|usd|eur|pesos?|d[oó]lares?|euros?)$/, "");
  cleaned = cleaned.replace(/^-/, "").trim();

  const match = cleaned.match(/^(\d[\d.,]*)\s*([a-zó]+)?$/);
  if (!match) return null;

  const base = parseNumber(match[1]);
  if (base === null) return null;

  const suffix = match[2];
  if (!suffix) return roundCents(base);
  const multiplier = MULTIPLIERS[suffix];
  if (multiplier === undefined) return null;
  return roundCents(base * multiplier);
}

/** An amount located inside a message */
export interface AmountToken {
  value: number;
  currency: string;
  /** Offset of the first character of the token in the source text */
  start: number;
  /** Offset just past the last character of the token */
  end: number;
  raw: string;
  /** True when a currency symbol, word, multiplier or thousands grouping marks it as money */
  marked: boolean;
}

const AMOUNT_PATTERN =
  /(us\$|\$|€)?\s?(?<![\p{L}\d.,])(\d+(?:[.,]\d+)*)(?:\s?(k|mil|lucas?|lukas?|palos?|millones|mill[oó]n|m)(?![\p{L}\d]))?(?:\s?(cop|usd|eur|pesos?|d[oó]lares?|euros?)(?![\p{L}\d]))?/giu;

const DAY_REFERENCE_BEFORE = /(?:^|[^\p{L}])(?:el|los|las|d[ií]a|dias|días|cada|hasta|desde|antes del|a las|a la)\s*$/iu;
const DATE_CONTINUATION_AFTER = /^\s*(?:[/-]\d|de\s+(?:ene|feb|mar|abr|may|jun|jul|ago|sep|oct|nov|dic)|d[ií]as?\b|[ap]\.?\s?m\b|:\d{2}|%|h\b|hrs?\b)/iu;
const DATE_PIECE_BEFORE = /\d[/-]$/;

/**
 * Find every money amount in a text, in order of appearance.
 * Day references ("el 5", "todos los 5", "día 15", "a las 8") are not amounts,
 * and unmarked small numbers ("2 cafés") are dropped when other amounts are present.
 */
export function findAmounts(text: string, locale: string, defaultCurrency: string): AmountToken[] {
  if (!text) return [];
  const candidates: AmountToken[] = [];

  for (const match of text.matchAll(AMOUNT_PATTERN)) {
    const index = match.index ?? 0;
    const [whole, symbol, digits, multiplier, word] = match;
    const lead = whole.length - whole.trimStart().length;
    const start = index + lead;
    const end = index + whole.trimEnd().length;
    const raw = text.slice(start, end);

    const grouped = GROUPED_THOUSANDS.test(digits);
    const marked = Boolean(symbol || multiplier || word || grouped);

    if (!marked) {
      const before = text.slice(0, start);
      const after = text.slice(end);
      if (DAY_REFERENCE_BEFORE.test(before)) continue;
      if (DATE_CONTINUATION_AFTER.test(after)) continue;
      if (DATE_PIECE_BEFORE.test(before)) continue;
      // a 4-digit year inside a written date
      if (/^\d{4}$/.test(digits) && /de\s*$/i.test(before)) continue;
    }

    const value = normalizeAmount(`${digits}${multiplier ?? ""}`);
    if (value === null || value <= 0) continue;

    let currency = defaultCurrency;
    if (word) currency = WORD_CURRENCY[word.toLowerCase()] ?? defaultCurrency;
    else if (symbol) currency = SYMBOL_CURRENCY[symbol.toLowerCase()] ?? currencyForDollarSign(locale, defaultCurrency);

    candidates.push({ value, currency, start, end, raw, marked });
  }

  if (candidates.length <= 1) return candidates;
  const significant = candidates.filter((c) => c.marked || c.value >= MIN_BARE_AMOUNT);
  return significant.length > 0 ? significant : candidates;
}
