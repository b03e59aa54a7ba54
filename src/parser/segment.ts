/**
 * Segmentation of a message into one segment per amount.
 *
 *   clause:    "me gasté 5k en comida y 60k en ropa" → [5k: comida] [60k: ropa]
 *              "almuerzo 15k, taxi 8k"               → [15k: almuerzo] [8k: taxi]
 *   proximity: the nearest words after each amount, else the nearest words before it
 */

import cueTable from "./category-cues.json";
import type { SegmentationPolicy } from "../config";
import type { AmountToken } from "./amount";
import { collapseWhitespace } from "./text";

export interface Segment {
  amount: AmountToken;
  /** Noun phrase describing what the amount was for; may be empty */
  phrase: string;
  /** Slice of the message that belongs to this amount */
  text: string;
}

const ACCENT_CLASSES: Record<string, string> = {
  a: "[aá]",
  e: "[eé]",
  i: "[ií]",
  o: "[oó]",
  u: "[uúü]",
  n: "[nñ]",
};

function accentInsensitive(cue: string): string {
  return cue
    .split(/\s+/)
    .map((word) =>
      [...word].map((ch) => ACCENT_CLASSES[ch] ?? ch.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")).join(""),
    )
    .join("\\s+");
}

const MONTH_NAMES = "enero|febrero|marzo|abril|mayo|junio|julio|agosto|septiembre|setiembre|octubre|noviembre|diciembre";

const WEEKDAY_NAMES = "lunes|martes|mi[eé]rcoles|jueves|viernes|s[aá]bados?|domingos?";

const DATE_FILLERS = [
  "todos\\s+los\\s+\\d{1,2}",
  `(?:todos\\s+)?(?:los|cada)\\s+(?:${WEEKDAY_NAMES})`,
  "el\\s+\\d{1,2}\\s+de\\s+cada\\s+mes",
  "cada\\s+\\d{1,3}\\s+(?:d[ií]as|semanas)",
  "cada\\s+(?:quince\\s+d[ií]as|dos\\s+semanas|semana|a[nñ]o)",
  "cada\\s+\\d{1,2}",
  "cada\\s+mes",
  "el\\s+(?:d[ií]a\\s+)?\\d{1,2}",
  `\\d{1,2}\\s+de\\s+(?:${MONTH_NAMES})`,
  "\\d{4}-\\d{2}-\\d{2}",
  "\\d{1,2}[/-]\\d{1,2}(?:[/-]\\d{2,4})?",
  "hoy|ayer|anoche|anteayer|mensual(?:mente)?|al\\s+mes",
  "quincenal(?:mente)?|semanal(?:mente)?|anual(?:mente)?|al\\s+a[nñ]o|a\\s+la\\s+semana",
];

const VERB_FILLERS = Object.values(cueTable.kinds)
  .flatMap((cues) => cues.verbs)
  .sort((a, b) => b.length - a.length)
  .map(accentInsensitive);

const PRONOUNS = ["me", "le", "les", "nos", "yo"];

const FILLER = new RegExp(
  `(?<![\\p{L}\\d])(?:${[...DATE_FILLERS, ...VERB_FILLERS, ...PRONOUNS].join("|")})(?![\\p{L}\\d])`,
  "giu",
);

const EDGE_WORDS = "en|de|del|para|por|a|al|y|e|con|un|una|el|la|los|las";
const LEADING = new RegExp(`^(?:(?:${EDGE_WORDS})(?=\\s|$)|[\\s,;:.+\\-!¡?¿])+`, "iu");
const TRAILING = new RegExp(`(?:(?<=^|\\s)(?:${EDGE_WORDS})|[\\s,;:.+\\-!¡?¿])+$`, "iu");

/** Strip dates, movement verbs and connectors, leaving the noun phrase. */
export function cleanPhrase(text: string): string {
  const stripped = collapseWhitespace(text.replace(FILLER, " "));
  return stripped.replace(LEADING, "").replace(TRAILING, "").trim();
}

function words(text: string, count: number, fromEnd: boolean): string {
  const all = text.split(" ").filter(Boolean);
  return (fromEnd ? all.slice(-count) : all.slice(0, count)).join(" ");
}

const PROXIMITY_WORDS = 3;

export function segment(text: string, amounts: AmountToken[], policy: SegmentationPolicy): Segment[] {
  if (amounts.length === 0) return [];

  const before = amounts.map((a, i) => text.slice(i === 0 ? 0 : amounts[i - 1].end, a.start));
  const after = amounts.map((a, i) => text.slice(a.end, i === amounts.length - 1 ? text.length : amounts[i + 1].start));

  if (policy === "proximity") {
    return amounts.map((amount, i) => {
      const next = cleanPhrase(after[i]);
      const phrase = next ? words(next, PROXIMITY_WORDS, false) : words(cleanPhrase(before[i]), PROXIMITY_WORDS, true);
      return { amount, phrase, text: `${before[i]}${amount.raw}${after[i]}`.trim() };
    });
  }

  const last = amounts.length - 1;
  const amountFirst = cleanPhrase(after[last]) !== "" || cleanPhrase(before[0]) === "";

  return amounts.map((amount, i) => {
    const primary = cleanPhrase(amountFirst ? after[i] : before[i]);
    const phrase = primary || cleanPhrase(amountFirst ? before[i] : after[i]);
    const start = amountFirst ? (i === 0 ? 0 : amount.start) : i === 0 ? 0 : amounts[i - 1].end;
    const end = amountFirst ? (i === last ? text.length : amounts[i + 1].start) : i === last ? text.length : amount.end;
    return { amount, phrase, text: collapseWhitespace(text.slice(start, end)).replace(LEADING, "") };
  });
}
