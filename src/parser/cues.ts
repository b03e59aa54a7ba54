/**
 * Rule layer: keyword cues for category, movement kind and loan counterparty.
 * Cue words live in category-cues.json, already lowercased and without accents.
 */

import cueTable from "./category-cues.json";
import type { TransactionKind } from "../types";
import { foldText } from "./text";

export const FALLBACK_CATEGORY = "misc";

const KIND_PRECEDENCE: TransactionKind[] = ["loan", "transfer", "income", "expense"];

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function cuePattern(cue: string): RegExp {
  return new RegExp(`(?:^|[^a-z0-9])${escapeRegex(cue)}(?=$|[^a-z0-9])`);
}

interface CompiledCue {
  label: string;
  cue: string;
  pattern: RegExp;
}

function compile(groups: Record<string, string[]>): CompiledCue[] {
  const compiled: CompiledCue[] = [];
  for (const [label, cues] of Object.entries(groups)) {
    for (const cue of cues) compiled.push({ label, cue, pattern: cuePattern(cue) });
  }
  return compiled;
}

const CATEGORY_CUES = compile(cueTable.categories);
const KIND_CUES = compile(
  Object.fromEntries(
    Object.entries(cueTable.kinds).map(([kind, cues]) => [kind, [...cues.verbs, ...cues.nouns]]),
  ),
);

export const KNOWN_CATEGORIES: string[] = [...Object.keys(cueTable.categories), FALLBACK_CATEGORY];

export interface CueMatch {
  category: string;
  cue: string;
}

/**
 * Category of a phrase by the earliest cue it contains ("uber al aeropuerto" → transport).
 * Returns null when no cue matches.
 */
export function matchCategory(phrase: string): CueMatch | null {
  const folded = foldText(phrase);
  let best: { match: CueMatch; at: number } | null = null;

  for (const { label, cue, pattern } of CATEGORY_CUES) {
    const found = pattern.exec(folded);
    if (!found) continue;
    // the pattern may consume one separator before the cue
    const at = found.index + found[0].length - cue.length;
    if (!best || at < best.at || (at === best.at && cue.length > best.match.cue.length)) {
      best = { match: { category: label, cue }, at };
    }
  }
  return best ? best.match : null;
}

function isKind(label: string): label is TransactionKind {
  return KIND_PRECEDENCE.some((kind) => kind === label);
}

export interface KindMatch {
  kind: TransactionKind;
  /** True when a movement verb named the kind; false means the expense default */
  explicit: boolean;
}

/** Movement kind from verbs in the message ("me pagaron" → income, "le presté" → loan). */
export function detectKind(text: string): KindMatch {
  const folded = foldText(text);
  const matched = new Set<TransactionKind>();
  for (const { label, pattern } of KIND_CUES) {
    if (isKind(label) && pattern.test(folded)) matched.add(label);
  }
  for (const kind of KIND_PRECEDENCE) {
    if (matched.has(kind)) return { kind, explicit: true };
  }
  return { kind: "expense", explicit: false };
}

const COUNTERPARTY = /(?:^|\s)(?:a|de|con)\s+([A-ZÁÉÍÓÚÑ][\p{L}]+)/u;

/** Capitalized name after "a", "de" or "con" ("le presté 50k a Juan" → "Juan"). */
export function findCounterparty(text: string): string | undefined {
  const match = text.match(COUNTERPARTY);
  return match ? match[1] : undefined;
}
