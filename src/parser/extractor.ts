/**
 * Candidate Extractor: free text → transaction drafts.
 *
 * Runs the rule layer first (amounts, dates, kind verbs, category cues) and hands
 * each segment without a category cue to the classifier. Amounts always come from
 * the rule layer; the classifier only contributes meaning.
 */

import type { Classifier, ClassifierResult, TransactionDraft } from "../types";
import type { AppConfig } from "../config";
import { InputTooLongError } from "../errors";
import { cadenceFromHint, nextDueOnOrAfter } from "../scheduler/cadence";
import { findAmounts } from "./amount";
import { resolveDate, type ResolvedDate } from "./dates";
import { detectKind, findCounterparty, matchCategory, FALLBACK_CATEGORY, type KindMatch } from "./cues";
import { segment, type Segment } from "./segment";
import { extractPaymentDetails, type PaymentDetails } from "./payment";
import { clampConfidence } from "./ai-fallback";

/** Confidence added to a cue match when a movement verb is also present */
const VERB_BONUS = 0.1;

export interface ExtractorDeps {
  classifier: Classifier;
  parser: AppConfig["parser"];
  classifierConfig: Pick<AppConfig["classifier"], "maxOutputTokens">;
  currency: string;
  /** Today's date (YYYY-MM-DD) in the user's zone */
  today: () => string;
}

export interface Extractor {
  extract(rawText: string, userLocale: string, signal?: AbortSignal): Promise<TransactionDraft[]>;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Classifier draft describing the same amount, else the first one */
function pickClassifierDraft(result: ClassifierResult, value: number): TransactionDraft | undefined {
  return result.drafts.find((d) => d.amounts.some((a) => a.value === value)) ?? result.drafts[0];
}

interface DraftContext {
  rawText: string;
  text: string;
  today: string;
  kind: KindMatch;
  date: ResolvedDate;
  payment: PaymentDetails;
}

/** Rule-layer draft for one segment: amount, kind, date, recurrence, payment details and loan counterparty */
function baseDraft(seg: Segment, ctx: DraftContext): TransactionDraft {
  const draft: TransactionDraft = {
    amounts: [{ value: seg.amount.value, currency: seg.amount.currency }],
    kind: ctx.kind.kind,
    category: FALLBACK_CATEGORY,
    description: seg.phrase,
    occurredOn: ctx.date.occurredOn,
    confidence: 0,
    source: "rules",
    rawText: ctx.rawText,
  };
  if (ctx.kind.kind === "loan") {
    const counterparty = findCounterparty(seg.text) ?? findCounterparty(ctx.text);
    if (counterparty) draft.counterparty = counterparty;
  }
  const recurrence = ctx.date.recurrence;
  if (recurrence) {
    draft.recurrence = recurrence;
    const { cadence, complete } = cadenceFromHint(recurrence, ctx.today);
    if (complete) draft.dueDate = nextDueOnOrAfter(cadence, ctx.today, ctx.today);
    if (ctx.payment.paymentLink) draft.paymentLink = ctx.payment.paymentLink;
    if (ctx.payment.paymentReference) draft.paymentReference = ctx.payment.paymentReference;
  }
  return draft;
}

export function createExtractor(deps: ExtractorDeps): Extractor {
  return {
    async extract(rawText: string, userLocale: string, signal?: AbortSignal): Promise<TransactionDraft[]> {
      const limit = deps.parser.maxInputChars;
      if (rawText.length > limit) throw new InputTooLongError(rawText.length, limit);

      const payment = extractPaymentDetails(rawText.normalize("NFC").trim());
      const text = payment.text;
      const amounts = findAmounts(text, userLocale, deps.currency);
      if (amounts.length === 0) return [];

      const today = deps.today();
      const date = resolveDate(text, today);
      const kind = detectKind(text);
      const segments = segment(text, amounts, deps.parser.segmentation);

      const drafts: TransactionDraft[] = [];
      for (const seg of segments) {
        const base = baseDraft(seg, { rawText, text, today, kind, date, payment });
        const cue = matchCategory(seg.phrase) ?? matchCategory(segments.length === 1 ? text : seg.text);

        if (cue) {
          const confidence = kind.explicit ? round2(deps.parser.ruleConfidence + VERB_BONUS) : deps.parser.ruleConfidence;
          drafts.push({ ...base, category: cue.category, description: seg.phrase || cue.cue, confidence: Math.min(1, confidence) });
          continue;
        }

        const result = await deps.classifier.classify(seg.text, deps.classifierConfig.maxOutputTokens, signal);
        const suggestion = pickClassifierDraft(result, seg.amount.value);
        const merged: TransactionDraft = {
          ...base,
          source: "classifier",
          category: suggestion?.category ?? FALLBACK_CATEGORY,
          kind: kind.explicit ? kind.kind : suggestion?.kind ?? kind.kind,
          description: seg.phrase || suggestion?.description || "",
          confidence: clampConfidence(suggestion?.confidence ?? result.confidence, 0),
        };
        const counterparty = base.counterparty ?? suggestion?.counterparty;
        if (counterparty) merged.counterparty = counterparty;
        drafts.push(merged);
      }
      return drafts;
    },
  };
}
