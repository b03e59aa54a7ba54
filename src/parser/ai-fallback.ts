import type { Classifier, ClassifierResult, TransactionDraft, TransactionKind } from "../types";
import { ClassifierTimeoutError, ClassifierUnavailableError } from "../errors";
import type { ClaudeCli } from "../classifier/claude-cli";
import { isIsoDate } from "../calendar";
import { normalizeAmount } from "./amount";
import { KNOWN_CATEGORIES, FALLBACK_CATEGORY } from "./cues";

/**
 * Expected JSON shape of one movement in the classifier response.
 */
interface AiMovement {
  amount: number | string;
  currency?: string;
  kind?: string;
  category?: string;
  description?: string;
  counterparty?: string;
  date?: string;
  confidence?: number;
}

interface AiResponse {
  movements: AiMovement[];
  confidence?: number;
}

const VALID_KINDS: TransactionKind[] = ["expense", "income", "loan", "transfer"];

const PROMPT_TEMPLATE = `You are a personal finance assistant. Extract the money movements from one chat message written in Spanish.

Return ONLY valid JSON (no markdown, no code fences) in this exact format:
{
  "movements": [
    {
      "amount": 12000,
      "currency": "{{CURRENCY}}",
      "kind": "expense" or "income" or "loan" or "transfer",
      "category": one of {{CATEGORIES}},
      "description": "short noun phrase, what the money was for",
      "counterparty": "person or entity for loans, empty otherwise",
      "date": "YYYY-MM-DD",
      "confidence": 0.0 to 1.0
    }
  ],
  "confidence": 0.0 to 1.0
}

Rules:
- Amount slang: k/lucas = 1,000; m/palo(s) = 1,000,000. Amounts are positive.
- Default currency is {{CURRENCY}}. Today is {{TODAY}}; "ayer" and "anoche" mean the day before.
- "le presté", "me prestaron", "le pagué a" are loans; moving money between own accounts is a transfer.
- Use "misc" only when no other category fits.
- confidence is low when the amount or the meaning is ambiguous.
- If the message has no money movement, return {"movements": [], "confidence": 0}.

Message:
{{TEXT}}`;

export interface PromptContext {
  today: string;
  currency: string;
}

export function buildPrompt(text: string, context: PromptContext): string {
  return PROMPT_TEMPLATE
    .replace(/\{\{CURRENCY\}\}/g, context.currency)
    .replace("{{CATEGORIES}}", KNOWN_CATEGORIES.map((c) => `"${c}"`).join(", "))
    .replace("{{TODAY}}", context.today)
    .replace("{{TEXT}}", text);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isMovement(value: unknown): value is AiMovement {
  return isRecord(value) && (typeof value.amount === "number" || typeof value.amount === "string");
}

/**
 * Parse the raw stdout of the claude CLI into an AiResponse.
 * Accepts the CLI envelope ({"result": "..."}), bare JSON and fenced JSON.
 */
export function parseClassifierResponse(raw: string): AiResponse {
  let text = raw;
  try {
    const wrapper: unknown = JSON.parse(raw);
    if (isRecord(wrapper)) {
      if (typeof wrapper.result === "string") {
        text = wrapper.result;
      } else if (Array.isArray(wrapper.movements)) {
        return validateAiResponse(wrapper);
      }
    }
  } catch {
    // Not a JSON envelope, parse the text directly below
  }

  // Strip markdown code fences if present
  text = text.replace(/^```(?:json)?\s*\n?/m, "").replace(/\n?```\s*$/m, "");
  text = text.trim();

  const parsed: unknown = JSON.parse(text);
  return validateAiResponse(parsed);
}

function validateAiResponse(obj: unknown): AiResponse {
  if (!isRecord(obj) || !Array.isArray(obj.movements)) {
    return { movements: [] };
  }
  const movements = obj.movements.filter(isMovement);
  return typeof obj.confidence === "number" ? { movements, confidence: obj.confidence } : { movements };
}

export function clampConfidence(value: unknown, fallback = 0.5): number {
  if (typeof value !== "number" || Number.isNaN(value)) return fallback;
  return Math.max(0, Math.min(1, value));
}

function isKind(value: string | undefined): value is TransactionKind {
  return VALID_KINDS.some((kind) => kind === value);
}

export function toDraft(ai: AiMovement, rawText: string, context: PromptContext): TransactionDraft | null {
  const amount = typeof ai.amount === "string" ? normalizeAmount(ai.amount) : ai.amount;
  if (amount === null || !Number.isFinite(amount) || amount <= 0) return null;

  const kind = ai.kind?.trim().toLowerCase();
  const category = ai.category?.trim().toLowerCase();
  const counterparty = ai.counterparty?.trim();
  const currency = ai.currency?.trim().toUpperCase();

  const draft: TransactionDraft = {
    amounts: [{ value: amount, currency: currency && /^[A-Z]{3}$/.test(currency) ? currency : context.currency }],
    kind: isKind(kind) ? kind : "expense",
    category: category && KNOWN_CATEGORIES.includes(category) ? category : FALLBACK_CATEGORY,
    description: ai.description?.trim() ?? "",
    occurredOn: ai.date && isIsoDate(ai.date) ? ai.date : context.today,
    confidence: clampConfidence(ai.confidence),
    source: "classifier",
    rawText,
  };
  if (counterparty) draft.counterparty = counterparty;
  return draft;
}

export interface CliClassifierOptions {
  timeoutMs: number;
  currency: string;
  /** Today's date (YYYY-MM-DD) in the user's zone */
  today: () => string;
}

/**
 * Creates a Classifier backed by the claude CLI.
 * Timeouts and aborts raise ClassifierTimeoutError; any other failure raises ClassifierUnavailableError.
 */
export function createCliClassifier(cli: ClaudeCli, options: CliClassifierOptions): Classifier {
  return {
    async classify(text: string, maxOutputTokens: number, signal?: AbortSignal): Promise<ClassifierResult> {
      const context: PromptContext = { today: options.today(), currency: options.currency };
      const result = await cli.run({
        prompt: buildPrompt(text, context),
        maxTokens: maxOutputTokens,
        timeoutMs: options.timeoutMs,
        signal,
      });

      if (result.timedOut || result.aborted) {
        throw new ClassifierTimeoutError(options.timeoutMs);
      }
      if (!result.success) {
        console.error(`Classifier: ${result.error ?? "claude CLI failed"}`);
        throw new ClassifierUnavailableError(result.error ?? "claude CLI failed");
      }
      if (!result.output) {
        throw new ClassifierUnavailableError("claude CLI returned no output");
      }

      let response: AiResponse;
      try {
        response = parseClassifierResponse(result.output);
      } catch (err) {
        console.error("Classifier: failed to parse response:", err);
        throw new ClassifierUnavailableError("Classifier response was not valid JSON");
      }

      const drafts: TransactionDraft[] = [];
      for (const movement of response.movements) {
        const draft = toDraft(movement, text, context);
        if (draft) drafts.push(draft);
      }

      const confidence =
        response.confidence !== undefined
          ? clampConfidence(response.confidence)
          : drafts.reduce((min, d) => Math.min(min, d.confidence), drafts.length > 0 ? 1 : 0);
      return { drafts, confidence };
    },
  };
}
