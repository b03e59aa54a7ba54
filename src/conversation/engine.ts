/**
 * Chat conversation engine.
 * One message in, a list of replies out. Messages of the same user are handled
 * strictly in order. A cancel command is answered at once: it aborts the user's
 * in-flight classifier call and drops the messages still waiting behind it.
 */

import { getConfig, type AppConfig } from "../config";
import { addDays, todayIn } from "../calendar";
import { InputTooLongError, InvalidRecurringFieldError, isClassifierFailure } from "../errors";
import { createExtractor, type Extractor } from "../parser/extractor";
import { createCliClassifier } from "../parser/ai-fallback";
import { createClaudeCli } from "../classifier/claude-cli";
import { clearAll, countEntries, createEntries, draftTotal, getMonthlySummary, listEntries, softDeleteLast } from "../db/ledger";
import { clearPending, getPending, savePending } from "../db/pending-actions";
import {
  cancelAllRules,
  createRule,
  findRuleByService,
  getUserRule,
  listRules,
  setRuleStatus,
  updateRule,
  type RulePatch,
} from "../db/recurring-rules";
import { listOpenInstancesForUser } from "../db/bill-instances";
import { markInstancePaid, skipInstance } from "../scheduler/dispatcher";
import { cadenceFromHint } from "../scheduler/cadence";
import { KeyedSerialQueue } from "./serial-queue";
import { parseFieldValue, parseRecurringCommand, type RecurringCommand } from "./recurring-commands";
import {
  HELP_TEXT,
  MESSAGES,
  WELCOME_TEXT,
  confirmDraftsText,
  isAffirmative,
  isCancelCommand,
  isNegative,
  listText,
  recurringListText,
  savedText,
  summaryText,
  undoneText,
} from "./replies";
import type {
  PendingState,
  RecurrenceHint,
  RecurringField,
  RecurringRule,
  SetupStep,
  TransactionDraft,
} from "../types";

export interface EngineDeps {
  extractor: Extractor;
  config: AppConfig;
  now: () => Date;
}

export interface ConversationEngine {
  handleMessage(userId: string, text: string): Promise<string[]>;
}

type ExtractionOutcome =
  | { type: "drafts"; drafts: TransactionDraft[] }
  | { type: "reply"; reply: string }
  | { type: "aborted" };

const LIST_LIMIT = 10;

/** Slash commands that only read; they leave a pending action in place */
const READ_ONLY_COMMANDS = new Set(["/start", "/help", "/list", "/summary", "/recurrings"]);

function askFor(field: RecurringField, rule: RecurringRule): string {
  switch (field) {
    case "billingDay":
      return MESSAGES.askBillingDay(rule);
    case "reminderOffsets":
      return MESSAGES.askOffsets(rule);
    case "reminderHour":
      return MESSAGES.askHour(rule);
    case "amount":
      return MESSAGES.askAmount(rule);
  }
}

const SETUP_STEPS: SetupStep[] = ["schedule", "reminderOffsets", "reminderHour"];

function setupQuestion(step: SetupStep, rule: RecurringRule): string {
  switch (step) {
    case "schedule":
      return MESSAGES.askBillingDay(rule);
    case "reminderOffsets": {
      const current = rule.reminderOffsets.length > 0 ? rule.reminderOffsets.join(",") : "sin recordatorios";
      return `${MESSAGES.askOffsets(rule)} ${MESSAGES.keepCurrent(current)}`;
    }
    case "reminderHour":
      return `${MESSAGES.askHour(rule)} ${MESSAGES.keepCurrent(`las ${rule.reminderHour}:00`)}`;
  }
}

/** A reply made only of digits and separators is an attempt at a field value */
function looksLikeFieldValue(text: string): boolean {
  return /^[\d\s,.;:/$kKhH-]+$/.test(text.trim()) || /^\d{1,2}\s*(am|pm)$/i.test(text.trim());
}

type SetupState = Extract<PendingState, { type: "recurring_setup" }>;

export function createDefaultEngineDeps(config: AppConfig = getConfig()): EngineDeps {
  const now = () => new Date();
  const today = () => todayIn(config.timezone, now());
  const cli = createClaudeCli(undefined, config.classifier.command);
  const classifier = createCliClassifier(cli, {
    timeoutMs: config.classifier.timeoutMs,
    currency: config.currency.code,
    today,
  });
  return {
    config,
    now,
    extractor: createExtractor({
      classifier,
      parser: config.parser,
      classifierConfig: config.classifier,
      currency: config.currency.code,
      today,
    }),
  };
}

export function createEngine(deps: EngineDeps): ConversationEngine {
  const { extractor, config } = deps;
  const queue = new KeyedSerialQueue();
  const inflight = new Map<string, AbortController>();
  // bumped by every cancel; a message queued under an older generation is dropped
  const generations = new Map<string, number>();
  const waiting = new Map<string, number>();

  const generationOf = (userId: string) => generations.get(userId) ?? 0;

  const hold = (userId: string, state: PendingState, now: Date) =>
    savePending(userId, state, config.pendingActions.ttlMinutes, now);

  /**
   * The rule a recurring expense describes. A live rule for the same service is
   * updated instead of adding a second one.
   */
  function upsertRule(
    userId: string,
    draft: TransactionDraft,
    hint: RecurrenceHint,
    now: Date,
  ): { rule: RecurringRule; created: boolean } {
    const today = todayIn(config.timezone, now);
    const { cadence, complete } = cadenceFromHint(hint, today);
    const existing = findRuleByService(userId, draft.description || draft.category);

    if (!existing) {
      const rule = createRule(
        {
          userId,
          serviceName: draft.description || draft.category,
          category: draft.category,
          amount: draftTotal(draft),
          currency: draft.amounts[0]?.currency ?? config.currency.code,
          cadence,
          // an interval counts from the payment just recorded
          anchorDate: cadence.kind === "custom" ? addDays(draft.occurredOn, cadence.intervalDays) : today,
          timezone: config.timezone,
          reminderOffsets: config.recurring.defaultReminderOffsets,
          reminderHour: config.recurring.defaultReminderHour,
          paymentLink: draft.paymentLink,
          paymentReference: draft.paymentReference,
          status: complete ? "active" : "pending",
        },
        now,
      );
      return { rule, created: true };
    }

    const patch: RulePatch = { amount: draftTotal(draft) };
    const kindChanged = cadence.kind !== existing.cadence.kind;
    if (complete || kindChanged) patch.cadence = cadence;
    if (draft.paymentLink) patch.paymentLink = draft.paymentLink;
    if (draft.paymentReference) patch.paymentReference = draft.paymentReference;
    let rule = updateRule(existing.id, patch, now) ?? existing;
    if (complete && rule.status === "pending") rule = setRuleStatus(rule.id, "active", now) ?? rule;
    if (!complete && kindChanged && rule.status === "active") rule = setRuleStatus(rule.id, "pending", now) ?? rule;
    return { rule, created: false };
  }

  /** Rules for the recurring expenses of a committed message, then the first setup question. */
  function setupRecurring(userId: string, drafts: TransactionDraft[], now: Date): string[] {
    const replies: string[] = [];
    const toSetUp: number[] = [];
    for (const draft of drafts) {
      // income, loans and transfers are recorded but are not bills
      if (!draft.recurrence || draft.kind !== "expense") continue;
      const { rule, created } = upsertRule(userId, draft, draft.recurrence, now);
      replies.push(created ? MESSAGES.ruleCreated(rule) : MESSAGES.ruleExists(rule));
      if (created || rule.status === "pending") toSetUp.push(rule.id);
    }
    return [...replies, ...startSetup(userId, toSetUp, now)];
  }

  /** Ask the first question of the first rule still open in `ruleIds`. */
  function startSetup(userId: string, ruleIds: number[], now: Date): string[] {
    for (let index = 0; index < ruleIds.length; index++) {
      const rule = getUserRule(userId, ruleIds[index]);
      if (!rule || rule.status === "canceled") continue;
      const step: SetupStep = rule.status === "pending" ? "schedule" : "reminderOffsets";
      hold(userId, { type: "recurring_setup", ruleId: rule.id, step, queue: ruleIds.slice(index + 1) }, now);
      return [setupQuestion(step, rule)];
    }
    return [];
  }

  /** Ask the rule's question after `step`, or finish it and go on to the next queued rule. */
  function continueSetup(userId: string, rule: RecurringRule, step: SetupStep, queue: number[], now: Date): string[] {
    const next = SETUP_STEPS.indexOf(step) + 1;
    if (next < SETUP_STEPS.length) {
      hold(userId, { type: "recurring_setup", ruleId: rule.id, step: SETUP_STEPS[next], queue }, now);
      return [setupQuestion(SETUP_STEPS[next], rule)];
    }
    clearPending(userId);
    return [MESSAGES.ruleReady(rule), ...startSetup(userId, queue, now)];
  }

  function answerSetup(userId: string, state: SetupState, text: string, now: Date): string[] | null {
    const rule = getUserRule(userId, state.ruleId);
    if (!rule || rule.status === "canceled") {
      clearPending(userId);
      return null;
    }

    if (isNegative(text)) {
      clearPending(userId);
      const closing = state.step === "schedule" ? MESSAGES.setupPostponed(rule) : MESSAGES.ruleReady(rule);
      return [closing, ...startSetup(userId, state.queue, now)];
    }
    if (isAffirmative(text)) {
      // there is no current value to keep for an unknown schedule
      if (state.step === "schedule") return [setupQuestion(state.step, rule)];
      return continueSetup(userId, rule, state.step, state.queue, now);
    }

    const field: RecurringField = state.step === "schedule" ? "billingDay" : state.step;
    try {
      let updated = updateRule(rule.id, parseFieldValue(field, text, rule.cadence.kind), now) ?? rule;
      if (state.step === "schedule" && updated.status === "pending") {
        updated = setRuleStatus(rule.id, "active", now) ?? updated;
      }
      return continueSetup(userId, updated, state.step, state.queue, now);
    } catch (err) {
      if (!(err instanceof InvalidRecurringFieldError)) throw err;
      if (looksLikeFieldValue(text)) return [MESSAGES.invalidField(err.message), setupQuestion(state.step, rule)];
      // anything else ends the setup; the rule keeps what it has so far
      clearPending(userId);
      return null;
    }
  }

  function commit(userId: string, drafts: TransactionDraft[], now: Date): string[] {
    createEntries(userId, drafts, now);
    return [savedText(drafts), ...setupRecurring(userId, drafts, now)];
  }

  function applyField(rule: RecurringRule, field: RecurringField, value: string, now: Date): string {
    const patch = parseFieldValue(field, value, rule.cadence.kind);
    let updated = updateRule(rule.id, patch, now) ?? rule;
    if (field === "billingDay" && updated.status === "pending") {
      updated = setRuleStatus(rule.id, "active", now) ?? updated;
    }
    return MESSAGES.ruleUpdated(updated);
  }

  function slashCommand(userId: string, command: string, args: string[], now: Date): string[] | null {
    switch (command) {
      case "/start":
        return [WELCOME_TEXT];
      case "/help":
        return [HELP_TEXT];
      case "/list":
        return [listText(listEntries(userId, { limit: LIST_LIMIT }))];
      case "/summary": {
        const month = args[0] && /^\d{4}-\d{2}$/.test(args[0]) ? args[0] : todayIn(config.timezone, now).slice(0, 7);
        return [summaryText(getMonthlySummary(userId, month))];
      }
      case "/recurrings":
        return [recurringListText(listRules(userId), listOpenInstancesForUser(userId))];
      case "/undo": {
        const entry = softDeleteLast(userId, now);
        return [entry ? undoneText(entry) : MESSAGES.nothingToUndo];
      }
      case "/clear": {
        const count = countEntries(userId);
        if (count === 0) return [MESSAGES.emptyLedger];
        hold(userId, { type: "confirm_clear" }, now);
        return [MESSAGES.confirmClear(count)];
      }
      case "/clear_recurrings": {
        const rules = listRules(userId);
        if (rules.length === 0) return [MESSAGES.noRecurring];
        hold(userId, { type: "confirm_clear_recurring" }, now);
        return [MESSAGES.confirmClearRecurring(rules.length)];
      }
      default:
        return null;
    }
  }

  function recurringCommand(userId: string, cmd: RecurringCommand, now: Date): string[] {
    if (cmd.type === "paid") {
      const paid = markInstancePaid(cmd.instanceId, now, userId);
      if (!paid) return [MESSAGES.instanceNotFound(cmd.instanceId)];
      return [MESSAGES.instancePaid(paid.instance, getUserRule(userId, paid.instance.ruleId), paid.entryId !== undefined)];
    }
    if (cmd.type === "skip") {
      const skipped = skipInstance(cmd.instanceId, now, userId);
      return [skipped ? MESSAGES.instanceSkipped(skipped) : MESSAGES.instanceNotFound(cmd.instanceId)];
    }

    const rule = getUserRule(userId, cmd.ruleId);
    if (!rule || rule.status === "canceled") return [MESSAGES.ruleNotFound(cmd.ruleId)];

    switch (cmd.type) {
      case "pause": {
        const updated = setRuleStatus(rule.id, "paused", now) ?? rule;
        return [MESSAGES.rulePaused(updated)];
      }
      case "activate": {
        if (rule.status === "pending") return startSetup(userId, [rule.id], now);
        const updated = setRuleStatus(rule.id, "active", now) ?? rule;
        return [MESSAGES.ruleActivated(updated)];
      }
      case "cancel":
        hold(userId, { type: "confirm_cancel_recurring", ruleId: rule.id }, now);
        return [MESSAGES.confirmCancelRule(rule)];
      case "edit":
        if (cmd.value === undefined) {
          hold(userId, { type: "awaiting_recurring_field", ruleId: rule.id, field: cmd.field }, now);
          return [askFor(cmd.field, rule)];
        }
        try {
          return [applyField(rule, cmd.field, cmd.value, now)];
        } catch (err) {
          if (err instanceof InvalidRecurringFieldError) return [MESSAGES.invalidField(err.message)];
          throw err;
        }
    }
  }

  /**
   * Resolve a reply against the pending action.
   * Returns null when the message is not an answer to it; the caller then processes it fresh.
   */
  function answerPending(userId: string, state: PendingState, text: string, now: Date): string[] | null {
    if (state.type === "recurring_setup") return answerSetup(userId, state, text, now);
    if (state.type === "awaiting_recurring_field") {
      const rule = getUserRule(userId, state.ruleId);
      if (!rule || rule.status === "canceled") {
        clearPending(userId);
        return null;
      }
      try {
        const reply = applyField(rule, state.field, text, now);
        clearPending(userId);
        return [reply];
      } catch (err) {
        if (!(err instanceof InvalidRecurringFieldError)) throw err;
        if (looksLikeFieldValue(text)) return [MESSAGES.invalidField(err.message), askFor(state.field, rule)];
        clearPending(userId);
        return null;
      }
    }

    if (isNegative(text)) {
      clearPending(userId);
      return [MESSAGES.discarded];
    }
    if (!isAffirmative(text)) {
      clearPending(userId);
      return null;
    }

    clearPending(userId);
    switch (state.type) {
      case "confirm_transaction":
        return commit(userId, state.drafts, now);
      case "confirm_clear":
        return [MESSAGES.cleared(clearAll(userId, now))];
      case "confirm_clear_recurring":
        return [MESSAGES.clearedRecurring(cancelAllRules(userId, now))];
      case "confirm_cancel_recurring": {
        const rule = setRuleStatus(state.ruleId, "canceled", now);
        return [rule ? MESSAGES.ruleCanceled(rule) : MESSAGES.ruleNotFound(state.ruleId)];
      }
    }
  }

  async function extractDrafts(userId: string, text: string): Promise<ExtractionOutcome> {
    const controller = new AbortController();
    inflight.set(userId, controller);
    try {
      const drafts = await extractor.extract(text, config.currency.locale, controller.signal);
      return controller.signal.aborted ? { type: "aborted" } : { type: "drafts", drafts };
    } catch (err) {
      if (controller.signal.aborted) return { type: "aborted" };
      if (err instanceof InputTooLongError) return { type: "reply", reply: MESSAGES.tooLong(err.limit) };
      if (isClassifierFailure(err)) {
        console.error(`Engine: classifier failed for ${userId}: ${err.message}`);
        return { type: "reply", reply: MESSAGES.classifierFailed };
      }
      throw err;
    } finally {
      if (inflight.get(userId) === controller) inflight.delete(userId);
    }
  }

  async function processMessage(userId: string, text: string, generation: number): Promise<string[]> {
    const trimmed = text.trim();
    if (!trimmed || generationOf(userId) !== generation) return [];
    const now = deps.now();

    const [first = "", ...args] = trimmed.split(/\s+/);
    const command = first.toLowerCase().replace(/@\S+$/, "");
    const pending = getPending(userId, now);

    if (command.startsWith("/")) {
      if (pending && !READ_ONLY_COMMANDS.has(command)) clearPending(userId);
      const reply = slashCommand(userId, command, args, now);
      if (reply) return reply;
    } else if (pending) {
      const reply = answerPending(userId, pending.state, trimmed, now);
      if (reply) return reply;
    }

    const recurring = parseRecurringCommand(trimmed);
    if (recurring) return recurringCommand(userId, recurring, now);

    const outcome = await extractDrafts(userId, trimmed);
    // the cancel command that aborted it answers for it
    if (outcome.type === "aborted" || generationOf(userId) !== generation) return [];
    if (outcome.type === "reply") return [outcome.reply];

    const { drafts } = outcome;
    if (drafts.length === 0) return [MESSAGES.notParsed];
    if (drafts.every((d) => d.confidence >= config.parser.autoCommitThreshold)) {
      return commit(userId, drafts, now);
    }
    hold(userId, { type: "confirm_transaction", drafts }, now);
    return [confirmDraftsText(drafts)];
  }

  function cancel(userId: string): string[] {
    const interrupted = (waiting.get(userId) ?? 0) > 0;
    generations.set(userId, generationOf(userId) + 1);
    inflight.get(userId)?.abort();
    const cleared = clearPending(userId);
    return [cleared || interrupted ? MESSAGES.canceled : MESSAGES.nothingToCancel];
  }

  function settle(userId: string): void {
    const left = (waiting.get(userId) ?? 1) - 1;
    if (left > 0) waiting.set(userId, left);
    else waiting.delete(userId);
  }

  return {
    handleMessage(userId: string, text: string): Promise<string[]> {
      if (isCancelCommand(text)) return Promise.resolve(cancel(userId));
      const generation = generationOf(userId);
      waiting.set(userId, (waiting.get(userId) ?? 0) + 1);
      return queue.run(userId, () => processMessage(userId, text, generation)).finally(() => settle(userId));
    },
  };
}
