import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { createEngine } from "../../src/conversation/engine";
import { MESSAGES, confirmDraftsText, savedText } from "../../src/conversation/replies";
import { DEFAULT_CONFIG } from "../../src/config";
import { _resetDb, _setDb, openMemoryDb } from "../../src/db/connection";
import { runMigrations } from "../../src/db/migrate";
import { countEntries, listEntries } from "../../src/db/ledger";
import { getPending } from "../../src/db/pending-actions";
import { createRule, getRule, listRules } from "../../src/db/recurring-rules";
import { getInstance, insertInstance } from "../../src/db/bill-instances";
import { ClassifierUnavailableError, InputTooLongError } from "../../src/errors";
import { createExtractor, type Extractor } from "../../src/parser/extractor";
import type { ClassifierResult, RecurringRule, TransactionDraft } from "../../src/types";

const USER = "user-1";
const NOW = new Date("2026-10-19T15:00:00Z");

function draft(overrides: Partial<TransactionDraft> = {}): TransactionDraft {
  return {
    amounts: [{ value: 15000, currency: "COP" }],
    kind: "expense",
    category: "food_out",
    description: "almuerzo",
    occurredOn: "2026-10-19",
    confidence: 0.9,
    source: "rules",
    rawText: "gasté 15k en almuerzo",
    ...overrides,
  };
}

function setup(table: Record<string, TransactionDraft[]> = {}, now: () => Date = () => NOW) {
  const extract = vi.fn(async (text: string, _locale: string, _signal?: AbortSignal) => table[text] ?? []);
  const extractor: Extractor = { extract };
  const engine = createEngine({ extractor, config: DEFAULT_CONFIG, now });
  return { engine, extract };
}

function ruleOf(id: number): RecurringRule {
  const rule = getRule(id);
  if (!rule) throw new Error(`rule ${id} not found`);
  return rule;
}

const askOffsets = (rule: RecurringRule) =>
  `${MESSAGES.askOffsets(rule)} ${MESSAGES.keepCurrent(rule.reminderOffsets.join(","))}`;
const askHour = (rule: RecurringRule) => `${MESSAGES.askHour(rule)} ${MESSAGES.keepCurrent(`las ${rule.reminderHour}:00`)}`;

/** An extractor call that waits until `release` is called */
function gate() {
  let release: () => void = () => {};
  let started: () => void = () => {};
  const opened = new Promise<void>((resolve) => {
    release = resolve;
  });
  const running = new Promise<void>((resolve) => {
    started = resolve;
  });
  const slow = async (_text: string, _locale: string, _signal?: AbortSignal): Promise<TransactionDraft[]> => {
    started();
    await opened;
    return [draft()];
  };
  return { slow, running, release: () => release() };
}

function newRule(status: "active" | "pending" = "active", serviceName = "netflix") {
  return createRule(
    {
      userId: USER,
      serviceName,
      category: "subscriptions",
      amount: 45000,
      currency: "COP",
      cadence: { kind: "monthly", day: 5 },
      anchorDate: "2026-10-01",
      timezone: "America/Bogota",
      reminderOffsets: [3, 1, 0],
      reminderHour: 9,
      status,
    },
    NOW,
  );
}

beforeEach(() => {
  const db = openMemoryDb();
  runMigrations(db);
  _setDb(db);
});

afterEach(() => {
  _resetDb();
});

describe("transaction confirmation", () => {
  const low = draft({ confidence: 0.8 });

  test("a confident draft is saved without asking", async () => {
    const high = draft();
    const { engine } = setup({ "gasté 15k en almuerzo": [high] });
    const replies = await engine.handleMessage(USER, "gasté 15k en almuerzo");
    expect(replies).toEqual([savedText([high])]);
    expect(countEntries(USER)).toBe(1);
    expect(getPending(USER, NOW)).toBeNull();
  });

  test("a draft below the threshold leaves exactly one pending confirmation", async () => {
    const { engine } = setup({ "almuerzo 15k": [low] });
    const replies = await engine.handleMessage(USER, "almuerzo 15k");
    expect(replies).toEqual([confirmDraftsText([low])]);
    expect(countEntries(USER)).toBe(0);
    expect(getPending(USER, NOW)?.state).toEqual({ type: "confirm_transaction", drafts: [low] });
  });

  test('"no" discards the pending drafts', async () => {
    const { engine } = setup({ "almuerzo 15k": [low] });
    await engine.handleMessage(USER, "almuerzo 15k");
    expect(await engine.handleMessage(USER, "No")).toEqual([MESSAGES.discarded]);
    expect(countEntries(USER)).toBe(0);
    expect(getPending(USER, NOW)).toBeNull();
  });

  test('"sí" commits the pending drafts', async () => {
    const { engine } = setup({ "almuerzo 15k": [low] });
    await engine.handleMessage(USER, "almuerzo 15k");
    expect(await engine.handleMessage(USER, "Sí!")).toEqual([savedText([low])]);
    expect(countEntries(USER)).toBe(1);
    expect(listEntries(USER)[0].amount).toBe(15000);
    expect(getPending(USER, NOW)).toBeNull();
  });

  test("one uncertain draft holds the whole message for confirmation", async () => {
    const drafts = [
      draft({ amounts: [{ value: 5000, currency: "COP" }], description: "comida" }),
      draft({ amounts: [{ value: 60000, currency: "COP" }], category: "shopping", description: "ropa" }),
      draft({ amounts: [{ value: 80000, currency: "COP" }], category: "misc", description: "estuche", confidence: 0.4 }),
    ];
    const { engine } = setup({ "me gasté 5k en comida, 60k en ropa y 80k en estuche": drafts });
    await engine.handleMessage(USER, "me gasté 5k en comida, 60k en ropa y 80k en estuche");
    expect(countEntries(USER)).toBe(0);

    await engine.handleMessage(USER, "si");
    expect(countEntries(USER)).toBe(3);
  });

  test("an unrelated message drops the pending action and is processed fresh", async () => {
    const high = draft({ amounts: [{ value: 8000, currency: "COP" }], category: "transport", description: "taxi" });
    const { engine } = setup({ "almuerzo 15k": [low], "pagué 8k de taxi": [high] });
    await engine.handleMessage(USER, "almuerzo 15k");
    expect(await engine.handleMessage(USER, "pagué 8k de taxi")).toEqual([savedText([high])]);
    expect(listEntries(USER).map((e) => e.amount)).toEqual([8000]);
    expect(getPending(USER, NOW)).toBeNull();
  });

  test("a late answer after the pending action expired is processed fresh", async () => {
    let clock = NOW;
    const { engine } = setup({ "almuerzo 15k": [draft({ confidence: 0.5 })] }, () => clock);
    await engine.handleMessage(USER, "almuerzo 15k");

    clock = new Date(NOW.getTime() + 31 * 60_000);
    expect(await engine.handleMessage(USER, "sí")).toEqual([MESSAGES.notParsed]);
    expect(countEntries(USER)).toBe(0);
    expect(getPending(USER, clock)).toBeNull();
  });

  test("read-only commands keep the pending action", async () => {
    const { engine } = setup({ "almuerzo 15k": [low] });
    await engine.handleMessage(USER, "almuerzo 15k");
    await engine.handleMessage(USER, "/list");
    expect(getPending(USER, NOW)?.state.type).toBe("confirm_transaction");
  });

  test("a message without amounts is reported as not understood", async () => {
    const { engine } = setup();
    expect(await engine.handleMessage(USER, "hola")).toEqual([MESSAGES.notParsed]);
  });
});

describe("errors", () => {
  test("input over the limit", async () => {
    const { engine, extract } = setup();
    extract.mockRejectedValueOnce(new InputTooLongError(1300, 1200));
    expect(await engine.handleMessage(USER, "x")).toEqual([MESSAGES.tooLong(1200)]);
  });

  test("classifier failure saves nothing", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const { engine, extract } = setup();
    extract.mockRejectedValueOnce(new ClassifierUnavailableError("claude CLI exited with code 1"));
    expect(await engine.handleMessage(USER, "80k en estuche")).toEqual([MESSAGES.classifierFailed]);
    expect(countEntries(USER)).toBe(0);
    expect(getPending(USER, NOW)).toBeNull();
  });
});

describe("cancel", () => {
  test("without a pending action", async () => {
    const { engine } = setup();
    expect(await engine.handleMessage(USER, "/cancel")).toEqual([MESSAGES.nothingToCancel]);
  });

  test("clears the pending action", async () => {
    const { engine } = setup({ "almuerzo 15k": [draft({ confidence: 0.5 })] });
    await engine.handleMessage(USER, "almuerzo 15k");
    expect(await engine.handleMessage(USER, "cancelar")).toEqual([MESSAGES.canceled]);
    expect(getPending(USER, NOW)).toBeNull();
  });

  test("aborts an in-flight classifier call", async () => {
    const { engine, extract } = setup();
    let started: () => void = () => {};
    const running = new Promise<void>((resolve) => {
      started = resolve;
    });
    extract.mockImplementationOnce(
      (_text: string, _locale: string, signal?: AbortSignal) =>
        new Promise<TransactionDraft[]>((_resolve, reject) => {
          started();
          signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    );

    const message = engine.handleMessage(USER, "80k en estuche");
    await running;
    const cancel = engine.handleMessage(USER, "/cancel");

    expect(await message).toEqual([]);
    expect(await cancel).toEqual([MESSAGES.canceled]);
    expect(countEntries(USER)).toBe(0);
  });
});

describe("cancel while messages are queued", () => {
  test("answers at once and drops the messages waiting behind it", async () => {
    const { engine, extract } = setup({ "almuerzo 15k": [draft()] });
    const { slow, running, release } = gate();
    extract.mockImplementationOnce(slow);

    const first = engine.handleMessage(USER, "taxi 8k");
    const second = engine.handleMessage(USER, "almuerzo 15k");
    await running;

    expect(await engine.handleMessage(USER, "/cancel")).toEqual([MESSAGES.canceled]);
    release();
    expect(await first).toEqual([]);
    expect(await second).toEqual([]);
    expect(extract).toHaveBeenCalledTimes(1);
    expect(countEntries(USER)).toBe(0);

    expect(await engine.handleMessage(USER, "almuerzo 15k")).toEqual([savedText([draft()])]);
    expect(countEntries(USER)).toBe(1);
  });
});

describe("concurrent messages", () => {
  test("messages of one user are handled one at a time, in order", async () => {
    const { engine, extract } = setup({ "almuerzo 15k": [draft()] });
    const { slow, running, release } = gate();
    extract.mockImplementationOnce(slow);

    const first = engine.handleMessage(USER, "taxi 8k");
    const second = engine.handleMessage(USER, "almuerzo 15k");
    await running;
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(extract).toHaveBeenCalledTimes(1);

    release();
    const replies = await Promise.all([first, second]);
    expect(replies).toEqual([[savedText([draft()])], [savedText([draft()])]]);
    expect(extract.mock.calls.map((call) => call[0])).toEqual(["taxi 8k", "almuerzo 15k"]);
    expect(countEntries(USER)).toBe(2);
  });

  test("different users do not wait for each other", async () => {
    const { engine, extract } = setup({ "almuerzo 15k": [draft()] });
    const { slow, running, release } = gate();
    extract.mockImplementationOnce(slow);

    const blocked = engine.handleMessage(USER, "taxi 8k");
    await running;
    expect(await engine.handleMessage("user-2", "almuerzo 15k")).toEqual([savedText([draft()])]);
    release();
    await blocked;
  });
});

describe("ledger commands", () => {
  test("/undo removes the last entry", async () => {
    const { engine } = setup({ "gasté 15k en almuerzo": [draft()] });
    await engine.handleMessage(USER, "gasté 15k en almuerzo");
    const [reply] = await engine.handleMessage(USER, "/undo");
    expect(reply).toBe("Borré: Gasto $15.000 · almuerzo · 2026-10-19");
    expect(countEntries(USER)).toBe(0);
    expect(await engine.handleMessage(USER, "/undo")).toEqual([MESSAGES.nothingToUndo]);
  });

  test("/clear asks first, then clears", async () => {
    const { engine } = setup({ "gasté 15k en almuerzo": [draft()] });
    await engine.handleMessage(USER, "gasté 15k en almuerzo");
    expect(await engine.handleMessage(USER, "/clear")).toEqual([MESSAGES.confirmClear(1)]);
    expect(await engine.handleMessage(USER, "dale")).toEqual([MESSAGES.cleared(1)]);
    expect(countEntries(USER)).toBe(0);
  });

  test("/clear_recurrings asks first, then cancels every rule", async () => {
    newRule();
    newRule("active", "spotify");
    const { engine } = setup();

    expect(await engine.handleMessage(USER, "/clear_recurrings")).toEqual([MESSAGES.confirmClearRecurring(2)]);
    expect(await engine.handleMessage(USER, "no")).toEqual([MESSAGES.discarded]);
    expect(listRules(USER)).toHaveLength(2);

    await engine.handleMessage(USER, "/clear_recurrings");
    expect(await engine.handleMessage(USER, "sí")).toEqual([MESSAGES.clearedRecurring(2)]);
    expect(listRules(USER)).toEqual([]);
    expect(getRule(1)?.status).toBe("canceled");
    expect(await engine.handleMessage(USER, "/clear_recurrings")).toEqual([MESSAGES.noRecurring]);
  });

  test("/clear on an empty ledger", async () => {
    const { engine } = setup();
    expect(await engine.handleMessage(USER, "/clear")).toEqual([MESSAGES.emptyLedger]);
    expect(getPending(USER, NOW)).toBeNull();
  });
});

describe("recurring setup", () => {
  const netflix = draft({
    category: "subscriptions",
    description: "netflix",
    amounts: [{ value: 45000, currency: "COP" }],
    recurrence: { cadence: "monthly", day: 5 },
  });
  const gym = draft({ description: "gimnasio", category: "health", recurrence: { cadence: "monthly" } });

  test("a draft with a billing day creates an active rule, then asks for reminders and hour", async () => {
    const { engine } = setup({ "netflix 45k todos los 5": [netflix] });
    const replies = await engine.handleMessage(USER, "netflix 45k todos los 5");
    const rule = ruleOf(1);
    expect(rule.status).toBe("active");
    expect(rule.cadence).toEqual({ kind: "monthly", day: 5 });
    expect(rule.reminderOffsets).toEqual([3, 1, 0]);
    expect(replies).toEqual([savedText([netflix]), MESSAGES.ruleCreated(rule), askOffsets(rule)]);
    expect(getPending(USER, NOW)?.state).toEqual({ type: "recurring_setup", ruleId: 1, step: "reminderOffsets", queue: [] });

    expect(await engine.handleMessage(USER, "sí")).toEqual([askHour(rule)]);
    const [ready] = await engine.handleMessage(USER, "7pm");
    expect(ruleOf(1).reminderHour).toBe(19);
    expect(ready).toBe(MESSAGES.ruleReady(ruleOf(1)));
    expect(getPending(USER, NOW)).toBeNull();
  });

  test("a draft without a billing day asks for it", async () => {
    const { engine } = setup({ "gimnasio 90k mensual": [gym], "almuerzo 15k": [draft()] });
    await engine.handleMessage(USER, "gimnasio 90k mensual");
    expect(getRule(1)?.status).toBe("pending");
    expect(getPending(USER, NOW)?.state).toEqual({ type: "recurring_setup", ruleId: 1, step: "schedule", queue: [] });

    const pendingRule = ruleOf(1);
    expect(await engine.handleMessage(USER, "45")).toEqual([
      MESSAGES.invalidField("el día debe estar entre 1 y 31"),
      MESSAGES.askBillingDay(pendingRule),
    ]);

    expect(await engine.handleMessage(USER, "el 10")).toEqual([askOffsets(ruleOf(1))]);
    expect(getRule(1)?.status).toBe("active");
    expect(getRule(1)?.cadence).toEqual({ kind: "monthly", day: 10 });

    expect(await engine.handleMessage(USER, "no")).toEqual([MESSAGES.ruleReady(ruleOf(1))]);
    expect(getPending(USER, NOW)).toBeNull();
  });

  test("an unrelated reply to a setup question is processed fresh", async () => {
    const { engine } = setup({ "gimnasio 90k mensual": [gym], "almuerzo 15k": [draft()] });
    await engine.handleMessage(USER, "gimnasio 90k mensual");
    await engine.handleMessage(USER, "almuerzo 15k");
    expect(getPending(USER, NOW)).toBeNull();
    expect(countEntries(USER)).toBe(2);
    expect(getRule(1)?.status).toBe("pending");
  });

  test("every rule of a message gets its own questions, one after the other", async () => {
    const { engine } = setup({ "netflix 45k todos los 5 y gimnasio 90k mensual": [netflix, gym] });
    const replies = await engine.handleMessage(USER, "netflix 45k todos los 5 y gimnasio 90k mensual");
    expect(replies).toEqual([
      savedText([netflix, gym]),
      MESSAGES.ruleCreated(ruleOf(1)),
      MESSAGES.ruleCreated(ruleOf(2)),
      askOffsets(ruleOf(1)),
    ]);
    expect(getPending(USER, NOW)?.state).toEqual({ type: "recurring_setup", ruleId: 1, step: "reminderOffsets", queue: [2] });

    await engine.handleMessage(USER, "sí");
    expect(await engine.handleMessage(USER, "sí")).toEqual([
      MESSAGES.ruleReady(ruleOf(1)),
      MESSAGES.askBillingDay(ruleOf(2)),
    ]);

    await engine.handleMessage(USER, "el 10");
    await engine.handleMessage(USER, "1");
    expect(await engine.handleMessage(USER, "8")).toEqual([MESSAGES.ruleReady(ruleOf(2))]);
    expect(ruleOf(2)).toMatchObject({
      status: "active",
      cadence: { kind: "monthly", day: 10 },
      reminderOffsets: [1],
      reminderHour: 8,
    });
    expect(getPending(USER, NOW)).toBeNull();
  });

  test("the same recurring message twice keeps one rule", async () => {
    const raised = { ...netflix, description: "Netflix", amounts: [{ value: 50000, currency: "COP" }] };
    const { engine } = setup({ "netflix 45k todos los 5": [netflix], "Netflix 50k todos los 5": [raised] });
    await engine.handleMessage(USER, "netflix 45k todos los 5");
    await engine.handleMessage(USER, "no");

    const replies = await engine.handleMessage(USER, "Netflix 50k todos los 5");
    expect(listRules(USER)).toHaveLength(1);
    expect(ruleOf(1).amount).toBe(50000);
    expect(replies).toEqual([savedText([raised]), MESSAGES.ruleExists(ruleOf(1))]);
    expect(countEntries(USER)).toBe(2);
  });

  test("a recurring income is recorded without creating a bill", async () => {
    const salary = draft({
      kind: "income",
      category: "salary",
      description: "sueldo",
      amounts: [{ value: 3_000_000, currency: "COP" }],
      recurrence: { cadence: "monthly", day: 30 },
    });
    const { engine } = setup({ "me pagaron el sueldo 3m todos los 30": [salary] });
    expect(await engine.handleMessage(USER, "me pagaron el sueldo 3m todos los 30")).toEqual([savedText([salary])]);
    expect(listRules(USER)).toEqual([]);
    expect(getPending(USER, NOW)).toBeNull();
    expect(countEntries(USER)).toBe(1);
  });

  test("activar on a pending rule starts its setup", async () => {
    const rule = newRule("pending");
    const { engine } = setup();
    expect(await engine.handleMessage(USER, `activar ${rule.id}`)).toEqual([MESSAGES.askBillingDay(rule)]);
    expect(getPending(USER, NOW)?.state).toEqual({ type: "recurring_setup", ruleId: rule.id, step: "schedule", queue: [] });
  });

  test("declining the schedule question leaves the rule pending", async () => {
    const { engine } = setup({ "gimnasio 90k mensual": [gym] });
    await engine.handleMessage(USER, "gimnasio 90k mensual");
    expect(await engine.handleMessage(USER, "no")).toEqual([MESSAGES.setupPostponed(ruleOf(1))]);
    expect(getRule(1)?.status).toBe("pending");
    expect(getPending(USER, NOW)).toBeNull();
  });
});

describe("recurring commands", () => {
  test("pausar and activar", async () => {
    const rule = newRule();
    const { engine } = setup();
    await engine.handleMessage(USER, `pausar ${rule.id}`);
    expect(getRule(rule.id)?.status).toBe("paused");
    await engine.handleMessage(USER, `activar ${rule.id}`);
    expect(getRule(rule.id)?.status).toBe("active");
  });

  test("cancelar asks for confirmation", async () => {
    const rule = newRule();
    const { engine } = setup();
    expect(await engine.handleMessage(USER, `cancelar ${rule.id}`)).toEqual([MESSAGES.confirmCancelRule(rule)]);
    await engine.handleMessage(USER, "si");
    expect(getRule(rule.id)?.status).toBe("canceled");
  });

  test("another user's rule is not found", async () => {
    const rule = newRule();
    const { engine } = setup();
    expect(await engine.handleMessage("user-2", `pausar ${rule.id}`)).toEqual([MESSAGES.ruleNotFound(rule.id)]);
    expect(getRule(rule.id)?.status).toBe("active");
  });

  test("editing a field inline and through a follow-up question", async () => {
    const rule = newRule();
    const { engine } = setup();
    await engine.handleMessage(USER, `monto ${rule.id} 50k`);
    expect(getRule(rule.id)?.amount).toBe(50000);

    await engine.handleMessage(USER, `hora ${rule.id}`);
    expect(getPending(USER, NOW)?.state).toEqual({ type: "awaiting_recurring_field", ruleId: rule.id, field: "reminderHour" });
    await engine.handleMessage(USER, "8pm");
    expect(getRule(rule.id)?.reminderHour).toBe(20);
  });

  test("pagado closes the instance and records the payment", async () => {
    const rule = newRule();
    const instance = insertInstance({ ruleId: rule.id, periodKey: "2026-11", dueDate: "2026-11-05", amount: 45000 }, NOW);
    const { engine } = setup();
    await engine.handleMessage(USER, `pagado ${instance.id}`);
    expect(getInstance(instance.id)?.status).toBe("paid");
    expect(listEntries(USER).map((e) => [e.amount, e.source])).toEqual([[45000, "recurring"]]);
    expect(await engine.handleMessage(USER, `pagado ${instance.id}`)).toEqual([MESSAGES.instanceNotFound(instance.id)]);
  });

  test("omitir skips the instance", async () => {
    const rule = newRule();
    const instance = insertInstance({ ruleId: rule.id, periodKey: "2026-11", dueDate: "2026-11-05" }, NOW);
    const { engine } = setup();
    await engine.handleMessage(USER, `omitir ${instance.id}`);
    expect(getInstance(instance.id)?.status).toBe("skipped");
    expect(countEntries(USER)).toBe(0);
  });
});

describe("with the rule extractor", () => {
  const MESSAGE = "me gasté 5k en comida y 60k en ropa y 80k en estuche";

  function realEngine() {
    const suggestion = draft({
      amounts: [{ value: 80000, currency: "COP" }],
      category: "shopping",
      description: "estuche",
      confidence: 0.7,
      source: "classifier",
    });
    const classify = vi.fn(async (): Promise<ClassifierResult> => ({ drafts: [suggestion], confidence: 0.7 }));
    const extractor = createExtractor({
      classifier: { classify },
      parser: DEFAULT_CONFIG.parser,
      classifierConfig: DEFAULT_CONFIG.classifier,
      currency: "COP",
      today: () => "2026-10-19",
    });
    return createEngine({ extractor, config: DEFAULT_CONFIG, now: () => NOW });
  }

  test("three movements with one uncertain are confirmed together", async () => {
    const engine = realEngine();
    await engine.handleMessage(USER, MESSAGE);
    const pending = getPending(USER, NOW);
    expect(pending?.state.type).toBe("confirm_transaction");
    expect(pending?.state.type === "confirm_transaction" ? pending.state.drafts.length : 0).toBe(3);

    await engine.handleMessage(USER, "no");
    expect(countEntries(USER)).toBe(0);

    await engine.handleMessage(USER, MESSAGE);
    await engine.handleMessage(USER, "sí");
    expect(listEntries(USER).map((e) => [e.amount, e.category]).sort((a, b) => Number(a[0]) - Number(b[0]))).toEqual([
      [5000, "food_out"],
      [60000, "shopping"],
      [80000, "shopping"],
    ]);
  });

  test("a confident movement is saved straight away", async () => {
    const engine = realEngine();
    await engine.handleMessage(USER, "ayer pagué 200k de arriendo");
    expect(listEntries(USER).map((e) => [e.amount, e.category, e.occurredOn])).toEqual([[200000, "housing", "2026-10-18"]]);
  });

  test("a weekly bill gets a weekday schedule", async () => {
    const engine = realEngine();
    await engine.handleMessage(USER, "gimnasio 50k todos los lunes");
    const replies = await engine.handleMessage(USER, "sí");
    const rule = ruleOf(1);
    expect(rule).toMatchObject({ serviceName: "gimnasio", status: "active", cadence: { kind: "weekly", weekday: 1 } });
    expect(replies.slice(1)).toEqual([MESSAGES.ruleCreated(rule), askOffsets(rule)]);
  });

  test("a weekly bill without its day asks for a weekday", async () => {
    const engine = realEngine();
    await engine.handleMessage(USER, "clases de baile 40k semanal");
    await engine.handleMessage(USER, "sí");
    expect(getPending(USER, NOW)?.state).toMatchObject({ type: "recurring_setup", step: "schedule" });

    await engine.handleMessage(USER, "los martes");
    expect(ruleOf(1)).toMatchObject({ status: "active", cadence: { kind: "weekly", weekday: 2 } });
  });

  test("the payment link and reference are kept on the rule", async () => {
    const engine = realEngine();
    await engine.handleMessage(USER, "internet 80k mensual https://pagos.example/internet ref 778899");
    await engine.handleMessage(USER, "sí");
    expect(listEntries(USER).map((e) => e.amount)).toEqual([80000]);
    expect(ruleOf(1)).toMatchObject({
      serviceName: "internet",
      category: "utilities",
      status: "pending",
      paymentLink: "https://pagos.example/internet",
      paymentReference: "778899",
    });
  });
});
