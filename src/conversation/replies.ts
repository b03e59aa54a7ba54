/**
 * Reply vocabulary and Spanish message templates for the chat.
 */

import { formatMoney, kindLabel } from "../format";
import { describeCadence } from "../scheduler/cadence";
import { foldText } from "../parser/text";
import { draftTotal, type MonthlySummary } from "../db/ledger";
import type { BillInstance, LedgerEntry, RecurringRule, TransactionDraft } from "../types";

const AFFIRMATIVE = new Set(["si", "s", "ok", "okay", "dale", "listo", "confirmo", "confirmar", "yes", "claro", "de una"]);
const NEGATIVE = new Set(["no", "n", "nop", "nel", "negativo"]);

function normalizeReply(text: string): string {
  return foldText(text)
    .replace(/[¡!¿?.,]/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

export function isAffirmative(text: string): boolean {
  return AFFIRMATIVE.has(normalizeReply(text));
}

export function isNegative(text: string): boolean {
  return NEGATIVE.has(normalizeReply(text));
}

/** "cancelar" alone or /cancel */
export function isCancelCommand(text: string): boolean {
  const t = normalizeReply(text.replace(/^\//, ""));
  return t === "cancel" || t === "cancelar";
}

export const HELP_TEXT = [
  "Escríbeme tus movimientos en lenguaje natural:",
  '  "almuerzo 15k", "ayer pagué 200k de arriendo", "me pagaron 2m"',
  '  "netflix 45k todos los 5" crea un pago recurrente',
  "",
  "Comandos:",
  "  /list          últimos movimientos",
  "  /summary       resumen del mes",
  "  /recurrings    pagos recurrentes y cuentas por pagar",
  "  /undo          borra el último movimiento",
  "  /clear         borra todos los movimientos",
  "  /clear_recurrings  cancela todos los pagos recurrentes",
  "  /cancel        cancela la acción pendiente",
  "",
  "Recurrentes: pausar N, activar N, cancelar N, monto N 50k,",
  "  recordatorios N 3,1,0, hora N 8, pagado N, omitir N",
].join("\n");

export const WELCOME_TEXT = `¡Hola! Soy tu libreta de gastos.\n\n${HELP_TEXT}`;

export const MESSAGES = {
  notParsed: 'No entendí ningún monto. Prueba con algo como "almuerzo 15k".',
  classifierFailed: "No pude interpretar el mensaje en este momento. Intenta escribirlo de otra forma.",
  tooLong: (limit: number) => `El mensaje es muy largo (máximo ${limit} caracteres).`,
  discarded: "Listo, no guardé nada.",
  canceled: "Acción cancelada.",
  nothingToCancel: "No hay ninguna acción pendiente.",
  nothingToUndo: "No hay movimientos para borrar.",
  emptyLedger: "Aún no tienes movimientos.",
  confirmClear: (count: number) => `¿Seguro que quieres borrar tus ${count} movimientos? Responde "sí" o "no".`,
  cleared: (count: number) => `Borré ${count} movimientos.`,
  confirmClearRecurring: (count: number) =>
    `¿Seguro que quieres cancelar tus ${count} pagos recurrentes? Responde "sí" o "no".`,
  clearedRecurring: (count: number) => `Cancelé ${count} pagos recurrentes.`,
  noRecurring: "No tienes pagos recurrentes.",
  ruleNotFound: (id: number) => `No encontré el pago recurrente ${id}.`,
  instanceNotFound: (id: number) => `No encontré una cuenta abierta con el número ${id}.`,
  rulePaused: (rule: RecurringRule) => `Pausé "${rule.serviceName}". Escribe "activar ${rule.id}" para reanudarlo.`,
  ruleActivated: (rule: RecurringRule) => `Activé "${rule.serviceName}".`,
  ruleCanceled: (rule: RecurringRule) => `Cancelé "${rule.serviceName}".`,
  confirmCancelRule: (rule: RecurringRule) =>
    `¿Cancelar "${rule.serviceName}" (${formatMoney(rule.amount, rule.currency)}, ${describeCadence(rule.cadence)})? Responde "sí" o "no".`,
  askBillingDay: (rule: RecurringRule) => scheduleQuestion(rule),
  askOffsets: (rule: RecurringRule) =>
    `¿Cuántos días antes te recuerdo "${rule.serviceName}"? Ejemplo: 3,1,0`,
  askHour: (rule: RecurringRule) => `¿A qué hora te recuerdo "${rule.serviceName}"? Responde con un número del 0 al 23.`,
  askAmount: (rule: RecurringRule) => `¿Cuál es el valor de "${rule.serviceName}"?`,
  invalidField: (detail: string) => `Ese valor no es válido: ${detail}`,
  ruleCreated: (rule: RecurringRule) =>
    `Creé el pago recurrente ${rule.id} "${rule.serviceName}": ${describeRule(rule)}.`,
  ruleUpdated: (rule: RecurringRule) => `Actualicé "${rule.serviceName}": ${describeRule(rule)}`,
  ruleExists: (rule: RecurringRule) =>
    `Ya tenías el pago recurrente ${rule.id} "${rule.serviceName}", lo actualicé: ${describeRule(rule)}.`,
  ruleReady: (rule: RecurringRule) => `Listo, "${rule.serviceName}" quedó así: ${describeRule(rule)}.`,
  setupPostponed: (rule: RecurringRule) =>
    `Dejé "${rule.serviceName}" pendiente. Escribe "activar ${rule.id}" cuando quieras configurarlo.`,
  keepCurrent: (value: string) => `Responde "sí" para dejar ${value}.`,
  instancePaid: (instance: BillInstance, rule: RecurringRule | null, recorded: boolean) =>
    `Marqué como pagada la cuenta ${instance.id}${rule ? ` de "${rule.serviceName}"` : ""}.` +
    (recorded ? " También la registré como gasto." : ""),
  instanceSkipped: (instance: BillInstance) => `Omití la cuenta ${instance.id} (vence ${instance.dueDate}).`,
};

function scheduleQuestion(rule: RecurringRule): string {
  const name = rule.serviceName;
  switch (rule.cadence.kind) {
    case "monthly":
      return `¿Qué día del mes se paga "${name}"? Responde con un número del 1 al 31.`;
    case "weekly":
      return `¿Qué día de la semana se paga "${name}"? Por ejemplo: lunes.`;
    case "yearly":
      return `¿En qué fecha del año se paga "${name}"? Por ejemplo: 15 de marzo.`;
    case "custom":
      return `¿Cada cuántos días se paga "${name}"?`;
  }
}

function confidenceNote(draft: TransactionDraft): string {
  return `${Math.round(draft.confidence * 100)}%`;
}

export function describeDraft(draft: TransactionDraft): string {
  const currency = draft.amounts[0]?.currency ?? "COP";
  const parts = [
    `${kindLabel(draft.kind)} ${formatMoney(draftTotal(draft), currency)}`,
    draft.description || draft.category,
    `[${draft.category}]`,
    draft.occurredOn,
  ];
  if (draft.counterparty) parts.push(`con ${draft.counterparty}`);
  return parts.join(" · ");
}

export function confirmDraftsText(drafts: TransactionDraft[]): string {
  const lines = drafts.map((d, i) => `${drafts.length > 1 ? `${i + 1}. ` : ""}${describeDraft(d)} (${confidenceNote(d)})`);
  const question = drafts.length > 1 ? "¿Guardo estos movimientos?" : "¿Lo guardo?";
  return `${lines.join("\n")}\n${question} Responde "sí" o "no".`;
}

export function savedText(drafts: TransactionDraft[]): string {
  if (drafts.length === 1) return `Guardado: ${describeDraft(drafts[0])}`;
  return `Guardé ${drafts.length} movimientos:\n${drafts.map((d) => `- ${describeDraft(d)}`).join("\n")}`;
}

export function undoneText(entry: LedgerEntry): string {
  return `Borré: ${kindLabel(entry.kind)} ${formatMoney(entry.amount, entry.currency)} · ${entry.description || entry.category} · ${entry.occurredOn}`;
}

export function entryLine(entry: LedgerEntry): string {
  const sign = entry.kind === "income" ? "+" : "-";
  return `${entry.occurredOn}  ${sign}${formatMoney(entry.amount, entry.currency)}  ${entry.description || "-"}  [${entry.category}]`;
}

export function listText(entries: LedgerEntry[]): string {
  if (entries.length === 0) return MESSAGES.emptyLedger;
  return `Últimos movimientos:\n${entries.map(entryLine).join("\n")}`;
}

export function summaryText(summary: MonthlySummary): string {
  if (summary.count === 0) return `Sin movimientos en ${summary.month}.`;
  const lines = [`Resumen ${summary.month} (${summary.count} movimientos):`];
  for (const k of summary.byKind) {
    lines.push(`  ${kindLabel(k.kind)}: ${formatMoney(k.total, k.currency)} (${k.count})`);
  }
  if (summary.byCategory.length > 0) {
    lines.push("Gastos por categoría:");
    for (const c of summary.byCategory) {
      lines.push(`  ${c.category}: ${formatMoney(c.total, c.currency)} (${c.count})`);
    }
  }
  return lines.join("\n");
}

const STATUS_LABELS: Record<RecurringRule["status"], string> = {
  pending: "pendiente",
  active: "activo",
  paused: "pausado",
  canceled: "cancelado",
};

export function describeRule(rule: RecurringRule): string {
  const offsets = rule.reminderOffsets.length > 0 ? rule.reminderOffsets.join(",") : "sin recordatorios";
  return `${formatMoney(rule.amount, rule.currency)}, ${describeCadence(rule.cadence)}, recordatorios ${offsets} a las ${rule.reminderHour}:00`;
}

export function recurringListText(rules: RecurringRule[], open: BillInstance[]): string {
  if (rules.length === 0) return MESSAGES.noRecurring;
  const lines = ["Pagos recurrentes:"];
  for (const rule of rules) {
    lines.push(`  ${rule.id}. ${rule.serviceName}: ${describeRule(rule)} (${STATUS_LABELS[rule.status]})`);
  }
  if (open.length > 0) {
    lines.push("Cuentas por pagar:");
    for (const instance of open) {
      const rule = rules.find((r) => r.id === instance.ruleId);
      const amount = instance.amount ?? rule?.amount ?? 0;
      lines.push(
        `  #${instance.id} ${rule?.serviceName ?? "?"} ${formatMoney(amount, rule?.currency)} vence ${instance.dueDate}`,
      );
    }
  }
  return lines.join("\n");
}
