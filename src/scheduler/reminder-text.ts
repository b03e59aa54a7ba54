import { formatMoney } from "../format";
import { daysBetween, todayIn } from "../calendar";
import type { DueReminder } from "../db/reminder-events";

function whenText(daysLeft: number, dueDate: string): string {
  if (daysLeft < 0) return `venció el ${dueDate}`;
  if (daysLeft === 0) return `vence hoy (${dueDate})`;
  if (daysLeft === 1) return `vence mañana (${dueDate})`;
  return `vence en ${daysLeft} días (${dueDate})`;
}

/**
 * Spanish reminder message for a due bill. The wording counts days from the
 * send date in the rule's zone, so a late delivery does not claim "mañana".
 */
export function buildReminderText(due: DueReminder, now: Date = new Date()): string {
  const daysLeft = daysBetween(todayIn(due.timezone, now), due.dueDate);
  const lines = [
    `Recordatorio: ${due.serviceName} ${whenText(daysLeft, due.dueDate)}.`,
    `Valor: ${formatMoney(due.amount, due.currency)}`,
  ];
  if (due.paymentLink) lines.push(`Link de pago: ${due.paymentLink}`);
  if (due.reference) lines.push(`Referencia: ${due.reference}`);
  lines.push(`Responde "pagado ${due.instanceId}" cuando lo pagues u "omitir ${due.instanceId}" para saltarlo.`);
  return lines.join("\n");
}
