/** "$12.000" for COP, "USD 1.250" otherwise. Rounded to whole units, dot as thousands separator. */
export function formatMoney(amount: number, currency = "COP"): string {
  const sign = amount < 0 ? "-" : "";
  const digits = String(Math.abs(Math.round(amount))).replace(/\B(?=(\d{3})+(?!\d))/g, ".");
  const code = currency.toUpperCase();
  return code === "COP" ? `${sign}$${digits}` : `${sign}${code} ${digits}`;
}

const KIND_LABELS: Record<string, string> = {
  expense: "Gasto",
  income: "Ingreso",
  loan: "Préstamo",
  transfer: "Transferencia",
};

export function kindLabel(kind: string): string {
  return KIND_LABELS[kind] ?? kind;
}
