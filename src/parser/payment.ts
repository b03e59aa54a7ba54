/**
 * Payment details attached to a bill message: a payment link and a reference
 * ("ref 123456", "convenio 7788"). Both are cut out of the text before amount
 * detection so their digits are never read as money.
 */

const LINK = /(?:https?:\/\/|www\.)[^\s]+/i;
const REFERENCE = /(?<![\p{L}\d])(?:ref|referencia|convenio|c[oó]digo de pago)\.?\s*(?:de\s+pago\s*)?[:#]?\s*([\p{L}\d-]*\d[\p{L}\d-]*)/iu;

export interface PaymentDetails {
  /** The text without the link and reference */
  text: string;
  paymentLink?: string;
  paymentReference?: string;
}

export function extractPaymentDetails(text: string): PaymentDetails {
  let rest = text;
  const details: PaymentDetails = { text };

  const link = rest.match(LINK);
  if (link) {
    details.paymentLink = link[0].replace(/[.,;:)\]]+$/, "");
    rest = rest.replace(link[0], " ");
  }

  const reference = rest.match(REFERENCE);
  if (reference) {
    details.paymentReference = reference[1];
    rest = rest.replace(reference[0], " ");
  }

  details.text = rest.replace(/\s+/g, " ").trim();
  return details;
}
