import twilio from "twilio";
import { config } from "../config.js";
import type { TriggeredAlert } from "../types.js";

const MAX_LISTED = 5;

let client: ReturnType<typeof twilio> | null = null;

function getClient() {
  if (!client) {
    client = twilio(config.twilio.accountSid, config.twilio.authToken);
  }
  return client;
}

export function smsSummary(triggered: TriggeredAlert[]): string {
  const listed = triggered
    .slice(0, MAX_LISTED)
    .map(({ alert, currentPrice }) => `${alert.symbol} $${currentPrice.toFixed(2)} ${alert.condition} $${alert.targetPrice}`);
  const more = triggered.length > MAX_LISTED ? ` +${triggered.length - MAX_LISTED} more` : "";
  return `${triggered.length} price alert(s): ${listed.join("; ")}${more}`;
}

/** Texts the operator one summary of everything a check triggered. */
export async function sendSmsSummary(triggered: TriggeredAlert[], to: string): Promise<void> {
  await getClient().messages.create({
    body: smsSummary(triggered),
    from: config.twilio.fromNumber,
    to,
  });
}
