import { config, isEmailConfigured, isSmsConfigured } from "../config.js";
import type { Store } from "../store.js";
import type { TriggeredAlert } from "../types.js";
import { sendAlertDigest } from "./email-sender.js";
import { sendSmsSummary } from "./sms-sender.js";

export function formatAlertLine({ alert, currentPrice }: TriggeredAlert): string {
  return `[ALERT] ${alert.symbol} ($${currentPrice.toFixed(2)}) is ${alert.condition} $${alert.targetPrice}`;
}

function groupByUser(triggered: TriggeredAlert[]): Map<string, TriggeredAlert[]> {
  const groups = new Map<string, TriggeredAlert[]>();
  for (const t of triggered) {
    const group = groups.get(t.alert.userId);
    if (group) group.push(t);
    else groups.set(t.alert.userId, [t]);
  }
  return groups;
}

/**
 * Logs every triggered alert, emails each owner a digest of theirs and texts
 * the operator a summary. A failed channel is logged and does not stop the rest.
 */
export async function notify(store: Store, triggered: TriggeredAlert[]): Promise<void> {
  for (const t of triggered) {
    console.log(formatAlertLine(t));
  }

  if (isEmailConfigured()) {
    for (const [userId, alerts] of groupByUser(triggered)) {
      const user = await store.findUserById(userId);
      if (!user) continue;
      try {
        await sendAlertDigest(user.email, user.username, alerts);
        console.log(`  -> Email sent to ${user.username} (${alerts.length} alert(s))`);
      } catch (err) {
        console.error(`  -> Email to ${user.username} failed:`, err instanceof Error ? err.message : err);
      }
    }
  }

  if (isSmsConfigured() && config.notifySms) {
    try {
      await sendSmsSummary(triggered, config.notifySms);
      console.log(`  -> SMS sent to configured number`);
    } catch (err) {
      console.error(`  -> SMS failed:`, err instanceof Error ? err.message : err);
    }
  }
}
