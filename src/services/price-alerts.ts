import { notFound } from "../errors.js";
import type { Store } from "../store.js";
import type { NewPriceAlert, PriceAlert, PriceAlertView, TriggeredAlert } from "../types.js";
import { evaluateAlerts } from "./alert-evaluator.js";
import { getStock } from "./market.js";

export interface CheckOptions {
  /** Pause between reading pending alerts and writing the triggers. */
  delayMs?: number;
  now?: () => Date;
}

export async function createAlert(store: Store, userId: string, input: NewPriceAlert): Promise<PriceAlert> {
  const symbol = input.symbol.toUpperCase();
  const stock = await getStock(store, symbol);
  if (!stock) {
    throw notFound(`Stock ${symbol} not found`);
  }
  return store.createAlert(userId, { ...input, symbol });
}

export async function getAlerts(store: Store, userId: string, activeOnly = false): Promise<PriceAlert[]> {
  return store.listAlerts(userId, activeOnly);
}

export async function getAlert(store: Store, userId: string, alertId: string): Promise<PriceAlert> {
  const alert = await store.getAlert(userId, alertId);
  if (!alert) {
    throw notFound("Alert not found");
  }
  return alert;
}

export async function deleteAlert(store: Store, userId: string, alertId: string): Promise<void> {
  const removed = await store.removeAlert(userId, alertId);
  if (!removed) {
    throw notFound("Alert not found");
  }
}

async function priceMap(store: Store, symbols: Iterable<string>): Promise<Map<string, number>> {
  const prices = new Map<string, number>();
  for (const symbol of new Set(symbols)) {
    const stock = await store.getStock(symbol);
    if (stock) prices.set(symbol, stock.currentPrice);
  }
  return prices;
}

/**
 * Triggers every pending alert whose condition holds at the current price.
 * `userId` limits the check to one user's alerts. Each alert is flipped with a
 * conditional update, so concurrent checks never report the same alert twice.
 */
export async function checkAndTriggerAlerts(
  store: Store,
  userId: string | undefined,
  options: CheckOptions = {},
): Promise<TriggeredAlert[]> {
  const pending = await store.listPendingAlerts(userId);
  if (pending.length === 0) return [];

  const prices = await priceMap(store, pending.map((a) => a.symbol));
  const candidates = evaluateAlerts(pending, prices);

  if (candidates.length > 0 && options.delayMs && options.delayMs > 0) {
    await new Promise((r) => setTimeout(r, options.delayMs));
  }

  const now = options.now ?? (() => new Date());
  const triggered: TriggeredAlert[] = [];
  for (const candidate of candidates) {
    const updated = await store.markAlertTriggered(candidate.alert.id, now());
    if (updated) {
      triggered.push({ alert: updated, currentPrice: candidate.currentPrice });
    }
  }
  return triggered;
}

export async function toAlertViews(store: Store, alerts: PriceAlert[]): Promise<PriceAlertView[]> {
  const prices = await priceMap(store, alerts.map((a) => a.symbol));
  return alerts.map(({ userId: _userId, ...alert }) => ({
    ...alert,
    triggeredAt: alert.triggeredAt ?? null,
    currentPrice: prices.get(alert.symbol) ?? null,
  }));
}

export async function toAlertView(store: Store, alert: PriceAlert): Promise<PriceAlertView> {
  const [view] = await toAlertViews(store, [alert]);
  return view;
}
