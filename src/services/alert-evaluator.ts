import type { PriceAlert, TriggeredAlert } from "../types.js";

export function shouldTrigger(alert: PriceAlert, currentPrice: number): boolean {
  if (alert.condition === "above") return currentPrice >= alert.targetPrice;
  return currentPrice <= alert.targetPrice;
}

/** Prices at or below zero only show up in corrupted data and never trigger anything. */
export function isUsablePrice(price: number | undefined): price is number {
  return price != null && Number.isFinite(price) && price > 0;
}

export function evaluateAlerts(alerts: PriceAlert[], prices: Map<string, number>): TriggeredAlert[] {
  const triggered: TriggeredAlert[] = [];

  for (const alert of alerts) {
    if (!alert.isActive || alert.isTriggered) continue;

    const currentPrice = prices.get(alert.symbol);
    if (!isUsablePrice(currentPrice)) continue;

    if (shouldTrigger(alert, currentPrice)) {
      triggered.push({ alert, currentPrice });
    }
  }

  return triggered;
}
