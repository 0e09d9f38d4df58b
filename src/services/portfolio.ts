import { notFound } from "../errors.js";
import type { Store } from "../store.js";
import type { Holding, HoldingView, PortfolioSummary } from "../types.js";
import { requireUser } from "./auth.js";
import { round2 } from "./market.js";

interface Valuation {
  view: HoldingView;
  currentValue: number;
  costBasis: number;
}

async function valueHolding(store: Store, holding: Holding): Promise<Valuation> {
  const stock = await store.getStock(holding.symbol);
  const currentPrice = stock ? stock.currentPrice : holding.averageBuyPrice;
  const currentValue = holding.quantity * currentPrice;
  const costBasis = holding.quantity * holding.averageBuyPrice;
  const gainLoss = currentValue - costBasis;
  const gainLossPercent = costBasis > 0 ? (gainLoss / costBasis) * 100 : 0;

  return {
    currentValue,
    costBasis,
    view: {
      symbol: holding.symbol,
      quantity: holding.quantity,
      averageBuyPrice: round2(holding.averageBuyPrice),
      currentPrice: round2(currentPrice),
      currentValue: round2(currentValue),
      totalGainLoss: round2(gainLoss),
      gainLossPercent: round2(gainLossPercent),
    },
  };
}

export async function getHoldings(store: Store, userId: string): Promise<HoldingView[]> {
  const holdings = await store.listHoldings(userId);
  const views: HoldingView[] = [];
  for (const holding of holdings) {
    views.push((await valueHolding(store, holding)).view);
  }
  return views;
}

export async function getHolding(store: Store, userId: string, symbol: string): Promise<HoldingView> {
  const upper = symbol.toUpperCase();
  const holding = await store.getHolding(userId, upper);
  if (!holding) {
    throw notFound(`No holding found for ${upper}`);
  }
  return (await valueHolding(store, holding)).view;
}

export async function getPortfolio(store: Store, userId: string): Promise<PortfolioSummary> {
  const user = await requireUser(store, userId);
  const holdings = await store.listHoldings(userId);

  let totalHoldingsValue = 0;
  let totalCostBasis = 0;
  const views: HoldingView[] = [];
  for (const holding of holdings) {
    const { view, currentValue, costBasis } = await valueHolding(store, holding);
    totalHoldingsValue += currentValue;
    totalCostBasis += costBasis;
    views.push(view);
  }

  return {
    cashBalance: round2(user.balance),
    totalHoldingsValue: round2(totalHoldingsValue),
    totalPortfolioValue: round2(user.balance + totalHoldingsValue),
    totalGainLoss: round2(totalHoldingsValue - totalCostBasis),
    holdings: views,
  };
}

export async function getBalance(store: Store, userId: string): Promise<{ balance: number; currency: "USD" }> {
  const user = await requireUser(store, userId);
  return { balance: round2(user.balance), currency: "USD" };
}
