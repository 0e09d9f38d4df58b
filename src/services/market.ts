import type { Store } from "../store.js";
import type { PriceChange, PriceUpdate, Stock, StockSeed, StockView } from "../types.js";
import { fetchQuotes } from "./price-fetcher.js";

export type Random = () => number;

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function randomInt(min: number, max: number, random: Random = Math.random): number {
  return Math.floor(random() * (max - min + 1)) + min;
}

export function calculateChange(stock: Stock): PriceChange {
  if (stock.previousClose != null && stock.previousClose > 0) {
    const change = round2(stock.currentPrice - stock.previousClose);
    const changePercent = round2((change / stock.previousClose) * 100);
    return { change, changePercent };
  }
  return { change: 0, changePercent: 0 };
}

export function withChange(stock: Stock): StockView {
  return { ...stock, ...calculateChange(stock) };
}

export async function seedStocks(store: Store, seeds: StockSeed[], random: Random = Math.random): Promise<number> {
  return store.insertMissingStocks(seeds, () => randomInt(1_000_000, 50_000_000, random));
}

export async function getStock(store: Store, symbol: string): Promise<Stock | null> {
  return store.getStock(symbol.toUpperCase());
}

export async function listStocks(store: Store): Promise<Stock[]> {
  return store.listStocks();
}

export async function searchStocks(store: Store, query: string): Promise<Stock[]> {
  return store.searchStocks(query);
}

/** Next simulated tick: a uniform move of at most 2% either way. */
export function nextSimulatedPrice(stock: Stock, random: Random = Math.random): PriceUpdate {
  const changePercent = -0.02 + random() * 0.04;
  const newPrice = round2(stock.currentPrice * (1 + changePercent));
  return {
    currentPrice: newPrice,
    dayHigh: Math.max(stock.dayHigh ?? newPrice, newPrice),
    dayLow: Math.min(stock.dayLow ?? newPrice, newPrice),
    volume: stock.volume + randomInt(1000, 100_000, random),
  };
}

export async function simulatePriceChange(
  store: Store,
  symbol: string,
  random: Random = Math.random,
): Promise<Stock | null> {
  const stock = await getStock(store, symbol);
  if (!stock) return null;
  return store.updateStockPrice(stock.symbol, nextSimulatedPrice(stock, random));
}

export async function simulateAllPrices(store: Store, random: Random = Math.random): Promise<Stock[]> {
  const stocks = await store.listStocks();
  const updated: Stock[] = [];
  for (const stock of stocks) {
    const next = await store.updateStockPrice(stock.symbol, nextSimulatedPrice(stock, random));
    if (next) updated.push(next);
  }
  return updated;
}

/** Applies live quotes to the stocks we already list. Unknown symbols are ignored. */
export async function refreshFromLive(store: Store): Promise<Stock[]> {
  const stocks = await store.listStocks();
  const bySymbol = new Map(stocks.map((s) => [s.symbol, s]));
  const quotes = await fetchQuotes([...bySymbol.keys()]);
  const updated: Stock[] = [];

  for (const quote of quotes) {
    const stock = bySymbol.get(quote.symbol);
    if (!stock) continue;
    const next = await store.updateStockPrice(stock.symbol, {
      currentPrice: quote.price,
      dayHigh: quote.dayHigh ?? Math.max(stock.dayHigh ?? quote.price, quote.price),
      dayLow: quote.dayLow ?? Math.min(stock.dayLow ?? quote.price, quote.price),
      volume: quote.volume ?? stock.volume,
    });
    if (next) updated.push(next);
  }
  return updated;
}
