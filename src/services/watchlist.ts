import { badRequest, notFound } from "../errors.js";
import type { Store } from "../store.js";
import type { Stock, WatchlistItem, WatchlistView } from "../types.js";
import { calculateChange, getStock } from "./market.js";

function toView(item: WatchlistItem, stock: Stock | null): WatchlistView {
  const { change, changePercent } = stock ? calculateChange(stock) : { change: 0, changePercent: 0 };
  return {
    id: item.id,
    symbol: item.symbol,
    addedAt: item.addedAt,
    currentPrice: stock ? stock.currentPrice : null,
    change,
    changePercent,
  };
}

export async function getWatchlist(store: Store, userId: string): Promise<WatchlistView[]> {
  const items = await store.listWatchlist(userId);
  const views: WatchlistView[] = [];
  for (const item of items) {
    views.push(toView(item, await store.getStock(item.symbol)));
  }
  return views;
}

export async function addToWatchlist(store: Store, userId: string, symbol: string): Promise<WatchlistView> {
  const upper = symbol.toUpperCase();

  const stock = await getStock(store, upper);
  if (!stock) {
    throw notFound(`Stock ${upper} not found`);
  }
  if (await store.findWatchlistItem(userId, upper)) {
    throw badRequest(`${upper} is already in your watchlist`);
  }

  const item = await store.addWatchlistItem(userId, upper);
  return toView(item, stock);
}

export async function removeFromWatchlist(store: Store, userId: string, symbol: string): Promise<void> {
  const upper = symbol.toUpperCase();
  const removed = await store.removeWatchlistItem(userId, upper);
  if (!removed) {
    throw notFound(`${upper} is not in your watchlist`);
  }
}
