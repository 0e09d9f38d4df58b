import YahooFinance from "yahoo-finance2";
import type { LiveQuote } from "../types.js";

let client: InstanceType<typeof YahooFinance> | null = null;

function getClient(): InstanceType<typeof YahooFinance> {
  if (!client) {
    client = new YahooFinance({ queue: { concurrency: 1 } });
  }
  return client;
}

const CACHE_TTL_MS = 30_000;
const cache = new Map<string, { quote: LiveQuote; ts: number }>();

async function fetchWithRetry(symbols: string[], retries = 2): Promise<LiveQuote[]> {
  for (let attempt = 0; attempt <= retries; attempt++) {
    try {
      const quotes = await getClient().quote(symbols);
      const quoteArray = Array.isArray(quotes) ? quotes : [quotes];
      const results: LiveQuote[] = [];
      for (const q of quoteArray) {
        if (!q || q.regularMarketPrice == null) continue;
        results.push({
          symbol: q.symbol,
          name: q.shortName || q.longName || q.symbol,
          price: q.regularMarketPrice,
          dayHigh: q.regularMarketDayHigh,
          dayLow: q.regularMarketDayLow,
          volume: q.regularMarketVolume,
        });
      }
      return results;
    } catch (err) {
      const msg = err instanceof Error ? err.message : "";
      if (msg.includes("429") && attempt < retries) {
        const delay = (attempt + 1) * 2000;
        console.warn(`  Yahoo Finance 429, retrying in ${delay / 1000}s (attempt ${attempt + 1}/${retries})`);
        await new Promise((r) => setTimeout(r, delay));
        continue;
      }
      throw err;
    }
  }
  return [];
}

/**
 * Live quotes for `symbols`. Quotes younger than 30 s are served from the
 * cache; only the rest go to Yahoo, in one batched request.
 */
export async function fetchQuotes(symbols: string[]): Promise<LiveQuote[]> {
  const now = Date.now();
  const fresh: LiveQuote[] = [];
  const stale: string[] = [];

  for (const symbol of new Set(symbols.map((s) => s.toUpperCase()))) {
    const hit = cache.get(symbol);
    if (hit && now - hit.ts < CACHE_TTL_MS) fresh.push(hit.quote);
    else stale.push(symbol);
  }
  if (stale.length === 0) return fresh;

  const fetched = await fetchWithRetry(stale);
  for (const quote of fetched) {
    cache.set(quote.symbol, { quote, ts: now });
  }
  return [...fresh, ...fetched];
}
