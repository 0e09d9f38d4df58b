import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  calculateChange, nextSimulatedPrice, randomInt, refreshFromLive, round2, searchStocks,
  seedStocks, simulateAllPrices, simulatePriceChange,
} from "../src/services/market.js";
import { MemoryStore, TEST_STOCKS, seededStore } from "./support/memory-store.js";

vi.mock("../src/services/price-fetcher.js", () => ({
  fetchQuotes: vi.fn(async () => [
    { symbol: "AAPL", name: "Apple Inc.", price: 105, dayHigh: 106, volume: 2_000_000 },
    { symbol: "NOPE", name: "Not listed", price: 1 },
  ]),
}));

const fixed = (value: number) => () => value;

describe("helpers", () => {
  it("rounds to cents", () => {
    expect(round2(2.345678)).toBe(2.35);
  });

  it("draws integers within the bounds", () => {
    expect(randomInt(1000, 100_000, fixed(0))).toBe(1000);
    expect(randomInt(1000, 100_000, fixed(0.75))).toBe(75_250);
  });
});

describe("market", () => {
  let store: MemoryStore;

  beforeEach(async () => {
    store = await seededStore();
  });

  it("seeds missing stocks only", async () => {
    const empty = new MemoryStore();
    expect(await seedStocks(empty, TEST_STOCKS, fixed(0))).toBe(3);
    expect(await seedStocks(empty, TEST_STOCKS, fixed(0))).toBe(0);

    const aapl = await empty.getStock("AAPL");
    expect(aapl).toMatchObject({ currentPrice: 100, previousClose: 100, volume: 1_000_000 });
  });

  it("computes change against the previous close", async () => {
    await store.setStockPrice("AAPL", 101);
    const stock = await store.getStock("AAPL");
    expect(stock && calculateChange(stock)).toEqual({ change: 1, changePercent: 1 });
  });

  it("reports no change without a previous close", async () => {
    const stock = await store.getStock("AAPL");
    expect(stock && calculateChange({ ...stock, previousClose: undefined })).toEqual({ change: 0, changePercent: 0 });
  });

  it("moves a simulated price by at most 2%", async () => {
    const stock = await store.getStock("AAPL");
    if (!stock) throw new Error("AAPL missing");

    expect(nextSimulatedPrice(stock, fixed(0.75))).toEqual({
      currentPrice: 101,
      dayHigh: 101,
      dayLow: 100,
      volume: 1_075_250,
    });
    expect(nextSimulatedPrice(stock, fixed(0))).toEqual({
      currentPrice: 98,
      dayHigh: 100,
      dayLow: 98,
      volume: 1_001_000,
    });
  });

  it("simulates one stock by symbol, case-insensitively", async () => {
    const updated = await simulatePriceChange(store, "aapl", fixed(0.75));
    expect(updated?.currentPrice).toBe(101);
    expect(await simulatePriceChange(store, "zzzz")).toBeNull();
  });

  it("simulates every stock", async () => {
    const updated = await simulateAllPrices(store, fixed(0.75));
    expect(updated.map((s) => [s.symbol, s.currentPrice])).toEqual([
      ["AAPL", 101],
      ["GOOGL", 141.4],
      ["TSLA", 252.5],
    ]);
  });

  it("searches by symbol or name", async () => {
    expect((await searchStocks(store, "goo")).map((s) => s.symbol)).toEqual(["GOOGL"]);
    expect((await searchStocks(store, "tesla")).map((s) => s.symbol)).toEqual(["TSLA"]);
  });

  it("applies live quotes to listed stocks only", async () => {
    const updated = await refreshFromLive(store);
    expect(updated.map((s) => s.symbol)).toEqual(["AAPL"]);
    expect(updated[0]).toMatchObject({ currentPrice: 105, dayHigh: 106, dayLow: 100, volume: 2_000_000 });
    expect(await store.getStock("NOPE")).toBeNull();
  });
});
