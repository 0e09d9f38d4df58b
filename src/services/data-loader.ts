import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import type { StockSeed } from "../types.js";
import type { ScenarioManager } from "./scenario.js";

const stockSeedSchema = z.object({
  symbol: z.string().min(1),
  name: z.string(),
  price: z.number(),
  sector: z.string().optional(),
  marketCap: z.number().optional(),
});

const stocksFileSchema = z.object({
  stocks: z.array(stockSeedSchema).default([]),
});

/** Reads fixture JSON through the active scenario, caching each file once read. */
export class DataLoader {
  private cache = new Map<string, unknown>();

  constructor(private readonly scenarios: ScenarioManager) {}

  private loadJson(filename: string): unknown {
    if (!this.cache.has(filename)) {
      let path = this.scenarios.getDataPath(filename);
      if (!existsSync(path)) {
        path = join(this.scenarios.dataDir, filename);
      }
      if (!existsSync(path)) {
        throw new Error(`Data file not found: ${path}`);
      }
      this.cache.set(filename, JSON.parse(readFileSync(path, "utf8")));
    }
    return this.cache.get(filename);
  }

  getStocks(): StockSeed[] {
    return stocksFileSchema.parse(this.loadJson("stocks.json")).stocks;
  }

  getStock(symbol: string): StockSeed | null {
    const upper = symbol.toUpperCase();
    return this.getStocks().find((s) => s.symbol.toUpperCase() === upper) ?? null;
  }

  clearCache(): void {
    this.cache.clear();
  }
}
