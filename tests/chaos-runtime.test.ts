import { describe, it, expect, beforeEach, vi } from "vitest";
import { ChaosRuntime, STRESS_USER } from "../src/services/chaos-runtime.js";
import { DataLoader } from "../src/services/data-loader.js";
import { seedStocks } from "../src/services/market.js";
import { ScenarioManager } from "../src/services/scenario.js";
import { MemoryStore } from "./support/memory-store.js";

describe("ChaosRuntime", () => {
  let store: MemoryStore;
  let chaos: ChaosRuntime;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const scenarios = new ScenarioManager();
    scenarios.load("default");
    const data = new DataLoader(scenarios);
    store = new MemoryStore();
    await seedStocks(store, data.getStocks());
    chaos = new ChaosRuntime(store, data, { raceDelayMs: 25, random: () => 0.5 });
  });

  it("starts with nothing active", () => {
    expect(chaos.status()).toEqual({ active: null, available: ["chaos_data", "chaos_stress", "chaos_race"] });
    expect(chaos.raceDelayMs).toBe(0);
  });

  it("rejects unknown scenarios", async () => {
    await expect(chaos.activate("chaos_everything")).rejects.toThrow("Unknown scenario: chaos_everything");
  });

  describe("chaos_data", () => {
    it("corrupts four prices and reset restores them from the fixtures", async () => {
      const result = await chaos.activate("chaos_data");
      expect(result.actions).toEqual(["Corrupted 4 stocks"]);
      expect(result.corruptedStocks).toEqual([
        { symbol: "GOOGL", issue: "negative price" },
        { symbol: "AMZN", issue: "zero price" },
        { symbol: "TSLA", issue: "overflow price" },
        { symbol: "NVDA", issue: "near-zero negative" },
      ]);
      expect((await store.getStock("GOOGL"))?.currentPrice).toBe(-50.25);
      expect(chaos.activeScenario).toBe("chaos_data");

      const reset = await chaos.reset();
      expect(reset).toEqual({ scenario: null, actions: ["Reset 4 stock prices"] });
      expect((await store.getStock("GOOGL"))?.currentPrice).toBe(141.25);
      expect((await store.getStock("TSLA"))?.currentPrice).toBe(248.5);
      expect(chaos.activeScenario).toBeNull();
    });

    it("lists only the stocks that exist", async () => {
      store.stocks.delete("AMZN");
      const result = await chaos.activate("chaos_data");
      expect(result.corruptedStocks?.map((s) => s.symbol)).toEqual(["GOOGL", "TSLA", "NVDA"]);
    });
  });

  describe("chaos_stress", () => {
    it("creates the stress user with 500 alerts", async () => {
      const result = await chaos.activate("chaos_stress");
      expect(result.actions).toEqual(["Created stresstest user", "Created 500 alerts for stresstest user"]);
      expect(result.stressUser).toEqual({ username: "stresstest", password: "stresstest123" });

      const user = await store.findUserByUsername(STRESS_USER.username);
      expect(user?.balance).toBe(100000);
      expect(store.alerts).toHaveLength(500);
      expect(store.alerts.every((a) => a.userId === user?.id)).toBe(true);
    });

    it("reuses the user and replaces the alerts when activated again", async () => {
      await chaos.activate("chaos_stress");
      const again = await chaos.activate("chaos_stress");
      expect(again.actions).toEqual(["Created 500 alerts for stresstest user"]);
      expect(store.alerts).toHaveLength(500);

      expect((await chaos.reset()).actions).toEqual(["Deleted 500 stress test alerts"]);
      expect(store.alerts).toHaveLength(0);
    });

    it("keeps alert targets within 20% of the price", async () => {
      await chaos.seedStressAlerts(10);
      for (const alert of store.alerts) {
        const stock = await store.getStock(alert.symbol);
        expect(stock).not.toBeNull();
        if (stock) {
          expect(alert.targetPrice).toBeGreaterThanOrEqual(stock.currentPrice * 0.8);
          expect(alert.targetPrice).toBeLessThanOrEqual(stock.currentPrice * 1.2);
        }
      }
    });

    it("fails without stocks", async () => {
      store.stocks.clear();
      await expect(chaos.activate("chaos_stress")).rejects.toThrow("No stocks in database");
    });
  });

  describe("chaos_race", () => {
    it("enables the race delay until reset", async () => {
      const result = await chaos.activate("chaos_race");
      expect(result.actions).toEqual(["Enabled 25ms artificial delay", "Race condition testing mode active"]);
      expect(chaos.isRaceDelayEnabled).toBe(true);
      expect(chaos.raceDelayMs).toBe(25);

      expect((await chaos.reset()).actions).toEqual(["Disabled race delay"]);
      expect(chaos.raceDelayMs).toBe(0);
    });

    it("is switched off when another scenario is activated", async () => {
      await chaos.activate("chaos_race");
      await chaos.activate("chaos_data");
      expect(chaos.isRaceDelayEnabled).toBe(false);
      expect(chaos.status().active).toBe("chaos_data");
    });
  });
});
