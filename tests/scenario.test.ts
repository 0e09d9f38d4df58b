import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { alertCheckOptions, createContext, prepareData } from "../src/context.js";
import { DataLoader } from "../src/services/data-loader.js";
import { DEFAULT_DATA_DIR, ScenarioManager } from "../src/services/scenario.js";
import { MemoryStore } from "./support/memory-store.js";

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

describe("ScenarioManager", () => {
  it("lists the bundled scenarios sorted by id", () => {
    const ids = new ScenarioManager().listScenarios().map((s) => s.id);
    expect(ids).toEqual(["chaos_data", "chaos_race", "chaos_stress", "default"]);
  });

  it("loads a scenario's setup", () => {
    const scenarios = new ScenarioManager();
    scenarios.load("chaos_race");
    expect(scenarios.current).toBe("chaos_race");
    expect(scenarios.artificialDelayMs()).toBe(500);
    expect(scenarios.prePopulateAlertCount()).toBe(0);
    expect(scenarios.info()).toMatchObject({ id: "chaos_race", name: "Chaos: Race Window", difficulty: "hard" });
  });

  it("falls back to default for an unknown id", () => {
    const scenarios = new ScenarioManager();
    scenarios.load("no_such_scenario");
    expect(scenarios.current).toBe("default");
    expect(scenarios.config.name).toBe("Default");
    expect(console.warn).toHaveBeenCalledWith("[scenario] 'no_such_scenario' not found, using default");
  });

  it("reads fixtures from the data dir unless the scenario overrides them", () => {
    const scenarios = new ScenarioManager();
    scenarios.load("default");
    expect(scenarios.getDataPath("stocks.json")).toBe(join(DEFAULT_DATA_DIR, "stocks.json"));
  });
});

describe("DataLoader with scenario overrides", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "scenarios-"));
    mkdirSync(join(root, "scenarios", "tiny"), { recursive: true });
    mkdirSync(join(root, "data"));
    writeFileSync(
      join(root, "scenarios", "tiny", "config.json"),
      JSON.stringify({ id: "tiny", name: "Tiny", description: "One stock", setup: { pre_populate_alerts: 3 } }),
    );
    writeFileSync(
      join(root, "scenarios", "tiny", "stocks.json"),
      JSON.stringify({ stocks: [{ symbol: "ONE", name: "Only Corp", price: 10 }] }),
    );
    writeFileSync(
      join(root, "data", "stocks.json"),
      JSON.stringify({ stocks: [{ symbol: "BASE", name: "Base Corp", price: 20 }] }),
    );
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("prefers the scenario's copy of a fixture", () => {
    const scenarios = new ScenarioManager(join(root, "scenarios"), join(root, "data"));
    scenarios.load("tiny");
    const data = new DataLoader(scenarios);
    expect(data.getStocks().map((s) => s.symbol)).toEqual(["ONE"]);
    expect(data.getStock("one")?.price).toBe(10);
    expect(data.getStock("BASE")).toBeNull();
  });

  it("re-reads fixtures after clearCache", () => {
    const scenarios = new ScenarioManager(join(root, "scenarios"), join(root, "data"));
    scenarios.load("tiny");
    const data = new DataLoader(scenarios);
    expect(data.getStock("ONE")?.price).toBe(10);

    writeFileSync(
      join(root, "scenarios", "tiny", "stocks.json"),
      JSON.stringify({ stocks: [{ symbol: "ONE", name: "Only Corp", price: 12.5 }] }),
    );
    expect(data.getStock("ONE")?.price).toBe(10);
    data.clearCache();
    expect(data.getStock("ONE")?.price).toBe(12.5);
  });

  it("throws for a missing fixture", () => {
    const scenarios = new ScenarioManager(join(root, "scenarios"), join(root, "empty"));
    scenarios.load("default");
    expect(() => new DataLoader(scenarios).getStocks()).toThrow(
      `Data file not found: ${join(root, "empty", "stocks.json")}`,
    );
  });

  it("seeds stocks and pre-populates stress alerts on startup", async () => {
    const scenarios = new ScenarioManager(join(root, "scenarios"), join(root, "data"));
    scenarios.load("tiny");
    const store = new MemoryStore();
    const ctx = createContext(store, { scenarios, initialBalance: 5000, marketSource: "simulated" });

    await prepareData(ctx);
    expect([...store.stocks.keys()]).toEqual(["ONE"]);
    expect(store.alerts).toHaveLength(3);
    expect(store.users[0].username).toBe("stresstest");
  });

  it("keeps the pre-populated alert count across restarts", async () => {
    const scenarios = new ScenarioManager(join(root, "scenarios"), join(root, "data"));
    scenarios.load("tiny");
    const store = new MemoryStore();

    for (let boot = 0; boot < 3; boot++) {
      await prepareData(createContext(store, { scenarios, initialBalance: 5000, marketSource: "simulated" }));
    }
    expect(store.users).toHaveLength(1);
    expect(store.alerts).toHaveLength(3);
  });
});

describe("alertCheckOptions", () => {
  it("uses the scenario delay, overridden by the chaos race delay", async () => {
    const scenarios = new ScenarioManager();
    scenarios.load("default");
    const ctx = createContext(new MemoryStore(), { scenarios, raceDelayMs: 25 });
    expect(alertCheckOptions(ctx)).toEqual({ delayMs: 0 });

    scenarios.load("chaos_race");
    expect(alertCheckOptions(ctx)).toEqual({ delayMs: 500 });

    await ctx.chaos.activate("chaos_race");
    expect(alertCheckOptions(ctx)).toEqual({ delayMs: 25 });
  });
});
