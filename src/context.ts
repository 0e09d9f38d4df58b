import { config, type MarketSource } from "./config.js";
import type { Store } from "./store.js";
import { ChaosRuntime } from "./services/chaos-runtime.js";
import { DataLoader } from "./services/data-loader.js";
import { seedStocks } from "./services/market.js";
import type { CheckOptions } from "./services/price-alerts.js";
import { ScenarioManager, getScenarioManager } from "./services/scenario.js";

export interface AppContext {
  store: Store;
  scenarios: ScenarioManager;
  data: DataLoader;
  chaos: ChaosRuntime;
  initialBalance: number;
  marketSource: MarketSource;
}

export interface ContextOptions {
  scenarios?: ScenarioManager;
  initialBalance?: number;
  marketSource?: MarketSource;
  raceDelayMs?: number;
}

export function createContext(store: Store, options: ContextOptions = {}): AppContext {
  const scenarios = options.scenarios ?? getScenarioManager();
  const data = new DataLoader(scenarios);
  return {
    store,
    scenarios,
    data,
    chaos: new ChaosRuntime(store, data, { raceDelayMs: options.raceDelayMs ?? config.chaosRaceDelayMs }),
    initialBalance: options.initialBalance ?? config.initialBalance,
    marketSource: options.marketSource ?? config.marketSource,
  };
}

/** The race scenario's delay wins over the one a scenario file asks for. */
export function alertCheckOptions(ctx: AppContext): CheckOptions {
  return { delayMs: ctx.chaos.raceDelayMs || ctx.scenarios.artificialDelayMs() };
}

/** Seeds stocks from the fixtures and applies the scenario's start-up setup. */
export async function prepareData(ctx: AppContext): Promise<void> {
  const inserted = await seedStocks(ctx.store, ctx.data.getStocks());
  if (inserted > 0) {
    console.log(`Seeded ${inserted} stock(s)`);
  }

  const prePopulate = ctx.scenarios.prePopulateAlertCount();
  if (prePopulate > 0) {
    const { alerts } = await ctx.chaos.seedStressAlerts(prePopulate);
    console.log(`[scenario] Pre-populated ${alerts} alerts for the stress user`);
  }
}
