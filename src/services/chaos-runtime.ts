import type { Store } from "../store.js";
import type { AlertCondition, ChaosResult, ChaosScenario, User } from "../types.js";
import type { DataLoader } from "./data-loader.js";
import { type Random, randomInt } from "./market.js";

export const AVAILABLE_SCENARIOS: readonly ChaosScenario[] = ["chaos_data", "chaos_stress", "chaos_race"];

export const STRESS_USER = {
  username: "stresstest",
  email: "stresstest@example.com",
  password: "stresstest123",
  balance: 100_000,
} as const;

const STRESS_ALERT_COUNT = 500;

const CORRUPTIONS: { symbol: string; price: number; issue: string }[] = [
  { symbol: "GOOGL", price: -50.25, issue: "negative price" },
  { symbol: "AMZN", price: 0, issue: "zero price" },
  { symbol: "TSLA", price: 999999999999.99, issue: "overflow price" },
  { symbol: "NVDA", price: -0.0001, issue: "near-zero negative" },
];

export function isChaosScenario(name: string): name is ChaosScenario {
  return AVAILABLE_SCENARIOS.some((s) => s === name);
}

function isCorrupt(price: number): boolean {
  return price <= 0 || price > 10_000;
}

export interface ChaosOptions {
  raceDelayMs?: number;
  random?: Random;
}

/**
 * Demonstration faults an interviewer can switch on while the server runs.
 * Every activation starts from a reset, so at most one scenario is live.
 */
export class ChaosRuntime {
  private active: ChaosScenario | null = null;
  private raceDelayEnabled = false;
  private readonly raceDelay: number;
  private readonly random: Random;

  constructor(
    private readonly store: Store,
    private readonly data: DataLoader,
    options: ChaosOptions = {},
  ) {
    this.raceDelay = options.raceDelayMs ?? 500;
    this.random = options.random ?? Math.random;
  }

  get activeScenario(): ChaosScenario | null {
    return this.active;
  }

  get isRaceDelayEnabled(): boolean {
    return this.raceDelayEnabled;
  }

  /** Delay the alert check should add right now; 0 unless the race scenario is live. */
  get raceDelayMs(): number {
    return this.raceDelayEnabled ? this.raceDelay : 0;
  }

  status(): { active: ChaosScenario | null; available: readonly ChaosScenario[] } {
    return { active: this.active, available: AVAILABLE_SCENARIOS };
  }

  async activate(scenario: string): Promise<ChaosResult> {
    if (!isChaosScenario(scenario)) {
      throw new Error(`Unknown scenario: ${scenario}`);
    }
    await this.reset();

    const result = await this.run(scenario);
    this.active = scenario;
    console.log(`[CHAOS] Activated ${scenario}: ${result.actions.join("; ")}`);
    return result;
  }

  async reset(): Promise<ChaosResult> {
    const actions: string[] = [];

    if (this.raceDelayEnabled) {
      this.raceDelayEnabled = false;
      actions.push("Disabled race delay");
    }

    const restored = await this.restorePrices();
    if (restored > 0) actions.push(`Reset ${restored} stock prices`);

    const deleted = await this.deleteStressAlerts();
    if (deleted > 0) actions.push(`Deleted ${deleted} stress test alerts`);

    this.active = null;
    return { scenario: null, actions };
  }

  /** Replaces the stress user's alerts with `count` random ones around current prices. */
  async seedStressAlerts(count: number): Promise<{ user: User; created: boolean; alerts: number }> {
    const stocks = await this.store.listStocks();
    if (stocks.length === 0) {
      throw new Error("No stocks in database");
    }

    let created = false;
    let user = await this.store.findUserByUsername(STRESS_USER.username);
    if (!user) {
      user = await this.store.createUser({
        username: STRESS_USER.username,
        email: STRESS_USER.email,
        password: STRESS_USER.password,
        balance: STRESS_USER.balance,
      });
      created = true;
    } else {
      await this.store.removeAlertsForUser(user.id);
    }

    for (let i = 0; i < count; i++) {
      const stock = stocks[randomInt(0, stocks.length - 1, this.random)];
      const condition: AlertCondition = this.random() < 0.5 ? "above" : "below";
      await this.store.createAlert(user.id, {
        symbol: stock.symbol,
        targetPrice: stock.currentPrice * (0.8 + this.random() * 0.4),
        condition,
      });
    }

    return { user, created, alerts: count };
  }

  private async run(scenario: ChaosScenario): Promise<ChaosResult> {
    switch (scenario) {
      case "chaos_data":
        return this.corruptData();
      case "chaos_stress":
        return this.stress();
      case "chaos_race":
        return this.enableRace();
    }
  }

  private async corruptData(): Promise<ChaosResult> {
    const corruptedStocks: { symbol: string; issue: string }[] = [];
    for (const { symbol, price, issue } of CORRUPTIONS) {
      if (await this.store.setStockPrice(symbol, price)) {
        corruptedStocks.push({ symbol, issue });
      }
    }
    return {
      scenario: "chaos_data",
      actions: [`Corrupted ${corruptedStocks.length} stocks`],
      corruptedStocks,
    };
  }

  private async stress(): Promise<ChaosResult> {
    const actions: string[] = [];
    const { created, alerts } = await this.seedStressAlerts(STRESS_ALERT_COUNT);
    if (created) actions.push(`Created ${STRESS_USER.username} user`);
    actions.push(`Created ${alerts} alerts for ${STRESS_USER.username} user`);
    return {
      scenario: "chaos_stress",
      actions,
      stressUser: { username: STRESS_USER.username, password: STRESS_USER.password },
    };
  }

  private enableRace(): ChaosResult {
    this.raceDelayEnabled = true;
    return {
      scenario: "chaos_race",
      actions: [`Enabled ${this.raceDelay}ms artificial delay`, "Race condition testing mode active"],
    };
  }

  private async restorePrices(): Promise<number> {
    let count = 0;
    this.data.clearCache();
    for (const seed of this.data.getStocks()) {
      const stock = await this.store.getStock(seed.symbol);
      if (stock && isCorrupt(stock.currentPrice)) {
        await this.store.setStockPrice(seed.symbol, seed.price);
        count++;
      }
    }
    return count;
  }

  private async deleteStressAlerts(): Promise<number> {
    const user = await this.store.findUserByUsername(STRESS_USER.username);
    if (!user) return 0;
    return this.store.removeAlertsForUser(user.id);
  }
}
