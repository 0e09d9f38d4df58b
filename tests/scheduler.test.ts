import { describe, it, expect, beforeEach, vi } from "vitest";
import { createContext, prepareData, type AppContext } from "../src/context.js";
import { runCheck } from "../src/scheduler.js";
import { createAlert } from "../src/services/price-alerts.js";
import { ScenarioManager } from "../src/services/scenario.js";
import { MemoryStore } from "./support/memory-store.js";

const { notify } = vi.hoisted(() => ({ notify: vi.fn() }));
vi.mock("../src/services/notifier.js", () => ({ notify }));

describe("runCheck", () => {
  let store: MemoryStore;
  let ctx: AppContext;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const scenarios = new ScenarioManager();
    scenarios.load("default");
    store = new MemoryStore();
    ctx = createContext(store, { scenarios, marketSource: "simulated", raceDelayMs: 0 });
    await prepareData(ctx);
  });

  it("moves the market, then notifies about every user's crossed alerts", async () => {
    const before = (await store.listStocks()).map((s) => s.volume);
    const fires = await createAlert(store, "user-1", { symbol: "AAPL", targetPrice: 1, condition: "above" });
    await createAlert(store, "user-2", { symbol: "AAPL", targetPrice: 1_000_000, condition: "above" });
    const alsoFires = await createAlert(store, "user-2", { symbol: "NFLX", targetPrice: 1_000_000, condition: "below" });

    await runCheck(ctx);

    const after = (await store.listStocks()).map((s) => s.volume);
    after.forEach((volume, i) => expect(volume).toBeGreaterThan(before[i]));

    expect(notify).toHaveBeenCalledTimes(1);
    const [passedStore, triggered] = notify.mock.calls[0];
    expect(passedStore).toBe(store);
    expect(triggered.map((t: { alert: { id: string } }) => t.alert.id)).toEqual([fires.id, alsoFires.id]);
  });

  it("does not notify when nothing crossed", async () => {
    await createAlert(store, "user-1", { symbol: "AAPL", targetPrice: 1_000_000, condition: "above" });
    await runCheck(ctx);
    expect(notify).not.toHaveBeenCalled();
  });
});
