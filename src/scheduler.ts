import cron, { type ScheduledTask } from "node-cron";
import { config, isEmailConfigured, isSmsConfigured } from "./config.js";
import { type AppContext, alertCheckOptions, createContext, prepareData } from "./context.js";
import { refreshFromLive, simulateAllPrices } from "./services/market.js";
import { checkAndTriggerAlerts } from "./services/price-alerts.js";
import { notify } from "./services/notifier.js";

async function moveMarket(ctx: AppContext): Promise<void> {
  if (ctx.marketSource === "yahoo") {
    const updated = await refreshFromLive(ctx.store);
    console.log(`  Refreshed ${updated.length} live price(s)`);
  } else if (config.simulateMarket) {
    const updated = await simulateAllPrices(ctx.store);
    console.log(`  Simulated ${updated.length} price move(s)`);
  }
}

export async function runCheck(ctx: AppContext): Promise<void> {
  console.log(`[${timestamp()}] Market tick`);

  try {
    await moveMarket(ctx);
  } catch (err) {
    console.error(`[${timestamp()}] Failed to update prices:`, err instanceof Error ? err.message : err);
    return;
  }

  const triggered = await checkAndTriggerAlerts(ctx.store, undefined, alertCheckOptions(ctx));
  if (triggered.length === 0) {
    console.log(`  No thresholds crossed.`);
    return;
  }

  await notify(ctx.store, triggered);
}

function timestamp(): string {
  return new Date().toLocaleTimeString();
}

function runSafely(ctx: AppContext): void {
  runCheck(ctx).catch((err) => {
    console.error(`[${timestamp()}] Alert check failed:`, err);
  });
}

export function startScheduler(ctx: AppContext): ScheduledTask {
  console.log("Price Alert Scheduler");
  console.log("=====================");
  console.log(`Schedule: ${config.checkIntervalCron}`);
  console.log(`Market:   ${ctx.marketSource}${config.simulateMarket ? "" : " (simulation off)"}`);
  console.log(`Email:    ${isEmailConfigured() ? "configured" : "not configured"}`);
  console.log(`SMS:      ${isSmsConfigured() ? "configured" : "not configured"}`);
  console.log();

  // Run immediately on start
  runSafely(ctx);

  const task = cron.schedule(config.checkIntervalCron, () => {
    runSafely(ctx);
  });

  console.log("Scheduler running.\n");
  return task;
}

// Allow standalone execution: npx tsx src/scheduler.ts
const isDirectRun = process.argv[1]?.endsWith("scheduler.ts") || process.argv[1]?.endsWith("scheduler.js");
if (isDirectRun) {
  const { initDb, store } = await import("./db.js");
  await initDb();
  const ctx = createContext(store);
  await prepareData(ctx);
  startScheduler(ctx);
}
