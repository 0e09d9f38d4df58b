import { Command } from "commander";
import { config } from "./config.js";
import { createContext, alertCheckOptions, prepareData } from "./context.js";
import { initDb, pool, store } from "./db.js";
import { registerUser } from "./services/auth.js";
import { checkAndTriggerAlerts, getAlerts, toAlertViews } from "./services/price-alerts.js";
import { formatAlertLine } from "./services/notifier.js";

await initDb();

const ctx = createContext(store);
const program = new Command();

program
  .name("trading-cli")
  .description("Operate the paper trading backend: seed data, inspect alerts, drive chaos scenarios");

program
  .command("seed")
  .description("Seed stocks from the fixtures and apply the scenario's setup")
  .action(async () => {
    await prepareData(ctx);
    const stocks = await store.listStocks();
    console.log(`${stocks.length} stock(s) in the market (scenario: ${ctx.scenarios.current}).`);
  });

program
  .command("scenarios")
  .description("List the available scenarios")
  .action(() => {
    const scenarios = ctx.scenarios.listScenarios();
    console.log(`\n${"ID".padEnd(15)} ${"Difficulty".padEnd(11)} Name`);
    console.log("-".repeat(60));
    for (const s of scenarios) {
      const marker = s.id === ctx.scenarios.current ? "*" : " ";
      console.log(`${marker}${s.id.padEnd(14)} ${s.difficulty.padEnd(11)} ${s.name}`);
    }
    console.log();
  });

const chaos = program.command("chaos").description("Activate or reset chaos scenarios");

chaos
  .command("status")
  .description("Show the active chaos scenario")
  .action(() => {
    const { active, available } = ctx.chaos.status();
    console.log(`Active:    ${active ?? "none"}`);
    console.log(`Available: ${available.join(", ")}`);
  });

chaos
  .command("activate <name>")
  .description("Reset, then activate a chaos scenario")
  .action(async (name: string) => {
    const result = await ctx.chaos.activate(name);
    for (const action of result.actions) console.log(`  ${action}`);
    for (const { symbol, issue } of result.corruptedStocks ?? []) {
      console.log(`  ${symbol}: ${issue}`);
    }
    if (result.stressUser) {
      console.log(`  Log in as ${result.stressUser.username} / ${result.stressUser.password}`);
    }
  });

chaos
  .command("reset")
  .description("Undo every chaos scenario")
  .action(async () => {
    const result = await ctx.chaos.reset();
    if (result.actions.length === 0) {
      console.log("Nothing to reset.");
      return;
    }
    for (const action of result.actions) console.log(`  ${action}`);
  });

program
  .command("alerts <username>")
  .description("List a user's price alerts")
  .option("--active-only", "Only alerts that can still trigger")
  .action(async (username: string, opts: { activeOnly?: boolean }) => {
    const userId = await resolveUser(username);
    const alerts = await toAlertViews(store, await getAlerts(store, userId, opts.activeOnly ?? false));
    if (alerts.length === 0) {
      console.log("No alerts.");
      return;
    }

    console.log(`\n${"ID".padEnd(37)} ${"Symbol".padEnd(8)} ${"When".padEnd(16)} ${"Price".padEnd(12)} Triggered`);
    console.log("-".repeat(95));

    for (const a of alerts) {
      const when = `${a.condition} $${a.targetPrice.toFixed(2)}`;
      const price = a.currentPrice != null ? `$${a.currentPrice.toFixed(2)}` : "-";
      const triggered = a.triggeredAt ? new Date(a.triggeredAt).toLocaleString() : "No";
      console.log(`${a.id.padEnd(37)} ${a.symbol.padEnd(8)} ${when.padEnd(16)} ${price.padEnd(12)} ${triggered}`);
    }
    console.log();
  });

program
  .command("check <username>")
  .description("Run the trigger check for one user")
  .action(async (username: string) => {
    const userId = await resolveUser(username);
    const triggered = await checkAndTriggerAlerts(store, userId, alertCheckOptions(ctx));
    if (triggered.length === 0) {
      console.log("No thresholds crossed.");
      return;
    }
    for (const t of triggered) console.log(formatAlertLine(t));
  });

program
  .command("register <username>")
  .description("Create a new user account")
  .requiredOption("-e, --email <email>", "Email address")
  .requiredOption("-p, --password <password>", "Password (min 6 characters)")
  .action(async (username: string, opts: { email: string; password: string }) => {
    try {
      const user = await registerUser(store, { username, email: opts.email, password: opts.password }, config.initialBalance);
      console.log(`User "${user.username}" created (id: ${user.id}, balance: $${user.balance.toFixed(2)}).`);
    } catch (err) {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
    }
  });

async function resolveUser(username: string): Promise<string> {
  const user = await store.findUserByUsername(username);
  if (!user) {
    throw new Error(`User "${username}" not found. Register first with: npm run cli -- register ${username} -e <email> -p <password>`);
  }
  return user.id;
}

try {
  await program.parseAsync();
} catch (err) {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
} finally {
  await pool.end();
}
