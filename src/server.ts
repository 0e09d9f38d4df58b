import { randomUUID } from "node:crypto";
import { createApp } from "./app.js";
import { config } from "./config.js";
import { createContext, prepareData } from "./context.js";
import { initDb, store } from "./db.js";
import { startScheduler } from "./scheduler.js";

// ── Session secret validation ────────────────────────────────────────────
const sessionSecret = config.sessionSecret;
if (config.isProduction && !sessionSecret) {
  console.error("FATAL: SESSION_SECRET environment variable is required in production.");
  console.error("Generate one with: node -e \"console.log(require('crypto').randomBytes(32).toString('hex'))\"");
  process.exit(1);
}
if (!sessionSecret) {
  console.warn("WARNING: SESSION_SECRET is not set. Using a random secret; sessions will not survive restarts.");
}

// ── In-memory session store warning ──────────────────────────────────────
if (config.isProduction) {
  console.warn("WARNING: Using default in-memory session store. Sessions will be lost on restart and memory may leak under load.");
}

await initDb();

const ctx = createContext(store);
await prepareData(ctx);

const app = createApp(ctx, {
  sessionSecret: sessionSecret || randomUUID(),
  isProduction: config.isProduction,
  adminToken: config.adminToken,
});

app.listen(config.port, () => {
  console.log(`Trading API running at http://localhost:${config.port} (scenario: ${ctx.scenarios.current})`);
  startScheduler(ctx);
});
