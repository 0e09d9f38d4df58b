import "dotenv/config";

export type MarketSource = "simulated" | "yahoo";

function parseMarketSource(value: string | undefined): MarketSource {
  return value === "yahoo" ? "yahoo" : "simulated";
}

export const config = {
  databaseUrl: process.env.DATABASE_URL || "postgresql://localhost:5432/paper_trading",
  port: Number(process.env.PORT || 3000),
  isProduction: process.env.NODE_ENV === "production",
  sessionSecret: process.env.SESSION_SECRET,
  initialBalance: Number(process.env.INITIAL_BALANCE || 10000),
  scenario: process.env.SCENARIO || "default",
  dataDir: process.env.DATA_DIR || "data",
  scenariosDir: process.env.SCENARIOS_DIR || "scenarios",
  checkIntervalCron: process.env.CHECK_INTERVAL_CRON || "*/5 * * * *",
  simulateMarket: process.env.SIMULATE_MARKET !== "false",
  marketSource: parseMarketSource(process.env.MARKET_SOURCE),
  chaosRaceDelayMs: Number(process.env.CHAOS_RACE_DELAY_MS || 500),
  smtp: {
    host: process.env.SMTP_HOST,
    port: Number(process.env.SMTP_PORT || 587),
    user: process.env.SMTP_USER,
    pass: process.env.SMTP_PASS,
  },
  twilio: {
    accountSid: process.env.TWILIO_ACCOUNT_SID,
    authToken: process.env.TWILIO_AUTH_TOKEN,
    fromNumber: process.env.TWILIO_FROM_NUMBER,
  },
  notifySms: process.env.NOTIFY_SMS,
  adminToken: process.env.ADMIN_TOKEN,
};

export function isEmailConfigured(): boolean {
  return !!(config.smtp.host && config.smtp.user && config.smtp.pass);
}

export function isSmsConfigured(): boolean {
  return !!(config.twilio.accountSid && config.twilio.authToken && config.twilio.fromNumber && config.notifySms);
}
