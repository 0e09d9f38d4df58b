import { describe, it, expect, afterEach, vi } from "vitest";
import { config } from "../src/config.js";
import { formatAlertLine, notify } from "../src/services/notifier.js";
import type { PriceAlert, TriggeredAlert } from "../src/types.js";
import { MemoryStore } from "./support/memory-store.js";

const { sendAlertDigest, sendSmsSummary } = vi.hoisted(() => ({
  sendAlertDigest: vi.fn(),
  sendSmsSummary: vi.fn(),
}));

vi.mock("../src/services/email-sender.js", () => ({ sendAlertDigest }));
vi.mock("../src/services/sms-sender.js", () => ({ sendSmsSummary }));

function triggeredAlert(overrides: Partial<PriceAlert> = {}, currentPrice = 200): TriggeredAlert {
  return {
    currentPrice,
    alert: {
      id: "alert-1",
      userId: "user-1",
      symbol: "AAPL",
      targetPrice: 190,
      condition: "above",
      isTriggered: true,
      isActive: true,
      createdAt: "2026-01-01T00:00:00.000Z",
      triggeredAt: "2026-01-02T00:00:00.000Z",
      ...overrides,
    },
  };
}

describe("notifier", () => {
  const smtp = { ...config.smtp };

  afterEach(() => {
    Object.assign(config.smtp, smtp);
    sendAlertDigest.mockReset();
    sendSmsSummary.mockReset();
  });

  it("formats a triggered alert", () => {
    expect(formatAlertLine(triggeredAlert())).toBe("[ALERT] AAPL ($200.00) is above $190");
  });

  it("logs each alert and skips channels that are not configured", async () => {
    Object.assign(config.smtp, { host: undefined, user: undefined, pass: undefined });
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    await notify(new MemoryStore(), [triggeredAlert()]);
    expect(log).toHaveBeenCalledWith("[ALERT] AAPL ($200.00) is above $190");
    expect(sendAlertDigest).not.toHaveBeenCalled();
  });

  it("emails each owner one digest of their alerts", async () => {
    Object.assign(config.smtp, { host: "smtp.test", user: "alerts@example.com", pass: "test-secret" });
    vi.spyOn(console, "log").mockImplementation(() => {});
    const store = new MemoryStore();
    const ann = await store.createUser({ email: "ann@example.com", username: "ann", password: "test-password", balance: 0 });
    const bob = await store.createUser({ email: "bob@example.com", username: "bob", password: "test-password", balance: 0 });

    const annFirst = triggeredAlert({ id: "a1", userId: ann.id });
    const bobOnly = triggeredAlert({ id: "b1", userId: bob.id, symbol: "TSLA" });
    const annSecond = triggeredAlert({ id: "a2", userId: ann.id, symbol: "MSFT" });
    await notify(store, [annFirst, bobOnly, annSecond]);

    expect(sendAlertDigest).toHaveBeenCalledTimes(2);
    expect(sendAlertDigest).toHaveBeenNthCalledWith(1, "ann@example.com", "ann", [annFirst, annSecond]);
    expect(sendAlertDigest).toHaveBeenNthCalledWith(2, "bob@example.com", "bob", [bobOnly]);
  });

  it("keeps going when an email fails", async () => {
    Object.assign(config.smtp, { host: "smtp.test", user: "alerts@example.com", pass: "test-secret" });
    vi.spyOn(console, "log").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    sendAlertDigest.mockRejectedValueOnce(new Error("smtp down"));
    const store = new MemoryStore();
    const ann = await store.createUser({ email: "ann@example.com", username: "ann", password: "test-password", balance: 0 });
    const bob = await store.createUser({ email: "bob@example.com", username: "bob", password: "test-password", balance: 0 });

    await notify(store, [triggeredAlert({ userId: ann.id }), triggeredAlert({ userId: bob.id })]);
    expect(error).toHaveBeenCalledWith("  -> Email to ann failed:", "smtp down");
    expect(sendAlertDigest).toHaveBeenCalledTimes(2);
  });
});
