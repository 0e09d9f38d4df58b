import { describe, it, expect, beforeEach } from "vitest";
import { authenticate, deposit, registerUser, toPublicUser, withdraw } from "../src/services/auth.js";
import { MemoryStore } from "./support/memory-store.js";

describe("auth", () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
  });

  const alice = { email: "alice@example.com", username: "alice", password: "test-password" };

  it("registers with the initial balance and a hashed password", async () => {
    const user = await registerUser(store, alice, 10000);
    expect(user.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    expect(user.balance).toBe(10000);
    expect(user.passwordHash).not.toBe("test-password");
    expect(toPublicUser(user)).not.toHaveProperty("passwordHash");
  });

  it("rejects a duplicate email before a duplicate username", async () => {
    await registerUser(store, alice, 10000);
    await expect(registerUser(store, { ...alice, email: "ALICE@example.com" }, 10000)).rejects.toMatchObject({
      status: 400,
      message: "Email already registered",
    });
    await expect(registerUser(store, { ...alice, email: "other@example.com", username: "Alice" }, 10000)).rejects.toMatchObject({
      status: 400,
      message: "Username already taken",
    });
  });

  it("authenticates with the right password only", async () => {
    const user = await registerUser(store, alice, 10000);
    expect((await authenticate(store, "alice", "test-password"))?.id).toBe(user.id);
    expect(await authenticate(store, "alice", "wrong-password")).toBeNull();
    expect(await authenticate(store, "nobody", "test-password")).toBeNull();
  });

  it("deposits and withdraws", async () => {
    const user = await registerUser(store, alice, 10000);
    expect(await deposit(store, user.id, 500)).toBe(10500);
    expect(await withdraw(store, user.id, 2500)).toBe(8000);
  });

  it("rejects non-positive amounts", async () => {
    const user = await registerUser(store, alice, 10000);
    await expect(deposit(store, user.id, 0)).rejects.toMatchObject({ status: 400, message: "Amount must be greater than 0" });
    await expect(withdraw(store, user.id, -5)).rejects.toMatchObject({ status: 400, message: "Amount must be greater than 0" });
  });

  it("lets only one of two overlapping withdrawals through", async () => {
    const user = await registerUser(store, alice, 10000);
    const results = await Promise.allSettled([withdraw(store, user.id, 6000), withdraw(store, user.id, 6000)]);

    expect(results.map((r) => r.status)).toEqual(["fulfilled", "rejected"]);
    expect(results[1]).toMatchObject({
      reason: { status: 400, message: "Insufficient funds. Available: $4000.00" },
    });
    expect((await store.findUserById(user.id))?.balance).toBe(4000);
  });

  it("rejects a withdrawal beyond the balance", async () => {
    const user = await registerUser(store, alice, 10000);
    await expect(withdraw(store, user.id, 20000)).rejects.toMatchObject({
      status: 400,
      message: "Insufficient funds. Available: $10000.00",
    });
  });
});
