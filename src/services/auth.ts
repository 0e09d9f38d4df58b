import { badRequest, notFound } from "../errors.js";
import { DuplicateUserError, type Store } from "../store.js";
import type { PublicUser, User } from "../types.js";

export interface Registration {
  email: string;
  username: string;
  password: string;
  fullName?: string;
}

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    fullName: user.fullName,
    balance: user.balance,
    createdAt: user.createdAt,
  };
}

export async function registerUser(store: Store, input: Registration, initialBalance: number): Promise<User> {
  if (await store.findUserByEmail(input.email)) {
    throw badRequest("Email already registered");
  }
  if (await store.findUserByUsername(input.username)) {
    throw badRequest("Username already taken");
  }
  try {
    return await store.createUser({ ...input, balance: initialBalance });
  } catch (err) {
    // Lost a race with a concurrent registration of the same name.
    if (err instanceof DuplicateUserError) throw badRequest(err.message);
    throw err;
  }
}

export async function authenticate(store: Store, username: string, password: string): Promise<User | null> {
  return store.verifyUser(username, password);
}

export async function requireUser(store: Store, userId: string): Promise<User> {
  const user = await store.findUserById(userId);
  if (!user) throw notFound("User not found");
  return user;
}

/** Like `requireUser`, holding the user's row for the rest of the transaction. */
export async function lockUser(tx: Store, userId: string): Promise<User> {
  const user = await tx.lockUser(userId);
  if (!user) throw notFound("User not found");
  return user;
}

export async function deposit(store: Store, userId: string, amount: number): Promise<number> {
  if (amount <= 0) throw badRequest("Amount must be greater than 0");
  const balance = await store.adjustBalance(userId, amount);
  if (balance === null) throw notFound("User not found");
  return balance;
}

export async function withdraw(store: Store, userId: string, amount: number): Promise<number> {
  if (amount <= 0) throw badRequest("Amount must be greater than 0");
  return store.transaction(async (tx) => {
    const user = await lockUser(tx, userId);
    if (amount > user.balance) {
      throw badRequest(`Insufficient funds. Available: $${user.balance.toFixed(2)}`);
    }
    const balance = await tx.adjustBalance(userId, -amount);
    if (balance === null) throw notFound("User not found");
    return balance;
  });
}
