import type {
  Holding, NewOrder, NewPriceAlert, NewUser, Order, OrderPatch, OrderStatus,
  PriceAlert, PriceUpdate, Stock, StockSeed, User, WatchlistItem,
} from "./types.js";

export class DuplicateUserError extends Error {
  constructor(readonly field: "email" | "username") {
    super(field === "email" ? "Email already registered" : "Username already taken");
    this.name = "DuplicateUserError";
  }
}

/**
 * Persistence seam for the services. `db.ts` implements it on Postgres; the
 * tests run against an in-memory implementation.
 */
export interface Store {
  // ── Users ──
  createUser(input: NewUser): Promise<User>;
  verifyUser(username: string, password: string): Promise<User | null>;
  findUserById(id: string): Promise<User | null>;
  findUserByUsername(username: string): Promise<User | null>;
  findUserByEmail(email: string): Promise<User | null>;
  /**
   * Reads the user and holds its row until the surrounding transaction ends.
   * Balance and holding changes for one user take this lock first, so they
   * run one at a time.
   */
  lockUser(id: string): Promise<User | null>;
  /** Adds `delta` to the balance and returns the new balance, or null when the user is gone. */
  adjustBalance(userId: string, delta: number): Promise<number | null>;

  // ── Stocks ──
  /** Inserts seeds whose symbol is not present yet; returns how many were inserted. */
  insertMissingStocks(seeds: StockSeed[], volumeFor: (seed: StockSeed) => number): Promise<number>;
  listStocks(): Promise<Stock[]>;
  getStock(symbol: string): Promise<Stock | null>;
  searchStocks(query: string): Promise<Stock[]>;
  updateStockPrice(symbol: string, update: PriceUpdate): Promise<Stock | null>;
  setStockPrice(symbol: string, price: number): Promise<boolean>;

  // ── Orders & holdings ──
  createOrder(userId: string, input: NewOrder): Promise<Order>;
  updateOrder(id: string, patch: OrderPatch): Promise<Order | null>;
  getOrder(userId: string, id: string): Promise<Order | null>;
  listOrders(userId: string, status?: OrderStatus): Promise<Order[]>;
  getHolding(userId: string, symbol: string): Promise<Holding | null>;
  listHoldings(userId: string): Promise<Holding[]>;
  saveHolding(holding: Holding): Promise<void>;
  deleteHolding(userId: string, symbol: string): Promise<void>;

  // ── Watchlist ──
  listWatchlist(userId: string): Promise<WatchlistItem[]>;
  findWatchlistItem(userId: string, symbol: string): Promise<WatchlistItem | null>;
  addWatchlistItem(userId: string, symbol: string): Promise<WatchlistItem>;
  removeWatchlistItem(userId: string, symbol: string): Promise<boolean>;

  // ── Price alerts ──
  createAlert(userId: string, input: NewPriceAlert): Promise<PriceAlert>;
  listAlerts(userId: string, activeOnly: boolean): Promise<PriceAlert[]>;
  getAlert(userId: string, id: string): Promise<PriceAlert | null>;
  removeAlert(userId: string, id: string): Promise<boolean>;
  /** Active, untriggered alerts; every user's when `userId` is omitted. */
  listPendingAlerts(userId?: string): Promise<PriceAlert[]>;
  /**
   * Flips an untriggered alert to triggered. Returns null when the alert was
   * already triggered (or removed) by the time the update ran.
   */
  markAlertTriggered(id: string, triggeredAt: Date): Promise<PriceAlert | null>;
  removeAlertsForUser(userId: string): Promise<number>;

  /** Runs `fn` against a store whose writes commit or roll back together. */
  transaction<T>(fn: (tx: Store) => Promise<T>): Promise<T>;
}
