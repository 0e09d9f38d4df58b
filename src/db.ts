import pg from "pg";
import { randomUUID } from "node:crypto";
import bcrypt from "bcryptjs";
import { config } from "./config.js";
import { DuplicateUserError, type Store } from "./store.js";
import type {
  Holding, NewOrder, NewPriceAlert, NewUser, Order, OrderPatch, OrderSide, OrderStatus,
  OrderType, PriceAlert, AlertCondition, PriceUpdate, Stock, StockSeed, User, WatchlistItem,
} from "./types.js";

const isLocal = config.databaseUrl.includes("localhost");
const dbUrl = !isLocal && !config.databaseUrl.includes("sslmode=")
  ? config.databaseUrl + (config.databaseUrl.includes("?") ? "&" : "?") + "sslmode=require"
  : config.databaseUrl;

const pool = new pg.Pool({
  connectionString: dbUrl,
  ssl: isLocal ? false : { rejectUnauthorized: false },
});

// ── Schema initialization ────────────────────────────────────────────────

export async function initDb(): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS users (
      id            TEXT PRIMARY KEY,
      email         TEXT NOT NULL,
      username      TEXT NOT NULL,
      password_hash TEXT NOT NULL,
      full_name     TEXT,
      balance       DOUBLE PRECISION NOT NULL,
      created_at    TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at    TIMESTAMPTZ NOT NULL DEFAULT now()
    );
    CREATE UNIQUE INDEX IF NOT EXISTS users_email_lower_key ON users (LOWER(email));
    CREATE UNIQUE INDEX IF NOT EXISTS users_username_lower_key ON users (LOWER(username));

    CREATE TABLE IF NOT EXISTS stocks (
      symbol         TEXT PRIMARY KEY,
      name           TEXT NOT NULL,
      current_price  DOUBLE PRECISION NOT NULL,
      previous_close DOUBLE PRECISION,
      day_high       DOUBLE PRECISION,
      day_low        DOUBLE PRECISION,
      volume         BIGINT NOT NULL DEFAULT 0,
      market_cap     DOUBLE PRECISION,
      sector         TEXT,
      updated_at     TIMESTAMPTZ NOT NULL DEFAULT now()
    );

    CREATE TABLE IF NOT EXISTS orders (
      id              TEXT PRIMARY KEY,
      user_id         TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      symbol          TEXT NOT NULL,
      order_type      TEXT NOT NULL,
      side            TEXT NOT NULL,
      quantity        DOUBLE PRECISION NOT NULL,
      limit_price     DOUBLE PRECISION,
      filled_quantity DOUBLE PRECISION NOT NULL DEFAULT 0,
      filled_price    DOUBLE PRECISION,
      status          TEXT NOT NULL DEFAULT 'pending',
      created_at      TIMESTAMPTZ NOT NULL DEFAULT clock_timestamp(),
      updated_at      TIMESTAMPTZ NOT NULL DEFAULT clock_timestamp()
    );

    CREATE TABLE IF NOT EXISTS holdings (
      user_id           TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      symbol            TEXT NOT NULL,
      quantity          DOUBLE PRECISION NOT NULL,
      average_buy_price DOUBLE PRECISION NOT NULL,
      PRIMARY KEY (user_id, symbol)
    );

    CREATE TABLE IF NOT EXISTS watchlists (
      id       TEXT PRIMARY KEY,
      user_id  TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      symbol   TEXT NOT NULL,
      added_at TIMESTAMPTZ NOT NULL DEFAULT clock_timestamp(),
      UNIQUE (user_id, symbol)
    );

    CREATE TABLE IF NOT EXISTS price_alerts (
      id           TEXT PRIMARY KEY,
      user_id      TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      symbol       TEXT NOT NULL,
      target_price DOUBLE PRECISION NOT NULL,
      condition    TEXT NOT NULL,
      is_triggered BOOLEAN NOT NULL DEFAULT false,
      is_active    BOOLEAN NOT NULL DEFAULT true,
      created_at   TIMESTAMPTZ NOT NULL DEFAULT clock_timestamp(),
      triggered_at TIMESTAMPTZ
    );
    CREATE INDEX IF NOT EXISTS price_alerts_user_idx ON price_alerts (user_id);
  `);
}

// ── Row mapping ─────────────────────────────────────────────────────────

interface UserRow {
  id: string;
  email: string;
  username: string;
  passwordHash: string;
  fullName: string | null;
  balance: number;
  createdAt: Date;
  updatedAt: Date;
}

interface StockRow {
  symbol: string;
  name: string;
  currentPrice: number;
  previousClose: number | null;
  dayHigh: number | null;
  dayLow: number | null;
  volume: string;
  marketCap: number | null;
  sector: string | null;
  updatedAt: Date;
}

interface OrderRow {
  id: string;
  userId: string;
  symbol: string;
  orderType: OrderType;
  side: OrderSide;
  quantity: number;
  limitPrice: number | null;
  filledQuantity: number;
  filledPrice: number | null;
  status: OrderStatus;
  createdAt: Date;
  updatedAt: Date;
}

interface HoldingRow {
  userId: string;
  symbol: string;
  quantity: number;
  averageBuyPrice: number;
}

interface WatchlistRow {
  id: string;
  userId: string;
  symbol: string;
  addedAt: Date;
}

interface AlertRow {
  id: string;
  userId: string;
  symbol: string;
  targetPrice: number;
  condition: AlertCondition;
  isTriggered: boolean;
  isActive: boolean;
  createdAt: Date;
  triggeredAt: Date | null;
}

const USER_COLUMNS = `
  id, email, username, password_hash AS "passwordHash", full_name AS "fullName",
  balance, created_at AS "createdAt", updated_at AS "updatedAt"
`;

const STOCK_COLUMNS = `
  symbol, name, current_price AS "currentPrice", previous_close AS "previousClose",
  day_high AS "dayHigh", day_low AS "dayLow", volume, market_cap AS "marketCap",
  sector, updated_at AS "updatedAt"
`;

const ORDER_COLUMNS = `
  id, user_id AS "userId", symbol, order_type AS "orderType", side, quantity,
  limit_price AS "limitPrice", filled_quantity AS "filledQuantity",
  filled_price AS "filledPrice", status, created_at AS "createdAt", updated_at AS "updatedAt"
`;

const HOLDING_COLUMNS = `
  user_id AS "userId", symbol, quantity, average_buy_price AS "averageBuyPrice"
`;

const WATCHLIST_COLUMNS = `id, user_id AS "userId", symbol, added_at AS "addedAt"`;

const ALERT_COLUMNS = `
  id, user_id AS "userId", symbol, target_price AS "targetPrice", condition,
  is_triggered AS "isTriggered", is_active AS "isActive",
  created_at AS "createdAt", triggered_at AS "triggeredAt"
`;

function rowToUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    username: row.username,
    passwordHash: row.passwordHash,
    fullName: row.fullName ?? undefined,
    balance: row.balance,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

function rowToStock(row: StockRow): Stock {
  return {
    symbol: row.symbol,
    name: row.name,
    currentPrice: row.currentPrice,
    previousClose: row.previousClose ?? undefined,
    dayHigh: row.dayHigh ?? undefined,
    dayLow: row.dayLow ?? undefined,
    volume: Number(row.volume),
    marketCap: row.marketCap ?? undefined,
    sector: row.sector ?? undefined,
    updatedAt: row.updatedAt.toISOString(),
  };
}

function rowToOrder(row: OrderRow): Order {
  return {
    id: row.id,
    userId: row.userId,
    symbol: row.symbol,
    orderType: row.orderType,
    side: row.side,
    quantity: row.quantity,
    limitPrice: row.limitPrice ?? undefined,
    filledQuantity: row.filledQuantity,
    filledPrice: row.filledPrice ?? undefined,
    status: row.status,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

function rowToWatchlistItem(row: WatchlistRow): WatchlistItem {
  return { id: row.id, userId: row.userId, symbol: row.symbol, addedAt: row.addedAt.toISOString() };
}

function rowToAlert(row: AlertRow): PriceAlert {
  return {
    id: row.id,
    userId: row.userId,
    symbol: row.symbol,
    targetPrice: row.targetPrice,
    condition: row.condition,
    isTriggered: row.isTriggered,
    isActive: row.isActive,
    createdAt: row.createdAt.toISOString(),
    triggeredAt: row.triggeredAt ? row.triggeredAt.toISOString() : undefined,
  };
}

function uniqueViolation(err: unknown): string | null {
  if (typeof err !== "object" || err === null || !("code" in err) || err.code !== "23505") {
    return null;
  }
  return "constraint" in err && typeof err.constraint === "string" ? err.constraint : "";
}

// ── Store ───────────────────────────────────────────────────────────────

export class PgStore implements Store {
  constructor(
    private readonly pool: pg.Pool,
    private readonly client?: pg.PoolClient,
  ) {}

  private query<R extends pg.QueryResultRow>(text: string, values: unknown[] = []): Promise<pg.QueryResult<R>> {
    return this.client ? this.client.query<R>(text, values) : this.pool.query<R>(text, values);
  }

  async transaction<T>(fn: (tx: Store) => Promise<T>): Promise<T> {
    if (this.client) return fn(this);
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await fn(new PgStore(this.pool, client));
      await client.query("COMMIT");
      return result;
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    } finally {
      client.release();
    }
  }

  // ── Users ──

  async createUser(input: NewUser): Promise<User> {
    const passwordHash = await bcrypt.hash(input.password, 10);
    try {
      const { rows } = await this.query<UserRow>(
        `INSERT INTO users (id, email, username, password_hash, full_name, balance)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING ${USER_COLUMNS}`,
        [randomUUID(), input.email, input.username, passwordHash, input.fullName ?? null, input.balance],
      );
      return rowToUser(rows[0]);
    } catch (err) {
      const constraint = uniqueViolation(err);
      if (constraint === null) throw err;
      throw new DuplicateUserError(constraint.includes("email") ? "email" : "username");
    }
  }

  async verifyUser(username: string, password: string): Promise<User | null> {
    const user = await this.findUserByUsername(username);
    if (!user) return null;
    const valid = await bcrypt.compare(password, user.passwordHash);
    return valid ? user : null;
  }

  async findUserById(id: string): Promise<User | null> {
    const { rows } = await this.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
    return rows.length > 0 ? rowToUser(rows[0]) : null;
  }

  async findUserByUsername(username: string): Promise<User | null> {
    const { rows } = await this.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE LOWER(username) = LOWER($1)`,
      [username],
    );
    return rows.length > 0 ? rowToUser(rows[0]) : null;
  }

  async findUserByEmail(email: string): Promise<User | null> {
    const { rows } = await this.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE LOWER(email) = LOWER($1)`,
      [email],
    );
    return rows.length > 0 ? rowToUser(rows[0]) : null;
  }

  async lockUser(id: string): Promise<User | null> {
    const { rows } = await this.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1 FOR UPDATE`, [id]);
    return rows.length > 0 ? rowToUser(rows[0]) : null;
  }

  async adjustBalance(userId: string, delta: number): Promise<number | null> {
    const { rows } = await this.query<{ balance: number }>(
      `UPDATE users SET balance = balance + $1, updated_at = now() WHERE id = $2 RETURNING balance`,
      [delta, userId],
    );
    return rows.length > 0 ? rows[0].balance : null;
  }

  // ── Stocks ──

  async insertMissingStocks(seeds: StockSeed[], volumeFor: (seed: StockSeed) => number): Promise<number> {
    let inserted = 0;
    for (const seed of seeds) {
      const { rowCount } = await this.query(
        `INSERT INTO stocks (symbol, name, current_price, previous_close, day_high, day_low, volume, market_cap, sector)
         VALUES ($1, $2, $3, $3, $3, $3, $4, $5, $6)
         ON CONFLICT (symbol) DO NOTHING`,
        [seed.symbol.toUpperCase(), seed.name, seed.price, volumeFor(seed), seed.marketCap ?? null, seed.sector ?? null],
      );
      inserted += rowCount ?? 0;
    }
    return inserted;
  }

  async listStocks(): Promise<Stock[]> {
    const { rows } = await this.query<StockRow>(`SELECT ${STOCK_COLUMNS} FROM stocks ORDER BY symbol`);
    return rows.map(rowToStock);
  }

  async getStock(symbol: string): Promise<Stock | null> {
    const { rows } = await this.query<StockRow>(
      `SELECT ${STOCK_COLUMNS} FROM stocks WHERE symbol = $1`,
      [symbol.toUpperCase()],
    );
    return rows.length > 0 ? rowToStock(rows[0]) : null;
  }

  async searchStocks(query: string): Promise<Stock[]> {
    const { rows } = await this.query<StockRow>(
      `SELECT ${STOCK_COLUMNS} FROM stocks
       WHERE strpos(symbol, UPPER($1)) > 0 OR strpos(LOWER(name), LOWER($1)) > 0
       ORDER BY symbol`,
      [query],
    );
    return rows.map(rowToStock);
  }

  async updateStockPrice(symbol: string, update: PriceUpdate): Promise<Stock | null> {
    const { rows } = await this.query<StockRow>(
      `UPDATE stocks
       SET current_price = $1, day_high = $2, day_low = $3, volume = $4, updated_at = now()
       WHERE symbol = $5
       RETURNING ${STOCK_COLUMNS}`,
      [update.currentPrice, update.dayHigh ?? null, update.dayLow ?? null, update.volume, symbol.toUpperCase()],
    );
    return rows.length > 0 ? rowToStock(rows[0]) : null;
  }

  async setStockPrice(symbol: string, price: number): Promise<boolean> {
    const { rowCount } = await this.query(
      `UPDATE stocks SET current_price = $1, updated_at = now() WHERE symbol = $2`,
      [price, symbol.toUpperCase()],
    );
    return (rowCount ?? 0) > 0;
  }

  // ── Orders & holdings ──

  async createOrder(userId: string, input: NewOrder): Promise<Order> {
    const { rows } = await this.query<OrderRow>(
      `INSERT INTO orders (id, user_id, symbol, order_type, side, quantity, limit_price)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING ${ORDER_COLUMNS}`,
      [randomUUID(), userId, input.symbol, input.orderType, input.side, input.quantity, input.limitPrice ?? null],
    );
    return rowToOrder(rows[0]);
  }

  async updateOrder(id: string, patch: OrderPatch): Promise<Order | null> {
    const { rows } = await this.query<OrderRow>(
      `UPDATE orders SET
         status = COALESCE($1, status),
         filled_quantity = COALESCE($2, filled_quantity),
         filled_price = COALESCE($3, filled_price),
         updated_at = clock_timestamp()
       WHERE id = $4
       RETURNING ${ORDER_COLUMNS}`,
      [patch.status ?? null, patch.filledQuantity ?? null, patch.filledPrice ?? null, id],
    );
    return rows.length > 0 ? rowToOrder(rows[0]) : null;
  }

  async getOrder(userId: string, id: string): Promise<Order | null> {
    const { rows } = await this.query<OrderRow>(
      `SELECT ${ORDER_COLUMNS} FROM orders WHERE id = $1 AND user_id = $2`,
      [id, userId],
    );
    return rows.length > 0 ? rowToOrder(rows[0]) : null;
  }

  async listOrders(userId: string, status?: OrderStatus): Promise<Order[]> {
    const { rows } = await this.query<OrderRow>(
      `SELECT ${ORDER_COLUMNS} FROM orders
       WHERE user_id = $1 AND ($2::text IS NULL OR status = $2)
       ORDER BY created_at DESC`,
      [userId, status ?? null],
    );
    return rows.map(rowToOrder);
  }

  async getHolding(userId: string, symbol: string): Promise<Holding | null> {
    const { rows } = await this.query<HoldingRow>(
      `SELECT ${HOLDING_COLUMNS} FROM holdings WHERE user_id = $1 AND symbol = $2`,
      [userId, symbol.toUpperCase()],
    );
    return rows[0] ?? null;
  }

  async listHoldings(userId: string): Promise<Holding[]> {
    const { rows } = await this.query<HoldingRow>(
      `SELECT ${HOLDING_COLUMNS} FROM holdings WHERE user_id = $1 ORDER BY symbol`,
      [userId],
    );
    return rows;
  }

  async saveHolding(holding: Holding): Promise<void> {
    await this.query(
      `INSERT INTO holdings (user_id, symbol, quantity, average_buy_price)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (user_id, symbol) DO UPDATE SET
         quantity = EXCLUDED.quantity,
         average_buy_price = EXCLUDED.average_buy_price`,
      [holding.userId, holding.symbol, holding.quantity, holding.averageBuyPrice],
    );
  }

  async deleteHolding(userId: string, symbol: string): Promise<void> {
    await this.query(`DELETE FROM holdings WHERE user_id = $1 AND symbol = $2`, [userId, symbol]);
  }

  // ── Watchlist ──

  async listWatchlist(userId: string): Promise<WatchlistItem[]> {
    const { rows } = await this.query<WatchlistRow>(
      `SELECT ${WATCHLIST_COLUMNS} FROM watchlists WHERE user_id = $1 ORDER BY added_at DESC`,
      [userId],
    );
    return rows.map(rowToWatchlistItem);
  }

  async findWatchlistItem(userId: string, symbol: string): Promise<WatchlistItem | null> {
    const { rows } = await this.query<WatchlistRow>(
      `SELECT ${WATCHLIST_COLUMNS} FROM watchlists WHERE user_id = $1 AND symbol = $2`,
      [userId, symbol],
    );
    return rows.length > 0 ? rowToWatchlistItem(rows[0]) : null;
  }

  async addWatchlistItem(userId: string, symbol: string): Promise<WatchlistItem> {
    const { rows } = await this.query<WatchlistRow>(
      `INSERT INTO watchlists (id, user_id, symbol) VALUES ($1, $2, $3) RETURNING ${WATCHLIST_COLUMNS}`,
      [randomUUID(), userId, symbol],
    );
    return rowToWatchlistItem(rows[0]);
  }

  async removeWatchlistItem(userId: string, symbol: string): Promise<boolean> {
    const { rowCount } = await this.query(
      `DELETE FROM watchlists WHERE user_id = $1 AND symbol = $2`,
      [userId, symbol],
    );
    return (rowCount ?? 0) > 0;
  }

  // ── Price alerts ──

  async createAlert(userId: string, input: NewPriceAlert): Promise<PriceAlert> {
    const { rows } = await this.query<AlertRow>(
      `INSERT INTO price_alerts (id, user_id, symbol, target_price, condition)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${ALERT_COLUMNS}`,
      [randomUUID(), userId, input.symbol, input.targetPrice, input.condition],
    );
    return rowToAlert(rows[0]);
  }

  async listAlerts(userId: string, activeOnly: boolean): Promise<PriceAlert[]> {
    const { rows } = await this.query<AlertRow>(
      `SELECT ${ALERT_COLUMNS} FROM price_alerts
       WHERE user_id = $1 AND (NOT $2 OR (is_active AND NOT is_triggered))
       ORDER BY created_at`,
      [userId, activeOnly],
    );
    return rows.map(rowToAlert);
  }

  async getAlert(userId: string, id: string): Promise<PriceAlert | null> {
    const { rows } = await this.query<AlertRow>(
      `SELECT ${ALERT_COLUMNS} FROM price_alerts WHERE id = $1 AND user_id = $2`,
      [id, userId],
    );
    return rows.length > 0 ? rowToAlert(rows[0]) : null;
  }

  async removeAlert(userId: string, id: string): Promise<boolean> {
    const { rowCount } = await this.query(
      `DELETE FROM price_alerts WHERE id = $1 AND user_id = $2`,
      [id, userId],
    );
    return (rowCount ?? 0) > 0;
  }

  async listPendingAlerts(userId?: string): Promise<PriceAlert[]> {
    const { rows } = await this.query<AlertRow>(
      `SELECT ${ALERT_COLUMNS} FROM price_alerts
       WHERE is_active AND NOT is_triggered AND ($1::text IS NULL OR user_id = $1)
       ORDER BY created_at`,
      [userId ?? null],
    );
    return rows.map(rowToAlert);
  }

  async markAlertTriggered(id: string, triggeredAt: Date): Promise<PriceAlert | null> {
    const { rows } = await this.query<AlertRow>(
      `UPDATE price_alerts SET is_triggered = true, triggered_at = $1
       WHERE id = $2 AND is_triggered = false
       RETURNING ${ALERT_COLUMNS}`,
      [triggeredAt, id],
    );
    return rows.length > 0 ? rowToAlert(rows[0]) : null;
  }

  async removeAlertsForUser(userId: string): Promise<number> {
    const { rowCount } = await this.query(`DELETE FROM price_alerts WHERE user_id = $1`, [userId]);
    return rowCount ?? 0;
  }
}

export const store = new PgStore(pool);

export { pool };
