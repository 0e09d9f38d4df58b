import express from "express";
import session from "express-session";
import type { AppContext } from "./context.js";
import { createRateLimiter, requireAdminToken } from "./middleware.js";
import { adminRouter } from "./routes/admin.js";
import { alertsRouter } from "./routes/alerts.js";
import { authRouter } from "./routes/auth.js";
import { ordersRouter } from "./routes/orders.js";
import { portfolioRouter } from "./routes/portfolio.js";
import { stocksRouter } from "./routes/stocks.js";
import { watchlistRouter } from "./routes/watchlist.js";

export interface AppOptions {
  sessionSecret: string;
  isProduction?: boolean;
  /** Attempts per IP and window on register/login. */
  authRateLimit?: number;
  adminToken?: string;
}

export function createApp(ctx: AppContext, options: AppOptions): express.Express {
  const app = express();
  const isProduction = options.isProduction ?? false;

  app.use(express.json());

  app.use(
    session({
      secret: options.sessionSecret,
      resave: false,
      saveUninitialized: false,
      name: "sid",
      cookie: {
        httpOnly: true,
        sameSite: "strict",
        secure: isProduction,
        maxAge: 7 * 24 * 60 * 60 * 1000, // 7 days
      },
    })
  );

  if (isProduction) {
    app.set("trust proxy", 1);
  }

  app.get("/", (_req, res) => {
    res.json({
      message: "Paper trading API",
      scenario: ctx.scenarios.current,
      endpoints: {
        auth: "/auth",
        stocks: "/stocks",
        orders: "/orders",
        portfolio: "/portfolio",
        watchlist: "/watchlist",
        alerts: "/alerts",
        admin: "/admin",
        health: "/health",
      },
    });
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy" });
  });

  // ── Routes ─────────────────────────────────────────────────────────────
  app.use("/auth", authRouter(ctx, createRateLimiter({ max: options.authRateLimit })));
  app.use("/stocks", stocksRouter(ctx));
  app.use("/orders", ordersRouter(ctx));
  app.use("/portfolio", portfolioRouter(ctx));
  app.use("/watchlist", watchlistRouter(ctx));
  app.use("/alerts", alertsRouter(ctx));
  app.use("/admin", requireAdminToken(options.adminToken), adminRouter(ctx));

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  return app;
}
