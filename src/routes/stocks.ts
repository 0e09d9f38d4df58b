import express from "express";
import type { AppContext } from "../context.js";
import { badRequest, notFound, sendError, validate } from "../errors.js";
import { requireAuth } from "../middleware.js";
import { searchQuerySchema } from "../schemas.js";
import {
  calculateChange, getStock, listStocks, refreshFromLive, searchStocks,
  simulateAllPrices, simulatePriceChange, withChange,
} from "../services/market.js";

export function stocksRouter(ctx: AppContext): express.Router {
  const router = express.Router();

  router.get("/", async (_req, res) => {
    try {
      const stocks = await listStocks(ctx.store);
      res.json(stocks.map(withChange));
    } catch (err) {
      sendError(res, err, "Failed to list stocks");
    }
  });

  router.get("/search", async (req, res) => {
    try {
      const { q } = validate(searchQuerySchema, req.query);
      const stocks = await searchStocks(ctx.store, q);
      res.json(
        stocks.map((s) => ({ symbol: s.symbol, name: s.name, currentPrice: s.currentPrice, ...calculateChange(s) })),
      );
    } catch (err) {
      sendError(res, err, "Failed to search stocks");
    }
  });

  router.post("/simulate-all", requireAuth, async (_req, res) => {
    try {
      const stocks = await simulateAllPrices(ctx.store);
      res.json({ message: `Simulated price changes for ${stocks.length} stocks` });
    } catch (err) {
      sendError(res, err, "Failed to simulate prices");
    }
  });

  router.post("/refresh", requireAuth, async (_req, res) => {
    try {
      if (ctx.marketSource !== "yahoo") {
        throw badRequest("Live prices are disabled (MARKET_SOURCE is not yahoo)");
      }
      const stocks = await refreshFromLive(ctx.store);
      res.json({ message: `Refreshed ${stocks.length} stocks`, stocks: stocks.map(withChange) });
    } catch (err) {
      sendError(res, err, "Failed to refresh prices");
    }
  });

  router.get("/:symbol", async (req, res) => {
    try {
      const symbol = String(req.params.symbol);
      const stock = await getStock(ctx.store, symbol);
      if (!stock) throw notFound(`Stock ${symbol.toUpperCase()} not found`);
      res.json(withChange(stock));
    } catch (err) {
      sendError(res, err, "Failed to fetch stock");
    }
  });

  router.get("/:symbol/quote", async (req, res) => {
    try {
      const symbol = String(req.params.symbol);
      const stock = await getStock(ctx.store, symbol);
      if (!stock) throw notFound(`Stock ${symbol.toUpperCase()} not found`);
      res.json({ symbol: stock.symbol, price: stock.currentPrice, ...calculateChange(stock) });
    } catch (err) {
      sendError(res, err, "Failed to fetch quote");
    }
  });

  router.post("/:symbol/simulate", requireAuth, async (req, res) => {
    try {
      const symbol = String(req.params.symbol);
      const stock = await simulatePriceChange(ctx.store, symbol);
      if (!stock) throw notFound(`Stock ${symbol.toUpperCase()} not found`);
      res.json({ symbol: stock.symbol, newPrice: stock.currentPrice, ...calculateChange(stock) });
    } catch (err) {
      sendError(res, err, "Failed to simulate price");
    }
  });

  return router;
}
