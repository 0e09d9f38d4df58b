import express from "express";
import type { AppContext } from "../context.js";
import { sendError } from "../errors.js";
import { requireAuth, sessionUserId } from "../middleware.js";
import { getBalance, getHolding, getHoldings, getPortfolio } from "../services/portfolio.js";

export function portfolioRouter(ctx: AppContext): express.Router {
  const router = express.Router();
  router.use(requireAuth);

  router.get("/", async (req, res) => {
    try {
      res.json(await getPortfolio(ctx.store, sessionUserId(req)));
    } catch (err) {
      sendError(res, err, "Failed to load portfolio");
    }
  });

  router.get("/holdings", async (req, res) => {
    try {
      res.json(await getHoldings(ctx.store, sessionUserId(req)));
    } catch (err) {
      sendError(res, err, "Failed to load holdings");
    }
  });

  router.get("/holdings/:symbol", async (req, res) => {
    try {
      res.json(await getHolding(ctx.store, sessionUserId(req), String(req.params.symbol)));
    } catch (err) {
      sendError(res, err, "Failed to load holding");
    }
  });

  router.get("/balance", async (req, res) => {
    try {
      res.json(await getBalance(ctx.store, sessionUserId(req)));
    } catch (err) {
      sendError(res, err, "Failed to load balance");
    }
  });

  return router;
}
