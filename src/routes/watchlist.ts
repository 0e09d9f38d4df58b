import express from "express";
import type { AppContext } from "../context.js";
import { sendError, validate } from "../errors.js";
import { requireAuth, sessionUserId } from "../middleware.js";
import { watchlistSchema } from "../schemas.js";
import { addToWatchlist, getWatchlist, removeFromWatchlist } from "../services/watchlist.js";

export function watchlistRouter(ctx: AppContext): express.Router {
  const router = express.Router();
  router.use(requireAuth);

  router.get("/", async (req, res) => {
    try {
      res.json(await getWatchlist(ctx.store, sessionUserId(req)));
    } catch (err) {
      sendError(res, err, "Failed to load watchlist");
    }
  });

  router.post("/", async (req, res) => {
    try {
      const { symbol } = validate(watchlistSchema, req.body ?? {});
      res.status(201).json(await addToWatchlist(ctx.store, sessionUserId(req), symbol));
    } catch (err) {
      sendError(res, err, "Failed to add to watchlist");
    }
  });

  router.delete("/:symbol", async (req, res) => {
    try {
      await removeFromWatchlist(ctx.store, sessionUserId(req), String(req.params.symbol));
      res.status(204).end();
    } catch (err) {
      sendError(res, err, "Failed to remove from watchlist");
    }
  });

  return router;
}
