import express from "express";
import type { AppContext } from "../context.js";
import { sendError, validate } from "../errors.js";
import { requireAuth, sessionUserId } from "../middleware.js";
import { orderQuerySchema, orderSchema } from "../schemas.js";
import { cancelOrder, getOrder, getOrders, placeOrder } from "../services/trading.js";

export function ordersRouter(ctx: AppContext): express.Router {
  const router = express.Router();
  router.use(requireAuth);

  router.post("/", async (req, res) => {
    try {
      const input = validate(orderSchema, req.body ?? {});
      const order = await placeOrder(ctx.store, sessionUserId(req), input);
      res.status(201).json(order);
    } catch (err) {
      sendError(res, err, "Failed to place order");
    }
  });

  router.get("/", async (req, res) => {
    try {
      const { status } = validate(orderQuerySchema, req.query);
      res.json(await getOrders(ctx.store, sessionUserId(req), status));
    } catch (err) {
      sendError(res, err, "Failed to list orders");
    }
  });

  router.get("/:id", async (req, res) => {
    try {
      res.json(await getOrder(ctx.store, sessionUserId(req), String(req.params.id)));
    } catch (err) {
      sendError(res, err, "Failed to fetch order");
    }
  });

  router.delete("/:id", async (req, res) => {
    try {
      res.json(await cancelOrder(ctx.store, sessionUserId(req), String(req.params.id)));
    } catch (err) {
      sendError(res, err, "Failed to cancel order");
    }
  });

  return router;
}
