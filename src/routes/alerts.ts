import express from "express";
import { type AppContext, alertCheckOptions } from "../context.js";
import { notFound, sendError, validate } from "../errors.js";
import { requireAuth, sessionUserId } from "../middleware.js";
import { alertQuerySchema, alertSchema, concurrentCheckSchema } from "../schemas.js";
import {
  checkAndTriggerAlerts, createAlert, deleteAlert, getAlert, getAlerts, toAlertView, toAlertViews,
} from "../services/price-alerts.js";

export function alertsRouter(ctx: AppContext): express.Router {
  const router = express.Router();
  router.use(requireAuth);

  router.post("/", async (req, res) => {
    try {
      const input = validate(alertSchema, req.body ?? {});
      const alert = await createAlert(ctx.store, sessionUserId(req), input);
      res.status(201).json(await toAlertView(ctx.store, alert));
    } catch (err) {
      sendError(res, err, "Failed to create alert");
    }
  });

  router.get("/", async (req, res) => {
    try {
      const { active_only } = validate(alertQuerySchema, req.query);
      const alerts = await getAlerts(ctx.store, sessionUserId(req), active_only);
      res.json(await toAlertViews(ctx.store, alerts));
    } catch (err) {
      sendError(res, err, "Failed to list alerts");
    }
  });

  router.post("/check", async (req, res) => {
    try {
      const triggered = await checkAndTriggerAlerts(ctx.store, sessionUserId(req), alertCheckOptions(ctx));
      res.json(await toAlertViews(ctx.store, triggered.map((t) => t.alert)));
    } catch (err) {
      sendError(res, err, "Failed to check alerts");
    }
  });

  // Scenario-gated: runs several checks for the caller at once.
  router.post("/check-concurrent", async (req, res) => {
    try {
      if (!ctx.scenarios.isConcurrentTestEnabled()) throw notFound("Not found");
      const { runs } = validate(concurrentCheckSchema, req.query);
      const userId = sessionUserId(req);
      const results = await Promise.all(
        Array.from({ length: runs }, () => checkAndTriggerAlerts(ctx.store, userId, alertCheckOptions(ctx))),
      );
      const ids = results.flat().map((t) => t.alert.id);
      res.json({ runs, triggered: ids.length, uniqueAlerts: new Set(ids).size });
    } catch (err) {
      sendError(res, err, "Failed to run concurrent checks");
    }
  });

  router.get("/:id", async (req, res) => {
    try {
      const alert = await getAlert(ctx.store, sessionUserId(req), String(req.params.id));
      res.json(await toAlertView(ctx.store, alert));
    } catch (err) {
      sendError(res, err, "Failed to fetch alert");
    }
  });

  router.delete("/:id", async (req, res) => {
    try {
      await deleteAlert(ctx.store, sessionUserId(req), String(req.params.id));
      res.status(204).end();
    } catch (err) {
      sendError(res, err, "Failed to delete alert");
    }
  });

  return router;
}
