import express from "express";
import type { AppContext } from "../context.js";
import { badRequest, sendError, validate } from "../errors.js";
import { chaosSchema } from "../schemas.js";
import { AVAILABLE_SCENARIOS, isChaosScenario } from "../services/chaos-runtime.js";

export function adminRouter(ctx: AppContext): express.Router {
  const router = express.Router();

  router.get("/chaos/status", (_req, res) => {
    res.json(ctx.chaos.status());
  });

  router.post("/chaos/activate", async (req, res) => {
    let scenario: string;
    try {
      scenario = validate(chaosSchema, req.body ?? {}).scenario;
      if (!isChaosScenario(scenario)) {
        throw badRequest(`Invalid scenario. Available: ${AVAILABLE_SCENARIOS.join(", ")}`);
      }
    } catch (err) {
      sendError(res, err, "Invalid chaos request");
      return;
    }

    try {
      const details = await ctx.chaos.activate(scenario);
      res.json({ message: `Chaos scenario '${scenario}' activated`, scenario, details });
    } catch (err) {
      console.error("[CHAOS] activation failed:", err);
      res.status(500).json({ error: `Failed to activate chaos: ${err instanceof Error ? err.message : String(err)}` });
    }
  });

  router.post("/chaos/reset", async (_req, res) => {
    try {
      const details = await ctx.chaos.reset();
      res.json({ message: "Chaos reset to clean state", details });
    } catch (err) {
      console.error("[CHAOS] reset failed:", err);
      res.status(500).json({ error: `Failed to reset chaos: ${err instanceof Error ? err.message : String(err)}` });
    }
  });

  router.get("/scenario", (_req, res) => {
    res.json(ctx.scenarios.info());
  });

  router.get("/scenarios", (_req, res) => {
    try {
      res.json(ctx.scenarios.listScenarios());
    } catch (err) {
      sendError(res, err, "Failed to list scenarios");
    }
  });

  return router;
}
