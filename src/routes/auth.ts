import express from "express";
import type { AppContext } from "../context.js";
import { sendError, validate } from "../errors.js";
import { requireAuth, sessionUserId } from "../middleware.js";
import { amountSchema, loginSchema, registerSchema } from "../schemas.js";
import { authenticate, deposit, registerUser, requireUser, toPublicUser, withdraw } from "../services/auth.js";

export function authRouter(ctx: AppContext, rateLimit: express.RequestHandler): express.Router {
  const router = express.Router();

  router.post("/register", rateLimit, async (req, res) => {
    try {
      const input = validate(registerSchema, req.body ?? {});
      const user = await registerUser(ctx.store, input, ctx.initialBalance);
      req.session.userId = user.id;
      req.session.username = user.username;
      res.status(201).json(toPublicUser(user));
    } catch (err) {
      sendError(res, err, "Registration failed");
    }
  });

  router.post("/login", rateLimit, async (req, res) => {
    try {
      const { username, password } = validate(loginSchema, req.body ?? {});
      const user = await authenticate(ctx.store, username, password);
      if (!user) {
        res.status(401).json({ error: "Incorrect username or password" });
        return;
      }
      req.session.userId = user.id;
      req.session.username = user.username;
      res.json(toPublicUser(user));
    } catch (err) {
      sendError(res, err, "Login failed");
    }
  });

  router.post("/logout", (req, res) => {
    req.session.destroy((err) => {
      if (err) {
        sendError(res, err, "Logout failed");
        return;
      }
      res.json({ ok: true });
    });
  });

  router.get("/me", requireAuth, async (req, res) => {
    try {
      const user = await requireUser(ctx.store, sessionUserId(req));
      res.json(toPublicUser(user));
    } catch (err) {
      sendError(res, err, "Failed to load user");
    }
  });

  router.post("/deposit", requireAuth, async (req, res) => {
    try {
      const { amount } = validate(amountSchema, req.body ?? {});
      const newBalance = await deposit(ctx.store, sessionUserId(req), amount);
      res.json({ message: `Successfully deposited $${amount.toFixed(2)}`, newBalance });
    } catch (err) {
      sendError(res, err, "Deposit failed");
    }
  });

  router.post("/withdraw", requireAuth, async (req, res) => {
    try {
      const { amount } = validate(amountSchema, req.body ?? {});
      const newBalance = await withdraw(ctx.store, sessionUserId(req), amount);
      res.json({ message: `Successfully withdrew $${amount.toFixed(2)}`, newBalance });
    } catch (err) {
      sendError(res, err, "Withdrawal failed");
    }
  });

  return router;
}
