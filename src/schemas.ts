import { z } from "zod";

const lowerCase = (value: unknown) => (typeof value === "string" ? value.toLowerCase() : value);

const TRUTHY_FLAGS = ["true", "1", "yes", "on"];

const symbol = z.string().trim().min(1, "symbol is required").max(10);

export const registerSchema = z.object({
  email: z.string().trim().email(),
  username: z.string().trim().min(3, "Username must be 3-30 characters").max(30, "Username must be 3-30 characters"),
  password: z.string().min(6, "Password must be at least 6 characters"),
  fullName: z.string().trim().max(100).optional(),
});

export const loginSchema = z.object({
  username: z.string().min(1, "username and password required"),
  password: z.string().min(1, "username and password required"),
});

export const amountSchema = z.object({
  amount: z.coerce.number({ invalid_type_error: "amount must be a number" }).finite(),
});

export const orderSchema = z.object({
  symbol,
  orderType: z.preprocess(
    lowerCase,
    z.enum(["market", "limit"], { errorMap: () => ({ message: 'orderType must be "market" or "limit"' }) }),
  ),
  side: z.preprocess(lowerCase, z.enum(["buy", "sell"], { errorMap: () => ({ message: 'side must be "buy" or "sell"' }) })),
  quantity: z.number().positive("quantity must be greater than 0"),
  limitPrice: z.number().positive("limitPrice must be greater than 0").optional(),
});

export const orderQuerySchema = z.object({
  status: z.enum(["pending", "filled", "partially_filled", "cancelled", "rejected"]).optional(),
});

export const watchlistSchema = z.object({ symbol });

export const alertSchema = z.object({
  symbol,
  targetPrice: z.number().positive("targetPrice must be greater than 0"),
  condition: z.preprocess(
    lowerCase,
    z.enum(["above", "below"], { errorMap: () => ({ message: 'condition must be "above" or "below"' }) }),
  ),
});

export const alertQuerySchema = z.object({
  active_only: z
    .preprocess(lowerCase, z.enum(["true", "false", "1", "0", "yes", "no", "on", "off"]).optional())
    .transform((v) => v !== undefined && TRUTHY_FLAGS.includes(v)),
});

export const concurrentCheckSchema = z.object({
  runs: z.coerce.number().int().min(2, "runs must be between 2 and 20").max(20, "runs must be between 2 and 20").default(5),
});

export const searchQuerySchema = z.object({
  q: z.string().trim().min(1, "Search query must be at least 1 character"),
});

export const chaosSchema = z.object({
  scenario: z.string().min(1),
});
