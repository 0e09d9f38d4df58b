import type express from "express";
import type { z } from "zod";

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export const badRequest = (message: string, details?: unknown) => new HttpError(400, message, details);
export const unauthorized = (message = "Not authenticated") => new HttpError(401, message);
export const notFound = (message: string) => new HttpError(404, message);

/**
 * Parses `input` or throws a 400 whose message is the first issue's and whose
 * `details` are all of zod's issues.
 */
export function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const [first] = result.error.errors;
    const message = first ? (first.path.length > 0 ? `${first.path.join(".")}: ${first.message}` : first.message) : "Invalid request";
    throw badRequest(message, result.error.errors);
  }
  return result.data;
}

/**
 * Writes `err` as `{ error }`. Known HTTP errors keep their status; anything
 * else is logged and reported as a 500 with `fallback` as the message.
 */
export function sendError(res: express.Response, err: unknown, fallback: string): void {
  if (err instanceof HttpError) {
    const body = err.details === undefined ? { error: err.message } : { error: err.message, details: err.details };
    res.status(err.status).json(body);
    return;
  }
  console.error(`${res.req.method} ${res.req.originalUrl} error:`, err);
  res.status(500).json({ error: fallback });
}
