import { randomUUID } from "node:crypto";
import { createMiddleware } from "hono/factory";
import type { Env } from "../index";

/**
 * Request ids are always generated server-side
 */
export const requestIdMiddleware = createMiddleware<Env>(async (c, next) => {
  const requestId = randomUUID();
  c.set("requestId", requestId);
  c.header("X-Request-ID", requestId);
  await next();
});
