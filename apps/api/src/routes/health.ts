/**
 * Service banner, health and ping
 */

import { Hono } from "hono";
import type { Env } from "../index";

export const SERVICE_NAME = "picks-api";

const app = new Hono<Env>();

// HEAD / is answered from this route with an empty body
app.get("/", (c) => {
  return c.json({ service: SERVICE_NAME });
});

app.get("/health", (c) => {
  return c.json({ status: "ok" });
});

app.get("/api/v1/ping", (c) => {
  return c.json({ pong: true });
});

export { app as healthRoutes };
