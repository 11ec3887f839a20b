/**
 * App routes.
 *
 * POST /api/v1/apps                       — Register an app (admin)
 * GET  /api/v1/apps/:app                  — Registration status
 * GET  /api/v1/apps/:app/reserves/:currency — App reserve
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { requirePermission } from "../middleware/auth.js";
import { RegisterAppSchema } from "../types/dto.js";
import { validationError } from "../types/error.js";

export function createAppRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", requirePermission("admin"), async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(validationError("Invalid JSON in request body"), 400);
    }

    const parsed = RegisterAppSchema.safeParse(body);
    if (!parsed.success) {
      return c.json(validationError("Request body validation failed", parsed.error), 400);
    }

    const { app } = parsed.data;
    c.get("service").registerApp(app);
    return c.json({ app, registered: true }, 201);
  });

  routes.get("/:app", (c) => {
    const app = c.req.param("app");
    return c.json({ app, registered: c.get("service").isAppRegistered(app) });
  });

  routes.get("/:app/reserves/:currency", (c) => {
    const app = c.req.param("app");
    const currency = c.req.param("currency");
    const reserve = c.get("service").appReserve(app, currency);
    return c.json({ app, currency, reserve: reserve.toString() });
  });

  return routes;
}
