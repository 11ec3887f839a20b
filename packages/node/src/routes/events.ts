/**
 * Event query routes.
 *
 * GET /api/v1/events?afterPosition=&limit= — Vault events in global order
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { validationError } from "../types/error.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = ListEventsQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return c.json(validationError("Invalid query parameters", query.error), 400);
    }

    const { afterPosition, limit } = query.data;
    return c.json(c.get("service").readEvents(afterPosition, limit));
  });

  return routes;
}
