/**
 * Vault routes.
 *
 * GET  /api/v1/vault/session                    — Session holder and unsettled count
 * GET  /api/v1/vault/reserves/:currency         — Last-synced vault reserve
 * POST /api/v1/vault/reserves/:currency/sync    — Re-sync the reserve from custody (any caller)
 * GET  /api/v1/vault/deltas/:settler/:currency  — Settlement delta of a settler
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createVaultRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/session", (c) => {
    return c.json(c.get("service").session());
  });

  routes.get("/reserves/:currency", (c) => {
    const currency = c.req.param("currency");
    const reserve = c.get("service").vaultReserve(currency);
    return c.json({ currency, reserve: reserve.toString() });
  });

  routes.post("/reserves/:currency/sync", (c) => {
    const currency = c.req.param("currency");
    const reserve = c.get("service").syncReserve(currency);
    return c.json({ currency, reserve: reserve.toString() });
  });

  routes.get("/deltas/:settler/:currency", (c) => {
    const settler = c.req.param("settler");
    const currency = c.req.param("currency");
    const delta = c.get("service").currencyDelta(settler, currency);
    return c.json({ settler, currency, delta: delta.toString() });
  });

  return routes;
}
