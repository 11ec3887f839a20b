/**
 * Tests for the app routes.
 */

import { describe, it, expect } from "vitest";
import {
  ADMIN_KEY,
  VIEWER_KEY,
  createSecuredTestApp,
  createTestApp,
  jsonRequest,
} from "../setup.js";

describe("POST /api/v1/apps", () => {
  it("registers an app in unsecured mode", async () => {
    const { app, service } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/apps", "POST", { app: "0xpool" }));

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({ app: "0xpool", registered: true });
    expect(service.isAppRegistered("0xpool")).toBe(true);
  });

  it("trims the app address", async () => {
    const { app, service } = createTestApp();
    await app.request(jsonRequest("/api/v1/apps", "POST", { app: "  0xpool  " }));
    expect(service.vault.listApps()).toEqual(["0xpool"]);
  });

  it("is idempotent and records an event per call", async () => {
    const { app, service } = createTestApp();
    await app.request(jsonRequest("/api/v1/apps", "POST", { app: "0xpool" }));
    const res = await app.request(jsonRequest("/api/v1/apps", "POST", { app: "0xpool" }));

    expect(res.status).toBe(201);
    expect(service.vault.listApps()).toEqual(["0xpool"]);
    expect(service.eventStore.globalPosition()).toBe(2);
  });

  it("rejects a missing app with field issues", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/apps", "POST", {}));

    expect(res.status).toBe(400);
    const body = (await res.json()) as {
      error: { code: string; message: string; details: { issues: { path: string }[] } };
    };
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.message).toBe("Request body validation failed");
    expect(body.error.details.issues.map((i) => i.path)).toEqual(["app"]);
  });

  it("rejects a blank app", async () => {
    const { app } = createTestApp();
    const res = await app.request(jsonRequest("/api/v1/apps", "POST", { app: "   " }));
    expect(res.status).toBe(400);
  });

  it("rejects malformed JSON", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      new Request("http://localhost/api/v1/apps", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      }),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: "VALIDATION_ERROR", message: "Invalid JSON in request body" },
    });
  });

  it("requires the admin role when auth is enabled", async () => {
    const { app } = createSecuredTestApp();

    const viewer = await app.request(
      jsonRequest("/api/v1/apps", "POST", { app: "0xpool" }, { "X-Api-Key": VIEWER_KEY }),
    );
    expect(viewer.status).toBe(403);
    expect(await viewer.json()).toEqual({
      error: { code: "FORBIDDEN", message: "Role 'viewer' lacks 'admin' permission" },
    });

    const admin = await app.request(
      jsonRequest("/api/v1/apps", "POST", { app: "0xpool" }, { "X-Api-Key": ADMIN_KEY }),
    );
    expect(admin.status).toBe(201);
  });
});

describe("GET /api/v1/apps/:app", () => {
  it("reports registration status", async () => {
    const { app, service } = createTestApp();
    service.registerApp("0xpool");

    const registered = await app.request("/api/v1/apps/0xpool");
    expect(await registered.json()).toEqual({ app: "0xpool", registered: true });

    const unknown = await app.request("/api/v1/apps/0xother");
    expect(await unknown.json()).toEqual({ app: "0xother", registered: false });
  });
});

describe("GET /api/v1/apps/:app/reserves/:currency", () => {
  it("returns the app reserve as a decimal string", async () => {
    const { app, service } = createTestApp();
    service.registerApp("0xpool");
    service.custody.fund("0xpool", "USDC", 75n);
    service.vault.lock(
      {
        address: "0xpool",
        onLockAcquired: () => {
          service.vault.accountAppBalanceDelta("0xpool", "USDC", -75n, "0xpool");
          service.custody.deposit("USDC", 75n, "0xpool");
          service.vault.settle("0xpool", "USDC");
        },
      },
      undefined,
    );

    const res = await app.request("/api/v1/apps/0xpool/reserves/USDC");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ app: "0xpool", currency: "USDC", reserve: "75" });
  });

  it("returns 404 for an unknown currency", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/apps/0xpool/reserves/DAI");
    expect(res.status).toBe(404);
  });
});
