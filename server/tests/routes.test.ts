import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from "vitest";
import express from "express";
import { createServer, type Server } from "http";
import { registerRoutes } from "../routes";
import { invalidateBalanceConfigCache } from "../balance-config-loader";
import { MemStorage } from "./memoryStorage";

let server: Server;
let baseUrl: string;
let storage: MemStorage;

beforeAll(async () => {
  storage = new MemStorage();
  const app = express();
  app.use(express.json());
  server = createServer(app);
  await registerRoutes(server, app, storage);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server has no port");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

beforeEach(() => {
  invalidateBalanceConfigCache();
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  return () => {
    vi.restoreAllMocks();
  };
});

function send(method: string, path: string, body?: unknown) {
  return fetch(`${baseUrl}${path}`, {
    method,
    headers: { "Content-Type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

describe("master data routes", () => {
  it("lists utilities", async () => {
    const res = await send("GET", "/api/utilities");
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(Array.isArray(body) && body.length).toBe(43);
  });
});

describe("demand routes", () => {
  it("rejects negative demand", async () => {
    const res = await send("PUT", "/api/periods/FY2025-05/demand", {
      entries: [{ utilityId: "oxygen", processRequirement: -1, fixedRequirement: 0 }],
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: "VALIDATION_ERROR" });
  });

  it("stores demand for a period", async () => {
    const res = await send("PUT", "/api/periods/FY2025-05/demand", {
      entries: [{ utilityId: "oxygen", processRequirement: 1000, fixedRequirement: 50 }],
    });

    expect(res.status).toBe(200);
    const stored = await storage.getDemand("FY2025-05");
    expect(stored.map((r) => [r.utilityId, r.processRequirement, r.fixedRequirement])).toEqual([["oxygen", "1000", "50"]]);
  });
});

describe("balance routes", () => {
  it("runs the balance for a period", async () => {
    const res = await send("POST", "/api/periods/FY2025-04/balance", {});
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ periodId: "FY2025-04" });
  });

  it("rejects an invalid run request", async () => {
    const res = await send("POST", "/api/periods/FY2025-04/balance", { maxIterations: 0 });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: "VALIDATION_ERROR" });
  });

  it("maps engine failures to their status and code", async () => {
    const res = await send("POST", "/api/periods/FY2025-04/balance", {
      demand: [{ utilityId: "no-such-utility", processRequirement: 1, fixedRequirement: 0 }],
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: "VALIDATION_ERROR", details: { issues: [{ code: "UNKNOWN_UTILITY" }] } });
  });

  it("exports the balance as a workbook", async () => {
    const res = await send("GET", "/api/periods/FY2025-04/balance/export");

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("application/vnd.openxmlformats-officedocument.spreadsheetml.sheet");
    expect(res.headers.get("content-disposition")).toBe('attachment; filename="Utility_Balance_FY2025-04.xlsx"');
    expect((await res.arrayBuffer()).byteLength).toBeGreaterThan(0);
  });
});

describe("full-year balance route", () => {
  it("rejects a request without a financial year", async () => {
    const res = await send("POST", "/api/balance/full-year", { capacityCheck: false });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: "VALIDATION_ERROR" });
  });

  it("returns one outcome per month with failures in place", async () => {
    const res = await send("POST", "/api/balance/full-year", { financialYear: 2025 });
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ financialYear: 2025, label: "FY 2025-26" });
    const periods = typeof body === "object" && body !== null && "periods" in body && Array.isArray(body.periods) ? body.periods : [];
    expect(periods).toHaveLength(12);
    expect(periods[0]).toMatchObject({ periodId: "FY2025-04", ok: true, report: { periodId: "FY2025-04" } });
    expect(periods[2]).toMatchObject({
      periodId: "FY2025-06",
      ok: false,
      error: { code: "CAPACITY_EXCEEDED", details: { authoritative: false, violations: [{ assetId: "hrsg3" }] } },
    });
  });
});

describe("balance config routes", () => {
  it("rejects unknown keys and invalid values", async () => {
    const unknown = await send("GET", "/api/balance-config/damping");
    expect(unknown.status).toBe(404);
    expect(await unknown.json()).toEqual({ error: 'Unknown config key "damping"' });

    const invalid = await send("PUT", "/api/balance-config/maxIterations", { value: 0 });
    expect(invalid.status).toBe(400);
    expect(await invalid.json()).toMatchObject({ code: "VALIDATION_ERROR" });
  });

  it("stores a value and serves it back", async () => {
    const put = await send("PUT", "/api/balance-config/maxIterations", { value: 500 });
    expect(put.status).toBe(200);
    expect(await put.json()).toMatchObject({ configKey: "maxIterations", configValue: 500 });

    const res = await send("GET", "/api/balance-config/maxIterations");
    expect(await res.json()).toMatchObject({ key: "maxIterations", value: 500, defaultValue: 1000, isCustomized: true });
  });
});
