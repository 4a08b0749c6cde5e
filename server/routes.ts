/**
 * REST API routes for the utility balance application.
 *
 * Master-data reads (utilities, norms, steam assets), per-period demand maintenance,
 * balance runs with optional overrides, full financial-year runs, Excel export of a
 * run, and the runtime solver settings stored in balance_config.
 */
import type { Express, Request, Response } from "express";
import { type Server } from "http";
import { z } from "zod";
import { balanceRunRequestSchema, demandUpdateSchema, fullYearRunRequestSchema } from "@shared/schema";
import { storage as defaultStorage, type IStorage } from "./storage";
import {
  DEFAULT_BALANCE_SETTINGS,
  getBalanceSettings,
  invalidateBalanceConfigCache,
  isBalanceConfigKey,
  validateBalanceConfigValue,
} from "./balance-config-loader";
import { BalanceError } from "./services/balanceErrors";
import {
  financialYearLabel,
  financialYearPeriods,
  runBalance,
  runBalanceForPeriods,
} from "./services/balanceService";
import { exportBalanceExcel } from "./services/exportService";

const configUpdateSchema = z.object({
  value: z.unknown(),
  description: z.string().optional(),
});

/** Maps engine failures to their status code; anything else is a 500. */
export function sendError(res: Response, error: unknown, fallbackMessage: string) {
  if (error instanceof BalanceError) {
    return res.status(error.statusCode).json(error.toJSON());
  }
  console.error(`${fallbackMessage}:`, error);
  return res.status(500).json({ error: fallbackMessage });
}

function zodMessage(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
}

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  storage: IStorage = defaultStorage,
): Promise<Server> {
  // =========================================================================
  // Master data
  // =========================================================================

  app.get("/api/utilities", async (_req: Request, res: Response) => {
    try {
      res.json(await storage.getUtilities());
    } catch (error) {
      sendError(res, error, "Failed to fetch utilities");
    }
  });

  app.get("/api/norms", async (_req: Request, res: Response) => {
    try {
      res.json(await storage.getNorms());
    } catch (error) {
      sendError(res, error, "Failed to fetch norms");
    }
  });

  app.get("/api/steam-assets", async (_req: Request, res: Response) => {
    try {
      res.json(await storage.getSteamAssets());
    } catch (error) {
      sendError(res, error, "Failed to fetch steam assets");
    }
  });

  // =========================================================================
  // Period demand
  // =========================================================================

  app.get("/api/periods/:periodId/demand", async (req: Request, res: Response) => {
    try {
      res.json(await storage.getDemand(req.params.periodId));
    } catch (error) {
      sendError(res, error, "Failed to fetch demand");
    }
  });

  app.put("/api/periods/:periodId/demand", async (req: Request, res: Response) => {
    const parsed = demandUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: zodMessage(parsed.error), code: "VALIDATION_ERROR" });
    }
    try {
      const rows = await storage.upsertDemand(req.params.periodId, parsed.data.entries);
      console.log(`Demand: stored ${rows.length} entries for period ${req.params.periodId}`);
      res.json(rows);
    } catch (error) {
      sendError(res, error, "Failed to store demand");
    }
  });

  // =========================================================================
  // Balance runs
  // =========================================================================

  app.post("/api/periods/:periodId/balance", async (req: Request, res: Response) => {
    const parsed = balanceRunRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ error: zodMessage(parsed.error), code: "VALIDATION_ERROR" });
    }
    try {
      const report = await runBalance(storage, req.params.periodId, parsed.data);
      res.json(report);
    } catch (error) {
      sendError(res, error, "Failed to run balance");
    }
  });

  app.post("/api/balance/full-year", async (req: Request, res: Response) => {
    const parsed = fullYearRunRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ error: zodMessage(parsed.error), code: "VALIDATION_ERROR" });
    }
    const { financialYear, capacityCheck } = parsed.data;
    try {
      const outcomes = await runBalanceForPeriods(storage, financialYearPeriods(financialYear), { capacityCheck });
      const succeeded = outcomes.filter((o) => o.ok).length;
      res.json({
        financialYear,
        label: financialYearLabel(financialYear),
        succeeded,
        failed: outcomes.length - succeeded,
        periods: outcomes.map((o) =>
          o.ok ? { periodId: o.periodId, ok: true, report: o.report } : { periodId: o.periodId, ok: false, error: o.error.toJSON() },
        ),
      });
    } catch (error) {
      sendError(res, error, "Failed to run full-year balance");
    }
  });

  app.get("/api/periods/:periodId/balance/export", async (req: Request, res: Response) => {
    try {
      const periodId = req.params.periodId;
      const report = await runBalance(storage, periodId);
      const buffer = await exportBalanceExcel(report, periodId);
      const fileName = `Utility_Balance_${periodId.replace(/[^A-Za-z0-9_-]+/g, "_")}.xlsx`;
      res.setHeader("Content-Type", "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet");
      res.setHeader("Content-Disposition", `attachment; filename="${fileName}"`);
      res.send(buffer);
    } catch (error) {
      sendError(res, error, "Failed to export balance");
    }
  });

  // =========================================================================
  // Balance config
  // =========================================================================

  app.get("/api/balance-config/:key", async (req: Request, res: Response) => {
    const key = req.params.key;
    if (!isBalanceConfigKey(key)) {
      return res.status(404).json({ error: `Unknown config key "${key}"` });
    }
    try {
      const [entry, settings] = await Promise.all([storage.getBalanceConfig(key), getBalanceSettings(storage)]);
      res.json({
        key,
        value: settings[key],
        defaultValue: DEFAULT_BALANCE_SETTINGS[key],
        isCustomized: entry !== undefined,
        description: entry?.description ?? null,
        updatedAt: entry?.updatedAt ?? null,
      });
    } catch (error) {
      sendError(res, error, "Failed to fetch balance config");
    }
  });

  app.put("/api/balance-config/:key", async (req: Request, res: Response) => {
    const key = req.params.key;
    if (!isBalanceConfigKey(key)) {
      return res.status(404).json({ error: `Unknown config key "${key}"` });
    }
    const parsed = configUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: zodMessage(parsed.error), code: "VALIDATION_ERROR" });
    }
    const invalid = validateBalanceConfigValue(key, parsed.data.value);
    if (invalid) {
      return res.status(400).json({ error: `Invalid value for ${key}: ${invalid}`, code: "VALIDATION_ERROR" });
    }
    try {
      const entry = await storage.upsertBalanceConfig(key, parsed.data.value, parsed.data.description);
      invalidateBalanceConfigCache();
      console.log(`Balance Config: ${key} set to ${JSON.stringify(parsed.data.value)}`);
      res.json(entry);
    } catch (error) {
      sendError(res, error, "Failed to update balance config");
    }
  });

  return httpServer;
}
