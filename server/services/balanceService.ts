import type { BalanceRunRequest } from "@shared/schema";
import type { IStorage } from "../storage";
import { getBalanceSettings } from "../balance-config-loader";
import type { DemandRecord, UtilityId } from "./balanceTypes";
import { BalanceError } from "./balanceErrors";
import { buildAvailabilityView } from "./availability";
import { createDefaultFormulaEvaluator } from "./formulaEvaluator";
import { NormsGraph } from "./normsGraph";
import { resolveBalance } from "./balanceResolver";
import { aggregateBalance, type BalanceReport } from "./resultAggregator";
import { loadPeriodSnapshot, type SnapshotStorage } from "./snapshotLoader";

export type BalanceStorage = SnapshotStorage & Pick<IStorage, "getAllBalanceConfig">;

export type PeriodOutcome =
  | { periodId: string; ok: true; report: BalanceReport }
  | { periodId: string; ok: false; error: BalanceError };

// April to March
const FY_MONTHS = [4, 5, 6, 7, 8, 9, 10, 11, 12, 1, 2, 3];

/** Period ids of a financial year, e.g. 2025 -> FY2025-04 ... FY2025-03 (March 2026). */
export function financialYearPeriods(financialYear: number): string[] {
  return FY_MONTHS.map((month) => `FY${financialYear}-${String(month).padStart(2, "0")}`);
}

export function financialYearLabel(financialYear: number): string {
  return `FY ${financialYear}-${String(financialYear + 1).slice(-2)}`;
}

/**
 * Loads the period, applies request overrides and runs one resolution.
 * Demand entries in the request replace the stored demand of the same utility.
 */
export async function runBalance(
  storage: BalanceStorage,
  periodId: string,
  overrides: BalanceRunRequest = {},
): Promise<BalanceReport> {
  const startTime = Date.now();
  const settings = await getBalanceSettings(storage);
  const snapshot = await loadPeriodSnapshot(storage, periodId, {
    defaultOperationalHours: settings.defaultOperationalHours,
  });

  const demand = new Map<UtilityId, DemandRecord>(snapshot.demand);
  for (const entry of overrides.demand ?? []) {
    demand.set(entry.utilityId, { process: entry.processRequirement, fixed: entry.fixedRequirement });
  }

  const evaluator = createDefaultFormulaEvaluator();
  const options = {
    tolerance: overrides.tolerance ?? settings.tolerance,
    maxIterations: overrides.maxIterations ?? settings.maxIterations,
    capacityCheck: overrides.capacityCheck ?? true,
  };

  try {
    const graph = NormsGraph.build(snapshot, {
      epsilon: settings.distributionEpsilon,
      knownFormulas: evaluator.ids(),
    });
    const availability = buildAvailabilityView({
      periodId,
      steamAssets: snapshot.steamAssets,
      powerAssets: snapshot.powerAssets,
      records: snapshot.availability,
      defaultOperationalHours: settings.defaultOperationalHours,
    });

    const resolution = resolveBalance({
      graph,
      demand,
      availability,
      evaluator,
      coefficients: snapshot.coefficients,
      periodId,
      options,
    });

    const elapsed = Date.now() - startTime;
    console.log(
      `Balance Resolver: period ${periodId} converged in ${resolution.iterations} iterations (max delta ${resolution.maxDelta.toExponential(2)}) in ${elapsed}ms, ${resolution.warnings.length} warnings`,
    );
    for (const warning of resolution.warnings) {
      console.warn(`Balance Resolver: [${warning.code}] ${warning.message}`);
    }

    return aggregateBalance(graph, demand, resolution, snapshot.referenceNorms);
  } catch (error) {
    if (error instanceof BalanceError) {
      console.warn(`Balance Resolver: period ${periodId} failed with ${error.code}: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Resolves each period on its own, in order. A balance failure is recorded against
 * its period and the remaining periods still run; storage failures propagate.
 */
export async function runBalanceForPeriods(
  storage: BalanceStorage,
  periodIds: readonly string[],
  overrides: BalanceRunRequest = {},
): Promise<PeriodOutcome[]> {
  const startTime = Date.now();
  const outcomes: PeriodOutcome[] = [];

  for (const periodId of periodIds) {
    try {
      const report = await runBalance(storage, periodId, overrides);
      outcomes.push({ periodId, ok: true, report });
    } catch (error) {
      if (!(error instanceof BalanceError)) throw error;
      outcomes.push({ periodId, ok: false, error });
    }
  }

  const failed = outcomes.filter((o) => !o.ok).map((o) => o.periodId);
  console.log(
    `Balance Resolver: ${outcomes.length - failed.length} of ${outcomes.length} periods resolved in ${Date.now() - startTime}ms${failed.length > 0 ? `, failed: ${failed.join(", ")}` : ""}`,
  );
  return outcomes;
}
