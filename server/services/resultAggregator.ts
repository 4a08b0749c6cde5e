import type { UtilityType } from "@shared/schema";
import type { BalanceWarning, DemandRecord, ReferenceNormSnapshot, UtilityId } from "./balanceTypes";
import type { NormsGraph } from "./normsGraph";
import type { AssetLoad, BalanceResolution, FormulaEvaluationRecord } from "./balanceResolver";

export const NORM_MATCH_THRESHOLD = 1e-7;

export type NormComparisonStatus = "MATCH" | "MISMATCH" | "MISSING_REFERENCE";

export interface NormComparisonResult {
  status: NormComparisonStatus;
  referenceNorm: number | null;
  /** (effective - reference) / reference × 100; null when there is no usable reference */
  deviationPct: number | null;
}

export interface InboundContribution {
  normId: string;
  consumerId: UtilityId;
  consumerName: string;
  normType: "DISTRIBUTION" | "CONVERSION";
  quantity: number;
}

export interface UtilityBalanceLine {
  utilityId: UtilityId;
  utilityName: string;
  uom: string;
  utilityType: UtilityType;
  isDistribution: boolean;
  process: number;
  fixed: number;
  resolvedTotal: number;
  /** Share of the total that came from other utilities' norms rather than direct demand. */
  derived: number;
  inbound: InboundContribution[];
}

export interface NormComparisonLine extends NormComparisonResult {
  normId: string;
  consumerId: UtilityId;
  consumerName: string;
  supplierId: UtilityId;
  supplierName: string;
  normType: "DISTRIBUTION" | "CONVERSION";
  formulaId: string | null;
  effectiveNorm: number;
}

export interface UtilityTypeTotal {
  utilityType: UtilityType;
  uom: string;
  total: number;
}

export interface BalanceReport {
  periodId: string;
  iterations: number;
  maxDelta: number;
  utilities: UtilityBalanceLine[];
  norms: NormComparisonLine[];
  totalsByType: UtilityTypeTotal[];
  formulaResults: FormulaEvaluationRecord[];
  assetLoads: AssetLoad[];
  warnings: BalanceWarning[];
}

export function compareNorms(effective: number, reference: number | null | undefined): NormComparisonResult {
  if (reference === null || reference === undefined) {
    return { status: "MISSING_REFERENCE", referenceNorm: null, deviationPct: null };
  }
  const status = Math.abs(effective - reference) < NORM_MATCH_THRESHOLD ? "MATCH" : "MISMATCH";
  const deviationPct = reference === 0 ? null : ((effective - reference) / reference) * 100;
  return { status, referenceNorm: reference, deviationPct };
}

function pairKey(consumerId: UtilityId, supplierId: UtilityId): string {
  return `${consumerId}\u0000${supplierId}`;
}

/**
 * Shapes a resolution into the per-utility report the API and the Excel export serve.
 * Utilities keep graph order; totals by type skip distribution nodes, whose quantity is
 * already counted on the suppliers they split into.
 */
export function aggregateBalance(
  graph: NormsGraph,
  demand: ReadonlyMap<UtilityId, DemandRecord>,
  resolution: BalanceResolution,
  referenceNorms: readonly ReferenceNormSnapshot[] = [],
): BalanceReport {
  const inboundBySupplier = new Map<UtilityId, InboundContribution[]>();
  for (const flow of resolution.flows) {
    const list = inboundBySupplier.get(flow.supplierId) ?? [];
    list.push({
      normId: flow.normId,
      consumerId: flow.consumerId,
      consumerName: graph.utility(flow.consumerId).name,
      normType: flow.normType,
      quantity: flow.quantity,
    });
    inboundBySupplier.set(flow.supplierId, list);
  }

  const utilities: UtilityBalanceLine[] = graph.utilities.map((u) => {
    const record = demand.get(u.id);
    const process = record?.process ?? 0;
    const fixed = record?.fixed ?? 0;
    const resolvedTotal = resolution.quantities.get(u.id) ?? 0;
    return {
      utilityId: u.id,
      utilityName: u.name,
      uom: u.uom,
      utilityType: u.type,
      isDistribution: u.isDistribution,
      process,
      fixed,
      resolvedTotal,
      derived: resolvedTotal - process - fixed,
      inbound: inboundBySupplier.get(u.id) ?? [],
    };
  });

  const references = new Map<string, number>();
  for (const ref of referenceNorms) {
    references.set(pairKey(ref.consumerId, ref.supplierId), ref.factor);
  }

  const norms: NormComparisonLine[] = resolution.flows.map((flow) => ({
    normId: flow.normId,
    consumerId: flow.consumerId,
    consumerName: graph.utility(flow.consumerId).name,
    supplierId: flow.supplierId,
    supplierName: graph.utility(flow.supplierId).name,
    normType: flow.normType,
    formulaId: flow.formulaId ?? null,
    effectiveNorm: flow.norm,
    ...compareNorms(flow.norm, references.get(pairKey(flow.consumerId, flow.supplierId))),
  }));

  const totals = new Map<string, UtilityTypeTotal>();
  for (const line of utilities) {
    if (line.isDistribution) continue;
    const key = `${line.utilityType}|${line.uom}`;
    const entry = totals.get(key) ?? { utilityType: line.utilityType, uom: line.uom, total: 0 };
    entry.total += line.resolvedTotal;
    totals.set(key, entry);
  }

  return {
    periodId: resolution.periodId,
    iterations: resolution.iterations,
    maxDelta: resolution.maxDelta,
    utilities,
    norms,
    totalsByType: Array.from(totals.values()),
    formulaResults: resolution.formulaResults,
    assetLoads: resolution.assetLoads,
    warnings: resolution.warnings,
  };
}
