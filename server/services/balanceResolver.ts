/**
 * Balance resolver: turns top-level utility demand into the quantity of every utility
 * that has to be produced or bought for the period.
 *
 * The norms graph is cyclic (HRSG -> BFW -> LP steam -> PRDS -> BFW, power plants feeding
 * their own auxiliary power), so demand is propagated by fixed-point iteration. Every pass
 * recomputes all quantities from the previous pass's vector:
 *
 *   next[u] = max(0, seed[u] + Σ shares and conversions into u − Σ credits against u)
 *
 * and iteration stops once no quantity moves by more than the tolerance. The resolver
 * is a pure function of its arguments; it keeps no state between calls.
 */
import type { SteamAssetType } from "@shared/schema";
import type {
  AssetId,
  BalanceWarning,
  DemandRecord,
  FormulaCoefficients,
  ResolveOptions,
  UtilityId,
} from "./balanceTypes";
import { DEFAULT_RESOLVE_OPTIONS } from "./balanceTypes";
import type { AvailabilityView } from "./availability";
import type { NormsGraph } from "./normsGraph";
import type { FormulaEvaluator, FormulaResult } from "./formulaEvaluator";
import {
  BalanceError,
  CapacityExceededError,
  ConvergenceError,
  MissingCoefficientsError,
  NoAvailableSupplierError,
  ValidationError,
  type CapacityViolation,
  type GraphIssue,
} from "./balanceErrors";

export interface ResolveInput {
  graph: NormsGraph;
  demand: ReadonlyMap<UtilityId, DemandRecord>;
  availability: AvailabilityView;
  evaluator: FormulaEvaluator;
  coefficients: ReadonlyMap<AssetId, FormulaCoefficients>;
  periodId: string;
  options?: Partial<ResolveOptions>;
}

export interface NormFlow {
  normId: string;
  consumerId: UtilityId;
  supplierId: UtilityId;
  normType: "DISTRIBUTION" | "CONVERSION";
  /** Signed: credits from by-product edges are negative. */
  quantity: number;
  /** Supplier quantity per unit of consumer actually applied on this edge. */
  norm: number;
  /** Share actually applied after availability rerouting (distribution only). */
  effectiveShare?: number;
  formulaId?: string;
}

export interface FormulaEvaluationRecord {
  normId: string;
  consumerId: UtilityId;
  supplierId: UtilityId;
  formulaId: string;
  assetId: AssetId;
  generation: number;
  result: FormulaResult;
}

export interface AssetLoad {
  assetId: AssetId;
  assetName: string;
  assetType: SteamAssetType;
  utilityId: UtilityId;
  priority: number;
  isAvailable: boolean;
  operationalHours: number;
  quantity: number;
  minimumLoad: number;
  capacity: number;
  utilization: number | null;
}

export interface BalanceResolution {
  periodId: string;
  quantities: ReadonlyMap<UtilityId, number>;
  iterations: number;
  maxDelta: number;
  flows: NormFlow[];
  formulaResults: FormulaEvaluationRecord[];
  assetLoads: AssetLoad[];
  warnings: BalanceWarning[];
}

export type ResolveOutcome = { ok: true; value: BalanceResolution } | { ok: false; error: BalanceError };

type ConversionStep =
  | { normId: string; supplierIndex: number; kind: "plain"; factor: number }
  | {
      normId: string;
      supplierIndex: number;
      kind: "formula";
      formulaId: string;
      assetId: AssetId;
      coefficients: FormulaCoefficients;
    };

interface DistributionStep {
  normId: string;
  supplierIndex: number;
  share: number;
}

interface ConsumerPlan {
  distribution: DistributionStep[];
  /** true when the consumer has distribution norms but every supplier is unavailable */
  unserved: boolean;
  conversions: ConversionStep[];
}

interface PassResult {
  next: Float64Array;
  net: Float64Array;
}

function toQuantityMap(graph: NormsGraph, q: Float64Array): Map<UtilityId, number> {
  const out = new Map<UtilityId, number>();
  graph.utilities.forEach((u, idx) => out.set(u.id, q[idx]));
  return out;
}

function seedVector(graph: NormsGraph, demand: ReadonlyMap<UtilityId, DemandRecord>): Float64Array {
  const issues: GraphIssue[] = [];
  const seed = new Float64Array(graph.size);
  demand.forEach((record, utilityId) => {
    if (!graph.has(utilityId)) {
      issues.push({ code: "UNKNOWN_UTILITY", utilityId, message: `Demand references unknown utility ${utilityId}` });
      return;
    }
    const total = record.process + record.fixed;
    if (!Number.isFinite(total) || record.process < 0 || record.fixed < 0) {
      issues.push({
        code: "INVALID_DEMAND",
        utilityId,
        message: `Demand for ${utilityId} must be finite and non-negative (process ${record.process}, fixed ${record.fixed})`,
      });
      return;
    }
    seed[graph.indexOf(utilityId)] = total;
  });
  if (issues.length > 0) {
    throw new ValidationError(issues);
  }
  return seed;
}

/**
 * Availability and coefficients are fixed for the whole resolution, so rerouting weights
 * and formula inputs are worked out once before iterating.
 */
function planConsumers(input: ResolveInput, warnings: BalanceWarning[]): ConsumerPlan[] {
  const { graph, availability, coefficients } = input;
  const missingReported = new Set<UtilityId>();

  return graph.utilities.map((consumer, consumerIdx) => {
    const shares = graph.distributionSharesAt(consumerIdx);
    const available = shares.filter((s) => {
      const asset = availability.assetForUtility(s.supplierId);
      if (asset && !asset.hasRecord && !missingReported.has(s.supplierId)) {
        missingReported.add(s.supplierId);
        warnings.push({
          code: "MISSING_AVAILABILITY",
          severity: "warning",
          utilityId: s.supplierId,
          assetId: asset.assetId,
          message: `${asset.assetName} has no availability record for period ${input.periodId}; treated as unavailable`,
        });
      }
      return availability.isAvailable(s.supplierId);
    });
    const weight = available.reduce((sum, s) => sum + s.share, 0);
    const distribution: DistributionStep[] =
      weight > 0
        ? available.map((s) => ({ normId: s.normId, supplierIndex: s.supplierIndex, share: s.share / weight }))
        : [];

    const conversions: ConversionStep[] = [];
    for (const link of graph.suppliersAt(consumerIdx)) {
      if (link.normType !== "CONVERSION") continue;
      if (link.factor.kind === "plain") {
        conversions.push({ normId: link.normId, supplierIndex: link.supplierIndex, kind: "plain", factor: link.factor.factor });
        continue;
      }
      const coeffs = coefficients.get(link.factor.assetId);
      if (coeffs) {
        conversions.push({
          normId: link.normId,
          supplierIndex: link.supplierIndex,
          kind: "formula",
          formulaId: link.factor.formulaId,
          assetId: link.factor.assetId,
          coefficients: coeffs,
        });
        continue;
      }
      if (link.factor.fallbackFactor === null) {
        throw new MissingCoefficientsError(link.factor.assetId, link.factor.formulaId);
      }
      warnings.push({
        code: "FORMULA_FALLBACK",
        severity: "warning",
        utilityId: consumer.id,
        assetId: link.factor.assetId,
        message: `No ${link.factor.formulaId} coefficients for asset ${link.factor.assetId}; ${consumer.name} -> ${link.supplierId} uses the plain factor ${link.factor.fallbackFactor}`,
      });
      conversions.push({ normId: link.normId, supplierIndex: link.supplierIndex, kind: "plain", factor: link.factor.fallbackFactor });
    }

    return { distribution, unserved: shares.length > 0 && distribution.length === 0, conversions };
  });
}

function contribution(step: ConversionStep, quantity: number, evaluator: FormulaEvaluator): number {
  if (step.kind === "plain") return step.factor * quantity;
  return evaluator.compute(step.formulaId, quantity, step.coefficients).requirement;
}

function propagate(
  graph: NormsGraph,
  plans: readonly ConsumerPlan[],
  seed: Float64Array,
  q: Float64Array,
  evaluator: FormulaEvaluator,
): PassResult {
  const gross = Float64Array.from(seed);
  const credits = new Float64Array(graph.size);

  for (let c = 0; c < plans.length; c++) {
    const quantity = q[c];
    if (quantity <= 0) continue;
    const plan = plans[c];

    if (plan.unserved) {
      throw new NoAvailableSupplierError(graph.utilities[c].id, toQuantityMap(graph, q));
    }
    for (const step of plan.distribution) {
      gross[step.supplierIndex] += step.share * quantity;
    }
    for (const step of plan.conversions) {
      const amount = contribution(step, quantity, evaluator);
      if (amount >= 0) gross[step.supplierIndex] += amount;
      else credits[step.supplierIndex] -= amount;
    }
  }

  const next = new Float64Array(graph.size);
  const net = new Float64Array(graph.size);
  for (let u = 0; u < graph.size; u++) {
    net[u] = gross[u] - credits[u];
    next[u] = net[u] > 0 ? net[u] : 0;
  }
  return { next, net };
}

function collectFlows(
  graph: NormsGraph,
  plans: readonly ConsumerPlan[],
  q: Float64Array,
  evaluator: FormulaEvaluator,
): { flows: NormFlow[]; formulaResults: FormulaEvaluationRecord[] } {
  const flows: NormFlow[] = [];
  const formulaResults: FormulaEvaluationRecord[] = [];

  graph.utilities.forEach((consumer, c) => {
    const plan = plans[c];
    const quantity = q[c];
    const applied = new Map(plan.distribution.map((s) => [s.normId, s.share]));

    for (const share of graph.distributionSharesAt(c)) {
      const effectiveShare = applied.get(share.normId) ?? 0;
      flows.push({
        normId: share.normId,
        consumerId: consumer.id,
        supplierId: share.supplierId,
        normType: "DISTRIBUTION",
        quantity: effectiveShare * quantity,
        norm: effectiveShare,
        effectiveShare,
      });
    }

    for (const step of plan.conversions) {
      const supplierId = graph.utilities[step.supplierIndex].id;
      if (step.kind === "plain") {
        flows.push({
          normId: step.normId,
          consumerId: consumer.id,
          supplierId,
          normType: "CONVERSION",
          quantity: step.factor * quantity,
          norm: step.factor,
        });
        continue;
      }
      const result = evaluator.evaluate(step.formulaId, quantity, step.coefficients);
      formulaResults.push({
        normId: step.normId,
        consumerId: consumer.id,
        supplierId,
        formulaId: step.formulaId,
        assetId: step.assetId,
        generation: quantity,
        result,
      });
      flows.push({
        normId: step.normId,
        consumerId: consumer.id,
        supplierId,
        normType: "CONVERSION",
        quantity: result.requirement,
        norm: result.norm,
        formulaId: step.formulaId,
      });
    }
  });

  return { flows, formulaResults };
}

function checkAssets(
  input: ResolveInput,
  options: ResolveOptions,
  q: Float64Array,
  warnings: BalanceWarning[],
): { loads: AssetLoad[]; violations: CapacityViolation[] } {
  const { graph, availability } = input;
  const loads: AssetLoad[] = [];
  const violations: CapacityViolation[] = [];

  for (const entry of availability.assets) {
    const asset = entry.steamAsset;
    if (!asset || !entry.utilityId || !graph.has(entry.utilityId)) continue;

    const quantity = q[graph.indexOf(entry.utilityId)];
    const capacity = asset.maxCapacity * entry.operationalHours;
    const minimumLoad = asset.minCapacity * entry.operationalHours;

    loads.push({
      assetId: asset.id,
      assetName: asset.name,
      assetType: asset.type,
      utilityId: entry.utilityId,
      priority: asset.priority,
      isAvailable: entry.isAvailable,
      operationalHours: entry.operationalHours,
      quantity,
      minimumLoad,
      capacity,
      utilization: capacity > 0 ? quantity / capacity : null,
    });

    if (quantity > capacity + options.tolerance) {
      violations.push({
        assetId: asset.id,
        assetName: asset.name,
        utilityId: entry.utilityId,
        required: quantity,
        capacity,
        shortfall: quantity - capacity,
      });
    } else if (entry.isAvailable && quantity > 0 && quantity < minimumLoad - options.tolerance) {
      warnings.push({
        code: "BELOW_MINIMUM_LOAD",
        severity: "info",
        utilityId: entry.utilityId,
        assetId: asset.id,
        message: `${asset.name} is loaded at ${quantity} against a minimum of ${minimumLoad} for the period`,
      });
    }
  }

  loads.sort((a, b) => a.priority - b.priority || a.assetName.localeCompare(b.assetName));
  return { loads, violations };
}

export function resolveBalance(input: ResolveInput): BalanceResolution {
  const options: ResolveOptions = { ...DEFAULT_RESOLVE_OPTIONS, ...input.options };
  const { graph, evaluator } = input;
  const warnings: BalanceWarning[] = [];

  for (const zero of graph.zeroResiduals) {
    warnings.push({
      code: "ZERO_RESIDUAL_FACTOR",
      severity: "warning",
      utilityId: zero.supplierId,
      message: `Derived share of ${zero.supplierId} in ${zero.consumerId} is zero because the other factors already sum to 1; check norm ${zero.normId}`,
    });
  }

  const seed = seedVector(graph, input.demand);
  const plans = planConsumers(input, warnings);

  let q = Float64Array.from(seed);
  let net = Float64Array.from(seed);
  let iterations = 0;
  let maxDelta = Number.POSITIVE_INFINITY;
  let maxDeltaIdx = -1;

  while (maxDelta >= options.tolerance) {
    if (iterations >= options.maxIterations) {
      const culprit = maxDeltaIdx >= 0 ? graph.utilities[maxDeltaIdx].id : null;
      throw new ConvergenceError(toQuantityMap(graph, q), culprit, maxDelta, iterations);
    }

    const pass = propagate(graph, plans, seed, q, evaluator);
    iterations++;

    maxDelta = 0;
    maxDeltaIdx = -1;
    for (let u = 0; u < graph.size; u++) {
      const delta = Math.abs(pass.next[u] - q[u]);
      // the clamp turns NaN into 0, so divergence shows on the unclamped value
      if (!Number.isFinite(pass.net[u]) || Number.isNaN(delta)) {
        throw new ConvergenceError(toQuantityMap(graph, q), graph.utilities[u].id, Number.POSITIVE_INFINITY, iterations, "quantities diverged");
      }
      if (delta > maxDelta) {
        maxDelta = delta;
        maxDeltaIdx = u;
      }
    }
    q = pass.next;
    net = pass.net;
  }

  net.forEach((value, u) => {
    if (value < -options.tolerance) {
      const utility = graph.utilities[u];
      warnings.push({
        code: "NEGATIVE_REQUIREMENT",
        severity: "warning",
        utilityId: utility.id,
        message: `${utility.name} credits exceed its gross requirement by ${-value}; requirement clamped to 0`,
      });
    }
  });

  const quantities = toQuantityMap(graph, q);
  const { loads, violations } = checkAssets(input, options, q, warnings);
  if (options.capacityCheck && violations.length > 0) {
    throw new CapacityExceededError(violations, quantities);
  }
  for (const v of violations) {
    warnings.push({
      code: "CAPACITY_EXCEEDED",
      severity: "warning",
      utilityId: v.utilityId,
      assetId: v.assetId,
      message: `${v.assetName} needs ${v.required} against a capacity of ${v.capacity} (short by ${v.shortfall}); capacity check is off, requirement not capped`,
    });
  }

  const { flows, formulaResults } = collectFlows(graph, plans, q, evaluator);

  return {
    periodId: input.periodId,
    quantities,
    iterations,
    maxDelta,
    flows,
    formulaResults,
    assetLoads: loads,
    warnings,
  };
}

/** Same as resolveBalance, with balance failures returned instead of thrown. */
export function tryResolveBalance(input: ResolveInput): ResolveOutcome {
  try {
    return { ok: true, value: resolveBalance(input) };
  } catch (error) {
    if (error instanceof BalanceError) {
      return { ok: false, error };
    }
    throw error;
  }
}
