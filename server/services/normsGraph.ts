/**
 * In-memory norms graph for one resolution run.
 *
 * Utilities live in an arena addressed by integer index; edges are stored per consumer
 * index in source order, so back-edges (BFW -> LP steam -> PRDS -> BFW) need no owned
 * references. The graph is validated once on construction and is immutable afterwards.
 */
import type { AssetId, FormulaBinding, NormSnapshot, UtilityId, UtilitySnapshot } from "./balanceTypes";
import { ValidationError, type GraphIssue } from "./balanceErrors";

export type DistributionFactor = { kind: "fixed"; value: number } | { kind: "residual" };

export type ConversionFactor =
  | { kind: "plain"; factor: number }
  | { kind: "formula"; formulaId: string; assetId: AssetId; fallbackFactor: number | null };

export type SupplierLink =
  | {
      normId: string;
      normType: "DISTRIBUTION";
      supplierId: UtilityId;
      supplierIndex: number;
      factor: DistributionFactor;
      description: string | null;
    }
  | {
      normId: string;
      normType: "CONVERSION";
      supplierId: UtilityId;
      supplierIndex: number;
      factor: ConversionFactor;
      description: string | null;
    };

export interface DistributionShare {
  normId: string;
  supplierId: UtilityId;
  supplierIndex: number;
  share: number;
  derived: boolean;
}

export interface GraphSnapshot {
  utilities: readonly UtilitySnapshot[];
  norms: readonly NormSnapshot[];
  formulaBindings?: readonly FormulaBinding[];
}

export interface GraphBuildOptions {
  /** Tolerance on distribution factor sums. */
  epsilon?: number;
  /** Formula ids the evaluator knows; bindings to anything else are rejected. */
  knownFormulas?: readonly string[];
}

export const DEFAULT_DISTRIBUTION_EPSILON = 1e-4;

function bindingKey(consumerId: UtilityId, supplierId: UtilityId): string {
  return `${consumerId}\u0000${supplierId}`;
}

export class NormsGraph {
  readonly utilities: readonly UtilitySnapshot[];
  /** Residual factors that derived to zero; surfaced as warnings by the resolver. */
  readonly zeroResiduals: readonly { consumerId: UtilityId; supplierId: UtilityId; normId: string }[];

  private readonly indexById: ReadonlyMap<UtilityId, number>;
  private readonly links: readonly (readonly SupplierLink[])[];
  private readonly shares: readonly (readonly DistributionShare[])[];

  private constructor(
    utilities: readonly UtilitySnapshot[],
    indexById: ReadonlyMap<UtilityId, number>,
    links: readonly (readonly SupplierLink[])[],
    shares: readonly (readonly DistributionShare[])[],
    zeroResiduals: readonly { consumerId: UtilityId; supplierId: UtilityId; normId: string }[],
  ) {
    this.utilities = utilities;
    this.indexById = indexById;
    this.links = links;
    this.shares = shares;
    this.zeroResiduals = zeroResiduals;
  }

  static build(snapshot: GraphSnapshot, options: GraphBuildOptions = {}): NormsGraph {
    const epsilon = options.epsilon ?? DEFAULT_DISTRIBUTION_EPSILON;
    const issues: GraphIssue[] = [];

    const utilities = snapshot.utilities.map((u) => ({ ...u }));
    const indexById = new Map<UtilityId, number>();
    utilities.forEach((u, idx) => {
      if (indexById.has(u.id)) {
        issues.push({ code: "DUPLICATE_UTILITY", utilityId: u.id, message: `Utility ${u.id} (${u.name}) appears more than once` });
        return;
      }
      indexById.set(u.id, idx);
    });

    const bindings = new Map<string, FormulaBinding>();
    for (const b of snapshot.formulaBindings ?? []) {
      if (options.knownFormulas && !options.knownFormulas.includes(b.formulaId)) {
        issues.push({
          code: "UNKNOWN_FORMULA",
          utilityId: b.consumerId,
          message: `Formula "${b.formulaId}" bound to ${b.consumerId} -> ${b.supplierId} is not registered`,
        });
        continue;
      }
      bindings.set(bindingKey(b.consumerId, b.supplierId), b);
    }
    const usedBindings = new Set<string>();

    const links: SupplierLink[][] = utilities.map(() => []);

    const checkRef = (id: UtilityId, norm: NormSnapshot): number | undefined => {
      const idx = indexById.get(id);
      if (idx === undefined) {
        issues.push({ code: "UNKNOWN_UTILITY", utilityId: id, normId: norm.id, message: `Norm ${norm.id} references unknown utility ${id}` });
        return undefined;
      }
      if (!utilities[idx].isActive) {
        issues.push({
          code: "INACTIVE_UTILITY",
          utilityId: id,
          normId: norm.id,
          message: `Norm ${norm.id} references inactive utility ${utilities[idx].name}`,
        });
        return undefined;
      }
      return idx;
    };

    for (const norm of snapshot.norms) {
      if (!norm.isActive) continue;

      const consumerIdx = checkRef(norm.consumerId, norm);
      const supplierIdx = checkRef(norm.supplierId, norm);
      if (consumerIdx === undefined || supplierIdx === undefined) continue;

      if (consumerIdx === supplierIdx) {
        issues.push({ code: "SELF_REFERENCE", utilityId: norm.consumerId, normId: norm.id, message: `Norm ${norm.id} makes ${norm.consumerId} supply itself` });
        continue;
      }

      const description = norm.description ?? null;

      if (norm.normType === "DISTRIBUTION") {
        if (norm.factor !== null && norm.factor < 0) {
          issues.push({
            code: "NEGATIVE_DISTRIBUTION_FACTOR",
            utilityId: norm.consumerId,
            normId: norm.id,
            message: `Distribution norm ${norm.id} has negative factor ${norm.factor}`,
          });
          continue;
        }
        links[consumerIdx].push({
          normId: norm.id,
          normType: "DISTRIBUTION",
          supplierId: norm.supplierId,
          supplierIndex: supplierIdx,
          factor: norm.factor === null ? { kind: "residual" } : { kind: "fixed", value: norm.factor },
          description,
        });
        continue;
      }

      const key = bindingKey(norm.consumerId, norm.supplierId);
      const binding = bindings.get(key);
      if (binding) {
        usedBindings.add(key);
        links[consumerIdx].push({
          normId: norm.id,
          normType: "CONVERSION",
          supplierId: norm.supplierId,
          supplierIndex: supplierIdx,
          factor: { kind: "formula", formulaId: binding.formulaId, assetId: binding.assetId, fallbackFactor: norm.factor },
          description,
        });
        continue;
      }
      if (norm.factor === null) {
        issues.push({
          code: "MISSING_CONVERSION_FACTOR",
          utilityId: norm.consumerId,
          normId: norm.id,
          message: `Conversion norm ${norm.id} (${norm.consumerId} -> ${norm.supplierId}) has no factor and no formula`,
        });
        continue;
      }
      links[consumerIdx].push({
        normId: norm.id,
        normType: "CONVERSION",
        supplierId: norm.supplierId,
        supplierIndex: supplierIdx,
        factor: { kind: "plain", factor: norm.factor },
        description,
      });
    }

    bindings.forEach((b, key) => {
      if (!usedBindings.has(key)) {
        issues.push({
          code: "UNBOUND_FORMULA_EDGE",
          utilityId: b.consumerId,
          message: `Formula "${b.formulaId}" is bound to ${b.consumerId} -> ${b.supplierId} but no active conversion norm joins them`,
        });
      }
    });

    const shares: DistributionShare[][] = utilities.map(() => []);
    const zeroResiduals: { consumerId: UtilityId; supplierId: UtilityId; normId: string }[] = [];

    links.forEach((consumerLinks, consumerIdx) => {
      const consumer = utilities[consumerIdx];
      let knownSum = 0;
      let residualCount = 0;
      let hasDistribution = false;
      for (const link of consumerLinks) {
        if (link.normType !== "DISTRIBUTION") continue;
        hasDistribution = true;
        if (link.factor.kind === "fixed") knownSum += link.factor.value;
        else residualCount++;
      }
      if (!hasDistribution) return;

      if (residualCount > 1) {
        issues.push({
          code: "MULTIPLE_RESIDUAL_FACTORS",
          utilityId: consumer.id,
          message: `${consumer.name} has ${residualCount} distribution norms without a factor; at most one may be derived`,
        });
        return;
      }
      if (knownSum > 1 + epsilon) {
        issues.push({
          code: "DISTRIBUTION_FACTOR_OVERFLOW",
          utilityId: consumer.id,
          message: `Distribution factors of ${consumer.name} sum to ${knownSum}, more than 1`,
        });
        return;
      }
      if (residualCount === 0 && knownSum < 1 - epsilon) {
        issues.push({
          code: "DISTRIBUTION_FACTOR_UNDERFLOW",
          utilityId: consumer.id,
          message: `Distribution factors of ${consumer.name} sum to ${knownSum}, less than 1`,
        });
        return;
      }

      const residual = Math.max(0, 1 - knownSum);
      for (const link of consumerLinks) {
        if (link.normType !== "DISTRIBUTION") continue;
        const derived = link.factor.kind === "residual";
        const share = link.factor.kind === "fixed" ? link.factor.value : residual;
        if (derived && share <= epsilon) {
          zeroResiduals.push({ consumerId: consumer.id, supplierId: link.supplierId, normId: link.normId });
        }
        shares[consumerIdx].push({
          normId: link.normId,
          supplierId: link.supplierId,
          supplierIndex: link.supplierIndex,
          share: derived && share <= epsilon ? 0 : share,
          derived,
        });
      }
    });

    if (issues.length > 0) {
      throw new ValidationError(issues);
    }

    return new NormsGraph(utilities, indexById, links, shares, zeroResiduals);
  }

  get size(): number {
    return this.utilities.length;
  }

  has(id: UtilityId): boolean {
    return this.indexById.has(id);
  }

  indexOf(id: UtilityId): number {
    const idx = this.indexById.get(id);
    if (idx === undefined) {
      throw new Error(`Unknown utility ${id}`);
    }
    return idx;
  }

  utility(id: UtilityId): UtilitySnapshot {
    return this.utilities[this.indexOf(id)];
  }

  suppliersOf(consumerId: UtilityId): readonly SupplierLink[] {
    return this.links[this.indexOf(consumerId)];
  }

  suppliersAt(consumerIndex: number): readonly SupplierLink[] {
    return this.links[consumerIndex];
  }

  /** Distribution shares with the residual factor resolved, in source order. */
  distributionSharesOf(consumerId: UtilityId): readonly DistributionShare[] {
    return this.shares[this.indexOf(consumerId)];
  }

  distributionSharesAt(consumerIndex: number): readonly DistributionShare[] {
    return this.shares[consumerIndex];
  }

  isFormulaDriven(consumerId: UtilityId, supplierId?: UtilityId): boolean {
    return this.suppliersOf(consumerId).some(
      (link) =>
        link.normType === "CONVERSION" &&
        link.factor.kind === "formula" &&
        (supplierId === undefined || link.supplierId === supplierId),
    );
  }
}
