import type { NormType, SteamAssetType, UtilityType } from "@shared/schema";

export type UtilityId = string;
export type AssetId = string;

/**
 * Read-only inputs to a single resolution. Everything the resolver sees is one of these
 * snapshots; none of them is mutated once a resolution has started.
 */
export interface UtilitySnapshot {
  id: UtilityId;
  code: string | null;
  name: string;
  uom: string;
  plantId: string | null;
  type: UtilityType;
  isDistribution: boolean;
  isActive: boolean;
}

export interface NormSnapshot {
  id: string;
  consumerId: UtilityId;
  supplierId: UtilityId;
  normType: NormType;
  factor: number | null;
  isActive: boolean;
  accountTypeId?: string | null;
  description?: string | null;
}

export interface FormulaBinding {
  consumerId: UtilityId;
  supplierId: UtilityId;
  formulaId: string;
  assetId: AssetId;
}

export interface SteamAssetSnapshot {
  id: AssetId;
  name: string;
  type: SteamAssetType;
  steamType: string | null;
  utilityId: UtilityId | null;
  minCapacity: number;
  maxCapacity: number;
  efficiency: number;
  linkedPowerAssetId: AssetId | null;
  isAlwaysAvailable: boolean;
  priority: number;
}

export interface AvailabilityRecord {
  assetId: AssetId;
  isAvailable: boolean;
  operationalHours: number;
}

export interface DemandRecord {
  process: number;
  fixed: number;
}

export interface FormulaCoefficients {
  heatRate: number;
  freeSteamFactor: number;
}

export interface ReferenceNormSnapshot {
  consumerId: UtilityId;
  supplierId: UtilityId;
  factor: number;
  description?: string | null;
}

export type WarningCode =
  | "MISSING_AVAILABILITY"
  | "NEGATIVE_REQUIREMENT"
  | "ZERO_RESIDUAL_FACTOR"
  | "FORMULA_FALLBACK"
  | "BELOW_MINIMUM_LOAD"
  | "CAPACITY_EXCEEDED";

export interface BalanceWarning {
  code: WarningCode;
  message: string;
  severity: "warning" | "info";
  utilityId?: UtilityId;
  assetId?: AssetId;
}

export interface ResolveOptions {
  /** Largest per-utility change between passes that still counts as converged. */
  tolerance: number;
  maxIterations: number;
  capacityCheck: boolean;
}

export const DEFAULT_RESOLVE_OPTIONS: ResolveOptions = {
  tolerance: 1e-6,
  maxIterations: 1000,
  capacityCheck: true,
};
