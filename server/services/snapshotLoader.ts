import type { IStorage } from "../storage";
import type {
  AssetId,
  AvailabilityRecord,
  DemandRecord,
  FormulaBinding,
  FormulaCoefficients,
  NormSnapshot,
  ReferenceNormSnapshot,
  SteamAssetSnapshot,
  UtilityId,
  UtilitySnapshot,
} from "./balanceTypes";
import { DEFAULT_MONTHLY_HOURS, type PowerAssetSnapshot } from "./availability";

/**
 * Everything one resolution reads, detached from the database rows it came from.
 */
export interface PeriodSnapshot {
  periodId: string;
  utilities: readonly UtilitySnapshot[];
  norms: readonly NormSnapshot[];
  formulaBindings: readonly FormulaBinding[];
  steamAssets: readonly SteamAssetSnapshot[];
  powerAssets: readonly PowerAssetSnapshot[];
  availability: readonly AvailabilityRecord[];
  demand: ReadonlyMap<UtilityId, DemandRecord>;
  coefficients: ReadonlyMap<AssetId, FormulaCoefficients>;
  referenceNorms: readonly ReferenceNormSnapshot[];
}

export interface SnapshotLoadOptions {
  /** Hours assumed for an available asset whose record leaves them blank. */
  defaultOperationalHours?: number;
}

export type SnapshotStorage = Pick<
  IStorage,
  | "getUtilities"
  | "getNorms"
  | "getFormulaBindings"
  | "getSteamAssets"
  | "getPowerAssets"
  | "getAvailability"
  | "getDemand"
  | "getHeatRateCoefficients"
  | "getReferenceNorms"
>;

// pg returns numeric columns as strings
function toNumber(value: string | null | undefined, fallback: number): number {
  if (value === null || value === undefined) return fallback;
  const n = Number.parseFloat(value);
  return Number.isFinite(n) ? n : fallback;
}

function toNullableNumber(value: string | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  const n = Number.parseFloat(value);
  return Number.isFinite(n) ? n : null;
}

export async function loadPeriodSnapshot(
  storage: SnapshotStorage,
  periodId: string,
  options: SnapshotLoadOptions = {},
): Promise<PeriodSnapshot> {
  const defaultHours = options.defaultOperationalHours ?? DEFAULT_MONTHLY_HOURS;

  const [utilityRows, normRows, bindingRows, steamRows, powerRows, availabilityRows, demandRows, coefficientRows, referenceRows] =
    await Promise.all([
      storage.getUtilities(),
      storage.getNorms(),
      storage.getFormulaBindings(),
      storage.getSteamAssets(),
      storage.getPowerAssets(),
      storage.getAvailability(periodId),
      storage.getDemand(periodId),
      storage.getHeatRateCoefficients(periodId),
      storage.getReferenceNorms(),
    ]);

  const utilities: UtilitySnapshot[] = utilityRows.map((u) => ({
    id: u.utilityId,
    code: u.utilityCode,
    name: u.utilityName,
    uom: u.uom,
    plantId: u.plantId,
    type: u.utilityType,
    isDistribution: u.isDistribution,
    isActive: u.isActive,
  }));

  const norms: NormSnapshot[] = [...normRows]
    .sort((a, b) => a.sortOrder - b.sortOrder)
    .map((n) => ({
      id: n.normId,
      consumerId: n.consumerUtilityId,
      supplierId: n.supplierUtilityId,
      normType: n.normType,
      factor: toNullableNumber(n.normFactor),
      isActive: n.isActive,
      accountTypeId: n.accountTypeId,
      description: n.description,
    }));

  const formulaBindings: FormulaBinding[] = bindingRows.map((b) => ({
    consumerId: b.consumerUtilityId,
    supplierId: b.supplierUtilityId,
    formulaId: b.formulaId,
    assetId: b.assetId,
  }));

  const steamAssets: SteamAssetSnapshot[] = steamRows.map((a) => ({
    id: a.assetId,
    name: a.assetName,
    type: a.assetType,
    steamType: a.steamType,
    utilityId: a.utilityId,
    minCapacity: toNumber(a.minCapacityMt, 0),
    maxCapacity: toNumber(a.maxCapacityMt, Number.POSITIVE_INFINITY),
    efficiency: toNumber(a.efficiency, 1),
    linkedPowerAssetId: a.linkedPowerAssetId,
    isAlwaysAvailable: a.isAlwaysAvailable,
    priority: a.priority,
  }));

  const powerAssets: PowerAssetSnapshot[] = powerRows.map((a) => ({
    id: a.assetId,
    name: a.assetName,
    utilityId: a.utilityId,
  }));

  const availability: AvailabilityRecord[] = availabilityRows.map((r) => ({
    assetId: r.assetId,
    isAvailable: r.isAvailable,
    operationalHours: toNumber(r.operationalHours, r.isAvailable ? defaultHours : 0),
  }));

  const demand = new Map<UtilityId, DemandRecord>();
  for (const row of demandRows) {
    const existing = demand.get(row.utilityId);
    const process = toNumber(row.processRequirement, 0);
    const fixed = toNumber(row.fixedRequirement, 0);
    demand.set(row.utilityId, existing ? { process: existing.process + process, fixed: existing.fixed + fixed } : { process, fixed });
  }

  const coefficients = new Map<AssetId, FormulaCoefficients>();
  for (const row of coefficientRows) {
    coefficients.set(row.assetId, {
      heatRate: toNumber(row.heatRate, 0),
      freeSteamFactor: toNumber(row.freeSteamFactor, 0),
    });
  }

  const referenceNorms: ReferenceNormSnapshot[] = referenceRows.map((r) => ({
    consumerId: r.consumerUtilityId,
    supplierId: r.supplierUtilityId,
    factor: toNumber(r.referenceFactor, 0),
    description: r.description,
  }));

  console.log(
    `Snapshot Loader: period ${periodId} - ${utilities.length} utilities, ${norms.length} norms, ${demand.size} demand lines, ${availability.length} availability records`,
  );

  return Object.freeze({
    periodId,
    utilities: Object.freeze(utilities),
    norms: Object.freeze(norms),
    formulaBindings: Object.freeze(formulaBindings),
    steamAssets: Object.freeze(steamAssets),
    powerAssets: Object.freeze(powerAssets),
    availability: Object.freeze(availability),
    demand,
    coefficients,
    referenceNorms: Object.freeze(referenceNorms),
  });
}
