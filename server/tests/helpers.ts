import type {
  AvailabilityRecord,
  FormulaBinding,
  NormSnapshot,
  SteamAssetSnapshot,
  UtilitySnapshot,
} from "../services/balanceTypes";

let normSeq = 0;

export function makeUtility(id: string, overrides: Partial<UtilitySnapshot> = {}): UtilitySnapshot {
  return {
    id,
    code: null,
    name: id,
    uom: "MT",
    plantId: null,
    type: "STEAM",
    isDistribution: false,
    isActive: true,
    ...overrides,
  };
}

export function distribution(consumerId: string, supplierId: string, factor: number | null, id?: string): NormSnapshot {
  normSeq++;
  return {
    id: id ?? `norm-${normSeq}`,
    consumerId,
    supplierId,
    normType: "DISTRIBUTION",
    factor,
    isActive: true,
  };
}

export function conversion(consumerId: string, supplierId: string, factor: number | null, id?: string): NormSnapshot {
  normSeq++;
  return {
    id: id ?? `norm-${normSeq}`,
    consumerId,
    supplierId,
    normType: "CONVERSION",
    factor,
    isActive: true,
  };
}

export function binding(consumerId: string, supplierId: string, assetId: string, formulaId = "gt-net-fuel"): FormulaBinding {
  return { consumerId, supplierId, formulaId, assetId };
}

export function makeSteamAsset(id: string, overrides: Partial<SteamAssetSnapshot> = {}): SteamAssetSnapshot {
  return {
    id,
    name: id.toUpperCase(),
    type: "HRSG",
    steamType: "SHP",
    utilityId: null,
    minCapacity: 0,
    maxCapacity: 136,
    efficiency: 1.03,
    linkedPowerAssetId: null,
    isAlwaysAvailable: false,
    priority: 1,
    ...overrides,
  };
}

export function available(assetId: string, operationalHours = 720): AvailabilityRecord {
  return { assetId, isAvailable: true, operationalHours };
}

export function unavailable(assetId: string): AvailabilityRecord {
  return { assetId, isAvailable: false, operationalHours: 0 };
}
