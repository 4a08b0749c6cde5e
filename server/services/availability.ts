import type { AssetId, AvailabilityRecord, SteamAssetSnapshot, UtilityId } from "./balanceTypes";

export const DEFAULT_MONTHLY_HOURS = 720;

export interface PowerAssetSnapshot {
  id: AssetId;
  name: string;
  utilityId: UtilityId | null;
}

export interface AssetAvailabilityEntry {
  assetId: AssetId;
  assetName: string;
  kind: "STEAM" | "POWER";
  utilityId: UtilityId | null;
  isAvailable: boolean;
  operationalHours: number;
  /** false when neither the asset nor its linked power asset had a record for the period */
  hasRecord: boolean;
  steamAsset: SteamAssetSnapshot | null;
}

export interface AvailabilityView {
  readonly periodId: string;
  readonly assets: readonly AssetAvailabilityEntry[];
  isAvailable(assetOrUtilityId: string): boolean;
  operationalHours(assetOrUtilityId: string): number;
  hasRecord(assetOrUtilityId: string): boolean;
  assetForUtility(utilityId: UtilityId): AssetAvailabilityEntry | undefined;
}

export interface AvailabilityInput {
  periodId: string;
  steamAssets: readonly SteamAssetSnapshot[];
  powerAssets?: readonly PowerAssetSnapshot[];
  records: readonly AvailabilityRecord[];
  defaultOperationalHours?: number;
}

/**
 * Builds the per-period availability lookup.
 *
 * HRSGs mirror their linked power asset; STG and PRDS are always available and run the
 * default monthly hours unless a record for the asset itself overrides them. Assets
 * without any record are unavailable. Utilities with no backing asset are always available.
 */
export function buildAvailabilityView(input: AvailabilityInput): AvailabilityView {
  const defaultHours = input.defaultOperationalHours ?? DEFAULT_MONTHLY_HOURS;
  const recordByAsset = new Map<AssetId, AvailabilityRecord>();
  for (const r of input.records) {
    recordByAsset.set(r.assetId, r);
  }

  const entries: AssetAvailabilityEntry[] = [];

  for (const asset of input.powerAssets ?? []) {
    const record = recordByAsset.get(asset.id);
    entries.push({
      assetId: asset.id,
      assetName: asset.name,
      kind: "POWER",
      utilityId: asset.utilityId,
      isAvailable: record?.isAvailable ?? false,
      operationalHours: record?.isAvailable ? record.operationalHours : 0,
      hasRecord: record !== undefined,
      steamAsset: null,
    });
  }

  for (const asset of input.steamAssets) {
    const own = recordByAsset.get(asset.id);
    if (asset.isAlwaysAvailable) {
      entries.push({
        assetId: asset.id,
        assetName: asset.name,
        kind: "STEAM",
        utilityId: asset.utilityId,
        isAvailable: true,
        operationalHours: own?.operationalHours ?? defaultHours,
        hasRecord: true,
        steamAsset: asset,
      });
      continue;
    }
    const record = asset.linkedPowerAssetId ? recordByAsset.get(asset.linkedPowerAssetId) : own;
    entries.push({
      assetId: asset.id,
      assetName: asset.name,
      kind: "STEAM",
      utilityId: asset.utilityId,
      isAvailable: record?.isAvailable ?? false,
      operationalHours: record?.isAvailable ? record.operationalHours : 0,
      hasRecord: record !== undefined,
      steamAsset: asset,
    });
  }

  const byAsset = new Map<AssetId, AssetAvailabilityEntry>();
  const byUtility = new Map<UtilityId, AssetAvailabilityEntry>();
  for (const entry of entries) {
    Object.freeze(entry);
    byAsset.set(entry.assetId, entry);
    // a steam asset wins over a power asset mapped to the same utility
    if (entry.utilityId && (entry.kind === "STEAM" || !byUtility.has(entry.utilityId))) {
      byUtility.set(entry.utilityId, entry);
    }
  }

  const lookup = (id: string): AssetAvailabilityEntry | undefined => byAsset.get(id) ?? byUtility.get(id);

  return Object.freeze({
    periodId: input.periodId,
    assets: Object.freeze(entries),
    isAvailable: (id: string) => lookup(id)?.isAvailable ?? true,
    operationalHours: (id: string) => lookup(id)?.operationalHours ?? defaultHours,
    hasRecord: (id: string) => lookup(id)?.hasRecord ?? true,
    assetForUtility: (utilityId: UtilityId) => byUtility.get(utilityId),
  });
}
