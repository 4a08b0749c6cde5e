import { eq, asc, and, inArray } from "drizzle-orm";
import { drizzle } from "drizzle-orm/node-postgres";
import pg from "pg";
import {
  plantMaster,
  accountTypeMaster,
  utilityMaster,
  utilityNorms,
  powerGenerationAssets,
  steamGenerationAssets,
  assetAvailability,
  steamRequirement,
  heatRateCoefficients,
  normFormulaBindings,
  referenceNorms,
  balanceConfig,
  type Plant,
  type AccountType,
  type Utility,
  type UtilityNorm,
  type PowerAsset,
  type SteamAsset,
  type AssetAvailability,
  type SteamRequirement,
  type HeatRateCoefficient,
  type NormFormulaBinding,
  type ReferenceNorm,
  type BalanceConfigEntry,
  type DemandEntry,
} from "@shared/schema";

const pool = new pg.Pool({
  connectionString: process.env.DATABASE_URL,
});

export const db = drizzle(pool);

export interface IStorage {
  // Master data
  getPlants(): Promise<Plant[]>;
  getAccountTypes(): Promise<AccountType[]>;
  getUtilities(): Promise<Utility[]>;
  getNorms(): Promise<UtilityNorm[]>;
  getPowerAssets(): Promise<PowerAsset[]>;
  getSteamAssets(): Promise<SteamAsset[]>;
  getFormulaBindings(): Promise<NormFormulaBinding[]>;
  getReferenceNorms(): Promise<ReferenceNorm[]>;

  // Period inputs
  getAvailability(periodId: string): Promise<AssetAvailability[]>;
  getDemand(periodId: string): Promise<SteamRequirement[]>;
  upsertDemand(periodId: string, entries: DemandEntry[]): Promise<SteamRequirement[]>;
  getHeatRateCoefficients(periodId: string): Promise<HeatRateCoefficient[]>;

  // Balance config
  getAllBalanceConfig(): Promise<BalanceConfigEntry[]>;
  getBalanceConfig(key: string): Promise<BalanceConfigEntry | undefined>;
  upsertBalanceConfig(key: string, value: unknown, description?: string): Promise<BalanceConfigEntry>;
}

export class DatabaseStorage implements IStorage {
  // Master data
  async getPlants(): Promise<Plant[]> {
    return db.select().from(plantMaster).orderBy(asc(plantMaster.plantCode));
  }

  async getAccountTypes(): Promise<AccountType[]> {
    return db.select().from(accountTypeMaster).orderBy(asc(accountTypeMaster.accountTypeName));
  }

  async getUtilities(): Promise<Utility[]> {
    return db.select().from(utilityMaster).orderBy(asc(utilityMaster.utilityName));
  }

  async getNorms(): Promise<UtilityNorm[]> {
    return db.select().from(utilityNorms).orderBy(asc(utilityNorms.sortOrder), asc(utilityNorms.createdAt));
  }

  async getPowerAssets(): Promise<PowerAsset[]> {
    return db.select().from(powerGenerationAssets).orderBy(asc(powerGenerationAssets.assetName));
  }

  async getSteamAssets(): Promise<SteamAsset[]> {
    return db
      .select()
      .from(steamGenerationAssets)
      .orderBy(asc(steamGenerationAssets.priority), asc(steamGenerationAssets.assetName));
  }

  async getFormulaBindings(): Promise<NormFormulaBinding[]> {
    return db.select().from(normFormulaBindings);
  }

  async getReferenceNorms(): Promise<ReferenceNorm[]> {
    return db.select().from(referenceNorms);
  }

  // Period inputs
  async getAvailability(periodId: string): Promise<AssetAvailability[]> {
    return db.select().from(assetAvailability).where(eq(assetAvailability.financialYearMonthId, periodId));
  }

  async getDemand(periodId: string): Promise<SteamRequirement[]> {
    return db
      .select()
      .from(steamRequirement)
      .where(eq(steamRequirement.financialYearMonthId, periodId))
      .orderBy(asc(steamRequirement.createdAt));
  }

  async upsertDemand(periodId: string, entries: DemandEntry[]): Promise<SteamRequirement[]> {
    return db.transaction(async (tx) => {
      await tx.delete(steamRequirement).where(
        and(
          eq(steamRequirement.financialYearMonthId, periodId),
          inArray(
            steamRequirement.utilityId,
            entries.map((e) => e.utilityId),
          ),
        ),
      );
      return tx
        .insert(steamRequirement)
        .values(
          entries.map((e) => ({
            financialYearMonthId: periodId,
            utilityId: e.utilityId,
            processRequirement: String(e.processRequirement),
            fixedRequirement: String(e.fixedRequirement),
          })),
        )
        .returning();
    });
  }

  async getHeatRateCoefficients(periodId: string): Promise<HeatRateCoefficient[]> {
    return db.select().from(heatRateCoefficients).where(eq(heatRateCoefficients.financialYearMonthId, periodId));
  }

  // Balance config
  async getAllBalanceConfig(): Promise<BalanceConfigEntry[]> {
    return db.select().from(balanceConfig).orderBy(asc(balanceConfig.configKey));
  }

  async getBalanceConfig(key: string): Promise<BalanceConfigEntry | undefined> {
    const result = await db.select().from(balanceConfig).where(eq(balanceConfig.configKey, key));
    return result[0];
  }

  async upsertBalanceConfig(key: string, value: unknown, description?: string): Promise<BalanceConfigEntry> {
    const result = await db
      .insert(balanceConfig)
      .values({ configKey: key, configValue: value, description })
      .onConflictDoUpdate({
        target: balanceConfig.configKey,
        set: { configValue: value, ...(description !== undefined ? { description } : {}), updatedAt: new Date() },
      })
      .returning();
    return result[0];
  }
}

export const storage = new DatabaseStorage();
