import { db } from "./storage";
import { loadPlantData } from "./plant-data";
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
} from "@shared/schema";

export async function seedDatabase() {
  try {
    // Check if we already have data
    const existingPlants = await db.select().from(plantMaster).limit(1);
    if (existingPlants.length > 0) {
      console.log("Database already seeded, skipping...");
      return;
    }

    console.log("Seeding database with plant master data...");
    const data = loadPlantData();

    await db.transaction(async (tx) => {
      await tx.insert(plantMaster).values(
        data.plants.map((p) => ({ plantId: p.id, plantCode: p.code, plantName: p.name, description: p.description })),
      );

      await tx.insert(accountTypeMaster).values(
        data.accountTypes.map((a) => ({ accountTypeId: a.id, accountTypeName: a.name, description: a.description })),
      );

      await tx.insert(utilityMaster).values(
        data.utilities.map((u) => ({
          utilityId: u.id,
          utilityCode: u.code,
          utilityName: u.name,
          uom: u.uom,
          plantId: u.plantId,
          utilityType: u.type,
          isDistribution: u.isDistribution,
          isActive: u.isActive,
        })),
      );

      await tx.insert(utilityNorms).values(
        data.norms.map((n, idx) => ({
          normId: n.id,
          consumerUtilityId: n.consumerId,
          supplierUtilityId: n.supplierId,
          accountTypeId: n.accountTypeId,
          normFactor: n.factor === null ? null : String(n.factor),
          normType: n.normType,
          description: n.description,
          isActive: n.isActive,
          sortOrder: idx,
        })),
      );

      await tx.insert(powerGenerationAssets).values(
        data.powerAssets.map((a) => ({
          assetId: a.id,
          assetName: a.name,
          utilityId: a.utilityId,
          capacityMw: a.capacityMw === null ? null : String(a.capacityMw),
        })),
      );

      await tx.insert(steamGenerationAssets).values(
        data.steamAssets.map((a) => ({
          assetId: a.id,
          assetName: a.name,
          assetType: a.type,
          steamType: a.steamType,
          utilityId: a.utilityId,
          minCapacityMt: String(a.minCapacity),
          maxCapacityMt: String(a.maxCapacity),
          efficiency: String(a.efficiency),
          linkedPowerAssetId: a.linkedPowerAssetId,
          isAlwaysAvailable: a.isAlwaysAvailable,
          priority: a.priority,
        })),
      );

      await tx.insert(normFormulaBindings).values(
        data.formulaBindings.map((b) => ({
          consumerUtilityId: b.consumerId,
          supplierUtilityId: b.supplierId,
          formulaId: b.formulaId,
          assetId: b.assetId,
        })),
      );

      await tx.insert(referenceNorms).values(
        data.referenceNorms.map((r) => ({
          consumerUtilityId: r.consumerId,
          supplierUtilityId: r.supplierId,
          referenceFactor: String(r.factor),
          description: r.description,
        })),
      );

      for (const period of data.periods) {
        await tx.insert(assetAvailability).values(
          period.availability.map((a) => ({
            financialYearMonthId: period.periodId,
            assetId: a.assetId,
            isAvailable: a.isAvailable,
            operationalHours: String(a.operationalHours),
          })),
        );
        await tx.insert(steamRequirement).values(
          period.demand.map((d) => ({
            financialYearMonthId: period.periodId,
            utilityId: d.utilityId,
            processRequirement: String(d.processRequirement),
            fixedRequirement: String(d.fixedRequirement),
          })),
        );
        await tx.insert(heatRateCoefficients).values(
          period.heatRates.map((h) => ({
            financialYearMonthId: period.periodId,
            assetId: h.assetId,
            heatRate: String(h.heatRate),
            freeSteamFactor: String(h.freeSteamFactor),
          })),
        );
      }

      await tx.insert(balanceConfig).values(
        data.balanceConfig.map((c) => ({ configKey: c.key, configValue: c.value, description: c.description })),
      );
    });

    console.log(
      `Seeded ${data.plants.length} plants, ${data.utilities.length} utilities, ${data.norms.length} norms, ${data.periods.length} periods`,
    );
  } catch (error) {
    console.error("Error seeding database:", error);
    throw error;
  }
}

