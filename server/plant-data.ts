import fs from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";
import { NORM_TYPES, STEAM_ASSET_TYPES, UTILITY_TYPES } from "@shared/schema";

export const PLANT_DATA_PATH = fileURLToPath(new URL("../data/utility-norms.json", import.meta.url));

const plantSchema = z.object({
  id: z.string(),
  code: z.string(),
  name: z.string(),
  description: z.string().nullable(),
});

const accountTypeSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullable(),
});

const utilitySchema = z.object({
  id: z.string(),
  code: z.string().nullable(),
  name: z.string(),
  uom: z.string(),
  plantId: z.string().nullable(),
  type: z.enum(UTILITY_TYPES),
  isDistribution: z.boolean(),
  isActive: z.boolean().default(true),
});

const normSchema = z.object({
  id: z.string(),
  consumerId: z.string(),
  supplierId: z.string(),
  accountTypeId: z.string().nullable(),
  factor: z.number().nullable(),
  normType: z.enum(NORM_TYPES),
  description: z.string().nullable(),
  isActive: z.boolean().default(true),
});

const powerAssetSchema = z.object({
  id: z.string(),
  name: z.string(),
  utilityId: z.string().nullable(),
  capacityMw: z.number().nullable(),
});

const steamAssetSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.enum(STEAM_ASSET_TYPES),
  steamType: z.string().nullable(),
  utilityId: z.string().nullable(),
  minCapacity: z.number(),
  maxCapacity: z.number(),
  efficiency: z.number(),
  linkedPowerAssetId: z.string().nullable(),
  isAlwaysAvailable: z.boolean(),
  priority: z.number().int(),
});

const formulaBindingSchema = z.object({
  consumerId: z.string(),
  supplierId: z.string(),
  formulaId: z.string(),
  assetId: z.string(),
});

const referenceNormSchema = z.object({
  consumerId: z.string(),
  supplierId: z.string(),
  factor: z.number(),
  description: z.string().nullable(),
});

const periodSchema = z.object({
  periodId: z.string(),
  label: z.string(),
  availability: z.array(
    z.object({ assetId: z.string(), isAvailable: z.boolean(), operationalHours: z.number().nonnegative() }),
  ),
  demand: z.array(
    z.object({
      utilityId: z.string(),
      processRequirement: z.number().nonnegative(),
      fixedRequirement: z.number().nonnegative(),
    }),
  ),
  heatRates: z.array(z.object({ assetId: z.string(), heatRate: z.number(), freeSteamFactor: z.number() })),
});

export const plantDataSchema = z.object({
  plants: z.array(plantSchema),
  accountTypes: z.array(accountTypeSchema),
  utilities: z.array(utilitySchema),
  norms: z.array(normSchema),
  powerAssets: z.array(powerAssetSchema),
  steamAssets: z.array(steamAssetSchema),
  formulaBindings: z.array(formulaBindingSchema),
  referenceNorms: z.array(referenceNormSchema),
  periods: z.array(periodSchema),
  balanceConfig: z.array(z.object({ key: z.string(), value: z.unknown(), description: z.string().nullable() })),
});

export type PlantData = z.infer<typeof plantDataSchema>;
export type PlantPeriod = z.infer<typeof periodSchema>;

/** Reads the bundled plant master data and sample periods. */
export function loadPlantData(filePath: string = PLANT_DATA_PATH): PlantData {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  return plantDataSchema.parse(raw);
}
