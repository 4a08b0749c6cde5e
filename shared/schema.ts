/**
 * Shared data model for the utility norms balance application.
 * This schema defines the master-data tables (plants, utilities, norms, assets)
 * and the per-period inputs (availability, demand, heat-rate coefficients) that the
 * balance engine reads as immutable snapshots. It is the single source of truth
 * for the database structure and the request payloads accepted by the API.
 */

import { sql } from "drizzle-orm";
import { pgTable, text, varchar, timestamp, jsonb, boolean, numeric, integer } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const UTILITY_TYPES = ["STEAM", "POWER", "WATER", "GAS", "RAW_MATERIAL", "CHEMICAL", "BY_PRODUCT"] as const;
export type UtilityType = (typeof UTILITY_TYPES)[number];

export const NORM_TYPES = ["DISTRIBUTION", "CONVERSION"] as const;
export type NormType = (typeof NORM_TYPES)[number];

export const STEAM_ASSET_TYPES = ["HRSG", "STG", "PRDS"] as const;
export type SteamAssetType = (typeof STEAM_ASSET_TYPES)[number];

/**
 * Plant Master table: physical plants or locations that own utilities
 * (power plants, utility plant, distribution header, raw material sources).
 */
export const plantMaster = pgTable("plant_master", {
  plantId: varchar("plant_id").primaryKey().default(sql`gen_random_uuid()`),
  plantCode: varchar("plant_code", { length: 50 }).notNull(),
  plantName: varchar("plant_name", { length: 100 }).notNull(),
  description: varchar("description", { length: 255 }),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const insertPlantSchema = createInsertSchema(plantMaster).omit({ createdAt: true });
export type InsertPlant = z.infer<typeof insertPlantSchema>;
export type Plant = typeof plantMaster.$inferSelect;

/**
 * Account Type Master table: input categories used to group norm lines
 * (Utilities, Raw Material, Catalyst & Chemical, By Product, ...).
 */
export const accountTypeMaster = pgTable("account_type_master", {
  accountTypeId: varchar("account_type_id").primaryKey().default(sql`gen_random_uuid()`),
  accountTypeName: varchar("account_type_name", { length: 100 }).notNull(),
  description: varchar("description", { length: 255 }),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const insertAccountTypeSchema = createInsertSchema(accountTypeMaster).omit({ createdAt: true });
export type InsertAccountType = z.infer<typeof insertAccountTypeSchema>;
export type AccountType = typeof accountTypeMaster.$inferSelect;

/**
 * Utility Master table: every steam grade, power node, water, gas, fuel and chemical.
 * Distribution utilities (e.g. "LP Steam_Dis") are the demand-side aggregation points
 * that split their total across suppliers.
 */
export const utilityMaster = pgTable("utility_master", {
  utilityId: varchar("utility_id").primaryKey().default(sql`gen_random_uuid()`),
  utilityCode: varchar("utility_code", { length: 50 }),
  utilityName: varchar("utility_name", { length: 100 }).notNull(),
  uom: varchar("uom", { length: 20 }).notNull(),
  plantId: varchar("plant_id").references(() => plantMaster.plantId),
  utilityType: varchar("utility_type", { length: 50 }).$type<UtilityType>().notNull(),
  isDistribution: boolean("is_distribution").default(false).notNull(),
  isActive: boolean("is_active").default(true).notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const insertUtilitySchema = createInsertSchema(utilityMaster, {
  utilityType: z.enum(UTILITY_TYPES),
}).omit({ createdAt: true });
export type InsertUtility = z.infer<typeof insertUtilitySchema>;
export type Utility = typeof utilityMaster.$inferSelect;

/**
 * Utility Norms table: consumer utility requires supplier utility.
 * DISTRIBUTION rows give the supplier's share of the consumer's demand (a null factor is the
 * residual share); CONVERSION rows give supplier quantity per unit of consumer, negative
 * factors being by-product credits. sortOrder preserves the source insertion order.
 */
export const utilityNorms = pgTable("utility_norms", {
  normId: varchar("norm_id").primaryKey().default(sql`gen_random_uuid()`),
  consumerUtilityId: varchar("consumer_utility_id").notNull().references(() => utilityMaster.utilityId),
  supplierUtilityId: varchar("supplier_utility_id").notNull().references(() => utilityMaster.utilityId),
  accountTypeId: varchar("account_type_id").references(() => accountTypeMaster.accountTypeId),
  normFactor: numeric("norm_factor", { precision: 18, scale: 6 }),
  normType: varchar("norm_type", { length: 50 }).$type<NormType>().notNull(),
  description: varchar("description", { length: 255 }),
  isActive: boolean("is_active").default(true).notNull(),
  sortOrder: integer("sort_order").default(0).notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const insertNormSchema = createInsertSchema(utilityNorms, {
  normType: z.enum(NORM_TYPES),
}).omit({ createdAt: true });
export type InsertNorm = z.infer<typeof insertNormSchema>;
export type UtilityNorm = typeof utilityNorms.$inferSelect;

/**
 * Power Generation Assets table: gas turbines and the STG generator.
 * HRSG availability is inherited from the linked gas turbine.
 */
export const powerGenerationAssets = pgTable("power_generation_assets", {
  assetId: varchar("asset_id").primaryKey().default(sql`gen_random_uuid()`),
  assetName: varchar("asset_name", { length: 100 }).notNull(),
  utilityId: varchar("utility_id").references(() => utilityMaster.utilityId),
  capacityMw: numeric("capacity_mw", { precision: 18, scale: 6 }),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const insertPowerAssetSchema = createInsertSchema(powerGenerationAssets).omit({ createdAt: true });
export type InsertPowerAsset = z.infer<typeof insertPowerAssetSchema>;
export type PowerAsset = typeof powerGenerationAssets.$inferSelect;

/**
 * Steam Generation Assets table: HRSG, STG and PRDS units with capacity bounds (MT/hr).
 * STG and PRDS are always available; HRSGs follow their linked power asset.
 */
export const steamGenerationAssets = pgTable("steam_generation_assets", {
  assetId: varchar("asset_id").primaryKey().default(sql`gen_random_uuid()`),
  assetName: varchar("asset_name", { length: 100 }).notNull(),
  assetType: varchar("asset_type", { length: 50 }).$type<SteamAssetType>().notNull(),
  steamType: varchar("steam_type", { length: 50 }),
  utilityId: varchar("utility_id").references(() => utilityMaster.utilityId),
  minCapacityMt: numeric("min_capacity_mt", { precision: 18, scale: 6 }),
  maxCapacityMt: numeric("max_capacity_mt", { precision: 18, scale: 6 }),
  efficiency: numeric("efficiency", { precision: 18, scale: 6 }),
  linkedPowerAssetId: varchar("linked_power_asset_id").references(() => powerGenerationAssets.assetId),
  isAlwaysAvailable: boolean("is_always_available").default(false).notNull(),
  priority: integer("priority").default(1).notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const insertSteamAssetSchema = createInsertSchema(steamGenerationAssets, {
  assetType: z.enum(STEAM_ASSET_TYPES),
}).omit({ createdAt: true });
export type InsertSteamAsset = z.infer<typeof insertSteamAssetSchema>;
export type SteamAsset = typeof steamGenerationAssets.$inferSelect;

/**
 * Asset Availability table: per financial-year-month availability of power assets.
 */
export const assetAvailability = pgTable("asset_availability", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  financialYearMonthId: varchar("financial_year_month_id").notNull(),
  assetId: varchar("asset_id").notNull(),
  isAvailable: boolean("is_available").default(false).notNull(),
  operationalHours: numeric("operational_hours", { precision: 18, scale: 6 }),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const insertAvailabilitySchema = createInsertSchema(assetAvailability).omit({ id: true, createdAt: true });
export type InsertAvailability = z.infer<typeof insertAvailabilitySchema>;
export type AssetAvailability = typeof assetAvailability.$inferSelect;

/**
 * Steam Requirement table: monthly process and fixed demand for the top-level utilities.
 */
export const steamRequirement = pgTable("steam_requirement", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  financialYearMonthId: varchar("financial_year_month_id").notNull(),
  utilityId: varchar("utility_id").notNull().references(() => utilityMaster.utilityId),
  processRequirement: numeric("process_requirement", { precision: 18, scale: 6 }).default("0").notNull(),
  fixedRequirement: numeric("fixed_requirement", { precision: 18, scale: 6 }).default("0").notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const insertRequirementSchema = createInsertSchema(steamRequirement).omit({ id: true, createdAt: true });
export type InsertRequirement = z.infer<typeof insertRequirementSchema>;
export type SteamRequirement = typeof steamRequirement.$inferSelect;

/**
 * Heat Rate Coefficients table: per-period heat rate (KCAL/KWH) and free steam factor
 * for each gas turbine, consumed by the gas-turbine net fuel formula.
 */
export const heatRateCoefficients = pgTable("heat_rate_coefficients", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  financialYearMonthId: varchar("financial_year_month_id").notNull(),
  assetId: varchar("asset_id").notNull().references(() => powerGenerationAssets.assetId),
  heatRate: numeric("heat_rate", { precision: 18, scale: 6 }).notNull(),
  freeSteamFactor: numeric("free_steam_factor", { precision: 18, scale: 6 }).notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const insertHeatRateSchema = createInsertSchema(heatRateCoefficients).omit({ id: true, createdAt: true });
export type InsertHeatRate = z.infer<typeof insertHeatRateSchema>;
export type HeatRateCoefficient = typeof heatRateCoefficients.$inferSelect;

/**
 * Norm Formula Bindings table: marks a conversion norm as formula-driven.
 * The resolver evaluates formulaId with the coefficients of assetId instead of the plain factor.
 */
export const normFormulaBindings = pgTable("norm_formula_bindings", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  consumerUtilityId: varchar("consumer_utility_id").notNull().references(() => utilityMaster.utilityId),
  supplierUtilityId: varchar("supplier_utility_id").notNull().references(() => utilityMaster.utilityId),
  formulaId: varchar("formula_id", { length: 50 }).notNull(),
  assetId: varchar("asset_id").notNull(),
});

export const insertFormulaBindingSchema = createInsertSchema(normFormulaBindings).omit({ id: true });
export type InsertFormulaBinding = z.infer<typeof insertFormulaBindingSchema>;
export type NormFormulaBinding = typeof normFormulaBindings.$inferSelect;

/**
 * Reference Norms table: benchmark factors the report compares effective norms against.
 */
export const referenceNorms = pgTable("reference_norms", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  consumerUtilityId: varchar("consumer_utility_id").notNull().references(() => utilityMaster.utilityId),
  supplierUtilityId: varchar("supplier_utility_id").notNull().references(() => utilityMaster.utilityId),
  referenceFactor: numeric("reference_factor", { precision: 18, scale: 7 }).notNull(),
  description: varchar("description", { length: 255 }),
});

export const insertReferenceNormSchema = createInsertSchema(referenceNorms).omit({ id: true });
export type InsertReferenceNorm = z.infer<typeof insertReferenceNormSchema>;
export type ReferenceNorm = typeof referenceNorms.$inferSelect;

/**
 * Balance Config table: solver settings editable at runtime (tolerance, iteration cap, ...).
 */
export const balanceConfig = pgTable("balance_config", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  configKey: text("config_key").notNull().unique(),
  configValue: jsonb("config_value").notNull(),
  description: text("description"),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

export const insertBalanceConfigSchema = createInsertSchema(balanceConfig).omit({ id: true, updatedAt: true });
export type InsertBalanceConfig = z.infer<typeof insertBalanceConfigSchema>;
export type BalanceConfigEntry = typeof balanceConfig.$inferSelect;

// ---------------------------------------------------------------------------
// API payloads
// ---------------------------------------------------------------------------

export const demandEntrySchema = z.object({
  utilityId: z.string().min(1),
  processRequirement: z.number().finite().nonnegative(),
  fixedRequirement: z.number().finite().nonnegative(),
});
export type DemandEntry = z.infer<typeof demandEntrySchema>;

export const demandUpdateSchema = z.object({
  entries: z.array(demandEntrySchema).min(1),
});

export const balanceRunRequestSchema = z.object({
  tolerance: z.number().positive().optional(),
  maxIterations: z.number().int().positive().max(100_000).optional(),
  capacityCheck: z.boolean().optional(),
  demand: z.array(demandEntrySchema).optional(),
});
export type BalanceRunRequest = z.infer<typeof balanceRunRequestSchema>;

export const fullYearRunRequestSchema = z.object({
  // starting year: 2025 runs April 2025 to March 2026
  financialYear: z.number().int().min(2000).max(2100),
  capacityCheck: z.boolean().optional(),
});
export type FullYearRunRequest = z.infer<typeof fullYearRunRequestSchema>;
