import { z } from "zod";
import type { IStorage } from "./storage";

export const balanceSettingsSchema = z.object({
  tolerance: z.number().positive(),
  maxIterations: z.number().int().positive(),
  distributionEpsilon: z.number().nonnegative(),
  defaultOperationalHours: z.number().positive(),
});

export type BalanceSettings = z.infer<typeof balanceSettingsSchema>;
export type BalanceConfigKey = keyof BalanceSettings;

export const DEFAULT_BALANCE_SETTINGS: BalanceSettings = {
  tolerance: 1e-6,
  maxIterations: 1000,
  distributionEpsilon: 1e-4,
  defaultOperationalHours: 720,
};

export const BALANCE_CONFIG_KEYS = balanceSettingsSchema.keyof().options;

export function isBalanceConfigKey(key: string): key is BalanceConfigKey {
  return balanceSettingsSchema.keyof().safeParse(key).success;
}

/** Validates a value for one config key; returns the zod error message on failure. */
export function validateBalanceConfigValue(key: BalanceConfigKey, value: unknown): string | null {
  const result = balanceSettingsSchema.shape[key].safeParse(value);
  return result.success ? null : result.error.issues.map((i) => i.message).join("; ");
}

let cachedConfig = new Map<string, unknown>();
let cacheTimestamp = 0;
const CACHE_TTL_MS = 30000;

export async function getBalanceSettings(source: Pick<IStorage, "getAllBalanceConfig">): Promise<BalanceSettings> {
  const now = Date.now();
  if (now - cacheTimestamp > CACHE_TTL_MS) {
    try {
      const allConfigs = await source.getAllBalanceConfig();
      cachedConfig = new Map();
      for (const c of allConfigs) {
        cachedConfig.set(c.configKey, c.configValue);
      }
      cacheTimestamp = now;
    } catch (err) {
      console.error("Failed to load balance config from DB, using defaults:", err);
    }
  }

  const settings: BalanceSettings = { ...DEFAULT_BALANCE_SETTINGS };
  for (const key of BALANCE_CONFIG_KEYS) {
    if (!cachedConfig.has(key)) continue;
    const parsed = balanceSettingsSchema.shape[key].safeParse(cachedConfig.get(key));
    if (parsed.success) {
      settings[key] = parsed.data;
    } else {
      console.warn(`Balance Config: ignoring invalid value for "${key}", using default ${DEFAULT_BALANCE_SETTINGS[key]}`);
    }
  }
  return settings;
}

export function invalidateBalanceConfigCache() {
  cacheTimestamp = 0;
}
