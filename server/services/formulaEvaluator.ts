import type { FormulaCoefficients } from "./balanceTypes";
import { FormulaError } from "./balanceErrors";

// Gas turbine net fuel: NET MMBTU = GROSS MMBTU - FREE STEAM MMBTU
//   GROSS      = KWH × HeatRate (KCAL/KWH) × 3.96567 / 1,000,000
//   FREE STEAM = KWH × FreeSteamFactor × 760.87 × 3.96567 / 1,000,000
export const KCAL_TO_BTU = 3.96567;
export const BTU_PER_MMBTU = 1_000_000;
export const SHP_ENTHALPY_KCAL_KG = 810;
export const HRSG_INLET_ENTHALPY_KCAL_KG = 110;
export const HRSG_EFFICIENCY = 0.92;
// (810 - 110) / 0.92, rounded the way the plant's heat-rate sheets carry it
export const FREE_STEAM_ENERGY_KCAL_KG = 760.87;

export const GT_NET_FUEL = "gt-net-fuel";

export interface FormulaResult {
  /** Supplier quantity required for the given generation (e.g. net MMBTU). */
  requirement: number;
  /** requirement per unit of generation; 0 when generation is 0 */
  norm: number;
  breakdown: Record<string, number>;
}

export type FormulaFn = (generation: number, coefficients: FormulaCoefficients) => FormulaResult;

export function gasTurbineNetFuel(kwh: number, coefficients: FormulaCoefficients): FormulaResult {
  const { heatRate, freeSteamFactor } = coefficients;
  if (kwh <= 0) {
    return {
      requirement: 0,
      norm: 0,
      breakdown: { grossEnergy: 0, freeSteam: 0, netEnergy: 0, heatRate, freeSteamFactor },
    };
  }

  const grossEnergy = (kwh * heatRate * KCAL_TO_BTU) / BTU_PER_MMBTU;
  const freeSteam = (kwh * freeSteamFactor * FREE_STEAM_ENERGY_KCAL_KG * KCAL_TO_BTU) / BTU_PER_MMBTU;
  const netEnergy = grossEnergy - freeSteam;

  return {
    requirement: netEnergy,
    norm: netEnergy / kwh,
    breakdown: { grossEnergy, freeSteam, netEnergy, heatRate, freeSteamFactor },
  };
}

/**
 * Named registry of physical formulas that stand in for a plain conversion factor.
 * Formulas must be pure; the resolver calls them once per edge per pass.
 */
export class FormulaEvaluator {
  private readonly formulas = new Map<string, FormulaFn>();

  register(id: string, fn: FormulaFn): this {
    if (this.formulas.has(id)) {
      throw new FormulaError(`Formula "${id}" is already registered`);
    }
    this.formulas.set(id, fn);
    return this;
  }

  has(id: string): boolean {
    return this.formulas.has(id);
  }

  ids(): string[] {
    return Array.from(this.formulas.keys());
  }

  /**
   * Runs a formula without checking its output. The resolver uses this inside the
   * iteration, where a non-finite requirement means the quantities diverged.
   */
  compute(id: string, generation: number, coefficients: FormulaCoefficients): FormulaResult {
    const fn = this.formulas.get(id);
    if (!fn) {
      throw new FormulaError(`Unknown formula "${id}"`);
    }
    return fn(generation, coefficients);
  }

  evaluate(id: string, generation: number, coefficients: FormulaCoefficients): FormulaResult {
    const result = this.compute(id, generation, coefficients);
    if (!Number.isFinite(result.requirement)) {
      throw new FormulaError(`Formula "${id}" produced a non-finite requirement for generation ${generation}`);
    }
    return result;
  }
}

export function createDefaultFormulaEvaluator(): FormulaEvaluator {
  return new FormulaEvaluator().register(GT_NET_FUEL, gasTurbineNetFuel);
}
