import type { AssetId, UtilityId } from "./balanceTypes";

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "CONVERGENCE_ERROR"
  | "CAPACITY_EXCEEDED"
  | "NO_AVAILABLE_SUPPLIER"
  | "MISSING_COEFFICIENTS"
  | "FORMULA_ERROR";

export class BalanceError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;

  constructor(code: ErrorCode, message: string, statusCode = 422) {
    super(message);
    this.name = "BalanceError";
    this.code = code;
    this.statusCode = statusCode;
  }

  toJSON(): Record<string, unknown> {
    return { error: this.message, code: this.code };
  }
}

/**
 * Best-known quantities at the point a resolution aborted. Never authoritative:
 * callers may inspect them for diagnosis but must not report them as a balance.
 */
export interface PartialQuantities {
  authoritative: false;
  quantities: ReadonlyMap<UtilityId, number>;
}

function partial(quantities: ReadonlyMap<UtilityId, number>): PartialQuantities {
  return { authoritative: false, quantities };
}

export type GraphIssueCode =
  | "DUPLICATE_UTILITY"
  | "UNKNOWN_UTILITY"
  | "INACTIVE_UTILITY"
  | "SELF_REFERENCE"
  | "DISTRIBUTION_FACTOR_OVERFLOW"
  | "DISTRIBUTION_FACTOR_UNDERFLOW"
  | "MULTIPLE_RESIDUAL_FACTORS"
  | "NEGATIVE_DISTRIBUTION_FACTOR"
  | "MISSING_CONVERSION_FACTOR"
  | "UNKNOWN_FORMULA"
  | "UNBOUND_FORMULA_EDGE"
  | "INVALID_DEMAND";

export interface GraphIssue {
  code: GraphIssueCode;
  message: string;
  utilityId?: UtilityId;
  normId?: string;
}

export class ValidationError extends BalanceError {
  public readonly issues: readonly GraphIssue[];

  constructor(issues: readonly GraphIssue[]) {
    const head = issues[0]?.message ?? "invalid norms graph or demand";
    const more = issues.length > 1 ? ` (+${issues.length - 1} more)` : "";
    super("VALIDATION_ERROR", `Balance inputs are invalid: ${head}${more}`, 400);
    this.name = "ValidationError";
    this.issues = issues;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), details: { issues: this.issues } };
  }
}

export class ConvergenceError extends BalanceError {
  public readonly partial: PartialQuantities;
  public readonly maxDeltaUtilityId: UtilityId | null;
  public readonly maxDelta: number;
  public readonly iterations: number;

  constructor(
    quantities: ReadonlyMap<UtilityId, number>,
    maxDeltaUtilityId: UtilityId | null,
    maxDelta: number,
    iterations: number,
    reason = "iteration cap exceeded",
  ) {
    super(
      "CONVERGENCE_ERROR",
      `Balance did not converge after ${iterations} iterations (${reason}); largest change ${maxDelta} on ${maxDeltaUtilityId ?? "n/a"}`,
    );
    this.name = "ConvergenceError";
    this.partial = partial(quantities);
    this.maxDeltaUtilityId = maxDeltaUtilityId;
    this.maxDelta = maxDelta;
    this.iterations = iterations;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: {
        maxDeltaUtilityId: this.maxDeltaUtilityId,
        maxDelta: this.maxDelta,
        iterations: this.iterations,
        authoritative: false,
        quantities: Object.fromEntries(this.partial.quantities),
      },
    };
  }
}

export interface CapacityViolation {
  assetId: AssetId;
  assetName: string;
  utilityId: UtilityId;
  required: number;
  capacity: number;
  shortfall: number;
}

export class CapacityExceededError extends BalanceError {
  public readonly violations: readonly CapacityViolation[];
  public readonly partial: PartialQuantities;

  constructor(violations: readonly CapacityViolation[], quantities: ReadonlyMap<UtilityId, number>) {
    const names = violations.map((v) => `${v.assetName} short by ${v.shortfall}`).join(", ");
    super("CAPACITY_EXCEEDED", `Resolved requirement exceeds asset capacity: ${names}`);
    this.name = "CapacityExceededError";
    this.violations = violations;
    this.partial = partial(quantities);
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: {
        violations: this.violations,
        authoritative: false,
        quantities: Object.fromEntries(this.partial.quantities),
      },
    };
  }
}

export class NoAvailableSupplierError extends BalanceError {
  public readonly consumerId: UtilityId;
  public readonly partial: PartialQuantities;

  constructor(consumerId: UtilityId, quantities: ReadonlyMap<UtilityId, number>) {
    super("NO_AVAILABLE_SUPPLIER", `No available supplier can carry the demand of ${consumerId}`);
    this.name = "NoAvailableSupplierError";
    this.consumerId = consumerId;
    this.partial = partial(quantities);
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: {
        consumerId: this.consumerId,
        authoritative: false,
        quantities: Object.fromEntries(this.partial.quantities),
      },
    };
  }
}

export class MissingCoefficientsError extends BalanceError {
  public readonly assetId: AssetId;

  constructor(assetId: AssetId, formulaId: string) {
    super("MISSING_COEFFICIENTS", `Formula ${formulaId} needs coefficients for asset ${assetId} and none were supplied`);
    this.name = "MissingCoefficientsError";
    this.assetId = assetId;
  }
}

export class FormulaError extends BalanceError {
  constructor(message: string) {
    super("FORMULA_ERROR", message, 400);
    this.name = "FormulaError";
  }
}
