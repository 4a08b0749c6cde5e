import { describe, it, expect } from "vitest";
import { NormsGraph } from "../services/normsGraph";
import { ValidationError } from "../services/balanceErrors";
import { binding, conversion, distribution, makeUtility } from "./helpers";

function captureValidation(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error("expected ValidationError");
}

const shpHeader = [
  makeUtility("shp-dis", { isDistribution: true }),
  makeUtility("hrsg1"),
  makeUtility("hrsg2"),
  makeUtility("hrsg3"),
];

// ---------------------------------------------------------------------------
// Distribution shares
// ---------------------------------------------------------------------------

describe("NormsGraph distribution shares", () => {
  it("derives the residual factor as one minus the known factors", () => {
    const graph = NormsGraph.build({
      utilities: shpHeader,
      norms: [
        distribution("shp-dis", "hrsg1", null),
        distribution("shp-dis", "hrsg2", 0.3),
        distribution("shp-dis", "hrsg3", 0.5),
      ],
    });

    const shares = graph.distributionSharesOf("shp-dis");
    expect(shares.map((s) => s.supplierId)).toEqual(["hrsg1", "hrsg2", "hrsg3"]);
    expect(shares[0].share).toBeCloseTo(0.2, 12);
    expect(shares[0].derived).toBe(true);
    expect(shares[1]).toMatchObject({ share: 0.3, derived: false });
    expect(graph.zeroResiduals).toEqual([]);
  });

  it("records a residual that derives to zero", () => {
    const graph = NormsGraph.build({
      utilities: shpHeader,
      norms: [
        distribution("shp-dis", "hrsg1", null, "n-hrsg1"),
        distribution("shp-dis", "hrsg2", 0.4934),
        distribution("shp-dis", "hrsg3", 0.5066),
      ],
    });

    expect(graph.distributionSharesOf("shp-dis")[0].share).toBe(0);
    expect(graph.zeroResiduals).toEqual([{ consumerId: "shp-dis", supplierId: "hrsg1", normId: "n-hrsg1" }]);
  });

  it("accepts factors that sum to one within epsilon", () => {
    const graph = NormsGraph.build({
      utilities: shpHeader.slice(0, 3),
      norms: [distribution("shp-dis", "hrsg1", 0.49995), distribution("shp-dis", "hrsg2", 0.5)],
    });

    expect(graph.distributionSharesOf("shp-dis")).toHaveLength(2);
  });

  it("keeps suppliers in insertion order and ignores inactive norms", () => {
    const inactive = { ...conversion("hrsg2", "hrsg3", 5), isActive: false };
    const graph = NormsGraph.build({
      utilities: shpHeader,
      norms: [conversion("hrsg1", "hrsg3", 2), inactive, conversion("hrsg1", "hrsg2", 1)],
    });

    expect(graph.suppliersOf("hrsg1").map((l) => l.supplierId)).toEqual(["hrsg3", "hrsg2"]);
    expect(graph.suppliersOf("hrsg2")).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Formula edges
// ---------------------------------------------------------------------------

describe("NormsGraph formula edges", () => {
  const utilities = [makeUtility("pp2", { type: "POWER", uom: "KWH" }), makeUtility("ng", { type: "RAW_MATERIAL", uom: "MMBTU" })];

  it("marks a bound conversion as formula driven and keeps its factor as fallback", () => {
    const graph = NormsGraph.build(
      { utilities, norms: [conversion("pp2", "ng", 0.0101)], formulaBindings: [binding("pp2", "ng", "gt2")] },
      { knownFormulas: ["gt-net-fuel"] },
    );

    const [link] = graph.suppliersOf("pp2");
    expect(link.normType).toBe("CONVERSION");
    expect(link.factor).toEqual({ kind: "formula", formulaId: "gt-net-fuel", assetId: "gt2", fallbackFactor: 0.0101 });
    expect(graph.isFormulaDriven("pp2")).toBe(true);
    expect(graph.isFormulaDriven("pp2", "ng")).toBe(true);
    expect(graph.isFormulaDriven("ng")).toBe(false);
  });

  it("allows a formula edge without a plain factor", () => {
    const graph = NormsGraph.build({
      utilities,
      norms: [conversion("pp2", "ng", null)],
      formulaBindings: [binding("pp2", "ng", "gt2")],
    });

    expect(graph.suppliersOf("pp2")[0].factor).toEqual({
      kind: "formula",
      formulaId: "gt-net-fuel",
      assetId: "gt2",
      fallbackFactor: null,
    });
  });

  it("rejects a binding to an unregistered formula", () => {
    const error = captureValidation(() =>
      NormsGraph.build(
        { utilities, norms: [conversion("pp2", "ng", 0.0101)], formulaBindings: [binding("pp2", "ng", "gt2", "steam-rate")] },
        { knownFormulas: ["gt-net-fuel"] },
      ),
    );

    expect(error.issues.map((i) => i.code)).toEqual(["UNKNOWN_FORMULA"]);
  });

  it("rejects a binding with no matching conversion norm", () => {
    const error = captureValidation(() =>
      NormsGraph.build({ utilities, norms: [], formulaBindings: [binding("pp2", "ng", "gt2")] }),
    );

    expect(error.issues.map((i) => i.code)).toEqual(["UNBOUND_FORMULA_EDGE"]);
  });
});

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe("NormsGraph validation", () => {
  it("rejects known factors that sum above one", () => {
    const error = captureValidation(() =>
      NormsGraph.build({
        utilities: shpHeader.slice(0, 3),
        norms: [distribution("shp-dis", "hrsg1", 0.6), distribution("shp-dis", "hrsg2", 0.6)],
      }),
    );

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatchObject({ code: "DISTRIBUTION_FACTOR_OVERFLOW", utilityId: "shp-dis" });
    expect(error.statusCode).toBe(400);
  });

  it("rejects fully specified factors that sum below one", () => {
    const error = captureValidation(() =>
      NormsGraph.build({
        utilities: shpHeader.slice(0, 3),
        norms: [distribution("shp-dis", "hrsg1", 0.4), distribution("shp-dis", "hrsg2", 0.4)],
      }),
    );

    expect(error.issues.map((i) => i.code)).toEqual(["DISTRIBUTION_FACTOR_UNDERFLOW"]);
  });

  it("rejects more than one residual factor", () => {
    const error = captureValidation(() =>
      NormsGraph.build({
        utilities: shpHeader,
        norms: [
          distribution("shp-dis", "hrsg1", null),
          distribution("shp-dis", "hrsg2", null),
          distribution("shp-dis", "hrsg3", 0.5),
        ],
      }),
    );

    expect(error.issues.map((i) => i.code)).toEqual(["MULTIPLE_RESIDUAL_FACTORS"]);
  });

  it("rejects a conversion norm with neither factor nor formula", () => {
    const error = captureValidation(() =>
      NormsGraph.build({ utilities: shpHeader.slice(1, 3), norms: [conversion("hrsg1", "hrsg2", null, "n-bfw")] }),
    );

    expect(error.issues[0]).toMatchObject({ code: "MISSING_CONVERSION_FACTOR", normId: "n-bfw" });
  });

  it("rejects references to unknown and inactive utilities", () => {
    const error = captureValidation(() =>
      NormsGraph.build({
        utilities: [makeUtility("bfw"), makeUtility("dm", { isActive: false })],
        norms: [conversion("bfw", "dm", 0.86), conversion("bfw", "power-dis", 9.5)],
      }),
    );

    expect(error.issues.map((i) => i.code)).toEqual(["INACTIVE_UTILITY", "UNKNOWN_UTILITY"]);
  });

  it("rejects self references, negative shares and duplicate utilities together", () => {
    const error = captureValidation(() =>
      NormsGraph.build({
        utilities: [makeUtility("a"), makeUtility("a"), makeUtility("b")],
        norms: [conversion("b", "b", 1), distribution("a", "b", -0.5)],
      }),
    );

    expect(error.issues.map((i) => i.code)).toEqual([
      "DUPLICATE_UTILITY",
      "SELF_REFERENCE",
      "NEGATIVE_DISTRIBUTION_FACTOR",
    ]);
    expect(error.message).toBe("Balance inputs are invalid: Utility a (a) appears more than once (+2 more)");
  });

  it("does not validate inactive norms", () => {
    const graph = NormsGraph.build({
      utilities: [makeUtility("a")],
      norms: [{ ...conversion("a", "missing", null), isActive: false }],
    });

    expect(graph.size).toBe(1);
  });

  it("throws for lookups of unknown utilities", () => {
    const graph = NormsGraph.build({ utilities: [makeUtility("a")], norms: [] });

    expect(graph.has("b")).toBe(false);
    expect(() => graph.indexOf("b")).toThrow("Unknown utility b");
  });
});
