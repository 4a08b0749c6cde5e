import { describe, it, expect } from "vitest";
import ExcelJS from "exceljs";
import { NormsGraph } from "../services/normsGraph";
import { buildAvailabilityView } from "../services/availability";
import { createDefaultFormulaEvaluator } from "../services/formulaEvaluator";
import { resolveBalance } from "../services/balanceResolver";
import { aggregateBalance } from "../services/resultAggregator";
import { exportBalanceExcel } from "../services/exportService";
import type { DemandRecord } from "../services/balanceTypes";
import { conversion, distribution, makeUtility } from "./helpers";

function sampleReport() {
  const graph = NormsGraph.build({
    utilities: [
      makeUtility("lp-dis", { name: "LP Steam Dis", isDistribution: true }),
      makeUtility("lp-prds", { name: "LP Steam PRDS" }),
      makeUtility("bfw", { name: "BFW", type: "WATER", uom: "M3" }),
    ],
    norms: [distribution("lp-dis", "lp-prds", 1, "n-prds"), conversion("lp-prds", "bfw", 0.25, "n-bfw")],
  });
  const demand = new Map<string, DemandRecord>([["lp-dis", { process: 900, fixed: 100 }]]);
  const resolution = resolveBalance({
    graph,
    demand,
    availability: buildAvailabilityView({ periodId: "FY2025-04", steamAssets: [], records: [] }),
    evaluator: createDefaultFormulaEvaluator(),
    coefficients: new Map(),
    periodId: "FY2025-04",
  });
  return aggregateBalance(graph, demand, resolution, [
    { consumerId: "lp-dis", supplierId: "lp-prds", factor: 1 },
    { consumerId: "lp-prds", supplierId: "bfw", factor: 0.2 },
  ]);
}

async function readBack(buffer: Buffer): Promise<ExcelJS.Workbook> {
  const wb = new ExcelJS.Workbook();
  await wb.xlsx.load(buffer);
  return wb;
}

describe("exportBalanceExcel", () => {
  it("writes the summary, balance, norm and warning sheets", async () => {
    const wb = await readBack(await exportBalanceExcel(sampleReport(), "April 2025"));

    expect(wb.worksheets.map((ws) => ws.name)).toEqual(["Summary", "Utility Balance", "Norm Comparison", "Warnings"]);
    expect(wb.creator).toBe("Utility Balance Engine");

    const summary = wb.getWorksheet("Summary");
    expect(summary?.getCell("A1").value).toBe("Utility Balance - April 2025");
    expect(summary?.getCell("B3").value).toBe("FY2025-04");
  });

  it("writes one row per utility", async () => {
    const wb = await readBack(await exportBalanceExcel(sampleReport(), "April 2025"));
    const ws = wb.getWorksheet("Utility Balance");

    expect(ws?.getRow(3).values).toEqual([undefined, "LP Steam Dis", "STEAM", "MT", 900, 100, 0, 1000]);
    expect(ws?.getRow(5).values).toEqual([undefined, "BFW", "WATER", "M3", 0, 0, 250, 250]);
    expect(ws?.getCell("G5").numFmt).toBe("#,##0.000");
  });

  it("highlights mismatched norms", async () => {
    const wb = await readBack(await exportBalanceExcel(sampleReport(), "April 2025"));
    const ws = wb.getWorksheet("Norm Comparison");

    expect(ws?.getCell("G3").value).toBe("MATCH");
    expect(ws?.getCell("G4").value).toBe("MISMATCH");
    expect(ws?.getCell("G4").font.color?.argb).toBe("FFC00000");
    expect(ws?.getCell("C4").value).toBe("CONVERSION");
  });

  it("writes a placeholder row when there are no warnings", async () => {
    const wb = await readBack(await exportBalanceExcel(sampleReport(), "April 2025"));

    expect(wb.getWorksheet("Warnings")?.getCell("A3").value).toBe("None");
  });
});
