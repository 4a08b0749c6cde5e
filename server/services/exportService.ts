import ExcelJS from "exceljs";
import type { BalanceReport } from "./resultAggregator";

const MB_HEADER_FILL: ExcelJS.FillPattern = { type: "pattern", pattern: "solid", fgColor: { argb: "FF323F4F" } };
const MB_HEADER_FONT: Partial<ExcelJS.Font> = { bold: true, color: { argb: "FFFFFFFF" }, size: 11 };
const MB_SECTION_FILL: ExcelJS.FillPattern = { type: "pattern", pattern: "solid", fgColor: { argb: "FF00B050" } };
const MB_SECTION_FONT: Partial<ExcelJS.Font> = { bold: true, color: { argb: "FFFFFFFF" }, size: 12 };
const MB_SUBSECTION_FILL: ExcelJS.FillPattern = { type: "pattern", pattern: "solid", fgColor: { argb: "FFD6DCE4" } };
const MB_SUBSECTION_FONT: Partial<ExcelJS.Font> = { bold: true, color: { argb: "FF323F4F" }, size: 11 };
const MB_BORDER_THIN: Partial<ExcelJS.Borders> = {
  top: { style: "thin", color: { argb: "FFCFD1D4" } },
  bottom: { style: "thin", color: { argb: "FFCFD1D4" } },
  left: { style: "thin", color: { argb: "FFCFD1D4" } },
  right: { style: "thin", color: { argb: "FFCFD1D4" } },
};
const MB_ALT_ROW_FILL: ExcelJS.FillPattern = { type: "pattern", pattern: "solid", fgColor: { argb: "FFE9E9EB" } };
const MB_MISMATCH_FONT: Partial<ExcelJS.Font> = { bold: true, color: { argb: "FFC00000" }, size: 10 };

const QTY_FMT = "#,##0.000";
const NORM_FMT = "0.0000000";
const PCT_FMT = "0.00";

function mbApplyTableHeaders(ws: ExcelJS.Worksheet, row: number, headers: string[], widths?: number[]): void {
  const r = ws.getRow(row);
  headers.forEach((h, i) => {
    const cell = r.getCell(i + 1);
    cell.value = h;
    cell.fill = MB_HEADER_FILL;
    cell.font = MB_HEADER_FONT;
    cell.alignment = { horizontal: "center", vertical: "middle", wrapText: true };
    cell.border = MB_BORDER_THIN;
  });
  r.height = 22;
  if (widths) {
    widths.forEach((w, i) => { ws.getColumn(i + 1).width = w; });
  }
}

function mbAddSectionTitle(ws: ExcelJS.Worksheet, row: number, title: string, colSpan: number): void {
  const r = ws.getRow(row);
  const cell = r.getCell(1);
  cell.value = title;
  cell.fill = MB_SECTION_FILL;
  cell.font = MB_SECTION_FONT;
  cell.alignment = { horizontal: "left", vertical: "middle" };
  for (let c = 2; c <= colSpan; c++) {
    const fc = r.getCell(c);
    fc.fill = MB_SECTION_FILL;
    fc.border = MB_BORDER_THIN;
  }
  if (colSpan > 1) ws.mergeCells(row, 1, row, colSpan);
  r.height = 26;
}

function mbAddSubsectionTitle(ws: ExcelJS.Worksheet, row: number, title: string, colSpan: number): void {
  const r = ws.getRow(row);
  const cell = r.getCell(1);
  cell.value = title;
  cell.fill = MB_SUBSECTION_FILL;
  cell.font = MB_SUBSECTION_FONT;
  cell.alignment = { horizontal: "left", vertical: "middle" };
  for (let c = 2; c <= colSpan; c++) {
    const fc = r.getCell(c);
    fc.fill = MB_SUBSECTION_FILL;
    fc.border = MB_BORDER_THIN;
  }
  if (colSpan > 1) ws.mergeCells(row, 1, row, colSpan);
  r.height = 22;
}

/** numFmts maps 0-based column index to an Excel number format */
function mbAddDataRow(
  ws: ExcelJS.Worksheet,
  row: number,
  values: (string | number | null | undefined)[],
  isAlt: boolean,
  numFmts: Record<number, string> = {},
): ExcelJS.Row {
  const r = ws.getRow(row);
  values.forEach((v, i) => {
    const cell = r.getCell(i + 1);
    cell.value = v ?? "";
    cell.border = MB_BORDER_THIN;
    cell.alignment = { vertical: "middle", wrapText: true, horizontal: i === 0 ? "left" : typeof v === "number" ? "right" : "center" };
    const fmt = numFmts[i];
    if (fmt && typeof v === "number") cell.numFmt = fmt;
    if (isAlt) cell.fill = MB_ALT_ROW_FILL;
  });
  r.height = 18;
  return r;
}

function addSummarySheet(wb: ExcelJS.Workbook, report: BalanceReport, periodLabel: string): void {
  const ws = wb.addWorksheet("Summary", { properties: { tabColor: { argb: "FF44546A" } } });
  let row = 1;

  mbAddSectionTitle(ws, row, `Utility Balance - ${periodLabel}`, 3);
  row++;
  mbApplyTableHeaders(ws, row, ["Field", "Value", ""], [28, 22, 14]);
  row++;
  const info: [string, string | number][] = [
    ["Period", report.periodId],
    ["Iterations", report.iterations],
    ["Max Delta", report.maxDelta],
    ["Utilities", report.utilities.length],
    ["Warnings", report.warnings.length],
    ["Date Generated", new Date().toLocaleDateString("en-US")],
  ];
  info.forEach(([label, value], idx) => {
    const r = mbAddDataRow(ws, row, [label, value, ""], idx % 2 === 1);
    r.getCell(1).font = { bold: true, size: 10 };
    row++;
  });
  row++;

  mbAddSubsectionTitle(ws, row, "Totals by Utility Type", 3);
  row++;
  mbApplyTableHeaders(ws, row, ["Utility Type", "Total", "UOM"]);
  row++;
  report.totalsByType.forEach((t, idx) => {
    mbAddDataRow(ws, row, [t.utilityType, t.total, t.uom], idx % 2 === 1, { 1: QTY_FMT });
    row++;
  });

  if (report.assetLoads.length > 0) {
    row++;
    mbAddSubsectionTitle(ws, row, "Steam Asset Loading", 3);
    row++;
    mbApplyTableHeaders(ws, row, ["Asset", "Quantity", "Utilization %"]);
    row++;
    report.assetLoads.forEach((load, idx) => {
      const utilization = load.utilization === null ? "" : load.utilization * 100;
      const label = load.isAvailable ? load.assetName : `${load.assetName} (unavailable)`;
      mbAddDataRow(ws, row, [label, load.quantity, utilization], idx % 2 === 1, { 1: QTY_FMT, 2: PCT_FMT });
      row++;
    });
  }
}

function addUtilitySheet(wb: ExcelJS.Workbook, report: BalanceReport): void {
  const ws = wb.addWorksheet("Utility Balance", { properties: { tabColor: { argb: "FF00B050" } } });
  let row = 1;
  mbAddSectionTitle(ws, row, "Utility Balance", 7);
  row++;
  mbApplyTableHeaders(
    ws,
    row,
    ["Utility", "Type", "UOM", "Process", "Fixed", "Derived", "Total"],
    [34, 14, 10, 16, 16, 16, 18],
  );
  row++;
  report.utilities.forEach((u, idx) => {
    mbAddDataRow(
      ws,
      row,
      [u.utilityName, u.utilityType, u.uom, u.process, u.fixed, u.derived, u.resolvedTotal],
      idx % 2 === 1,
      { 3: QTY_FMT, 4: QTY_FMT, 5: QTY_FMT, 6: QTY_FMT },
    );
    row++;
  });
}

function addNormSheet(wb: ExcelJS.Workbook, report: BalanceReport): void {
  const ws = wb.addWorksheet("Norm Comparison", { properties: { tabColor: { argb: "FF4472C4" } } });
  let row = 1;
  mbAddSectionTitle(ws, row, "Norm Comparison", 7);
  row++;
  mbApplyTableHeaders(
    ws,
    row,
    ["Consumer", "Supplier", "Type", "Effective Norm", "Reference Norm", "Deviation %", "Status"],
    [30, 30, 14, 18, 18, 14, 20],
  );
  row++;
  report.norms.forEach((n, idx) => {
    const r = mbAddDataRow(
      ws,
      row,
      [n.consumerName, n.supplierName, n.formulaId ?? n.normType, n.effectiveNorm, n.referenceNorm, n.deviationPct, n.status],
      idx % 2 === 1,
      { 3: NORM_FMT, 4: NORM_FMT, 5: PCT_FMT },
    );
    if (n.status === "MISMATCH") r.getCell(7).font = MB_MISMATCH_FONT;
    row++;
  });
}

function addWarningSheet(wb: ExcelJS.Workbook, report: BalanceReport): void {
  const ws = wb.addWorksheet("Warnings", { properties: { tabColor: { argb: "FFFFC000" } } });
  let row = 1;
  mbAddSectionTitle(ws, row, "Warnings", 3);
  row++;
  mbApplyTableHeaders(ws, row, ["Code", "Severity", "Message"], [26, 12, 90]);
  row++;
  if (report.warnings.length === 0) {
    mbAddDataRow(ws, row, ["None", "", ""], false);
    return;
  }
  report.warnings.forEach((w, idx) => {
    mbAddDataRow(ws, row, [w.code, w.severity, w.message], idx % 2 === 1);
    row++;
  });
}

export async function exportBalanceExcel(report: BalanceReport, periodLabel: string): Promise<Buffer> {
  const wb = new ExcelJS.Workbook();
  wb.creator = "Utility Balance Engine";
  wb.created = new Date();

  addSummarySheet(wb, report, periodLabel);
  addUtilitySheet(wb, report);
  addNormSheet(wb, report);
  addWarningSheet(wb, report);

  const buffer = await wb.xlsx.writeBuffer();
  return Buffer.from(buffer);
}
