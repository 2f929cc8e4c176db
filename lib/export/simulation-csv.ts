/**
 * Export a simulation run as CSV.
 * Columns mirror the monthly table; money is rounded to whole rands and
 * percentages to two decimals.
 */

import type { MonthlyRecord, SimulationResult } from "@/lib/model/engine";

type ColumnFormat = "int" | "money" | "percent";

const COLUMNS: Array<{ header: string; field: keyof MonthlyRecord; format: ColumnFormat }> = [
  { header: "Month", field: "month", format: "int" },
  { header: "Year", field: "year", format: "int" },
  { header: "Rent (ZAR)", field: "rent", format: "money" },
  { header: "Costs (ZAR)", field: "costs", format: "money" },
  { header: "Net Rental", field: "netRent", format: "money" },
  { header: "Mortgage Payment", field: "totalPayment", format: "money" },
  { header: "Base Payment", field: "basePayment", format: "money" },
  { header: "Extra Payment", field: "extraPayment", format: "money" },
  { header: "Interest Paid", field: "interestPaid", format: "money" },
  { header: "Interest from Rent", field: "interestFromRent", format: "money" },
  { header: "Interest from Cash", field: "interestFromCash", format: "money" },
  { header: "Principal from Rent", field: "principalFromRent", format: "money" },
  { header: "Principal from Cash", field: "principalFromCash", format: "money" },
  { header: "Loan Balance", field: "loanBalance", format: "money" },
  { header: "Equity", field: "equity", format: "money" },
  { header: "Gain From Rent", field: "gainFromRent", format: "money" },
  { header: "ROI From Rent (%)", field: "roiFromRent", format: "percent" },
  { header: "Property Value", field: "propertyValue", format: "money" },
  { header: "Capital Gain", field: "capitalGain", format: "money" },
  { header: "ROI From Capital (%)", field: "roiFromCapital", format: "percent" },
  { header: "Total Return", field: "totalReturn", format: "money" },
  { header: "Total ROI (%)", field: "totalRoi", format: "percent" },
  { header: "Total Cash Invested", field: "cumulativeCashInvested", format: "money" },
];

/** Escape a CSV field (wrap in quotes if it contains comma, newline, or quote). */
function escapeCsv(value: string): string {
  if (/[",\n\r]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatCsvNumber(n: number, format: ColumnFormat): string {
  if (format === "percent") return n.toFixed(2);
  // Math.round(-0.4) is -0; String(-0) is "0"
  return String(Math.round(n));
}

/** Header row only. */
export function getCsvHeader(): string {
  return COLUMNS.map((c) => escapeCsv(c.header)).join(",");
}

/** Build CSV string: monthly rows, then summary and validation sections. */
export function simulationToCsv(result: SimulationResult): string {
  const { setup, records, payoffMonth, totals, validation } = result;

  const rows: string[] = [getCsvHeader()];
  for (const record of records) {
    rows.push(COLUMNS.map((c) => formatCsvNumber(record[c.field], c.format)).join(","));
  }

  let csv = rows.join("\n");

  csv += "\n\n--- Summary ---\n";
  csv += `Loan amount,${formatCsvNumber(setup.loanAmount, "money")}\n`;
  csv += `Contract payment,${formatCsvNumber(setup.contractPayment, "money")}\n`;
  csv += `Initial outlay,${formatCsvNumber(setup.initialOutlay, "money")}\n`;
  csv += `Payoff month,${payoffMonth ?? "none"}\n`;
  csv += `Total interest paid,${formatCsvNumber(totals.interestPaid, "money")}\n`;
  csv += `Interest from cash,${formatCsvNumber(totals.interestFromCash, "money")}\n`;
  csv += `Principal from cash,${formatCsvNumber(totals.principalFromCash, "money")}\n`;

  if (validation.warnings.length > 0) {
    csv += "\n--- Validation ---\n";
    csv += "Warnings:\n";
    for (const w of validation.warnings) {
      csv += `  ${w.code}: ${w.message.replace(/\n/g, " ")}\n`;
    }
  }

  return csv;
}

/** Suggested download name, e.g. "property-roi-Seaview-flat-2026-10-19.csv". */
export function getCsvFilename(scenarioName: string, date: Date = new Date()): string {
  return `property-roi-${scenarioName.trim().replace(/\s+/g, "-")}-${date.toISOString().slice(0, 10)}.csv`;
}
