/**
 * Compare two parameter sets and produce human-readable changes for the What Changed panel.
 */

import type { SimulationParameters } from "@/lib/types/zod";
import { formatCurrency, formatRate } from "./format";

export interface ParameterChange {
  key: keyof SimulationParameters;
  label: string;
  from: string;
  to: string;
}

type ValueKind = "money" | "rate" | "years";

const PARAMETER_FIELDS: Array<{
  key: keyof SimulationParameters;
  label: string;
  kind: ValueKind;
}> = [
  { key: "purchasePrice", label: "Purchase price", kind: "money" },
  { key: "deposit", label: "Initial deposit", kind: "money" },
  { key: "upfrontFees", label: "Upfront property fees", kind: "money" },
  { key: "annualInterestRate", label: "Mortgage interest rate", kind: "rate" },
  { key: "termYears", label: "Loan term", kind: "years" },
  { key: "startingMonthlyRent", label: "Starting monthly rent", kind: "money" },
  { key: "startingMonthlyCosts", label: "Monthly rates & levies", kind: "money" },
  { key: "rentalEscalationPct", label: "Annual rent escalation", kind: "rate" },
  { key: "costsEscalationPct", label: "Annual costs escalation", kind: "rate" },
  { key: "capitalGrowthPct", label: "Annual property appreciation", kind: "rate" },
];

function formatValue(kind: ValueKind, value: number): string {
  switch (kind) {
    case "money":
      return formatCurrency(value);
    case "rate":
      return formatRate(value);
    case "years":
      return `${value} years`;
  }
}

/**
 * Diff two parameter sets, in input-panel order.
 */
export function diffParameters(
  prev: SimulationParameters,
  next: SimulationParameters
): ParameterChange[] {
  const changes: ParameterChange[] = [];
  for (const { key, label, kind } of PARAMETER_FIELDS) {
    if (prev[key] !== next[key]) {
      changes.push({
        key,
        label,
        from: formatValue(kind, prev[key]),
        to: formatValue(kind, next[key]),
      });
    }
  }
  return changes;
}
