/**
 * Validation and guardrails for simulation inputs.
 * Hard errors block calculation; soft warnings allow it.
 */

import type { SimulationParameters } from "@/lib/types/zod";
import {
  MIN_PURCHASE_PRICE,
  MAX_INTEREST_RATE,
  MIN_TERM_YEARS,
  MAX_TERM_YEARS,
  MAX_ESCALATION_RATE,
  MONTHS_PER_YEAR,
} from "@/lib/model/constants";
import { getInvalidInputs } from "./errors";
import { getMonthlyCashflow } from "./engine";

export interface ValidationError {
  code: string;
  message: string;
}

export interface ValidationWarning {
  code: string;
  message: string;
}

export interface ValidationResult {
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

function formatPct(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

function rangeWarnings(params: SimulationParameters): ValidationWarning[] {
  const warnings: ValidationWarning[] = [];
  const outOfRange = (message: string) =>
    warnings.push({ code: "OUT_OF_RANGE", message });

  if (params.purchasePrice > 0 && params.purchasePrice < MIN_PURCHASE_PRICE) {
    outOfRange(`Purchase price is below R ${MIN_PURCHASE_PRICE.toLocaleString("en-US")}`);
  }
  if (params.annualInterestRate > MAX_INTEREST_RATE) {
    outOfRange(
      `Interest rate ${formatPct(params.annualInterestRate)} is above ${formatPct(MAX_INTEREST_RATE)}`
    );
  }
  if (params.termYears > MAX_TERM_YEARS || (params.termYears > 0 && params.termYears < MIN_TERM_YEARS)) {
    outOfRange(`Loan term must be between ${MIN_TERM_YEARS} and ${MAX_TERM_YEARS} years`);
  }
  const escalations: Array<[string, number]> = [
    ["Rent escalation", params.rentalEscalationPct],
    ["Costs escalation", params.costsEscalationPct],
    ["Capital growth", params.capitalGrowthPct],
  ];
  for (const [label, rate] of escalations) {
    if (rate > MAX_ESCALATION_RATE) {
      outOfRange(`${label} ${formatPct(rate)} is above ${formatPct(MAX_ESCALATION_RATE)}`);
    }
  }
  return warnings;
}

/** First loan year (1-based) in which costs exceed rent, or null. */
function firstNegativeNetRentYear(params: SimulationParameters): number | null {
  const years = Math.ceil(Math.trunc(params.termYears * MONTHS_PER_YEAR) / MONTHS_PER_YEAR);
  for (let year = 1; year <= years; year++) {
    const month = (year - 1) * MONTHS_PER_YEAR + 1;
    if (getMonthlyCashflow(params, month).netRent < 0) {
      return year;
    }
  }
  return null;
}

/**
 * Validate parameters before a simulation run.
 */
export function validateParameters(params: SimulationParameters): ValidationResult {
  const errors: ValidationError[] = getInvalidInputs(params).map((e) => ({
    code: e.code,
    message: e.message,
  }));
  const warnings = rangeWarnings(params);

  if (errors.length === 0) {
    const year = firstNegativeNetRentYear(params);
    if (year != null) {
      warnings.push({
        code: "NEGATIVE_NET_RENT",
        message:
          year === 1
            ? "Costs exceed rent from the first month; the shortfall is paid from cash while the bond is outstanding"
            : `Costs overtake rent in year ${year}; the shortfall is paid from cash while the bond is outstanding`,
      });
    }
  }

  return { errors, warnings };
}
