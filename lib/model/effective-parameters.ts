/**
 * Resolve partial inputs to the values the engine runs with, and clamp them
 * to the ranges the input controls offer.
 */

import type { SimulationParameters } from "@/lib/types/zod";
import {
  DEFAULT_PURCHASE_PRICE,
  DEFAULT_DEPOSIT,
  DEFAULT_UPFRONT_FEES,
  DEFAULT_INTEREST_RATE,
  DEFAULT_TERM_YEARS,
  DEFAULT_MONTHLY_RENT,
  DEFAULT_MONTHLY_COSTS,
  DEFAULT_RENTAL_ESCALATION,
  DEFAULT_COSTS_ESCALATION,
  DEFAULT_CAPITAL_GROWTH,
  MIN_PURCHASE_PRICE,
  MAX_INTEREST_RATE,
  MIN_TERM_YEARS,
  MAX_TERM_YEARS,
  MAX_ESCALATION_RATE,
} from "@/lib/model/constants";

export const DEFAULT_PARAMETERS: Readonly<SimulationParameters> = Object.freeze({
  purchasePrice: DEFAULT_PURCHASE_PRICE,
  deposit: DEFAULT_DEPOSIT,
  upfrontFees: DEFAULT_UPFRONT_FEES,
  annualInterestRate: DEFAULT_INTEREST_RATE,
  termYears: DEFAULT_TERM_YEARS,
  startingMonthlyRent: DEFAULT_MONTHLY_RENT,
  startingMonthlyCosts: DEFAULT_MONTHLY_COSTS,
  rentalEscalationPct: DEFAULT_RENTAL_ESCALATION,
  costsEscalationPct: DEFAULT_COSTS_ESCALATION,
  capitalGrowthPct: DEFAULT_CAPITAL_GROWTH,
});

/** Fill any missing field from DEFAULT_PARAMETERS. */
export function resolveParameters(
  partial: Partial<SimulationParameters> = {}
): SimulationParameters {
  return {
    purchasePrice: partial.purchasePrice ?? DEFAULT_PARAMETERS.purchasePrice,
    deposit: partial.deposit ?? DEFAULT_PARAMETERS.deposit,
    upfrontFees: partial.upfrontFees ?? DEFAULT_PARAMETERS.upfrontFees,
    annualInterestRate: partial.annualInterestRate ?? DEFAULT_PARAMETERS.annualInterestRate,
    termYears: partial.termYears ?? DEFAULT_PARAMETERS.termYears,
    startingMonthlyRent: partial.startingMonthlyRent ?? DEFAULT_PARAMETERS.startingMonthlyRent,
    startingMonthlyCosts: partial.startingMonthlyCosts ?? DEFAULT_PARAMETERS.startingMonthlyCosts,
    rentalEscalationPct: partial.rentalEscalationPct ?? DEFAULT_PARAMETERS.rentalEscalationPct,
    costsEscalationPct: partial.costsEscalationPct ?? DEFAULT_PARAMETERS.costsEscalationPct,
    capitalGrowthPct: partial.capitalGrowthPct ?? DEFAULT_PARAMETERS.capitalGrowthPct,
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Clamp to input control ranges. Deposit is bounded by the clamped price,
 * so a deposit equal to the price still fails engine validation.
 */
export function clampParameters(params: SimulationParameters): SimulationParameters {
  const purchasePrice = Math.max(MIN_PURCHASE_PRICE, params.purchasePrice);
  return {
    purchasePrice,
    deposit: clamp(params.deposit, 0, purchasePrice),
    upfrontFees: Math.max(0, params.upfrontFees),
    annualInterestRate: clamp(params.annualInterestRate, 0, MAX_INTEREST_RATE),
    termYears: clamp(Math.round(params.termYears), MIN_TERM_YEARS, MAX_TERM_YEARS),
    startingMonthlyRent: Math.max(0, params.startingMonthlyRent),
    startingMonthlyCosts: Math.max(0, params.startingMonthlyCosts),
    rentalEscalationPct: clamp(params.rentalEscalationPct, 0, MAX_ESCALATION_RATE),
    costsEscalationPct: clamp(params.costsEscalationPct, 0, MAX_ESCALATION_RATE),
    capitalGrowthPct: clamp(params.capitalGrowthPct, 0, MAX_ESCALATION_RATE),
  };
}
