/**
 * Golden scenario fixtures: the default investment, early payoff,
 * cash-funded bond, and negative net rent after payoff.
 */

import type { SavedScenario, SimulationParameters } from "@/lib/types/zod";

function createScenario(
  name: string,
  parameters: SimulationParameters
): SavedScenario {
  return { name, currency: "ZAR", parameters };
}

/** R1m flat, 20% deposit, 10% over 20 years. Rent covers the bond from month 1. */
export function getBaseScenario(): SavedScenario {
  return createScenario("Base", {
    purchasePrice: 1_000_000,
    deposit: 200_000,
    upfrontFees: 50_000,
    annualInterestRate: 0.1,
    termYears: 20,
    startingMonthlyRent: 15_000,
    startingMonthlyCosts: 5_000,
    rentalEscalationPct: 0.05,
    costsEscalationPct: 0.03,
    capitalGrowthPct: 0.04,
  });
}

/** R50k loan at 12% with R20k/month rent: paid off in month 3 of 12. */
export function getPayoffScenario(): SavedScenario {
  return createScenario("Early payoff", {
    purchasePrice: 100_000,
    deposit: 50_000,
    upfrontFees: 0,
    annualInterestRate: 0.12,
    termYears: 1,
    startingMonthlyRent: 20_000,
    startingMonthlyCosts: 0,
    rentalEscalationPct: 0,
    costsEscalationPct: 0,
    capitalGrowthPct: 0,
  });
}

/** R100k loan at 12% with only R600/month rent: interest and principal topped up from cash. */
export function getCashFundedScenario(): SavedScenario {
  return createScenario("Cash funded", {
    purchasePrice: 200_000,
    deposit: 100_000,
    upfrontFees: 10_000,
    annualInterestRate: 0.12,
    termYears: 1,
    startingMonthlyRent: 600,
    startingMonthlyCosts: 0,
    rentalEscalationPct: 0,
    costsEscalationPct: 0,
    capitalGrowthPct: 0,
  });
}

/** Paid off in month 11; costs jump 50% in year 2 and exceed rent. */
export function getNegativeAfterPayoffScenario(): SavedScenario {
  return createScenario("Negative after payoff", {
    purchasePrice: 100_000,
    deposit: 50_000,
    upfrontFees: 0,
    annualInterestRate: 0.12,
    termYears: 2,
    startingMonthlyRent: 20_000,
    startingMonthlyCosts: 15_000,
    rentalEscalationPct: 0,
    costsEscalationPct: 0.5,
    capitalGrowthPct: 0,
  });
}
