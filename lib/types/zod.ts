/**
 * Zod schemas for the property ROI planner.
 * Rates are decimals (0.1 = 10%); amounts are in the scenario currency.
 */

import { z } from "zod";

const MoneySchema = z.number().finite();
const RateSchema = z.number().finite();

export const SimulationParametersSchema = z.object({
  purchasePrice: MoneySchema.min(0),
  /** Cash paid toward the price; the loan covers the rest. */
  deposit: MoneySchema.min(0),
  /** Transfer duties, bond registration and similar once-off costs. */
  upfrontFees: MoneySchema.min(0),
  annualInterestRate: RateSchema.min(0),
  termYears: z.number().finite().positive(),
  startingMonthlyRent: MoneySchema.min(0),
  /** Rates, levies and other recurring holding costs. */
  startingMonthlyCosts: MoneySchema.min(0),
  rentalEscalationPct: RateSchema.min(0),
  costsEscalationPct: RateSchema.min(0),
  capitalGrowthPct: RateSchema.min(0),
});
export type SimulationParameters = z.infer<typeof SimulationParametersSchema>;

export const SavedScenarioSchema = z.object({
  name: z.string().default("Untitled"),
  currency: z.string().default("ZAR"),
  parameters: SimulationParametersSchema,
});
export type SavedScenario = z.infer<typeof SavedScenarioSchema>;
