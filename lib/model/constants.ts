/**
 * Default inputs and input ranges for the property ROI model.
 */

/** Purchase price, ZAR. */
export const DEFAULT_PURCHASE_PRICE = 1_000_000;

/** Initial deposit, ZAR. */
export const DEFAULT_DEPOSIT = 200_000;

/** Upfront property fees, ZAR. */
export const DEFAULT_UPFRONT_FEES = 50_000;

/** Mortgage interest rate, decimal. Default 10%. */
export const DEFAULT_INTEREST_RATE = 0.1;

export const DEFAULT_TERM_YEARS = 20;

export const DEFAULT_MONTHLY_RENT = 15_000;

/** Monthly rates & levies, ZAR. */
export const DEFAULT_MONTHLY_COSTS = 5_000;

/** Annual rent escalation, decimal. Default 5%. */
export const DEFAULT_RENTAL_ESCALATION = 0.05;

/** Annual costs escalation, decimal. Default 3%. */
export const DEFAULT_COSTS_ESCALATION = 0.03;

/** Annual property appreciation, decimal. Default 4%. */
export const DEFAULT_CAPITAL_GROWTH = 0.04;

export const DEFAULT_CURRENCY = "ZAR";

export const MIN_PURCHASE_PRICE = 100_000;

export const MAX_INTEREST_RATE = 0.2;

export const MIN_TERM_YEARS = 1;
export const MAX_TERM_YEARS = 30;

/** Upper bound for rent escalation, costs escalation and capital growth. */
export const MAX_ESCALATION_RATE = 0.15;

export const MONTHS_PER_YEAR = 12;
