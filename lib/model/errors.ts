/**
 * Hard input rules. Any violation blocks the simulation before month 1.
 */

import type { SimulationParameters } from "@/lib/types/zod";
import { SimulationParametersSchema } from "@/lib/types/zod";
import { MONTHS_PER_YEAR } from "@/lib/model/constants";

export type InvalidInputCode =
  | "INVALID_PURCHASE_PRICE"
  | "DEPOSIT_NOT_BELOW_PRICE"
  | "INVALID_TERM"
  | "NON_FINITE_INPUT";

export interface InvalidInput {
  code: InvalidInputCode;
  message: string;
}

export class InvalidInputError extends Error {
  readonly code: InvalidInputCode;

  constructor(input: InvalidInput) {
    super(input.message);
    this.name = "InvalidInputError";
    this.code = input.code;
  }
}

/** All hard-rule violations, in check order. Empty when the parameters can be simulated. */
export function getInvalidInputs(params: SimulationParameters): InvalidInput[] {
  const invalid: InvalidInput[] = [];

  if (!(params.purchasePrice > 0)) {
    invalid.push({
      code: "INVALID_PURCHASE_PRICE",
      message: "purchase price must be positive",
    });
  }

  if (!(params.purchasePrice - params.deposit > 0)) {
    invalid.push({
      code: "DEPOSIT_NOT_BELOW_PRICE",
      message: "deposit must be less than purchase price",
    });
  }

  // Fractional terms are allowed as long as they cover one whole month
  if (!(Math.trunc(params.termYears * MONTHS_PER_YEAR) >= 1)) {
    invalid.push({
      code: "INVALID_TERM",
      message: "loan term must be at least one period",
    });
  }

  // The comparisons above let Infinity through
  for (const key of SimulationParametersSchema.keyof().options) {
    if (!Number.isFinite(params[key])) {
      invalid.push({
        code: "NON_FINITE_INPUT",
        message: `${key} must be a finite number`,
      });
    }
  }

  return invalid;
}

/** Throws the first violation as an InvalidInputError. */
export function assertValidParameters(params: SimulationParameters): void {
  const [first] = getInvalidInputs(params);
  if (first) {
    throw new InvalidInputError(first);
  }
}
