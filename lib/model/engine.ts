/**
 * Property investment amortization and ROI engine.
 * Monthly fold: net rent services the bond first, any surplus goes to principal
 * (access bond), and each month's interest and principal are split by funding
 * source (rent vs. the investor's own cash).
 */

import type { SimulationParameters } from "@/lib/types/zod";
import { MONTHS_PER_YEAR } from "@/lib/model/constants";
import { assertValidParameters } from "@/lib/model/errors";

/** Balances below this are treated as repaid (float residue of the final annuity payment). */
const BALANCE_EPSILON = 1e-6;
/** Residue grows with the loan, so large loans get a proportional tolerance. */
const RELATIVE_BALANCE_EPSILON = 1e-12;

function balanceTolerance(loanAmount: number): number {
  return Math.max(BALANCE_EPSILON, loanAmount * RELATIVE_BALANCE_EPSILON);
}

/** Loan terms derived once per run. */
export interface LoanSetup {
  loanAmount: number;
  monthlyRate: number;
  totalPeriods: number;
  /** Fixed monthly payment that fully amortizes loanAmount over totalPeriods. */
  contractPayment: number;
  /** Deposit plus upfront fees. */
  initialOutlay: number;
}

/** Accumulators carried from one month to the next. */
export interface SimulationState {
  remainingBalance: number;
  /** Deposit and fees plus every rand of principal paid from cash. */
  cumulativeCashInvested: number;
  cumulativePrincipalFromRent: number;
  cumulativeInterestFromCash: number;
}

export interface MonthlyRecord {
  month: number;
  year: number;
  rent: number;
  costs: number;
  netRent: number;
  totalPayment: number;
  basePayment: number;
  extraPayment: number;
  interestPaid: number;
  interestFromRent: number;
  interestFromCash: number;
  principalPaid: number;
  principalFromRent: number;
  principalFromCash: number;
  /** Closing balance after this month's payment. */
  loanBalance: number;
  equity: number;
  gainFromRent: number;
  /** Percent of cumulative cash invested. */
  roiFromRent: number;
  propertyValue: number;
  capitalGain: number;
  roiFromCapital: number;
  totalReturn: number;
  totalRoi: number;
  cumulativeCashInvested: number;
}

export interface SimulationTotals {
  interestPaid: number;
  interestFromRent: number;
  interestFromCash: number;
  principalFromRent: number;
  principalFromCash: number;
}

export interface SimulationWarning {
  code: string;
  message: string;
}

export interface SimulationResult {
  setup: LoanSetup;
  records: MonthlyRecord[];
  /** First month whose closing balance is zero; null when the loan runs to term. */
  payoffMonth: number | null;
  totals: SimulationTotals;
  validation: { warnings: SimulationWarning[] };
}

/**
 * Standard annuity payment. Zero rate falls back to straight-line repayment.
 */
export function computeContractPayment(
  loanAmount: number,
  monthlyRate: number,
  totalPeriods: number
): number {
  if (monthlyRate === 0) {
    return loanAmount / totalPeriods;
  }
  const pow = Math.pow(1 + monthlyRate, totalPeriods);
  return (loanAmount * monthlyRate * pow) / (pow - 1);
}

export function computeLoanSetup(params: SimulationParameters): LoanSetup {
  const loanAmount = params.purchasePrice - params.deposit;
  const monthlyRate = params.annualInterestRate / MONTHS_PER_YEAR;
  const totalPeriods = Math.trunc(params.termYears * MONTHS_PER_YEAR);
  return {
    loanAmount,
    monthlyRate,
    totalPeriods,
    contractPayment: computeContractPayment(loanAmount, monthlyRate, totalPeriods),
    initialOutlay: params.deposit + params.upfrontFees,
  };
}

export function initialState(setup: LoanSetup): SimulationState {
  return {
    remainingBalance: setup.loanAmount,
    cumulativeCashInvested: setup.initialOutlay,
    cumulativePrincipalFromRent: 0,
    cumulativeInterestFromCash: 0,
  };
}

/** Escalation steps once a year; no compounding within the year. */
export function escalatedAmount(
  startingAmount: number,
  annualRate: number,
  yearsElapsed: number
): number {
  return startingAmount * Math.pow(1 + annualRate, yearsElapsed);
}

/** Rent, costs and net rent for a 1-based month. */
export function getMonthlyCashflow(
  params: SimulationParameters,
  month: number
): { rent: number; costs: number; netRent: number } {
  const yearsElapsed = Math.floor((month - 1) / MONTHS_PER_YEAR);
  const rent = escalatedAmount(params.startingMonthlyRent, params.rentalEscalationPct, yearsElapsed);
  const costs = escalatedAmount(params.startingMonthlyCosts, params.costsEscalationPct, yearsElapsed);
  return { rent, costs, netRent: rent - costs };
}

/** Percentage of cash invested; 0 when nothing has been invested. */
function roiPercent(gain: number, cashInvested: number): number {
  return cashInvested > 0 ? (gain / cashInvested) * 100 : 0;
}

type PaymentAllocation = Pick<
  MonthlyRecord,
  | "totalPayment"
  | "basePayment"
  | "extraPayment"
  | "interestPaid"
  | "interestFromRent"
  | "interestFromCash"
  | "principalPaid"
  | "principalFromRent"
  | "principalFromCash"
>;

function allocatePayment(
  setup: LoanSetup,
  state: SimulationState,
  netRent: number
): { allocation: PaymentAllocation; state: SimulationState } {
  if (state.remainingBalance <= 0) {
    // Paid off: all net rent counts as principal from rent, negative or not
    return {
      allocation: {
        totalPayment: netRent,
        basePayment: 0,
        extraPayment: netRent,
        interestPaid: 0,
        interestFromRent: 0,
        interestFromCash: 0,
        principalPaid: netRent,
        principalFromRent: netRent,
        principalFromCash: 0,
      },
      state: {
        ...state,
        remainingBalance: 0,
        cumulativePrincipalFromRent: state.cumulativePrincipalFromRent + netRent,
      },
    };
  }

  const interestDue = state.remainingBalance * setup.monthlyRate;
  const basePayment = Math.max(setup.contractPayment, interestDue);
  const extraPayment = Math.max(netRent - basePayment, 0);
  const payoffAmount = state.remainingBalance + interestDue;
  const paysOff = basePayment + extraPayment >= payoffAmount;
  const totalPayment = Math.min(basePayment + extraPayment, payoffAmount);

  const interestPaid = Math.min(totalPayment, interestDue);
  const interestFromCash = Math.max(interestPaid - netRent, 0);
  const interestFromRent = interestPaid - interestFromCash;

  const principalPaid = totalPayment - interestPaid;
  const rentLeftForPrincipal = Math.max(netRent - interestPaid, 0);
  const principalFromCash = Math.max(principalPaid - rentLeftForPrincipal, 0);
  const principalFromRent = principalPaid - principalFromCash;

  const balanceAfter = state.remainingBalance - principalPaid;

  return {
    allocation: {
      totalPayment,
      basePayment,
      extraPayment,
      interestPaid,
      interestFromRent,
      interestFromCash,
      principalPaid,
      principalFromRent,
      principalFromCash,
    },
    state: {
      // Snap to zero on payoff so float residue cannot reopen the loan
      remainingBalance:
        paysOff || balanceAfter < balanceTolerance(setup.loanAmount) ? 0 : balanceAfter,
      cumulativeCashInvested: state.cumulativeCashInvested + principalFromCash,
      cumulativePrincipalFromRent: state.cumulativePrincipalFromRent + principalFromRent,
      cumulativeInterestFromCash: state.cumulativeInterestFromCash + interestFromCash,
    },
  };
}

/**
 * One step of the fold: allocate month `month`'s net rent, then derive
 * equity, capital gain and ROI from the updated accumulators.
 */
export function simulateMonth(
  params: SimulationParameters,
  setup: LoanSetup,
  state: SimulationState,
  month: number
): { record: MonthlyRecord; state: SimulationState } {
  const { rent, costs, netRent } = getMonthlyCashflow(params, month);
  const { allocation, state: next } = allocatePayment(setup, state, netRent);

  const equity =
    setup.initialOutlay + next.cumulativePrincipalFromRent - next.cumulativeInterestFromCash;
  const gainFromRent = equity - setup.initialOutlay;

  // Fractional-year exponent: appreciation accrues every month
  const propertyValue =
    params.purchasePrice * Math.pow(1 + params.capitalGrowthPct, month / MONTHS_PER_YEAR);
  const capitalGain = propertyValue - params.purchasePrice;
  const totalReturn = gainFromRent + capitalGain;
  const cash = next.cumulativeCashInvested;

  return {
    record: {
      month,
      year: Math.floor((month - 1) / MONTHS_PER_YEAR) + 1,
      rent,
      costs,
      netRent,
      ...allocation,
      loanBalance: next.remainingBalance,
      equity,
      gainFromRent,
      roiFromRent: roiPercent(gainFromRent, cash),
      propertyValue,
      capitalGain,
      roiFromCapital: roiPercent(capitalGain, cash),
      totalReturn,
      totalRoi: roiPercent(totalReturn, cash),
      cumulativeCashInvested: cash,
    },
    state: next,
  };
}

function sumTotals(records: MonthlyRecord[]): SimulationTotals {
  const totals: SimulationTotals = {
    interestPaid: 0,
    interestFromRent: 0,
    interestFromCash: 0,
    principalFromRent: 0,
    principalFromCash: 0,
  };
  for (const r of records) {
    totals.interestPaid += r.interestPaid;
    totals.interestFromRent += r.interestFromRent;
    totals.interestFromCash += r.interestFromCash;
    totals.principalFromRent += r.principalFromRent;
    totals.principalFromCash += r.principalFromCash;
  }
  return totals;
}

/**
 * Run the full simulation for months 1..termYears×12.
 * @throws InvalidInputError before any month is simulated.
 */
export function runSimulation(params: SimulationParameters): SimulationResult {
  assertValidParameters(params);

  const setup = computeLoanSetup(params);
  const records: MonthlyRecord[] = [];
  let state = initialState(setup);

  for (let month = 1; month <= setup.totalPeriods; month++) {
    const step = simulateMonth(params, setup, state, month);
    records.push(step.record);
    state = step.state;
  }

  const payoffRecord = records.find((r) => r.loanBalance === 0);
  const payoffMonth = payoffRecord?.month ?? null;

  const warnings: SimulationWarning[] = [];
  if (payoffMonth != null) {
    const firstNegative = records.find((r) => r.month > payoffMonth && r.netRent < 0);
    if (firstNegative) {
      warnings.push({
        code: "NEGATIVE_NET_RENT_AFTER_PAYOFF",
        message: `Net rent turns negative in month ${firstNegative.month} after the loan is paid off; the shortfall reduces principal from rent`,
      });
    }
  }

  return {
    setup,
    records,
    payoffMonth,
    totals: sumTotals(records),
    validation: { warnings },
  };
}

/** Monthly records only. */
export function simulate(params: SimulationParameters): MonthlyRecord[] {
  return runSimulation(params).records;
}
