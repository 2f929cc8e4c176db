/**
 * Engine unit tests: month-1 allocation, payoff, cash top-ups, invariants.
 */

import { describe, it, expect } from "vitest";
import {
  runSimulation,
  simulate,
  simulateMonth,
  computeLoanSetup,
  computeContractPayment,
  initialState,
  getMonthlyCashflow,
} from "./engine";
import type { MonthlyRecord } from "./engine";
import { InvalidInputError } from "./errors";
import type { SimulationParameters } from "@/lib/types/zod";
import {
  getBaseScenario,
  getPayoffScenario,
  getCashFundedScenario,
  getNegativeAfterPayoffScenario,
} from "@/fixtures/golden-scenarios";

function createParams(overrides?: Partial<SimulationParameters>): SimulationParameters {
  return { ...getBaseScenario().parameters, ...overrides };
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("engine", () => {
  describe("computeContractPayment", () => {
    it("matches the annuity formula for R800k at 10% over 240 months", () => {
      expect(computeContractPayment(800_000, 0.1 / 12, 240)).toBeCloseTo(7720.17, 2);
    });

    it("falls back to straight-line repayment at 0%", () => {
      expect(computeContractPayment(60_000, 0, 12)).toBe(5_000);
    });
  });

  describe("computeLoanSetup", () => {
    it("derives loan amount, monthly rate, periods and initial outlay", () => {
      const setup = computeLoanSetup(createParams());
      expect(setup.loanAmount).toBe(800_000);
      expect(setup.monthlyRate).toBeCloseTo(0.008333, 6);
      expect(setup.totalPeriods).toBe(240);
      expect(setup.initialOutlay).toBe(250_000);
    });

    it("truncates fractional terms to whole months", () => {
      expect(computeLoanSetup(createParams({ termYears: 1.5 })).totalPeriods).toBe(18);
      expect(computeLoanSetup(createParams({ termYears: 1.04 })).totalPeriods).toBe(12);
    });
  });

  describe("getMonthlyCashflow", () => {
    it("escalates rent and costs once a year", () => {
      const params = createParams();
      expect(getMonthlyCashflow(params, 12)).toEqual({ rent: 15_000, costs: 5_000, netRent: 10_000 });
      const month13 = getMonthlyCashflow(params, 13);
      expect(month13.rent).toBeCloseTo(15_750, 8);
      expect(month13.costs).toBeCloseTo(5_150, 8);
      expect(month13.netRent).toBeCloseTo(10_600, 8);
    });
  });

  describe("runSimulation: base scenario", () => {
    const result = runSimulation(getBaseScenario().parameters);
    const month1 = result.records[0];

    it("emits one record per month with contiguous month numbers", () => {
      expect(result.records).toHaveLength(240);
      result.records.forEach((r, i) => {
        expect(r.month).toBe(i + 1);
        expect(r.year).toBe(Math.floor(i / 12) + 1);
      });
    });

    it("month 1: contract payment plus rent surplus as extra principal", () => {
      expect(result.setup.contractPayment).toBeCloseTo(7720.17, 2);
      expect(month1.netRent).toBe(10_000);
      expect(month1.basePayment).toBeCloseTo(7720.17, 2);
      expect(month1.extraPayment).toBeCloseTo(2279.83, 2);
      expect(month1.totalPayment).toBeCloseTo(10_000, 6);
      expect(month1.interestPaid).toBeCloseTo(6666.67, 2);
      expect(month1.interestFromRent).toBeCloseTo(6666.67, 2);
      expect(month1.interestFromCash).toBe(0);
      expect(month1.principalPaid).toBeCloseTo(3333.33, 2);
      expect(month1.principalFromRent).toBeCloseTo(3333.33, 2);
      expect(month1.principalFromCash).toBeCloseTo(0, 8);
      expect(month1.loanBalance).toBeCloseTo(796_666.67, 2);
    });

    it("month 1: equity and ROI measured against deposit plus fees", () => {
      expect(month1.cumulativeCashInvested).toBe(250_000);
      expect(month1.equity).toBeCloseTo(253_333.33, 2);
      expect(month1.gainFromRent).toBeCloseTo(3333.33, 2);
      expect(month1.roiFromRent).toBeCloseTo(1.3333, 4);
      expect(month1.propertyValue).toBeCloseTo(1_003_273.74, 2);
      expect(month1.capitalGain).toBeCloseTo(3273.74, 2);
      expect(month1.roiFromCapital).toBeCloseTo(1.3095, 4);
      expect(month1.totalReturn).toBeCloseTo(6607.07, 2);
      expect(month1.totalRoi).toBeCloseTo(2.6428, 4);
    });

    it("property value compounds to a full year of growth at month 12", () => {
      const month12 = result.records[11];
      expect(month12.propertyValue).toBeCloseTo(1_040_000, 6);
      expect(month12.capitalGain).toBeCloseTo(40_000, 6);
      expect(month12.roiFromCapital).toBeCloseTo(16, 8);
    });

    it("escalated rent flows into a larger extra payment in year 2", () => {
      const month13 = result.records[12];
      expect(month13.netRent).toBeCloseTo(10_600, 8);
      expect(month13.extraPayment).toBeCloseTo(2879.83, 2);
      expect(month13.principalFromRent).toBeCloseTo(4282.38, 2);
    });

    it("rent alone retires the bond in month 98", () => {
      expect(result.payoffMonth).toBe(98);
      expect(result.records[96].loanBalance).toBeGreaterThan(0);
      expect(result.records[97].loanBalance).toBe(0);
    });

    it("never draws on cash", () => {
      expect(result.totals.interestFromCash).toBe(0);
      expect(result.totals.principalFromCash).toBeCloseTo(0, 6);
      expect(result.records[239].cumulativeCashInvested).toBeCloseTo(250_000, 6);
    });

    it("has no warnings", () => {
      expect(result.validation.warnings).toEqual([]);
    });
  });

  describe("runSimulation: full payoff", () => {
    const result = runSimulation(getPayoffScenario().parameters);

    it("pays off in month 3 with a capped final payment", () => {
      expect(result.payoffMonth).toBe(3);
      const month3 = result.records[2];
      expect(month3.totalPayment).toBeCloseTo(10_913.05, 6);
      expect(month3.interestPaid).toBeCloseTo(108.05, 6);
      expect(month3.principalPaid).toBeCloseTo(10_805, 6);
      expect(month3.loanBalance).toBe(0);
    });

    it("after payoff all net rent is principal from rent", () => {
      for (const r of result.records.slice(3)) {
        expect(r.basePayment).toBe(0);
        expect(r.interestPaid).toBe(0);
        expect(r.principalFromRent).toBe(20_000);
        expect(r.principalFromCash).toBe(0);
        expect(r.loanBalance).toBe(0);
      }
    });

    it("equity keeps growing from rent after payoff", () => {
      expect(result.records[3].equity).toBeCloseTo(120_000, 6);
      expect(result.records[11].equity).toBeCloseTo(280_000, 6);
      expect(result.records[11].roiFromRent).toBeCloseTo(460, 6);
    });
  });

  describe("runSimulation: cash-funded bond", () => {
    const result = runSimulation(getCashFundedScenario().parameters);

    it("tops up interest and principal from cash when rent falls short", () => {
      const month1 = result.records[0];
      expect(month1.interestPaid).toBeCloseTo(1_000, 8);
      expect(month1.interestFromRent).toBeCloseTo(600, 8);
      expect(month1.interestFromCash).toBeCloseTo(400, 8);
      expect(month1.principalFromRent).toBe(0);
      expect(month1.principalFromCash).toBeCloseTo(7884.88, 2);
      expect(month1.cumulativeCashInvested).toBeCloseTo(117_884.88, 2);
      expect(month1.equity).toBeCloseTo(109_600, 6);
      expect(month1.gainFromRent).toBeCloseTo(-400, 6);
      expect(month1.roiFromRent).toBeCloseTo(-0.3393, 4);
    });

    it("closes the loan at term without a float residue", () => {
      expect(result.records[11].loanBalance).toBe(0);
      expect(result.payoffMonth).toBe(12);
    });
  });

  describe("runSimulation: negative net rent after payoff", () => {
    const result = runSimulation(getNegativeAfterPayoffScenario().parameters);

    it("keeps the shortfall in principal from rent and flags it", () => {
      expect(result.payoffMonth).toBe(11);
      const month13 = result.records[12];
      expect(month13.netRent).toBe(-2_500);
      expect(month13.principalFromRent).toBe(-2_500);
      expect(month13.principalFromCash).toBe(0);
      expect(result.records[23].equity).toBeCloseTo(75_000, 6);
      expect(result.validation.warnings).toEqual([
        {
          code: "NEGATIVE_NET_RENT_AFTER_PAYOFF",
          message:
            "Net rent turns negative in month 13 after the loan is paid off; the shortfall reduces principal from rent",
        },
      ]);
    });
  });

  describe("runSimulation: no cash invested", () => {
    it("reports zero ROI while cumulative cash invested is zero", () => {
      const records = simulate({
        ...getPayoffScenario().parameters,
        deposit: 0,
        capitalGrowthPct: 0.05,
      });
      for (const r of records) {
        expect(r.cumulativeCashInvested).toBe(0);
        expect(r.roiFromRent).toBe(0);
        expect(r.roiFromCapital).toBe(0);
        expect(r.totalRoi).toBe(0);
      }
      expect(records[11].capitalGain).toBeCloseTo(5_000, 6);
    });
  });

  describe("invariants", () => {
    const fixtures = [
      getBaseScenario(),
      getPayoffScenario(),
      getCashFundedScenario(),
      getNegativeAfterPayoffScenario(),
    ];

    function assertBalanceInvariants(records: MonthlyRecord[]): void {
      let prev = Infinity;
      let paidOff = false;
      for (const r of records) {
        expect(r.loanBalance).toBeGreaterThanOrEqual(0);
        expect(r.loanBalance).toBeLessThanOrEqual(prev);
        if (paidOff) expect(r.loanBalance).toBe(0);
        if (r.loanBalance === 0) paidOff = true;
        prev = r.loanBalance;
      }
    }

    for (const scenario of fixtures) {
      it(`${scenario.name}: balance is non-increasing and stays at zero`, () => {
        assertBalanceInvariants(simulate(scenario.parameters));
      });

      it(`${scenario.name}: cash invested never decreases`, () => {
        const records = simulate(scenario.parameters);
        for (let i = 1; i < records.length; i++) {
          expect(records[i].cumulativeCashInvested).toBeGreaterThanOrEqual(
            records[i - 1].cumulativeCashInvested
          );
        }
      });

      it(`${scenario.name}: interest and principal split by source add up`, () => {
        for (const r of simulate(scenario.parameters)) {
          expect(r.interestFromRent + r.interestFromCash).toBeCloseTo(r.interestPaid, 6);
          expect(r.principalPaid).toBeCloseTo(r.totalPayment - r.interestPaid, 6);
          expect(r.principalFromRent + r.principalFromCash).toBeCloseTo(r.principalPaid, 6);
        }
      });
    }

    it("principal from rent never decreases while the loan is outstanding", () => {
      for (const scenario of fixtures.slice(0, 3)) {
        for (const r of simulate(scenario.parameters)) {
          expect(r.principalFromRent).toBeGreaterThanOrEqual(0);
        }
      }
    });

    it("is idempotent", () => {
      const params = getBaseScenario().parameters;
      expect(runSimulation(params)).toEqual(runSimulation(params));
    });
  });

  describe("simulateMonth", () => {
    it("does not mutate the incoming state", () => {
      const params = createParams();
      const setup = computeLoanSetup(params);
      const state = initialState(setup);
      const snapshot = { ...state };
      const first = simulateMonth(params, setup, state, 1);
      const second = simulateMonth(params, setup, state, 1);
      expect(state).toEqual(snapshot);
      expect(first).toEqual(second);
      expect(first.state.remainingBalance).toBeCloseTo(796_666.67, 2);
    });
  });

  describe("input validation", () => {
    it("rejects a deposit equal to the purchase price", () => {
      const error = catchError(() =>
        runSimulation(createParams({ purchasePrice: 1_000_000, deposit: 1_000_000 }))
      );
      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error).toMatchObject({
        code: "DEPOSIT_NOT_BELOW_PRICE",
        message: "deposit must be less than purchase price",
      });
    });

    it("rejects a zero purchase price", () => {
      const error = catchError(() => runSimulation(createParams({ purchasePrice: 0 })));
      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error).toMatchObject({
        code: "INVALID_PURCHASE_PRICE",
        message: "purchase price must be positive",
      });
    });

    it("rejects a term shorter than one month", () => {
      expect(() => simulate(createParams({ termYears: 0 }))).toThrow(
        "loan term must be at least one period"
      );
      expect(() => simulate(createParams({ termYears: 0.05 }))).toThrow(InvalidInputError);
    });

    it("rejects infinite inputs before the first month", () => {
      const error = catchError(() =>
        runSimulation(createParams({ purchasePrice: Infinity, termYears: 1 }))
      );
      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error).toMatchObject({
        code: "NON_FINITE_INPUT",
        message: "purchasePrice must be a finite number",
      });
      expect(() => runSimulation(createParams({ termYears: Infinity }))).toThrow(
        "termYears must be a finite number"
      );
    });
  });

  describe("runSimulation: very large interest-free loan", () => {
    const result = runSimulation(
      createParams({
        purchasePrice: 100_000_000_000_001,
        deposit: 1,
        annualInterestRate: 0,
        termYears: 30,
        startingMonthlyRent: 0,
        startingMonthlyCosts: 0,
      })
    );

    it("closes the loan in the final month despite float residue", () => {
      expect(result.setup.loanAmount).toBe(100_000_000_000_000);
      expect(result.records[358].loanBalance).toBeGreaterThan(0);
      expect(result.records[359].loanBalance).toBe(0);
      expect(result.payoffMonth).toBe(360);
    });
  });
});
