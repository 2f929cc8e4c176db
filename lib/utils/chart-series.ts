/**
 * Chart data for the two return-over-time charts, one point per month.
 */

import type { MonthlyRecord } from "@/lib/model/engine";
import { MONTHS_PER_YEAR } from "@/lib/model/constants";

export interface RoiPercentPoint {
  month: number;
  roiFromRent: number;
  roiFromCapital: number;
  totalRoi: number;
}

export interface ReturnPoint {
  month: number;
  gainFromRent: number;
  capitalGain: number;
  totalReturn: number;
}

/** "% Return Over Time" series. */
export function getRoiPercentSeries(records: MonthlyRecord[]): RoiPercentPoint[] {
  return records.map((r) => ({
    month: r.month,
    roiFromRent: r.roiFromRent,
    roiFromCapital: r.roiFromCapital,
    totalRoi: r.totalRoi,
  }));
}

/** "Rand Return Over Time" series. */
export function getReturnSeries(records: MonthlyRecord[]): ReturnPoint[] {
  return records.map((r) => ({
    month: r.month,
    gainFromRent: r.gainFromRent,
    capitalGain: r.capitalGain,
    totalReturn: r.totalReturn,
  }));
}

/** Keep one point per year (the last month of each year) for long horizons. */
export function sampleYearEnds<T extends { month: number }>(series: T[]): T[] {
  return series.filter((p, i) => p.month % MONTHS_PER_YEAR === 0 || i === series.length - 1);
}
