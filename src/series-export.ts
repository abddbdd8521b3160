/**
 * Series export and run summaries for the CLI scripts
 */

import type { SeriesPoint, SimulationResult } from "./scheduler";

export const SERIES_CSV_HEADER = [
  "step",
  "reference_price",
  "spot_price",
  "market_price",
  "twap",
  "twap_fiat",
  "redemption_price",
  "redemption_rate",
].join(",");

export function seriesToCsv(series: SeriesPoint[]): string {
  const rows = series.map((point) =>
    [
      point.step,
      point.referencePrice,
      point.spotPrice,
      point.marketPrice,
      point.twap,
      point.twapFiat,
      point.redemptionPrice,
      point.redemptionRate,
    ].join(",")
  );
  return [SERIES_CSV_HEADER, ...rows].join("\n") + "\n";
}

export interface RunSummaryStats {
  status: SimulationResult["status"];
  steps: number;
  finalMarketPrice: number | null;
  finalRedemptionPrice: number | null;
  minMarketPrice: number | null;
  maxMarketPrice: number | null;
  // Mean of |market / redemption - 1| in %
  meanDeviationPct: number | null;
}

export function summarizeRun(result: SimulationResult): RunSummaryStats {
  const { series } = result;
  if (series.length === 0) {
    return {
      status: result.status,
      steps: result.stepsCompleted,
      finalMarketPrice: null,
      finalRedemptionPrice: null,
      minMarketPrice: null,
      maxMarketPrice: null,
      meanDeviationPct: null,
    };
  }

  const last = series[series.length - 1];
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  let deviation = 0;
  for (const point of series) {
    min = Math.min(min, point.marketPrice);
    max = Math.max(max, point.marketPrice);
    deviation += Math.abs(point.marketPrice / point.redemptionPrice - 1);
  }

  return {
    status: result.status,
    steps: result.stepsCompleted,
    finalMarketPrice: last.marketPrice,
    finalRedemptionPrice: last.redemptionPrice,
    minMarketPrice: min,
    maxMarketPrice: max,
    meanDeviationPct: (100 * deviation) / series.length,
  };
}

function formatValue(value: number | null, digits: number): string {
  return value === null ? "-" : value.toFixed(digits);
}

export function formatSummaryRow(label: string, summary: RunSummaryStats): string {
  return [
    label.padEnd(16),
    summary.status.padEnd(18),
    String(summary.steps).padStart(6),
    formatValue(summary.finalMarketPrice, 4).padStart(10),
    formatValue(summary.finalRedemptionPrice, 4).padStart(10),
    formatValue(summary.meanDeviationPct, 2).padStart(8),
  ].join(" ");
}

export const SUMMARY_TABLE_HEADER = [
  "run".padEnd(16),
  "status".padEnd(18),
  "steps".padStart(6),
  "market".padStart(10),
  "redemption".padStart(10),
  "dev %".padStart(8),
].join(" ");
