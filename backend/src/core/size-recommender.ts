import {
  MEASUREMENT_NAMES,
  type FitVerdict,
  type GarmentWeights,
  type MeasurementFit,
  type MeasurementSet,
  type Range,
  type SizeChart,
  type SizeDefinition,
  type SizeRecommendation
} from '../types/contracts.js';
import { InvalidSizeChartError } from '../lib/errors.js';
import { round1 } from './geometry.js';

const PENALTY_PER_CM = 10;

/**
 * Fit score (0-100) of one value against one range. Inside the range the
 * score rewards centring and reaches 0 on the edges; outside it is
 * 100 minus 10 points per cm beyond the nearest edge, floored at 0.
 */
export function scoreMeasurement(value: number, [low, high]: Range): number {
  if (value >= low && value <= high) {
    const halfWidth = (high - low) / 2;
    if (halfWidth === 0) return 100;
    const mid = (low + high) / 2;
    return 100 * (1 - Math.abs(value - mid) / halfWidth);
  }

  const outside = value < low ? low - value : value - high;
  return Math.max(0, 100 - outside * PENALTY_PER_CM);
}

function fitVerdict(value: number, [low, high]: Range): FitVerdict {
  if (value > high) return 'snug';
  if (value < low) return 'loose';
  return 'good';
}

/** Per-measurement fits of one size, for the measurements that carry weight. */
export function fitBreakdown(
  measurements: MeasurementSet,
  size: SizeDefinition,
  weights: GarmentWeights
): MeasurementFit[] {
  const fits: MeasurementFit[] = [];
  for (const name of MEASUREMENT_NAMES) {
    const weight = weights[name] ?? 0;
    const range = size.ranges[name];
    if (weight <= 0 || !range) continue;

    const value = measurements[name];
    fits.push({
      measurement: name,
      value,
      range,
      score: scoreMeasurement(value, range),
      fit: fitVerdict(value, range)
    });
  }
  return fits;
}

/**
 * Weighted mean of the per-measurement scores. Measurements the size does not
 * define are left out of both numerator and denominator.
 */
export function scoreSize(measurements: MeasurementSet, size: SizeDefinition, weights: GarmentWeights): number {
  let weighted = 0;
  let totalWeight = 0;

  for (const fit of fitBreakdown(measurements, size, weights)) {
    const weight = weights[fit.measurement] ?? 0;
    weighted += fit.score * weight;
    totalWeight += weight;
  }

  return totalWeight > 0 ? weighted / totalWeight : 0;
}

function bandSentence(size: string, score: number): string {
  if (score >= 90) return `Size ${size} is an excellent fit for your measurements.`;
  if (score >= 75) return `Size ${size} is a good fit for your measurements.`;
  if (score >= 60) return `Size ${size} is recommended, but fit may vary by brand.`;
  return `Size ${size} is the closest match.`;
}

function deviationSentence(fit: MeasurementFit): string | null {
  const [low, high] = fit.range;
  const label = fit.measurement.replace('_', ' ');
  const value = round1(fit.value);

  if (fit.fit === 'snug') return `It may feel snug around the ${label} (${value}cm vs up to ${high}cm).`;
  if (fit.fit === 'loose') return `It may feel loose around the ${label} (${value}cm vs from ${low}cm).`;
  if (fit.score >= 50) return null;

  const end = fit.value > (low + high) / 2 ? 'upper' : 'lower';
  return `Your ${label} (${value}cm) sits near the ${end} end of the range.`;
}

export function explainRecommendation(
  size: string,
  score: number,
  fits: MeasurementFit[],
  runnerUp: string | null
): string {
  const parts = [bandSentence(size, score)];

  const worst = fits.reduce<MeasurementFit | null>(
    (acc, fit) => (acc === null || fit.score < acc.score ? fit : acc),
    null
  );
  const deviation = worst ? deviationSentence(worst) : null;
  if (deviation) parts.push(deviation);

  if (runnerUp && score < 75) {
    parts.push(`Consider ${runnerUp} if you prefer a different fit.`);
  }

  return parts.join(' ');
}

/**
 * Scores every size and picks the best. Ties go to the size listed first in
 * the chart, so results are stable for a given chart order.
 */
export function recommendSize(
  measurements: MeasurementSet,
  chart: SizeChart,
  weights: GarmentWeights
): SizeRecommendation {
  if (chart.length === 0) {
    throw new InvalidSizeChartError('the chart has no sizes');
  }

  const scored = chart.map(size => ({ size, score: scoreSize(measurements, size, weights) }));

  let best = scored[0];
  for (const entry of scored.slice(1)) {
    if (entry.score > best.score) best = entry;
  }

  let runnerUp: (typeof scored)[number] | null = null;
  for (const entry of scored) {
    if (entry === best) continue;
    if (runnerUp === null || entry.score > runnerUp.score) runnerUp = entry;
  }

  const fits = fitBreakdown(measurements, best.size, weights);
  const allSizeScores: Record<string, number> = {};
  for (const { size, score } of scored) allSizeScores[size.label] = round1(score);

  return {
    recommended_size: best.size.label,
    score: best.score,
    all_size_scores: allSizeScores,
    fit_breakdown: fits,
    runner_up: runnerUp?.size.label ?? null,
    explanation: explainRecommendation(best.size.label, best.score, fits, runnerUp?.size.label ?? null)
  };
}
