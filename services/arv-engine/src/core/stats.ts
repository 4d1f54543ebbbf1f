import { assertFiniteNumber } from "./math-utils.js";

export interface WeightedSample {
  value: number;
  weight: number;
  // ISO date (yyyy-MM-dd); the more recent sample wins an exactly balanced median
  tieBreakDate?: string;
  id?: string;
}

export interface OutlierOptions {
  stdDevBound: number;
  minSpreadPct: number;
  minSampleSize?: number;
}

export interface OutlierSplit<T extends WeightedSample> {
  retained: T[];
  rejected: T[];
  center: number;
  sigma: number;
}

// Scales the median absolute deviation to a standard deviation for normal data
export const MAD_TO_SIGMA = 1.4826;

const DEFAULT_MIN_OUTLIER_SAMPLE = 3;

function assertSamples(samples: readonly WeightedSample[]): void {
  if (!Array.isArray(samples) || samples.length === 0) {
    throw new RangeError("samples must be a non-empty array");
  }
  samples.forEach((sample, index) => {
    assertFiniteNumber(sample.value, `samples[${index}].value`);
    assertFiniteNumber(sample.weight, `samples[${index}].weight`);
    if (sample.weight <= 0) {
      throw new RangeError(`samples[${index}].weight must be positive`);
    }
  });
}

function compareSamples(a: WeightedSample, b: WeightedSample): number {
  if (a.value !== b.value) {
    return a.value - b.value;
  }
  const dateA = a.tieBreakDate ?? "";
  const dateB = b.tieBreakDate ?? "";
  if (dateA !== dateB) {
    // More recent first
    return dateA < dateB ? 1 : -1;
  }
  const idA = a.id ?? "";
  const idB = b.id ?? "";
  if (idA === idB) {
    return 0;
  }
  return idA < idB ? -1 : 1;
}

function resolveBalancedTie(lower: WeightedSample, upper: WeightedSample): number {
  if (lower.value === upper.value) {
    return lower.value;
  }
  const lowerDate = lower.tieBreakDate;
  const upperDate = upper.tieBreakDate;
  if (lowerDate !== undefined && upperDate !== undefined && lowerDate !== upperDate) {
    return lowerDate > upperDate ? lower.value : upper.value;
  }
  return (lower.value + upper.value) / 2;
}

// Weighted median: first value whose cumulative weight passes half the total
export function weightedMedian(samples: readonly WeightedSample[]): number {
  assertSamples(samples);

  const sorted = [...samples].sort(compareSamples);
  const total = sorted.reduce((acc, sample) => acc + sample.weight, 0);
  const half = total / 2;
  const tolerance = total * 1e-12;

  let cumulative = 0;
  for (let i = 0; i < sorted.length; i += 1) {
    const current = sorted[i];
    if (current === undefined) {
      break;
    }
    cumulative += current.weight;

    if (Math.abs(cumulative - half) <= tolerance) {
      const next = sorted[i + 1];
      return next === undefined ? current.value : resolveBalancedTie(current, next);
    }
    if (cumulative > half) {
      return current.value;
    }
  }

  const last = sorted[sorted.length - 1];
  if (last === undefined) {
    throw new Error("weighted median could not be resolved");
  }
  return last.value;
}

export function weightedMean(samples: readonly WeightedSample[]): number {
  assertSamples(samples);
  let weightTotal = 0;
  let total = 0;
  for (const sample of samples) {
    weightTotal += sample.weight;
    total += sample.value * sample.weight;
  }
  return total / weightTotal;
}

// Population standard deviation about the weighted mean
export function weightedStdDev(samples: readonly WeightedSample[]): number {
  const mean = weightedMean(samples);
  let weightTotal = 0;
  let total = 0;
  for (const sample of samples) {
    const deviation = sample.value - mean;
    weightTotal += sample.weight;
    total += sample.weight * deviation * deviation;
  }
  return Math.sqrt(total / weightTotal);
}

// Weighted median absolute deviation about `center`
export function weightedMad(samples: readonly WeightedSample[], center: number): number {
  assertFiniteNumber(center, "center");
  return weightedMedian(
    samples.map((sample) => ({
      value: Math.abs(sample.value - center),
      weight: sample.weight,
      tieBreakDate: sample.tieBreakDate,
      id: sample.id,
    })),
  );
}

/**
 * Split samples into retained and rejected around the weighted median.
 * Sigma is the MAD-based robust estimate, floored at `minSpreadPct` of the
 * center so near-identical samples do not reject ordinary variation.
 */
export function rejectOutliers<T extends WeightedSample>(
  samples: readonly T[],
  options: OutlierOptions,
): OutlierSplit<T> {
  assertSamples(samples);
  assertFiniteNumber(options.stdDevBound, "stdDevBound");
  assertFiniteNumber(options.minSpreadPct, "minSpreadPct");
  if (options.stdDevBound <= 0) {
    throw new RangeError("stdDevBound must be positive");
  }
  if (options.minSpreadPct < 0) {
    throw new RangeError("minSpreadPct must be non-negative");
  }

  const center = weightedMedian(samples);
  const minSampleSize = options.minSampleSize ?? DEFAULT_MIN_OUTLIER_SAMPLE;
  const sigma = Math.max(
    MAD_TO_SIGMA * weightedMad(samples, center),
    options.minSpreadPct * Math.abs(center),
  );

  if (samples.length < minSampleSize || sigma === 0) {
    return { retained: [...samples], rejected: [], center, sigma };
  }

  const limit = options.stdDevBound * sigma;
  const retained: T[] = [];
  const rejected: T[] = [];
  for (const sample of samples) {
    if (Math.abs(sample.value - center) > limit) {
      rejected.push(sample);
    } else {
      retained.push(sample);
    }
  }

  return { retained, rejected, center, sigma };
}
