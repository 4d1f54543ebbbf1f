import { rejectOutliers, weightedMean, weightedMedian, weightedStdDev } from "../../core/stats.js";
import { InsufficientCompsError } from "../../errors/index.js";
import type { ComparableSet, PriceNormalization, PricedComparable } from "../../types/analysis.js";
import type { PricingConfig } from "../../types/config.js";
import type { AnalysisContext } from "../../types/context.js";
import type { Module, ModuleResult, ValidationResult } from "../../types/module.js";
import { pricePerSqft } from "../../types/property.js";

export type PriceNormalizerOutputs = PriceNormalization;

type PriceNormalizerResult = ModuleResult<PriceNormalizerOutputs>;

export interface NormalizeOptions {
  // Throw InsufficientCompsError when the set is below minComps (default true)
  strict?: boolean;
  subjectId?: string;
}

interface PricedSample extends PricedComparable {
  value: number;
  tieBreakDate: string;
}

function toSample(comp: ComparableSet["comps"][number]): PricedSample {
  const value = pricePerSqft(comp.sale);
  return {
    id: comp.sale.id,
    pricePerSqft: value,
    weight: comp.weight,
    saleDate: comp.sale.saleDate,
    monthsSinceSale: comp.monthsSinceSale,
    value,
    tieBreakDate: comp.sale.saleDate,
  };
}

function toPriced(sample: PricedSample): PricedComparable {
  return Object.freeze({
    id: sample.id,
    pricePerSqft: sample.pricePerSqft,
    weight: sample.weight,
    saleDate: sample.saleDate,
    monthsSinceSale: sample.monthsSinceSale,
  });
}

/**
 * Reduce a comparable set to a single price per square foot.
 *
 * Outliers are rejected around the weighted median, then the weighted median
 * and standard deviation of the retained comps are reported.
 */
export function normalizePricePerSqft(
  comparableSet: ComparableSet,
  config: PricingConfig,
  options: NormalizeOptions = {},
): PriceNormalization {
  const strict = options.strict ?? true;
  const { comps, minComps, sufficient } = comparableSet;

  if (comps.length === 0 || (strict && !sufficient)) {
    throw new InsufficientCompsError(comps.length, minComps, options.subjectId);
  }

  const split = rejectOutliers(comps.map(toSample), {
    stdDevBound: config.outlierStdDevBound,
    minSpreadPct: config.outlierMinSpreadPct,
  });

  return Object.freeze({
    medianPricePerSqft: weightedMedian(split.retained),
    sampleSize: split.retained.length,
    weightedStdDev: weightedStdDev(split.retained),
    weightedMeanPricePerSqft: weightedMean(split.retained),
    retained: Object.freeze(split.retained.map(toPriced)),
    rejected: Object.freeze(split.rejected.map(toPriced)),
    fromSufficientSet: sufficient,
  });
}

export class PriceNormalizerModule implements Module<PriceNormalizerOutputs> {
  readonly name = "pricing";
  readonly version = "0.1.0";
  readonly dependencies: readonly string[] = ["comparables"];

  validate(_inputs: unknown): ValidationResult {
    // Works entirely from the comparables output
    return { valid: true, errors: [] };
  }

  compute(context: AnalysisContext): PriceNormalizerResult {
    const selection = context.outputs.comparables;
    if (!selection) {
      return {
        success: false,
        errors: ["ComparableSelectorModule must be computed before PriceNormalizerModule"],
      };
    }

    const outputs = normalizePricePerSqft(selection.comparableSet, context.config.pricing, {
      strict: context.inputs.strict,
      subjectId: selection.subjectId,
    });

    if (outputs.rejected.length > 0) {
      const ids = outputs.rejected.map((comp) => comp.id).join(", ");
      context.warnings.push(`Rejected ${outputs.rejected.length} outlier comparable(s): ${ids}`);
    }

    context.outputs.pricing = outputs;
    return { success: true, outputs };
  }
}
