import { assertFiniteNumber, roundCurrency } from "../../core/math-utils.js";
import type { ConfidenceLabel, PriceNormalization, ValuationResult } from "../../types/analysis.js";
import type { ValuationConfig } from "../../types/config.js";
import type { AnalysisContext } from "../../types/context.js";
import type { Module, ModuleResult, ValidationResult } from "../../types/module.js";
import type { Property } from "../../types/property.js";

export type ArvCalculatorOutputs = ValuationResult;

type ArvCalculatorResult = ModuleResult<ArvCalculatorOutputs>;

export interface ArvSettings extends ValuationConfig {
  minComps: number;
  monthsBack: number;
}

export function confidenceLabel(normalization: PriceNormalization, settings: ArvSettings): ConfidenceLabel {
  // Below minComps after outlier rejection nothing is better than LOW
  if (!normalization.fromSufficientSet || normalization.sampleSize < settings.minComps) {
    return "LOW";
  }
  const recencyLimit = settings.monthsBack / 2;
  const allRecent = normalization.retained.every((comp) => comp.monthsSinceSale <= recencyLimit);
  if (normalization.sampleSize >= settings.highConfidenceMinComps && allRecent) {
    return "HIGH";
  }
  return "MODERATE";
}

/**
 * After-repair value from the normalized price per square foot.
 *
 * The range scales with the relative dispersion of comp prices:
 * point × (1 ± spreadFactor × stdDev / median), with the low end floored at zero.
 */
export function calculateArv(
  subject: Property,
  normalization: PriceNormalization,
  settings: ArvSettings,
): ValuationResult {
  const median = normalization.medianPricePerSqft;
  assertFiniteNumber(median, "medianPricePerSqft");
  assertFiniteNumber(normalization.weightedStdDev, "weightedStdDev");
  assertFiniteNumber(settings.spreadFactor, "spreadFactor");
  if (median <= 0) {
    throw new RangeError("medianPricePerSqft must be positive");
  }
  if (settings.spreadFactor < 0) {
    throw new RangeError("spreadFactor must be non-negative");
  }

  const point = median * subject.squareFootage;
  const relativeSpread = settings.spreadFactor * (normalization.weightedStdDev / median);
  const confidence = confidenceLabel(normalization, settings);

  return Object.freeze({
    pointEstimate: roundCurrency(point),
    range: Object.freeze({
      low: roundCurrency(point * Math.max(0, 1 - relativeSpread)),
      expected: roundCurrency(point),
      high: roundCurrency(point * (1 + relativeSpread)),
    }),
    medianPricePerSqft: median,
    sampleSize: normalization.sampleSize,
    weightedStdDev: normalization.weightedStdDev,
    confidence,
    insufficientData: !normalization.fromSufficientSet,
  });
}

export class ArvCalculatorModule implements Module<ArvCalculatorOutputs> {
  readonly name = "valuation";
  readonly version = "0.1.0";
  readonly dependencies: readonly string[] = ["pricing"];

  validate(_inputs: unknown): ValidationResult {
    return { valid: true, errors: [] };
  }

  compute(context: AnalysisContext): ArvCalculatorResult {
    const pricing = context.outputs.pricing;
    if (!pricing) {
      return {
        success: false,
        errors: ["PriceNormalizerModule must be computed before ArvCalculatorModule"],
      };
    }

    const { selection, valuation } = context.config;
    const outputs = calculateArv(context.inputs.subject, pricing, {
      ...valuation,
      minComps: selection.minComps,
      monthsBack: selection.monthsBack,
    });

    if (outputs.confidence === "LOW") {
      context.warnings.push(
        `Valuation confidence is LOW (${outputs.sampleSize} comparable(s) retained)`,
      );
    }

    context.outputs.valuation = outputs;
    return { success: true, outputs };
  }
}
