export { ComparableSelectorModule, selectComparables, similarityScore } from "./comparables/comparable-selector.js";
export type { ComparableSelectorOutputs } from "./comparables/comparable-selector.js";

export { PriceNormalizerModule, normalizePricePerSqft } from "./pricing/price-normalizer.js";
export type { PriceNormalizerOutputs, NormalizeOptions } from "./pricing/price-normalizer.js";

export { ArvCalculatorModule, calculateArv, confidenceLabel } from "./valuation/arv-calculator.js";
export type { ArvCalculatorOutputs, ArvSettings } from "./valuation/arv-calculator.js";

export { RenovationEstimatorModule, estimateRenovation } from "./renovation/renovation-estimator.js";
export type { RenovationEstimatorOutputs } from "./renovation/renovation-estimator.js";

export {
  FeasibilityAnalyzerModule,
  analyzeFeasibility,
  formatCurrency,
  riskFactors,
  riskScore,
} from "./feasibility/feasibility-analyzer.js";
export type { FeasibilityAnalyzerOutputs } from "./feasibility/feasibility-analyzer.js";
