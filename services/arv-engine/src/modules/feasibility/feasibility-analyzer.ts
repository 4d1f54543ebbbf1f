import { assertFiniteNumber, clamp, roundCurrency, roundTo } from "../../core/math-utils.js";
import type {
  ConfidenceLabel,
  FeasibilityReport,
  FeasibilityVerdict,
  RenovationEstimate,
  RiskFactors,
  ValuationResult,
} from "../../types/analysis.js";
import type { FeasibilityConfig, RiskConfig } from "../../types/config.js";
import type { AnalysisContext } from "../../types/context.js";
import type { AnalysisInput } from "../../types/inputs.js";
import type { Module, ModuleResult, ValidationError, ValidationResult } from "../../types/module.js";

export type FeasibilityAnalyzerOutputs = FeasibilityReport;

type FeasibilityAnalyzerResult = ModuleResult<FeasibilityAnalyzerOutputs>;

const CONFIDENCE_RISK: Record<ConfidenceLabel, number> = {
  HIGH: 0,
  MODERATE: 0.5,
  LOW: 1,
};

export function formatCurrency(value: number): string {
  const formatted = Math.abs(value).toLocaleString("en-US", {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });
  return value < 0 ? `-$${formatted}` : `$${formatted}`;
}

export function riskFactors(
  purchasePrice: number,
  valuation: ValuationResult,
  risk: RiskConfig,
): RiskFactors {
  const ratio = purchasePrice / valuation.range.expected;
  return {
    priceRatio: clamp((ratio - risk.priceRatioFloor) / (risk.priceRatioCeiling - risk.priceRatioFloor)),
    confidence: CONFIDENCE_RISK[valuation.confidence],
    sampleSize: clamp(1 - valuation.sampleSize / risk.sampleSizeTarget),
  };
}

// 0 (safest) to 100 (riskiest)
export function riskScore(factors: RiskFactors, risk: RiskConfig): number {
  const { weights } = risk;
  const totalWeight = weights.priceRatio + weights.confidence + weights.sampleSize;
  if (!(totalWeight > 0)) {
    throw new RangeError("risk weights must sum to a positive number");
  }
  const weighted =
    weights.priceRatio * factors.priceRatio +
    weights.confidence * factors.confidence +
    weights.sampleSize * factors.sampleSize;
  return roundTo((100 * weighted) / totalWeight, 2);
}

/**
 * Flip feasibility: the 70% rule cap, profit and ROI on total investment,
 * and a weighted risk score. The verdict is PROMISING only when ROI clears
 * the target and the purchase price is within tolerance of the cap.
 */
export function analyzeFeasibility(
  purchasePrice: number,
  valuation: ValuationResult,
  renovation: RenovationEstimate,
  config: FeasibilityConfig,
): FeasibilityReport {
  assertFiniteNumber(purchasePrice, "purchasePrice");
  if (purchasePrice <= 0) {
    throw new RangeError("purchasePrice must be positive");
  }
  const arv = valuation.range.expected;
  assertFiniteNumber(arv, "arv");
  if (arv <= 0) {
    throw new RangeError("ARV must be positive");
  }

  const renovationCost = renovation.total;
  const totalInvestment = roundCurrency(purchasePrice + renovationCost);
  const profit = roundCurrency(arv - totalInvestment);
  const roiPercent = roundTo((profit / totalInvestment) * 100, 2);
  const maxPurchasePrice70 = roundCurrency(config.maxPurchaseArvPct * arv - renovationCost);
  const purchaseToArvPercent = roundTo((purchasePrice / arv) * 100, 2);

  const factors = riskFactors(purchasePrice, valuation, config.risk);
  const score = riskScore(factors, config.risk);

  const findings: string[] = [];
  const roiPasses = roiPercent > config.targetRoiPercent;
  findings.push(
    roiPasses
      ? `ROI ${roiPercent.toFixed(2)}% is above the ${config.targetRoiPercent}% target`
      : `ROI ${roiPercent.toFixed(2)}% does not exceed the ${config.targetRoiPercent}% target`,
  );

  const rulePct = roundTo(config.maxPurchaseArvPct * 100, 2);
  const purchaseCap = maxPurchasePrice70 * (1 + config.ruleTolerancePct);
  const rulePasses = purchasePrice <= purchaseCap;
  findings.push(
    rulePasses
      ? `Purchase price ${formatCurrency(purchasePrice)} is within the ${rulePct}% rule maximum of ${formatCurrency(maxPurchasePrice70)}`
      : `Purchase price ${formatCurrency(purchasePrice)} exceeds the ${rulePct}% rule maximum of ${formatCurrency(maxPurchasePrice70)}`,
  );

  if (valuation.confidence !== "HIGH") {
    findings.push(
      `Valuation confidence is ${valuation.confidence} with ${valuation.sampleSize} comparable(s)`,
    );
  }

  const verdict: FeasibilityVerdict = roiPasses && rulePasses ? "PROMISING" : "UNFAVORABLE";

  return Object.freeze({
    purchasePrice,
    renovationCost,
    totalInvestment,
    arv,
    profit,
    roiPercent,
    maxPurchasePrice70,
    purchaseToArvPercent,
    riskScore: score,
    riskFactors: Object.freeze(factors),
    verdict,
    findings: Object.freeze(findings),
  });
}

function assertAnalysisInput(inputs: unknown): asserts inputs is AnalysisInput {
  if (!inputs || typeof inputs !== "object") {
    throw new TypeError("analysis must be an object");
  }
  if (!("purchase_price" in inputs) || typeof inputs.purchase_price !== "number") {
    throw new TypeError("purchase_price must be a number");
  }
}

export class FeasibilityAnalyzerModule implements Module<FeasibilityAnalyzerOutputs> {
  readonly name = "feasibility";
  readonly version = "0.1.0";
  readonly dependencies: readonly string[] = ["valuation", "renovation"];

  validate(inputs: unknown): ValidationResult {
    const errors: ValidationError[] = [];

    try {
      assertAnalysisInput(inputs);
    } catch (error) {
      errors.push({
        path: "analysis",
        message: error instanceof Error ? error.message : String(error),
      });
      return { valid: false, errors };
    }

    if (!Number.isFinite(inputs.purchase_price) || inputs.purchase_price <= 0) {
      errors.push({
        path: "analysis.purchase_price",
        message: "purchase_price must be positive",
      });
    }

    return { valid: errors.length === 0, errors };
  }

  compute(context: AnalysisContext): FeasibilityAnalyzerResult {
    const { valuation, renovation } = context.outputs;
    if (!valuation || !renovation) {
      return {
        success: false,
        errors: ["ArvCalculatorModule and RenovationEstimatorModule must be computed before FeasibilityAnalyzerModule"],
      };
    }

    const outputs = analyzeFeasibility(
      context.inputs.purchasePrice,
      valuation,
      renovation,
      context.config.feasibility,
    );

    if (outputs.roiPercent < 0) {
      context.warnings.push(`Projected ROI is negative (${outputs.roiPercent.toFixed(2)}%)`);
    }
    if (outputs.purchasePrice > outputs.maxPurchasePrice70) {
      context.warnings.push(
        `Purchase price ${formatCurrency(outputs.purchasePrice)} is above the maximum allowable offer of ${formatCurrency(outputs.maxPurchasePrice70)}`,
      );
    }

    context.outputs.feasibility = outputs;
    return { success: true, outputs };
  }
}
