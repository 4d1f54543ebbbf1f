import { describe, expect, it } from "vitest";

import {
  FeasibilityAnalyzerModule,
  analyzeFeasibility,
  formatCurrency,
  riskFactors,
  riskScore,
} from "../../src/modules/feasibility/feasibility-analyzer.js";
import type { ConfidenceLabel, RenovationEstimate, ValuationResult } from "../../src/types/analysis.js";
import type { FeasibilityConfig } from "../../src/types/config.js";
import { makeContext } from "../helpers.js";

const CONFIG: FeasibilityConfig = {
  maxPurchaseArvPct: 0.7,
  targetRoiPercent: 15,
  ruleTolerancePct: 0.1,
  risk: {
    weights: { priceRatio: 0.5, confidence: 0.3, sampleSize: 0.2 },
    priceRatioFloor: 0.5,
    priceRatioCeiling: 1.0,
    sampleSizeTarget: 5,
  },
};

function valuation(expected: number, confidence: ConfidenceLabel, sampleSize: number): ValuationResult {
  return {
    pointEstimate: expected,
    range: { low: expected * 0.95, expected, high: expected * 1.05 },
    medianPricePerSqft: expected / 1800,
    sampleSize,
    weightedStdDev: 5,
    confidence,
    insufficientData: false,
  };
}

function renovation(total: number): RenovationEstimate {
  return {
    categories: { structural: 0, cosmetic: total, systems: 0, permitting: 0, holding: 0 },
    lineItems: [],
    subtotal: total,
    contingencyRate: 0,
    contingency: 0,
    total,
  };
}

describe("FeasibilityAnalyzer", () => {
  it("applies the 70% rule with renovation subtracted from the cap", () => {
    const report = analyzeFeasibility(350000, valuation(380000, "MODERATE", 4), renovation(111895), CONFIG);

    expect(report.maxPurchasePrice70).toBe(154105);
    expect(report.totalInvestment).toBe(461895);
    expect(report.profit).toBe(-81895);
    expect(report.roiPercent).toBe(-17.73);
    expect(report.purchaseToArvPercent).toBe(92.11);
    expect(report.verdict).toBe("UNFAVORABLE");
    expect(report.findings).toEqual([
      "ROI -17.73% does not exceed the 15% target",
      "Purchase price $350,000.00 exceeds the 70% rule maximum of $154,105.00",
      "Valuation confidence is MODERATE with 4 comparable(s)",
    ]);
  });

  it("scores risk from price ratio, confidence and sample size", () => {
    const report = analyzeFeasibility(350000, valuation(380000, "MODERATE", 4), renovation(111895), CONFIG);

    expect(report.riskFactors.priceRatio).toBeCloseTo(0.8421052631578947, 12);
    expect(report.riskFactors.confidence).toBe(0.5);
    expect(report.riskFactors.sampleSize).toBeCloseTo(0.2, 12);
    expect(report.riskScore).toBe(61.11);
  });

  it("calls a deal PROMISING when ROI and the 70% rule both pass", () => {
    const report = analyzeFeasibility(150000, valuation(300000, "HIGH", 6), renovation(40000), CONFIG);

    expect(report.maxPurchasePrice70).toBe(170000);
    expect(report.profit).toBe(110000);
    expect(report.roiPercent).toBe(57.89);
    expect(report.riskScore).toBe(0);
    expect(report.verdict).toBe("PROMISING");
    expect(report.findings).toEqual([
      "ROI 57.89% is above the 15% target",
      "Purchase price $150,000.00 is within the 70% rule maximum of $170,000.00",
    ]);
  });

  it("allows the purchase price to exceed the cap by the tolerance", () => {
    const report = analyzeFeasibility(180000, valuation(300000, "HIGH", 6), renovation(40000), CONFIG);

    expect(report.roiPercent).toBe(36.36);
    expect(report.riskScore).toBe(10);
    expect(report.verdict).toBe("PROMISING");

    const tooHigh = analyzeFeasibility(190000, valuation(300000, "HIGH", 6), renovation(40000), CONFIG);
    expect(tooHigh.verdict).toBe("UNFAVORABLE");
  });

  it("keeps profit equal to ARV minus total investment at cent precision", () => {
    const report = analyzeFeasibility(85000.1, valuation(262500, "HIGH", 6), renovation(88275.35), CONFIG);

    expect(report.totalInvestment).toBe(173275.45);
    expect(report.profit).toBe(89224.55);
  });

  it("clamps risk factors to the unit interval", () => {
    const factors = riskFactors(400000, valuation(300000, "LOW", 0), CONFIG.risk);
    expect(factors).toEqual({ priceRatio: 1, confidence: 1, sampleSize: 1 });
    expect(riskScore(factors, CONFIG.risk)).toBe(100);

    const cheap = riskFactors(100000, valuation(300000, "HIGH", 9), CONFIG.risk);
    expect(cheap).toEqual({ priceRatio: 0, confidence: 0, sampleSize: 0 });
  });

  it("rejects non-positive prices and weights", () => {
    expect(() => analyzeFeasibility(0, valuation(300000, "HIGH", 6), renovation(0), CONFIG)).toThrow(
      "purchasePrice must be positive",
    );
    expect(() => analyzeFeasibility(100000, valuation(0, "LOW", 0), renovation(0), CONFIG)).toThrow(
      "ARV must be positive",
    );
    expect(() =>
      riskScore(
        { priceRatio: 1, confidence: 1, sampleSize: 1 },
        { ...CONFIG.risk, weights: { priceRatio: 0, confidence: 0, sampleSize: 0 } },
      ),
    ).toThrow(RangeError);
  });

  it("formats currency with sign, grouping and cents", () => {
    expect(formatCurrency(154105)).toBe("$154,105.00");
    expect(formatCurrency(-1495)).toBe("-$1,495.00");
    expect(formatCurrency(0.5)).toBe("$0.50");
  });

  describe("module", () => {
    const module = new FeasibilityAnalyzerModule();

    it("validates the purchase price", () => {
      expect(module.validate({ as_of_date: "2026-10-01", purchase_price: 240000 }).valid).toBe(true);
      expect(module.validate({ purchase_price: "cheap" }).errors).toEqual([
        { path: "analysis", message: "purchase_price must be a number" },
      ]);
      expect(module.validate({ purchase_price: -5 }).errors).toEqual([
        { path: "analysis.purchase_price", message: "purchase_price must be positive" },
      ]);
    });

    it("requires valuation and renovation outputs", () => {
      expect(module.compute(makeContext()).success).toBe(false);
    });

    it("warns about negative ROI and a price above the cap", () => {
      const context = makeContext({ purchasePrice: 350000 });
      context.outputs.valuation = valuation(380000, "MODERATE", 4);
      context.outputs.renovation = renovation(111895);

      const result = module.compute(context);

      expect(result.success).toBe(true);
      expect(context.outputs.feasibility?.roiPercent).toBe(-17.73);
      expect(context.warnings).toEqual([
        "Projected ROI is negative (-17.73%)",
        "Purchase price $350,000.00 is above the maximum allowable offer of $154,105.00",
      ]);
    });
  });
});
