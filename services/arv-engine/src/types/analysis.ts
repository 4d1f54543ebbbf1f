import type { ComparableSale } from "./property.js";

export type ConfidenceLabel = "LOW" | "MODERATE" | "HIGH";

export type ExclusionReason = "outside-radius" | "stale-sale" | "future-sale" | "over-cap";

export interface SelectedComparable {
  readonly sale: ComparableSale;
  readonly distanceMiles: number;
  readonly monthsSinceSale: number;
  readonly daysSinceSale: number;
  readonly similarityScore: number;
  // 1 / (1 + similarityScore), in (0, 1]
  readonly weight: number;
}

export interface ComparableSet {
  readonly comps: readonly SelectedComparable[];
  readonly minComps: number;
  readonly sufficient: boolean;
}

export interface ExcludedComparable {
  readonly id: string;
  readonly reason: ExclusionReason;
}

export interface ComparableSelection {
  readonly subjectId: string;
  readonly asOfDate: string;
  readonly comparableSet: ComparableSet;
  readonly excluded: readonly ExcludedComparable[];
  readonly candidatesConsidered: number;
}

export interface PricedComparable {
  readonly id: string;
  readonly pricePerSqft: number;
  readonly weight: number;
  readonly saleDate: string;
  readonly monthsSinceSale: number;
}

export interface PriceNormalization {
  readonly medianPricePerSqft: number;
  readonly sampleSize: number;
  readonly weightedStdDev: number;
  readonly weightedMeanPricePerSqft: number;
  readonly retained: readonly PricedComparable[];
  readonly rejected: readonly PricedComparable[];
  // False when the comp set fell short of minComps and was priced best-effort
  readonly fromSufficientSet: boolean;
}

export type RenovationCategory = "structural" | "cosmetic" | "systems" | "permitting" | "holding";

export interface RenovationLineItem {
  readonly item: string;
  readonly grade: string;
  readonly category: RenovationCategory;
  readonly quantity: number;
  readonly unitCost: number;
  readonly cost: number;
}

export interface RenovationEstimate {
  readonly categories: Readonly<Record<RenovationCategory, number>>;
  readonly lineItems: readonly RenovationLineItem[];
  readonly subtotal: number;
  readonly contingencyRate: number;
  readonly contingency: number;
  readonly total: number;
}

export interface ValueRange {
  readonly low: number;
  readonly expected: number;
  readonly high: number;
}

export interface ValuationResult {
  readonly pointEstimate: number;
  readonly range: Readonly<ValueRange>;
  readonly medianPricePerSqft: number;
  readonly sampleSize: number;
  readonly weightedStdDev: number;
  readonly confidence: ConfidenceLabel;
  readonly insufficientData: boolean;
}

export interface RiskFactors {
  readonly priceRatio: number;
  readonly confidence: number;
  readonly sampleSize: number;
}

export type FeasibilityVerdict = "PROMISING" | "UNFAVORABLE";

export interface FeasibilityReport {
  readonly purchasePrice: number;
  readonly renovationCost: number;
  readonly totalInvestment: number;
  readonly arv: number;
  readonly profit: number;
  readonly roiPercent: number;
  readonly maxPurchasePrice70: number;
  readonly purchaseToArvPercent: number;
  readonly riskScore: number;
  readonly riskFactors: Readonly<RiskFactors>;
  readonly verdict: FeasibilityVerdict;
  readonly findings: readonly string[];
}

export interface LineItemRequest {
  readonly item: string;
  readonly grade: string;
  readonly quantity?: number;
}

export interface RenovationOptions {
  readonly contingencyRate: number;
  readonly permittingCost?: number;
  readonly holdingCost?: number;
  readonly lineItems?: readonly LineItemRequest[];
}
