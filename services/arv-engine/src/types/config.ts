import type { ConditionTag } from "./property.js";

export type CostCategory = "structural" | "cosmetic" | "systems";

export type LineItemUnit = "each" | "sqft";

export interface CategoryUnitCost {
  unitCostPerSqft: number;
  conditionMultipliers: Record<ConditionTag, number>;
}

export interface LineItemDefinition {
  category: CostCategory;
  unit: LineItemUnit;
  grades: Record<string, number>;
}

export interface UnitCostCatalog {
  version: string;
  categories: Record<CostCategory, CategoryUnitCost>;
  lineItems: Record<string, LineItemDefinition>;
}

export interface SimilarityWeights {
  squareFootage: number;
  bedrooms: number;
  bathrooms: number;
  condition: number;
  distance: number;
  age: number;
}

export interface SelectionConfig {
  radiusMiles: number;
  monthsBack: number;
  minComps: number;
  maxComps: number | null;
  weights: SimilarityWeights;
}

export interface PricingConfig {
  outlierStdDevBound: number;
  outlierMinSpreadPct: number;
}

export interface ValuationConfig {
  spreadFactor: number;
  highConfidenceMinComps: number;
}

export interface RenovationConfig {
  contingencyRate: number;
  catalog: UnitCostCatalog;
}

export interface RiskWeights {
  priceRatio: number;
  confidence: number;
  sampleSize: number;
}

export interface RiskConfig {
  weights: RiskWeights;
  priceRatioFloor: number;
  priceRatioCeiling: number;
  sampleSizeTarget: number;
}

export interface FeasibilityConfig {
  maxPurchaseArvPct: number;
  targetRoiPercent: number;
  ruleTolerancePct: number;
  risk: RiskConfig;
}

export interface EngineConfig {
  selection: SelectionConfig;
  pricing: PricingConfig;
  valuation: ValuationConfig;
  renovation: RenovationConfig;
  feasibility: FeasibilityConfig;
}
