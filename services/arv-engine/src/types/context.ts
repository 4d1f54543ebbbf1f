import type {
  ComparableSelection,
  FeasibilityReport,
  PriceNormalization,
  RenovationEstimate,
  RenovationOptions,
  ValuationResult,
} from "./analysis.js";
import type { EngineConfig } from "./config.js";
import type { ComparableSale, Property } from "./property.js";

export interface AnalysisInputs {
  subject: Property;
  comparables: readonly ComparableSale[];
  asOfDate: string;
  purchasePrice: number;
  strict: boolean;
  renovation: RenovationOptions;
}

export interface AnalysisOutputs {
  comparables?: ComparableSelection;
  pricing?: PriceNormalization;
  valuation?: ValuationResult;
  renovation?: RenovationEstimate;
  feasibility?: FeasibilityReport;
}

// Per-run state; each analysis gets a fresh context
export interface AnalysisContext {
  readonly inputs: AnalysisInputs;
  readonly config: EngineConfig;
  outputs: AnalysisOutputs;
  warnings: string[];
}
