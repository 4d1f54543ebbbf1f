// Core primitives
export {
  EARTH_RADIUS_MILES,
  assertValidCoordinate,
  boundingBox,
  distanceMiles,
  isInBoundingBox,
  isValidCoordinate,
  withinRadius,
} from "./core/geo.js";
export type { BoundingBox } from "./core/geo.js";
export {
  parseDate,
  tryParseDate,
  toIsoDate,
  monthsElapsed,
  daysElapsed,
  windowStart,
} from "./core/date-utils.js";
export { clamp, roundTo, roundCurrency, sum } from "./core/math-utils.js";
export {
  MAD_TO_SIGMA,
  rejectOutliers,
  weightedMad,
  weightedMean,
  weightedMedian,
  weightedStdDev,
} from "./core/stats.js";
export type { OutlierOptions, OutlierSplit, WeightedSample } from "./core/stats.js";

// Errors
export {
  ArvEngineError,
  ConfigurationError,
  InsufficientCompsError,
  InvalidCoordinateError,
  InvalidPropertyDataError,
  InvalidRenovationInputError,
  describeError,
} from "./errors/index.js";
export type { ArvEngineErrorCode, ErrorDetails } from "./errors/index.js";

// Configuration
export {
  DEFAULT_CATALOG_PATH,
  configFromEnv,
  engineConfigSchema,
  loadUnitCostCatalog,
  parseUnitCostCatalog,
  resolveConfig,
  unitCostCatalogSchema,
} from "./config/index.js";
export type { EngineConfigOverrides, UnitCostCatalogInput } from "./config/index.js";

// Logging
export { createLogger, formatLine, redactSensitive, silentLogger } from "./logging/logger.js";
export type { LogLevel, LogMeta, Logger, LoggerOptions } from "./logging/logger.js";

// Contract validation
export { validateRequest } from "./validate/validate.js";
export type { ContractValidationResult } from "./validate/validate.js";

// Domain records
export {
  CONDITION_TAGS,
  createComparableSale,
  createProperty,
  isConditionTag,
  pricePerSqft,
} from "./types/property.js";

// Types (all type-only exports)
export type {
  ComparableSale,
  ComparableSaleInput,
  ConditionTag,
  GeoPoint,
  Property,
  PropertyInput,
} from "./types/property.js";
export type {
  AnalysisInput,
  ArvEngineInputs,
  ContractInput,
  LineItemInput,
  RenovationInput,
} from "./types/inputs.js";
export type {
  ComparableSelection,
  ComparableSet,
  ConfidenceLabel,
  ExcludedComparable,
  ExclusionReason,
  FeasibilityReport,
  FeasibilityVerdict,
  LineItemRequest,
  PriceNormalization,
  PricedComparable,
  RenovationCategory,
  RenovationEstimate,
  RenovationLineItem,
  RenovationOptions,
  RiskFactors,
  SelectedComparable,
  ValuationResult,
  ValueRange,
} from "./types/analysis.js";
export type {
  CategoryUnitCost,
  CostCategory,
  EngineConfig,
  FeasibilityConfig,
  LineItemDefinition,
  LineItemUnit,
  PricingConfig,
  RenovationConfig,
  RiskConfig,
  RiskWeights,
  SelectionConfig,
  SimilarityWeights,
  UnitCostCatalog,
  ValuationConfig,
} from "./types/config.js";
export type { AnalysisContext, AnalysisInputs, AnalysisOutputs } from "./types/context.js";
export type { ValidationResult, ValidationError, ModuleResult, Module } from "./types/module.js";

// Modules
export * from "./modules/index.js";

// Engine
export { ArvEngine, createSummaryReport } from "./engine/arv-engine.js";
export type { ArvEngineOptions, ArvEngineResult, ArvEngineValidation } from "./engine/arv-engine.js";
