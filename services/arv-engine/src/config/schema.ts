import { z } from "zod";

const nonNegative = z.number().finite().nonnegative();

const conditionMultipliersSchema = z.object({
  poor: nonNegative,
  fair: nonNegative,
  average: nonNegative,
  good: nonNegative,
  excellent: nonNegative,
});

const categoryUnitCostSchema = z.object({
  unitCostPerSqft: nonNegative,
  conditionMultipliers: conditionMultipliersSchema,
});

const costCategorySchema = z.enum(["structural", "cosmetic", "systems"]);

export const unitCostCatalogSchema = z.object({
  version: z.string().min(1),
  categories: z.object({
    structural: categoryUnitCostSchema,
    cosmetic: categoryUnitCostSchema,
    systems: categoryUnitCostSchema,
  }),
  lineItems: z
    .record(
      z.object({
        category: costCategorySchema,
        unit: z.enum(["each", "sqft"]),
        grades: z.record(nonNegative),
      }),
    )
    .default({}),
});

const similarityWeightsSchema = z.object({
  squareFootage: nonNegative.default(1),
  bedrooms: nonNegative.default(0.25),
  bathrooms: nonNegative.default(0.25),
  condition: nonNegative.default(0.5),
  distance: nonNegative.default(0),
  age: nonNegative.default(0),
});

const selectionSchema = z
  .object({
    radiusMiles: z.number().finite().positive().default(2.0),
    monthsBack: z.number().int().positive().default(6),
    minComps: z.number().int().positive().default(3),
    maxComps: z.number().int().positive().nullable().default(null),
    weights: similarityWeightsSchema.default({}),
  })
  .refine((value) => value.maxComps === null || value.maxComps >= value.minComps, {
    message: "maxComps must be null or at least minComps",
    path: ["maxComps"],
  });

const pricingSchema = z.object({
  outlierStdDevBound: z.number().finite().positive().default(2),
  outlierMinSpreadPct: nonNegative.default(0.05),
});

const valuationSchema = z.object({
  spreadFactor: nonNegative.default(1),
  highConfidenceMinComps: z.number().int().positive().default(5),
});

const renovationSchema = z.object({
  contingencyRate: z.number().finite().min(0).max(1).default(0.15),
  catalog: unitCostCatalogSchema.optional(),
});

const riskSchema = z
  .object({
    weights: z
      .object({
        priceRatio: nonNegative.default(0.5),
        confidence: nonNegative.default(0.3),
        sampleSize: nonNegative.default(0.2),
      })
      .default({})
      .refine((w) => w.priceRatio + w.confidence + w.sampleSize > 0, {
        message: "at least one risk weight must be positive",
      }),
    priceRatioFloor: nonNegative.default(0.5),
    priceRatioCeiling: z.number().finite().positive().default(1.0),
    sampleSizeTarget: z.number().int().positive().default(5),
  })
  .refine((value) => value.priceRatioCeiling > value.priceRatioFloor, {
    message: "priceRatioCeiling must be greater than priceRatioFloor",
    path: ["priceRatioCeiling"],
  });

const feasibilitySchema = z.object({
  maxPurchaseArvPct: z.number().finite().positive().max(1).default(0.7),
  targetRoiPercent: z.number().finite().default(15),
  ruleTolerancePct: nonNegative.default(0.1),
  risk: riskSchema.default({}),
});

export const engineConfigSchema = z
  .object({
    selection: selectionSchema.default({}),
    pricing: pricingSchema.default({}),
    valuation: valuationSchema.default({}),
    renovation: renovationSchema.default({}),
    feasibility: feasibilitySchema.default({}),
  })
  .refine((value) => value.valuation.highConfidenceMinComps >= value.selection.minComps, {
    message: "highConfidenceMinComps must be at least selection.minComps",
    path: ["valuation", "highConfidenceMinComps"],
  });

export type EngineConfigOverrides = z.input<typeof engineConfigSchema>;
export type UnitCostCatalogInput = z.input<typeof unitCostCatalogSchema>;
