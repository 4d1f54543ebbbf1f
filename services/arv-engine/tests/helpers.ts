import { resolveConfig } from "../src/config/index.js";
import type { EngineConfig } from "../src/types/config.js";
import type { AnalysisContext, AnalysisInputs } from "../src/types/context.js";
import { createComparableSale, createProperty } from "../src/types/property.js";
import type { ComparableSale, ComparableSaleInput, Property, PropertyInput } from "../src/types/property.js";

// Roughly 1/69 of a degree of latitude per mile
export const MILE_IN_LATITUDE = 1 / 69;

export const SUBJECT_LOCATION = { latitude: 30.2672, longitude: -97.7431 };

export function subjectInput(overrides: Partial<PropertyInput> = {}): PropertyInput {
  return {
    id: "subject-1",
    latitude: SUBJECT_LOCATION.latitude,
    longitude: SUBJECT_LOCATION.longitude,
    bedrooms: 3,
    bathrooms: 2,
    square_footage: 1800,
    year_built: 1985,
    condition: "fair",
    ...overrides,
  };
}

export function saleInput(overrides: Partial<ComparableSaleInput> & { id: string }): ComparableSaleInput {
  return {
    latitude: SUBJECT_LOCATION.latitude,
    longitude: SUBJECT_LOCATION.longitude,
    bedrooms: 3,
    bathrooms: 2,
    square_footage: 1800,
    year_built: 1985,
    condition: "fair",
    sale_price: 360000,
    sale_date: "2026-09-01",
    ...overrides,
  };
}

export function makeSubject(overrides: Partial<PropertyInput> = {}): Property {
  return createProperty(subjectInput(overrides));
}

export function makeSale(overrides: Partial<ComparableSaleInput> & { id: string }): ComparableSale {
  return createComparableSale(saleInput(overrides));
}

export function makeContext(inputs: Partial<AnalysisInputs> = {}, config: EngineConfig = resolveConfig()): AnalysisContext {
  return {
    inputs: {
      subject: makeSubject(),
      comparables: [],
      asOfDate: "2026-10-01",
      purchasePrice: 240000,
      strict: false,
      renovation: { contingencyRate: config.renovation.contingencyRate },
      ...inputs,
    },
    config,
    outputs: {},
    warnings: [],
  };
}
