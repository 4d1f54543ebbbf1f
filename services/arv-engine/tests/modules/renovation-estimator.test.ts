import { describe, expect, it } from "vitest";

import { loadUnitCostCatalog } from "../../src/config/index.js";
import { InvalidRenovationInputError } from "../../src/errors/index.js";
import {
  RenovationEstimatorModule,
  estimateRenovation,
} from "../../src/modules/renovation/renovation-estimator.js";
import type { UnitCostCatalog } from "../../src/types/config.js";
import { makeContext, makeSubject } from "../helpers.js";

describe("RenovationEstimator", () => {
  const catalog = loadUnitCostCatalog();
  const subject = makeSubject();

  it("scales per-sqft category costs by the subject's condition", () => {
    const estimate = estimateRenovation(subject, catalog, { contingencyRate: 0.15 });

    expect(estimate.categories).toEqual({
      structural: 18000,
      cosmetic: 36000,
      systems: 16200,
      permitting: 0,
      holding: 0,
    });
    expect(estimate.subtotal).toBe(70200);
    expect(estimate.contingencyRate).toBe(0.15);
    expect(estimate.contingency).toBe(10530);
    expect(estimate.total).toBe(80730);
    expect(estimate.lineItems).toEqual([]);
  });

  it("allows zero-cost categories", () => {
    const estimate = estimateRenovation(makeSubject({ condition: "excellent" }), catalog, { contingencyRate: 0.1 });

    expect(estimate.categories.structural).toBe(0);
    expect(estimate.categories.systems).toBe(0);
    expect(estimate.categories.cosmetic).toBe(4500);
    expect(estimate.total).toBe(4950);
  });

  it("adds line items, permitting and holding costs", () => {
    const estimate = estimateRenovation(subject, catalog, {
      contingencyRate: 0.15,
      permittingCost: 2500,
      holdingCost: 6000,
      lineItems: [
        { item: "kitchen", grade: "mid-range" },
        { item: "flooring", grade: "laminate" },
      ],
    });

    expect(estimate.lineItems).toEqual([
      { item: "kitchen", grade: "mid-range", category: "cosmetic", quantity: 1, unitCost: 30000, cost: 30000 },
      { item: "flooring", grade: "laminate", category: "cosmetic", quantity: 1800, unitCost: 7, cost: 12600 },
    ]);
    expect(estimate.categories).toEqual({
      structural: 18000,
      cosmetic: 78600,
      systems: 16200,
      permitting: 2500,
      holding: 6000,
    });
    expect(estimate.subtotal).toBe(121300);
    expect(estimate.contingency).toBe(18195);
    expect(estimate.total).toBe(139495);
  });

  it("keeps total equal to subtotal plus contingency", () => {
    const estimate = estimateRenovation(subject, catalog, {
      contingencyRate: 0.12,
      lineItems: [
        { item: "roof", grade: "metal" },
        { item: "windows", grade: "energy-efficient", quantity: 14 },
        { item: "flooring", grade: "hardwood", quantity: 500 },
      ],
    });

    expect(estimate.categories.structural).toBe(18000 + 18000 + 10500);
    expect(estimate.categories.cosmetic).toBe(36000 + 6000);
    expect(estimate.total).toBe(estimate.subtotal + estimate.contingency);
  });

  it("rejects unknown items and grades", () => {
    expect(() =>
      estimateRenovation(subject, catalog, { contingencyRate: 0.15, lineItems: [{ item: "pool", grade: "basic" }] }),
    ).toThrow('lineItems[0].item "pool" is not in catalog unit-costs.v1');
    expect(() =>
      estimateRenovation(subject, catalog, {
        contingencyRate: 0.15,
        lineItems: [{ item: "kitchen", grade: "gold" }],
      }),
    ).toThrow('lineItems[0].grade "gold" is not a grade of kitchen (expected one of basic, mid-range, high-end)');
    expect(() =>
      estimateRenovation(subject, catalog, {
        contingencyRate: 0.15,
        lineItems: [{ item: "toString", grade: "basic" }],
      }),
    ).toThrow(InvalidRenovationInputError);
  });

  it("rejects negative amounts and out-of-range contingency", () => {
    expect(() => estimateRenovation(subject, catalog, { contingencyRate: 1.5 })).toThrow(
      "contingencyRate must be between 0 and 1",
    );
    expect(() => estimateRenovation(subject, catalog, { contingencyRate: 0.15, permittingCost: -1 })).toThrow(
      "permittingCost must not be negative",
    );
    expect(() =>
      estimateRenovation(subject, catalog, {
        contingencyRate: 0.15,
        lineItems: [{ item: "hvac", grade: "repair", quantity: -2 }],
      }),
    ).toThrow("lineItems[0].quantity must not be negative");
  });

  it("rejects a catalog with negative multipliers", () => {
    const broken: UnitCostCatalog = {
      ...catalog,
      categories: {
        ...catalog.categories,
        systems: {
          unitCostPerSqft: 15,
          conditionMultipliers: { poor: 1, fair: -0.6, average: 0.3, good: 0.1, excellent: 0 },
        },
      },
    };
    expect(() => estimateRenovation(subject, broken, { contingencyRate: 0.15 })).toThrow(
      "catalog.categories.systems.conditionMultipliers.fair must not be negative",
    );
  });

  describe("module", () => {
    const module = new RenovationEstimatorModule();

    it("accepts a missing renovation block", () => {
      expect(module.validate(undefined)).toEqual({ valid: true, errors: [] });
    });

    it("reports out-of-range request fields", () => {
      const result = module.validate({
        contingency_rate: 2,
        holding_cost: -100,
        line_items: [{ item: "paint", grade: "interior", quantity: -1 }],
      });
      expect(result.errors.map((e) => e.path)).toEqual([
        "renovation.contingency_rate",
        "renovation.holding_cost",
        "renovation.line_items[0].quantity",
      ]);
    });

    it("estimates from the configured catalog", () => {
      const context = makeContext();
      const result = module.compute(context);

      expect(result.success).toBe(true);
      expect(context.outputs.renovation?.total).toBe(80730);
    });
  });
});
