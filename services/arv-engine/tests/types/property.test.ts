import { describe, expect, it } from "vitest";

import { InvalidCoordinateError, InvalidPropertyDataError } from "../../src/errors/index.js";
import {
  createComparableSale,
  createProperty,
  isConditionTag,
  pricePerSqft,
} from "../../src/types/property.js";
import { saleInput, subjectInput } from "../helpers.js";

describe("property records", () => {
  it("maps contract fields onto a frozen property", () => {
    const property = createProperty(
      subjectInput({ address: "412 Maple St", features: ["garage"], last_sale_date: "2019-03-14" }),
    );

    expect(property.squareFootage).toBe(1800);
    expect(property.yearBuilt).toBe(1985);
    expect(property.location).toEqual({ latitude: 30.2672, longitude: -97.7431 });
    expect(property.features).toEqual(["garage"]);
    expect(property.lastSaleDate).toBe("2019-03-14");
    expect(Object.isFrozen(property)).toBe(true);
    expect(Object.isFrozen(property.location)).toBe(true);
  });

  it("defaults features to an empty list and omits absent optional fields", () => {
    const property = createProperty(subjectInput());
    expect(property.features).toEqual([]);
    expect("address" in property).toBe(false);
    expect("lastSalePrice" in property).toBe(false);
  });

  it("rejects non-positive square footage", () => {
    expect(() => createProperty(subjectInput({ square_footage: 0 }))).toThrow(InvalidPropertyDataError);
    expect(() => createProperty(subjectInput({ square_footage: -50 }))).toThrow(
      "subject-1: square_footage must be greater than 0",
    );
  });

  it("rejects unknown conditions and negative room counts", () => {
    expect(() => createProperty(subjectInput({ condition: "gutted" }))).toThrow(
      "subject-1: condition must be one of poor, fair, average, good, excellent",
    );
    expect(() => createProperty(subjectInput({ bedrooms: -1 }))).toThrow(
      "subject-1: bedrooms must be non-negative",
    );
  });

  it("rejects malformed coordinates with the record id", () => {
    expect(() => createProperty(subjectInput({ latitude: 120 }))).toThrow(InvalidCoordinateError);
    expect(() => createProperty(subjectInput({ longitude: 200 }))).toThrow("for subject-1");
  });

  it("normalises sale dates and rejects unparseable ones", () => {
    const sale = createComparableSale(saleInput({ id: "comp-1", sale_date: " 2026-08-15 " }));
    expect(sale.saleDate).toBe("2026-08-15");
    expect(sale.salePrice).toBe(360000);

    let caught: unknown;
    try {
      createComparableSale(saleInput({ id: "comp-2", sale_date: "15/08/2026" }));
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvalidPropertyDataError);
    if (caught instanceof InvalidPropertyDataError) {
      expect(caught.code).toBe("INVALID_PROPERTY_DATA");
      expect(caught.details).toEqual({
        recordId: "comp-2",
        field: "sale_date",
        constraint: "must be a calendar date (yyyy-MM-dd)",
      });
    }
  });

  it.each(["2026", "2026-04", "2026-W14", "2026-09-01T23:30:00-05:00"])(
    "rejects the sale date %s because it is not a full calendar date",
    (saleDate) => {
      expect(() => createComparableSale(saleInput({ id: "comp-partial", sale_date: saleDate }))).toThrow(
        "comp-partial: sale_date must be a calendar date (yyyy-MM-dd)",
      );
    },
  );

  it("rejects a last sale date given as a timestamp", () => {
    expect(() => createProperty(subjectInput({ last_sale_date: "2019-03-14T00:00:00Z" }))).toThrow(
      "subject-1: last_sale_date must be a calendar date (yyyy-MM-dd)",
    );
  });

  it("rejects non-positive sale prices", () => {
    expect(() => createComparableSale(saleInput({ id: "comp-3", sale_price: 0 }))).toThrow(
      "comp-3: sale_price must be greater than 0",
    );
  });

  it("computes price per square foot", () => {
    const sale = createComparableSale(saleInput({ id: "comp-4", sale_price: 376250, square_footage: 1750 }));
    expect(pricePerSqft(sale)).toBe(215);
  });

  it("recognises condition tags", () => {
    expect(isConditionTag("excellent")).toBe(true);
    expect(isConditionTag("Excellent")).toBe(false);
    expect(isConditionTag(3)).toBe(false);
  });
});
