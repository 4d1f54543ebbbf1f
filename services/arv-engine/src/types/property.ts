import { assertValidCoordinate } from "../core/geo.js";
import { toIsoDate, tryParseDate } from "../core/date-utils.js";
import { InvalidPropertyDataError } from "../errors/index.js";

export const CONDITION_TAGS = ["poor", "fair", "average", "good", "excellent"] as const;

export type ConditionTag = (typeof CONDITION_TAGS)[number];

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

export interface Property {
  readonly id: string;
  readonly address?: string;
  readonly location: Readonly<GeoPoint>;
  readonly bedrooms: number;
  readonly bathrooms: number;
  readonly squareFootage: number;
  readonly yearBuilt: number;
  readonly condition: ConditionTag;
  readonly lastSalePrice?: number;
  readonly lastSaleDate?: string;
  readonly features: readonly string[];
}

export interface ComparableSale extends Property {
  readonly salePrice: number;
  readonly saleDate: string;
}

// Raw shapes as supplied by the data-acquisition layer (contract field names)
export interface PropertyInput {
  id: string;
  address?: string;
  latitude: number;
  longitude: number;
  bedrooms: number;
  bathrooms: number;
  square_footage: number;
  year_built: number;
  condition: string;
  last_sale_price?: number;
  last_sale_date?: string;
  features?: string[];
}

export interface ComparableSaleInput extends PropertyInput {
  sale_price: number;
  sale_date: string;
}

export function isConditionTag(value: unknown): value is ConditionTag {
  return typeof value === "string" && CONDITION_TAGS.some((tag) => tag === value);
}

function requireId(input: { id?: unknown }): string {
  if (typeof input.id !== "string" || input.id.trim().length === 0) {
    throw new InvalidPropertyDataError("<unknown>", "id", "must be a non-empty string");
  }
  return input.id.trim();
}

function requireFinite(id: string, field: string, value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidPropertyDataError(id, field, "must be a finite number");
  }
  return value;
}

function requirePositive(id: string, field: string, value: unknown): number {
  const parsed = requireFinite(id, field, value);
  if (parsed <= 0) {
    throw new InvalidPropertyDataError(id, field, "must be greater than 0");
  }
  return parsed;
}

function requireNonNegative(id: string, field: string, value: unknown): number {
  const parsed = requireFinite(id, field, value);
  if (parsed < 0) {
    throw new InvalidPropertyDataError(id, field, "must be non-negative");
  }
  return parsed;
}

function requireDate(id: string, field: string, value: unknown): string {
  const parsed = tryParseDate(value);
  if (!parsed) {
    throw new InvalidPropertyDataError(id, field, "must be a calendar date (yyyy-MM-dd)");
  }
  return toIsoDate(parsed);
}

function buildProperty(input: PropertyInput): Property {
  const id = requireId(input);
  const location = { latitude: input.latitude, longitude: input.longitude };
  if (typeof location.latitude !== "number" || typeof location.longitude !== "number") {
    throw new InvalidPropertyDataError(id, "location", "must include numeric latitude and longitude");
  }
  assertValidCoordinate(location, id);

  const condition = input.condition;
  if (!isConditionTag(condition)) {
    throw new InvalidPropertyDataError(
      id,
      "condition",
      `must be one of ${CONDITION_TAGS.join(", ")}`,
    );
  }

  const yearBuilt = requireFinite(id, "year_built", input.year_built);
  if (!Number.isInteger(yearBuilt)) {
    throw new InvalidPropertyDataError(id, "year_built", "must be an integer year");
  }

  return {
    id,
    ...(input.address !== undefined ? { address: input.address } : {}),
    location: Object.freeze(location),
    bedrooms: requireNonNegative(id, "bedrooms", input.bedrooms),
    bathrooms: requireNonNegative(id, "bathrooms", input.bathrooms),
    squareFootage: requirePositive(id, "square_footage", input.square_footage),
    yearBuilt,
    condition,
    ...(input.last_sale_price !== undefined
      ? { lastSalePrice: requirePositive(id, "last_sale_price", input.last_sale_price) }
      : {}),
    ...(input.last_sale_date !== undefined
      ? { lastSaleDate: requireDate(id, "last_sale_date", input.last_sale_date) }
      : {}),
    features: Object.freeze([...(input.features ?? [])]),
  };
}

export function createProperty(input: PropertyInput): Property {
  return Object.freeze(buildProperty(input));
}

export function createComparableSale(input: ComparableSaleInput): ComparableSale {
  const property = buildProperty(input);
  return Object.freeze({
    ...property,
    salePrice: requirePositive(property.id, "sale_price", input.sale_price),
    saleDate: requireDate(property.id, "sale_date", input.sale_date),
  });
}

export function pricePerSqft(sale: ComparableSale): number {
  return sale.salePrice / sale.squareFootage;
}
