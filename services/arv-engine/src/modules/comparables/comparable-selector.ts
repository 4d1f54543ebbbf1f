import type { DateTime } from "luxon";
import { coerceDate, daysElapsed, monthsElapsed, parseDate, toIsoDate, windowStart } from "../../core/date-utils.js";
import { boundingBox, distanceMiles, isInBoundingBox } from "../../core/geo.js";
import type {
  ComparableSelection,
  ComparableSet,
  ExcludedComparable,
  SelectedComparable,
} from "../../types/analysis.js";
import type { SelectionConfig, SimilarityWeights } from "../../types/config.js";
import type { AnalysisContext } from "../../types/context.js";
import type { Module, ModuleResult, ValidationError, ValidationResult } from "../../types/module.js";
import type { ComparableSale, Property } from "../../types/property.js";

export type ComparableSelectorOutputs = ComparableSelection;

type ComparableSelectorResult = ModuleResult<ComparableSelectorOutputs>;

interface ScoredCandidate {
  sale: ComparableSale;
  distanceMiles: number;
  monthsSinceSale: number;
  daysSinceSale: number;
  similarityScore: number;
}

/**
 * Weighted dissimilarity between subject and candidate; 0 is an identical match.
 */
export function similarityScore(
  subject: Property,
  candidate: Property,
  weights: SimilarityWeights,
  distance = 0,
  radiusMiles = 1,
): number {
  const sqftTerm = Math.abs(candidate.squareFootage - subject.squareFootage) / subject.squareFootage;
  const bedroomTerm = Math.abs(candidate.bedrooms - subject.bedrooms);
  const bathroomTerm = Math.abs(candidate.bathrooms - subject.bathrooms);
  const conditionTerm = candidate.condition === subject.condition ? 0 : 1;
  const distanceTerm = radiusMiles > 0 ? distance / radiusMiles : 0;
  // Age difference counted per decade
  const ageTerm = Math.abs(candidate.yearBuilt - subject.yearBuilt) / 10;

  return (
    weights.squareFootage * sqftTerm +
    weights.bedrooms * bedroomTerm +
    weights.bathrooms * bathroomTerm +
    weights.condition * conditionTerm +
    weights.distance * distanceTerm +
    weights.age * ageTerm
  );
}

function compareScored(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.similarityScore !== b.similarityScore) {
    return a.similarityScore - b.similarityScore;
  }
  if (a.distanceMiles !== b.distanceMiles) {
    return a.distanceMiles - b.distanceMiles;
  }
  if (a.sale.saleDate !== b.sale.saleDate) {
    return a.sale.saleDate < b.sale.saleDate ? 1 : -1;
  }
  if (a.sale.id === b.sale.id) {
    return 0;
  }
  return a.sale.id < b.sale.id ? -1 : 1;
}

function assertSelectionConfig(config: SelectionConfig): void {
  if (!Number.isFinite(config.radiusMiles) || config.radiusMiles <= 0) {
    throw new RangeError("radiusMiles must be a positive number");
  }
  if (!Number.isInteger(config.monthsBack) || config.monthsBack <= 0) {
    throw new RangeError("monthsBack must be a positive integer");
  }
  if (!Number.isInteger(config.minComps) || config.minComps <= 0) {
    throw new RangeError("minComps must be a positive integer");
  }
  if (config.maxComps !== null && (!Number.isInteger(config.maxComps) || config.maxComps <= 0)) {
    throw new RangeError("maxComps must be null or a positive integer");
  }
}

/**
 * Filter candidates to the radius and look-back window, rank them by
 * similarity to the subject and weight the survivors. Falling short of
 * minComps yields a set marked insufficient rather than an error.
 */
export function selectComparables(
  subject: Property,
  candidates: readonly ComparableSale[],
  asOfDate: DateTime | string,
  config: SelectionConfig,
): ComparableSelection {
  assertSelectionConfig(config);

  const asOf = coerceDate(asOfDate);
  const cutoff = windowStart(asOf, config.monthsBack);
  const box = boundingBox(subject.location, config.radiusMiles);

  const excluded: ExcludedComparable[] = [];
  const scored: ScoredCandidate[] = [];

  for (const sale of candidates) {
    if (!isInBoundingBox(sale.location, box)) {
      excluded.push({ id: sale.id, reason: "outside-radius" });
      continue;
    }
    const distance = distanceMiles(subject.location, sale.location);
    if (distance > config.radiusMiles) {
      excluded.push({ id: sale.id, reason: "outside-radius" });
      continue;
    }

    const saleDate = parseDate(sale.saleDate);
    if (saleDate > asOf) {
      excluded.push({ id: sale.id, reason: "future-sale" });
      continue;
    }
    if (saleDate < cutoff) {
      excluded.push({ id: sale.id, reason: "stale-sale" });
      continue;
    }

    scored.push({
      sale,
      distanceMiles: distance,
      monthsSinceSale: monthsElapsed(saleDate, asOf),
      daysSinceSale: daysElapsed(saleDate, asOf),
      similarityScore: similarityScore(subject, sale, config.weights, distance, config.radiusMiles),
    });
  }

  scored.sort(compareScored);

  const cap = config.maxComps ?? scored.length;
  for (const dropped of scored.slice(cap)) {
    excluded.push({ id: dropped.sale.id, reason: "over-cap" });
  }

  const comps: SelectedComparable[] = scored.slice(0, cap).map((candidate) =>
    Object.freeze({
      ...candidate,
      weight: 1 / (1 + candidate.similarityScore),
    }),
  );

  const comparableSet: ComparableSet = Object.freeze({
    comps: Object.freeze(comps),
    minComps: config.minComps,
    sufficient: comps.length >= config.minComps,
  });

  return Object.freeze({
    subjectId: subject.id,
    asOfDate: toIsoDate(asOf),
    comparableSet,
    excluded: Object.freeze(excluded),
    candidatesConsidered: candidates.length,
  });
}

export class ComparableSelectorModule implements Module<ComparableSelectorOutputs> {
  readonly name = "comparables";
  readonly version = "0.1.0";
  readonly dependencies: readonly string[] = [];

  validate(inputs: unknown): ValidationResult {
    const errors: ValidationError[] = [];

    if (!Array.isArray(inputs)) {
      errors.push({ path: "comparables", message: "comparables must be an array" });
      return { valid: false, errors };
    }

    const seen = new Set<string>();
    inputs.forEach((candidate: unknown, index) => {
      if (typeof candidate !== "object" || candidate === null || !("id" in candidate)) {
        errors.push({ path: `comparables[${index}]`, message: "comparable must be an object with an id" });
        return;
      }
      const id = candidate.id;
      if (typeof id === "string") {
        if (seen.has(id)) {
          errors.push({ path: `comparables[${index}].id`, message: `duplicate comparable id ${id}` });
        }
        seen.add(id);
      }
    });

    return { valid: errors.length === 0, errors };
  }

  compute(context: AnalysisContext): ComparableSelectorResult {
    const { subject, comparables, asOfDate } = context.inputs;
    const outputs = selectComparables(subject, comparables, asOfDate, context.config.selection);

    const { comps, sufficient, minComps } = outputs.comparableSet;
    if (!sufficient) {
      context.warnings.push(
        `Only ${comps.length} of ${outputs.candidatesConsidered} candidate sales qualified as comparables (minimum ${minComps})`,
      );
    }

    context.outputs.comparables = outputs;
    return { success: true, outputs };
  }
}
