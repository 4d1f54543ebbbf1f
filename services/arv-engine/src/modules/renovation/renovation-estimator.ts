import { roundCurrency, sum } from "../../core/math-utils.js";
import { InvalidRenovationInputError } from "../../errors/index.js";
import type {
  LineItemRequest,
  RenovationCategory,
  RenovationEstimate,
  RenovationLineItem,
  RenovationOptions,
} from "../../types/analysis.js";
import type { CostCategory, UnitCostCatalog } from "../../types/config.js";
import type { AnalysisContext } from "../../types/context.js";
import type { RenovationInput } from "../../types/inputs.js";
import type { Module, ModuleResult, ValidationError, ValidationResult } from "../../types/module.js";
import type { Property } from "../../types/property.js";

export type RenovationEstimatorOutputs = RenovationEstimate;

type RenovationEstimatorResult = ModuleResult<RenovationEstimatorOutputs>;

const COST_CATEGORIES: readonly CostCategory[] = ["structural", "cosmetic", "systems"];

const RENOVATION_CATEGORIES: readonly RenovationCategory[] = [
  ...COST_CATEGORIES,
  "permitting",
  "holding",
];

function requireNonNegative(path: string, value: number | undefined): number {
  if (value === undefined) {
    return 0;
  }
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidRenovationInputError(path, "must be a finite number");
  }
  if (value < 0) {
    throw new InvalidRenovationInputError(path, "must not be negative");
  }
  return value;
}

function priceLineItem(
  request: LineItemRequest,
  index: number,
  subject: Property,
  catalog: UnitCostCatalog,
): RenovationLineItem {
  const path = `lineItems[${index}]`;
  const definition = Object.prototype.hasOwnProperty.call(catalog.lineItems, request.item)
    ? catalog.lineItems[request.item]
    : undefined;
  if (!definition) {
    throw new InvalidRenovationInputError(
      `${path}.item`,
      `"${request.item}" is not in catalog ${catalog.version}`,
    );
  }

  const unitCost = Object.prototype.hasOwnProperty.call(definition.grades, request.grade)
    ? definition.grades[request.grade]
    : undefined;
  if (unitCost === undefined) {
    const grades = Object.keys(definition.grades).join(", ");
    throw new InvalidRenovationInputError(
      `${path}.grade`,
      `"${request.grade}" is not a grade of ${request.item} (expected one of ${grades})`,
    );
  }
  requireNonNegative(`catalog.lineItems.${request.item}.grades.${request.grade}`, unitCost);

  const defaultQuantity = definition.unit === "sqft" ? subject.squareFootage : 1;
  const quantity = requireNonNegative(`${path}.quantity`, request.quantity ?? defaultQuantity);

  return Object.freeze({
    item: request.item,
    grade: request.grade,
    category: definition.category,
    quantity,
    unitCost,
    cost: roundCurrency(unitCost * quantity),
  });
}

/**
 * Estimate renovation cost for a subject property.
 *
 * Each catalog category contributes unitCostPerSqft × squareFootage scaled by
 * the multiplier for the subject's condition. Requested line items, permitting
 * and holding costs are added on top, and contingency is charged on the subtotal.
 */
export function estimateRenovation(
  subject: Property,
  catalog: UnitCostCatalog,
  options: RenovationOptions,
): RenovationEstimate {
  const contingencyRate = requireNonNegative("contingencyRate", options.contingencyRate);
  if (contingencyRate > 1) {
    throw new InvalidRenovationInputError("contingencyRate", "must be between 0 and 1");
  }

  const categories: Record<RenovationCategory, number> = {
    structural: 0,
    cosmetic: 0,
    systems: 0,
    permitting: requireNonNegative("permittingCost", options.permittingCost),
    holding: requireNonNegative("holdingCost", options.holdingCost),
  };

  for (const category of COST_CATEGORIES) {
    const entry = catalog.categories[category];
    const unitCost = requireNonNegative(
      `catalog.categories.${category}.unitCostPerSqft`,
      entry.unitCostPerSqft,
    );
    const multiplier = requireNonNegative(
      `catalog.categories.${category}.conditionMultipliers.${subject.condition}`,
      entry.conditionMultipliers[subject.condition],
    );
    categories[category] = unitCost * subject.squareFootage * multiplier;
  }

  const lineItems = (options.lineItems ?? []).map((request, index) =>
    priceLineItem(request, index, subject, catalog),
  );
  for (const lineItem of lineItems) {
    categories[lineItem.category] += lineItem.cost;
  }

  for (const category of RENOVATION_CATEGORIES) {
    categories[category] = roundCurrency(categories[category]);
  }

  const subtotal = roundCurrency(sum(Object.values(categories)));
  const contingency = roundCurrency(contingencyRate * subtotal);

  return Object.freeze({
    categories: Object.freeze(categories),
    lineItems: Object.freeze(lineItems),
    subtotal,
    contingencyRate,
    contingency,
    total: roundCurrency(subtotal + contingency),
  });
}

export class RenovationEstimatorModule implements Module<RenovationEstimatorOutputs> {
  readonly name = "renovation";
  readonly version = "0.1.0";
  readonly dependencies: readonly string[] = [];

  validate(inputs: unknown): ValidationResult {
    const errors: ValidationError[] = [];

    if (inputs === undefined) {
      return { valid: true, errors };
    }
    if (!isRenovationInput(inputs)) {
      errors.push({ path: "renovation", message: "renovation must be an object" });
      return { valid: false, errors };
    }

    const rate = inputs.contingency_rate;
    if (rate !== undefined && (rate < 0 || rate > 1)) {
      errors.push({
        path: "renovation.contingency_rate",
        message: "contingency_rate must be between 0 and 1",
      });
    }
    if (inputs.permitting_cost !== undefined && inputs.permitting_cost < 0) {
      errors.push({
        path: "renovation.permitting_cost",
        message: "permitting_cost must not be negative",
      });
    }
    if (inputs.holding_cost !== undefined && inputs.holding_cost < 0) {
      errors.push({
        path: "renovation.holding_cost",
        message: "holding_cost must not be negative",
      });
    }
    (inputs.line_items ?? []).forEach((lineItem, index) => {
      if (lineItem.quantity !== undefined && lineItem.quantity < 0) {
        errors.push({
          path: `renovation.line_items[${index}].quantity`,
          message: "quantity must not be negative",
        });
      }
    });

    return { valid: errors.length === 0, errors };
  }

  compute(context: AnalysisContext): RenovationEstimatorResult {
    const outputs = estimateRenovation(
      context.inputs.subject,
      context.config.renovation.catalog,
      context.inputs.renovation,
    );

    context.outputs.renovation = outputs;
    return { success: true, outputs };
  }
}

// Structural shape only; the contract schema has already checked field types
function isRenovationInput(value: unknown): value is RenovationInput {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
