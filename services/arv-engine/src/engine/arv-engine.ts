import { resolveConfig } from "../config/index.js";
import { ArvEngineError, describeError } from "../errors/index.js";
import { createLogger } from "../logging/logger.js";
import type { Logger } from "../logging/logger.js";
import { ComparableSelectorModule } from "../modules/comparables/comparable-selector.js";
import { PriceNormalizerModule } from "../modules/pricing/price-normalizer.js";
import { ArvCalculatorModule } from "../modules/valuation/arv-calculator.js";
import { RenovationEstimatorModule } from "../modules/renovation/renovation-estimator.js";
import { FeasibilityAnalyzerModule, formatCurrency } from "../modules/feasibility/feasibility-analyzer.js";
import type {
  ComparableSelection,
  FeasibilityReport,
  PriceNormalization,
  RenovationEstimate,
  RenovationOptions,
  ValuationResult,
} from "../types/analysis.js";
import type { EngineConfig } from "../types/config.js";
import type { AnalysisContext, AnalysisInputs } from "../types/context.js";
import type { ArvEngineInputs } from "../types/inputs.js";
import type { Module, ValidationError } from "../types/module.js";
import { createComparableSale, createProperty } from "../types/property.js";
import { validateRequest } from "../validate/validate.js";

export interface ArvEngineResult {
  success: boolean;
  comparables?: ComparableSelection;
  pricing?: PriceNormalization;
  valuation?: ValuationResult;
  renovation?: RenovationEstimate;
  feasibility?: FeasibilityReport;
  errors?: string[];
  warnings: string[];
}

export type ArvEngineValidation =
  | { valid: true; request: ArvEngineInputs; errors: [] }
  | { valid: false; errors: ValidationError[] };

export interface ArvEngineOptions {
  config?: EngineConfig;
  logger?: Logger;
}

export class ArvEngine {
  private readonly modules: Module<unknown>[];
  private readonly config: EngineConfig;
  private readonly logger: Logger;

  constructor(options: ArvEngineOptions = {}) {
    this.config = options.config ?? resolveConfig();
    this.logger = options.logger ?? createLogger({ scope: "arv-engine" });
    // Execution order; each module's dependencies come before it
    this.modules = [
      new ComparableSelectorModule(),
      new PriceNormalizerModule(),
      new ArvCalculatorModule(),
      new RenovationEstimatorModule(),
      new FeasibilityAnalyzerModule(),
    ];
  }

  /**
   * Validate the request against the contract, then each module's inputs
   */
  validateAll(request: unknown): ArvEngineValidation {
    const contract = validateRequest(request);
    if (!contract.valid) {
      return {
        valid: false,
        errors: contract.errors.map((message) => ({ path: "contract", message })),
      };
    }

    const allErrors: ValidationError[] = [];
    for (const module of this.modules) {
      const validation = module.validate(this.getModuleInputs(contract.request, module.name));
      if (!validation.valid) {
        allErrors.push(...validation.errors);
      }
    }

    if (allErrors.length > 0) {
      return { valid: false, errors: allErrors };
    }
    return { valid: true, request: contract.request, errors: [] };
  }

  /**
   * Run one analysis from request to feasibility report
   */
  run(request: unknown): ArvEngineResult {
    const validation = this.validateAll(request);
    if (!validation.valid) {
      const errors = validation.errors.map((e) => `${e.path}: ${e.message}`);
      this.logger.warn("Request rejected", { errorCount: errors.length });
      return { success: false, errors, warnings: [] };
    }

    let inputs: AnalysisInputs;
    try {
      inputs = this.buildInputs(validation.request);
    } catch (error) {
      this.logFailure("inputs", error);
      return { success: false, errors: [`inputs: ${describeError(error)}`], warnings: [] };
    }

    const context: AnalysisContext = {
      inputs,
      config: this.config,
      outputs: {},
      warnings: [],
    };

    this.logger.debug("Starting analysis", {
      subjectId: inputs.subject.id,
      candidates: inputs.comparables.length,
      asOfDate: inputs.asOfDate,
    });

    for (const module of this.modules) {
      try {
        const result = module.compute(context);
        if (!result.success) {
          const errors = (result.errors ?? ["module failed"]).map((message) => `${module.name}: ${message}`);
          return this.failure(context, errors);
        }
        this.logger.debug(`Module ${module.name} complete`);
      } catch (error) {
        this.logFailure(module.name, error);
        return this.failure(context, [`${module.name}: ${describeError(error)}`]);
      }
    }

    for (const warning of context.warnings) {
      this.logger.warn(warning, { subjectId: inputs.subject.id });
    }
    this.logger.info("Analysis complete", {
      subjectId: inputs.subject.id,
      arv: context.outputs.valuation?.range.expected ?? null,
      confidence: context.outputs.valuation?.confidence ?? null,
      verdict: context.outputs.feasibility?.verdict ?? null,
    });

    return {
      success: true,
      ...context.outputs,
      warnings: context.warnings,
    };
  }

  private buildInputs(request: ArvEngineInputs): AnalysisInputs {
    const renovation = request.renovation ?? {};
    const renovationOptions: RenovationOptions = {
      contingencyRate: renovation.contingency_rate ?? this.config.renovation.contingencyRate,
      ...(renovation.permitting_cost !== undefined ? { permittingCost: renovation.permitting_cost } : {}),
      ...(renovation.holding_cost !== undefined ? { holdingCost: renovation.holding_cost } : {}),
      lineItems: (renovation.line_items ?? []).map((lineItem) => ({
        item: lineItem.item,
        grade: lineItem.grade,
        ...(lineItem.quantity !== undefined ? { quantity: lineItem.quantity } : {}),
      })),
    };

    return {
      subject: createProperty(request.subject),
      comparables: request.comparables.map(createComparableSale),
      asOfDate: request.analysis.as_of_date,
      purchasePrice: request.analysis.purchase_price,
      strict: request.analysis.strict ?? false,
      renovation: renovationOptions,
    };
  }

  /**
   * Get module-specific inputs from the full request
   */
  private getModuleInputs(request: ArvEngineInputs, moduleName: string): unknown {
    switch (moduleName) {
      case "comparables":
        return request.comparables;
      case "renovation":
        return request.renovation;
      case "feasibility":
        return request.analysis;
      default:
        return undefined;
    }
  }

  private failure(context: AnalysisContext, errors: string[]): ArvEngineResult {
    return {
      success: false,
      ...context.outputs,
      errors,
      warnings: context.warnings,
    };
  }

  private logFailure(stage: string, error: unknown): void {
    if (error instanceof ArvEngineError) {
      this.logger.error(`${stage} failed: ${error.message}`, { code: error.code, details: error.details });
    } else {
      this.logger.error(`${stage} failed: ${describeError(error)}`);
    }
  }
}

/**
 * Plain-text summary of an analysis result
 */
export function createSummaryReport(result: ArvEngineResult): string {
  if (!result.success || !result.valuation || !result.feasibility) {
    return `ARV Analysis Failed:\n${result.errors?.join("\n") ?? "Unknown error"}`;
  }

  const { comparables, valuation, feasibility, renovation } = result;
  const lines: string[] = [
    "=".repeat(60),
    `ARV SUMMARY: ${comparables?.subjectId ?? "subject"}`,
    "=".repeat(60),
    "",
    "COMPARABLES",
    `  Considered: ${comparables?.candidatesConsidered ?? 0}`,
    `  Selected: ${comparables?.comparableSet.comps.length ?? 0}`,
    `  Retained after outliers: ${valuation.sampleSize}`,
    `  Median $/sqft: ${valuation.medianPricePerSqft.toFixed(2)}`,
    "",
    "VALUATION",
    `  ARV: ${formatCurrency(valuation.range.expected)}`,
    `  Range: ${formatCurrency(valuation.range.low)} - ${formatCurrency(valuation.range.high)}`,
    `  Confidence: ${valuation.confidence}`,
    "",
    "RENOVATION",
    `  Subtotal: ${formatCurrency(renovation?.subtotal ?? 0)}`,
    `  Contingency: ${formatCurrency(renovation?.contingency ?? 0)}`,
    `  Total: ${formatCurrency(feasibility.renovationCost)}`,
    "",
    "FEASIBILITY",
    `  Purchase Price: ${formatCurrency(feasibility.purchasePrice)}`,
    `  Max Purchase (70% rule): ${formatCurrency(feasibility.maxPurchasePrice70)}`,
    `  Profit: ${formatCurrency(feasibility.profit)}`,
    `  ROI: ${feasibility.roiPercent.toFixed(2)}%`,
    `  Risk Score: ${feasibility.riskScore.toFixed(2)}`,
    `  Verdict: ${feasibility.verdict}`,
  ];

  if (result.warnings.length > 0) {
    lines.push("");
    lines.push("WARNINGS");
    for (const warning of result.warnings) {
      lines.push(`  ! ${warning}`);
    }
  }

  lines.push("");
  lines.push("=".repeat(60));

  return lines.join("\n");
}
