import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { ZodError } from "zod";
import { ConfigurationError, describeError } from "../errors/index.js";
import type { EngineConfig, UnitCostCatalog } from "../types/config.js";
import { engineConfigSchema, unitCostCatalogSchema } from "./schema.js";
import type { EngineConfigOverrides } from "./schema.js";

export { engineConfigSchema, unitCostCatalogSchema } from "./schema.js";
export type { EngineConfigOverrides, UnitCostCatalogInput } from "./schema.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// In development the catalog sits beside src/; ARV_CATALOG_DIR overrides it for builds
const catalogDir = process.env.ARV_CATALOG_DIR ?? path.resolve(__dirname, "..", "..", "catalogs");

export const DEFAULT_CATALOG_PATH = path.join(catalogDir, "unit-costs.v1.json");

const catalogCache = new Map<string, UnitCostCatalog>();

function formatZodIssues(error: ZodError, prefix: string): string[] {
  return error.issues.map((issue) => {
    const issuePath = [prefix, ...issue.path.map(String)].filter((part) => part.length > 0).join(".");
    return `${issuePath || "/"}: ${issue.message}`;
  });
}

export function parseUnitCostCatalog(data: unknown): UnitCostCatalog {
  const parsed = unitCostCatalogSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError(formatZodIssues(parsed.error, "catalog"));
  }
  return parsed.data;
}

export function loadUnitCostCatalog(catalogPath: string = DEFAULT_CATALOG_PATH): UnitCostCatalog {
  const resolved = path.resolve(catalogPath);
  const cached = catalogCache.get(resolved);
  if (cached) {
    return cached;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(resolved, "utf8"));
  } catch (error) {
    throw new ConfigurationError([`catalog: could not read ${resolved} (${describeError(error)})`]);
  }

  const catalog = parseUnitCostCatalog(raw);
  catalogCache.set(resolved, catalog);
  return catalog;
}

/**
 * Merge overrides onto the defaults and validate the result.
 * The unit-cost catalog falls back to the bundled file when none is given.
 */
export function resolveConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const parsed = engineConfigSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new ConfigurationError(formatZodIssues(parsed.error, ""));
  }

  const { renovation, ...rest } = parsed.data;
  return {
    ...rest,
    renovation: {
      contingencyRate: renovation.contingencyRate,
      catalog: renovation.catalog ?? loadUnitCostCatalog(),
    },
  };
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, issues: string[]): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    issues.push(`${key}: expected a number, received "${raw}"`);
    return undefined;
  }
  return value;
}

// Environment overrides for the settings operators tune most often
export function configFromEnv(env: Env = process.env): EngineConfig {
  const issues: string[] = [];
  const radiusMiles = readNumber(env, "ARV_RADIUS_MILES", issues);
  const monthsBack = readNumber(env, "ARV_MONTHS_BACK", issues);
  const minComps = readNumber(env, "ARV_MIN_COMPS", issues);
  const maxComps = readNumber(env, "ARV_MAX_COMPS", issues);
  const contingencyRate = readNumber(env, "ARV_CONTINGENCY_RATE", issues);
  const outlierStdDevBound = readNumber(env, "ARV_OUTLIER_STDDEV_BOUND", issues);
  const spreadFactor = readNumber(env, "ARV_SPREAD_FACTOR", issues);

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  const catalogPath = env.ARV_UNIT_COST_CATALOG?.trim();

  return resolveConfig({
    selection: {
      ...(radiusMiles !== undefined ? { radiusMiles } : {}),
      ...(monthsBack !== undefined ? { monthsBack } : {}),
      ...(minComps !== undefined ? { minComps } : {}),
      ...(maxComps !== undefined ? { maxComps } : {}),
    },
    pricing: outlierStdDevBound !== undefined ? { outlierStdDevBound } : {},
    valuation: spreadFactor !== undefined ? { spreadFactor } : {},
    renovation: {
      ...(contingencyRate !== undefined ? { contingencyRate } : {}),
      ...(catalogPath ? { catalog: loadUnitCostCatalog(catalogPath) } : {}),
    },
  });
}
