import { Ajv2020 } from "ajv/dist/2020.js";
import type { ErrorObject, SchemaObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import type { ArvEngineInputs } from "../types/inputs.js";

export type ContractValidationResult =
  | { valid: true; request: ArvEngineInputs; errors: [] }
  | { valid: false; errors: string[] };

let validator: ValidateFunction<ArvEngineInputs> | null = null;

// In development contracts live at the repo root; ARV_CONTRACTS_DIR overrides it for builds
function contractsDir(): string {
  const rootDir = join(dirname(fileURLToPath(import.meta.url)), "..", "..", "..", "..");
  return process.env.ARV_CONTRACTS_DIR ?? join(rootDir, "contracts");
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function getValidator(): ValidateFunction<ArvEngineInputs> {
  if (validator) {
    return validator;
  }

  const schemaPath = join(contractsDir(), "arv_engine_v0.schema.json");
  const schema: unknown = JSON.parse(readFileSync(schemaPath, "utf8"));
  if (!isSchemaObject(schema)) {
    throw new Error(`Contract schema at ${schemaPath} is not an object`);
  }

  const ajv = new Ajv2020({ strict: true, allErrors: true });
  // ajv-formats is CommonJS; under NodeNext its default import is the module object
  addFormats.default(ajv);

  validator = ajv.compile<ArvEngineInputs>(schema);
  return validator;
}

function formatError(error: ErrorObject): string {
  const path = error.instancePath && error.instancePath.length > 0 ? error.instancePath : "/";
  const message = error.message ?? "invalid";
  return `${path}: ${message}`;
}

export function validateRequest(request: unknown): ContractValidationResult {
  try {
    const validate = getValidator();
    if (validate(request)) {
      return { valid: true, request, errors: [] };
    }
    return { valid: false, errors: (validate.errors ?? []).map(formatError) };
  } catch (error) {
    return {
      valid: false,
      errors: [error instanceof Error ? error.message : "Validation failed"],
    };
  }
}
