export type ArvEngineErrorCode =
  | "INVALID_COORDINATE"
  | "INSUFFICIENT_COMPS"
  | "INVALID_PROPERTY_DATA"
  | "INVALID_RENOVATION_INPUT"
  | "CONFIGURATION";

export type ErrorDetails = Record<string, string | number | boolean | null>;

export class ArvEngineError extends Error {
  readonly code: ArvEngineErrorCode;
  readonly details: ErrorDetails;

  constructor(code: ArvEngineErrorCode, message: string, details: ErrorDetails = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class InvalidCoordinateError extends ArvEngineError {
  constructor(axis: "latitude" | "longitude", value: number, recordId?: string) {
    const bound = axis === "latitude" ? 90 : 180;
    const subject = recordId ? ` for ${recordId}` : "";
    super(
      "INVALID_COORDINATE",
      `${axis} ${String(value)}${subject} must be a finite number in [-${bound}, ${bound}]`,
      { axis, value: Number.isFinite(value) ? value : String(value), recordId: recordId ?? null },
    );
  }
}

export class InvalidPropertyDataError extends ArvEngineError {
  constructor(recordId: string, field: string, constraint: string) {
    super("INVALID_PROPERTY_DATA", `${recordId}: ${field} ${constraint}`, {
      recordId,
      field,
      constraint,
    });
  }
}

export class InsufficientCompsError extends ArvEngineError {
  readonly found: number;
  readonly required: number;

  constructor(found: number, required: number, subjectId?: string) {
    const subject = subjectId ? ` for ${subjectId}` : "";
    super(
      "INSUFFICIENT_COMPS",
      `Found ${found} comparable sale(s)${subject}; at least ${required} required`,
      { found, required, subjectId: subjectId ?? null },
    );
    this.found = found;
    this.required = required;
  }
}

export class InvalidRenovationInputError extends ArvEngineError {
  constructor(path: string, constraint: string) {
    super("INVALID_RENOVATION_INPUT", `${path} ${constraint}`, { path, constraint });
  }
}

export class ConfigurationError extends ArvEngineError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super("CONFIGURATION", `Invalid engine configuration: ${issues.join("; ")}`, {
      issueCount: issues.length,
    });
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
