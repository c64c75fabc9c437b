/**
 * Forecast error taxonomy.
 *
 * Configuration errors are fatal and surface to the caller. Per-entity
 * calculator failures never use these classes: the registry folds them into
 * diagnostics instead.
 */

export type ForecastConfigErrorCode =
  | "MISSING_DEPENDENCY"
  | "DEPENDENCY_CYCLE"
  | "UNKNOWN_CALCULATOR"
  | "INVALID_DATE_RANGE"
  | "UNKNOWN_SCENARIO"
  | "INVALID_CONFIG";

export class ForecastConfigError extends Error {
  readonly code: ForecastConfigErrorCode;

  constructor(code: ForecastConfigErrorCode, message: string) {
    super(`${code}: ${message}`);
    this.name = "ForecastConfigError";
    this.code = code;
  }
}

export interface EntityIssue {
  path: string;
  message: string;
}

export class EntityValidationError extends Error {
  readonly entityName: string | null;
  readonly issues: EntityIssue[];

  constructor(entityName: string | null, issues: EntityIssue[]) {
    const label = entityName ?? "<unnamed>";
    const detail = issues.map((i) => `${i.path || "(root)"}: ${i.message}`).join("; ");
    super(`INVALID_ENTITY: ${label}: ${detail}`);
    this.name = "EntityValidationError";
    this.entityName = entityName;
    this.issues = issues;
  }
}

export class CapTableReferenceError extends Error {
  readonly shareholders: string[];

  constructor(shareholders: string[]) {
    super(`DANGLING_SHARE_CLASS: unknown share class referenced by ${shareholders.join(", ")}`);
    this.name = "CapTableReferenceError";
    this.shareholders = shareholders;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
