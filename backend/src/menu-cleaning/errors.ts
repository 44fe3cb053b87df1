import type { StageTransition } from "./types";

export type StructuralErrorCode =
  | "MISSING_COLUMN"
  | "INVALID_ID"
  | "DUPLICATE_ID"
  | "MAPPING_TABLE_MISSING"
  | "MAPPING_TABLE_INVALID"
  | "CONFIG_INVALID";

// Raised for defects that make the whole run untrustworthy. Content defects
// never end up here; they resolve to a fallback value and an audit count.
export class StructuralError extends Error {
  readonly code: StructuralErrorCode;
  readonly detail: string;
  // Filled in by `clean` with the stages the run went through, ending in "failed".
  stages: StageTransition[] = [];

  constructor(code: StructuralErrorCode, detail: string) {
    super(`${code}: ${detail}`);
    this.name = "StructuralError";
    this.code = code;
    this.detail = detail;
  }
}

export function isStructuralError(error: unknown): error is StructuralError {
  return error instanceof StructuralError;
}
