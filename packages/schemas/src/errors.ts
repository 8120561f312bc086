/**
 * Programming errors that must not be swallowed: a broken invariant would
 * corrupt the transactional guarantees of the world model.
 */
export type InvariantCode =
  | "FOREIGN_CHECKPOINT"
  | "STALE_CHECKPOINT"
  | "UNKNOWN_ENTITY"
  | "MISSING_LOCATION"
  | "INVALID_LAYOUT"
  | "UNDO_OUT_OF_ORDER";

export class InvariantError extends Error {
  readonly code: InvariantCode;

  constructor(code: InvariantCode, message: string) {
    super(message);
    this.name = "InvariantError";
    this.code = code;
  }
}

export class LayoutError extends InvariantError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("INVALID_LAYOUT", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "LayoutError";
    this.issues = issues;
  }
}
