/**
 * Raised when a rendered tree or component arena breaks a structural rule
 * the diff engine depends on. These indicate a bug in whatever produced the
 * trees, never a problem in user data.
 */
export class DiffInvariantError extends Error {
  constructor(
    message: string,
    public readonly code: DiffInvariantCodeType,
  ) {
    super(message);
    this.name = "DiffInvariantError";
  }
}

export const DiffInvariantCode = {
  STATICS_LENGTH: "tessera/statics-length",
  SHAPE_MISMATCH: "tessera/shape-mismatch",
  MISSING_COMPONENT: "tessera/missing-component",
  DUPLICATE_COMPONENT: "tessera/duplicate-component",
  DUPLICATE_KEY: "tessera/duplicate-key",
} as const;

export type DiffInvariantCodeType = (typeof DiffInvariantCode)[keyof typeof DiffInvariantCode];
