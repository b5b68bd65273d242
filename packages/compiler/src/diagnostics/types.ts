import type { DiagnosticSeverity, DiagnosticStage } from "../model/diagnostics.js";

export type { DiagnosticSeverity, DiagnosticStage };

/** Impact captures the real consequence if ignored, which can differ from UI severity. */
export type DiagnosticImpact =
  | "blocking" // Compilation cannot proceed.
  | "degraded" // Output is produced but is likely wrong at runtime.
  | "informational";
/** Status tracks lifecycle (canonical vs migration cases). */
export type DiagnosticStatus =
  | "canonical" // Stable, preferred code for new usage.
  | "proposed" // Not finalized; may change or be removed.
  | "deprecated"; // Superseded by another code, do not emit.
/** Category is the primary axis for grouping and reporting. */
export type DiagnosticCategory =
  | "template-syntax"
  | "expression"
  | "component-definition"
  | "component-call"
  | "runtime";

export type DiagnosticDataBase = Record<string, unknown>;

/** Required/optional data fields are validated to catch emitter mistakes. */
export type DiagnosticDataRequirement = {
  readonly required?: readonly string[];
  readonly optional?: readonly string[];
};

/** Single source of truth for severity and presentation metadata. */
export type DiagnosticSpec<TData extends DiagnosticDataBase = DiagnosticDataBase> = {
  readonly category: DiagnosticCategory;
  readonly status: DiagnosticStatus;
  readonly defaultSeverity: DiagnosticSeverity;
  readonly impact: DiagnosticImpact;
  /** Stage is the canonical origin for code classification. */
  readonly stages: readonly DiagnosticStage[];
  readonly description: string;
  readonly data?: DiagnosticDataRequirement;
  /** Phantom marker so the data shape travels with the spec. */
  readonly __data?: TData;
};

/** Preserves literal types (especially stages) without boilerplate in callers. */
export function defineDiagnostic<
  TData extends DiagnosticDataBase,
  const TSpec extends DiagnosticSpec<TData> = DiagnosticSpec<TData>,
>(spec: TSpec): TSpec {
  return spec;
}

/** Catalog is the authoritative registry of codes and metadata. */
export type DiagnosticsCatalog = Record<string, DiagnosticSpec<DiagnosticDataBase>>;
export type DiagnosticCode<Catalog extends DiagnosticsCatalog> = keyof Catalog & string;
/** Maps code -> data shape for strongly-typed emission. */
export type DiagnosticDataByCode<Catalog extends DiagnosticsCatalog> = {
  [K in keyof Catalog]: Catalog[K] extends DiagnosticSpec<infer D extends DiagnosticDataBase> ? D : never;
};
