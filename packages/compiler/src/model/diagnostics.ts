/* =======================================================================================
 * DIAGNOSTIC MODEL (foundation types only)
 * ---------------------------------------------------------------------------------------
 * Builder functions live in shared/diagnostics.ts.
 * ======================================================================================= */

import type { SourceSpan } from "./span.js";
import type { Position } from "./text.js";

export type DiagnosticSeverity = "error" | "warning" | "info";

/** Stage tags where the diagnostic was produced. */
export type DiagnosticStage = "lex" | "parse" | "build" | "verify" | "render";

export interface DiagnosticRelated {
  message: string;
  span?: SourceSpan | null;
}

export interface CompilerDiagnostic<
  TCode extends string = string,
  TData extends Record<string, unknown> = Record<string, unknown>,
> {
  code: TCode;
  message: string;
  stage: DiagnosticStage;
  severity: DiagnosticSeverity;
  file: string;
  span: SourceSpan | null;
  /** Start of `span`, resolved against the template source. */
  position: Position | null;
  related?: readonly DiagnosticRelated[];
  data?: Readonly<TData>;
}
