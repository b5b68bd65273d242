import type { SourceSpan } from "../model/span.js";
import type { SourceText } from "../model/text.js";

export type {
  DiagnosticSeverity,
  DiagnosticStage,
  DiagnosticRelated,
  CompilerDiagnostic,
} from "../model/diagnostics.js";

import type { DiagnosticSeverity, DiagnosticStage, DiagnosticRelated, CompilerDiagnostic } from "../model/diagnostics.js";

export interface BuildDiagnosticInput<
  TCode extends string = string,
  TData extends Record<string, unknown> = Record<string, unknown>,
> {
  code: TCode;
  message: string;
  stage: DiagnosticStage;
  severity: DiagnosticSeverity;
  source: SourceText;
  span?: SourceSpan | null;
  related?: readonly DiagnosticRelated[];
  data?: Readonly<TData>;
}

/** Centralized diagnostic builder: resolves the span's position against the source. */
export function buildDiagnostic<
  TCode extends string,
  TData extends Record<string, unknown> = Record<string, unknown>,
>(input: BuildDiagnosticInput<TCode, TData>): CompilerDiagnostic<TCode, TData> {
  const span = input.span ?? null;
  return {
    code: input.code,
    message: input.message,
    stage: input.stage,
    severity: input.severity,
    file: input.source.file,
    span,
    position: span ? input.source.positionAt(span.start) : null,
    ...(input.related ? { related: input.related } : {}),
    ...(input.data ? { data: input.data } : {}),
  };
}

/** `file:line:column: message`, the form warnings are printed in. */
export function formatDiagnostic(diagnostic: CompilerDiagnostic): string {
  const where = diagnostic.position
    ? `${diagnostic.file}:${diagnostic.position.line}:${diagnostic.position.column}`
    : diagnostic.file;
  return `${where}: ${diagnostic.message}`;
}
