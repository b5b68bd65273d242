import type { CompilerDiagnostic } from "./model/diagnostics.js";
import type { SourceSpan } from "./model/span.js";
import { SourceText } from "./model/text.js";
import { diagnosticsCatalog, type RuntimeDiagnosticCode, type SyntaxDiagnosticCode } from "./diagnostics/catalog/index.js";
import { createDiagnosticEmitter } from "./diagnostics/emitter.js";

/**
 * A template that cannot be compiled. Carries the diagnostic with its code,
 * span and the 1-based line/column of the offending input.
 */
export class TemplateSyntaxError extends Error {
  constructor(public readonly diagnostic: CompilerDiagnostic<SyntaxDiagnosticCode>) {
    super(diagnostic.message);
    this.name = "TemplateSyntaxError";
  }

  get code(): SyntaxDiagnosticCode {
    return this.diagnostic.code;
  }

  get file(): string {
    return this.diagnostic.file;
  }

  get line(): number {
    return this.diagnostic.position?.line ?? 1;
  }

  get column(): number {
    return this.diagnostic.position?.column ?? 1;
  }

  get span(): SourceSpan | null {
    return this.diagnostic.span;
  }
}

/** An expression or structural requirement failed while rendering. */
export class TemplateRuntimeError extends Error {
  constructor(
    message: string,
    public readonly code: RuntimeDiagnosticCode,
    public readonly file?: string,
    public readonly line?: number,
    public readonly column?: number,
  ) {
    super(message);
    this.name = "TemplateRuntimeError";
  }
}

export interface SyntaxErrorInput {
  readonly message: string;
  readonly span: SourceSpan;
  readonly data?: Readonly<Record<string, unknown>>;
}

/** Build a TemplateSyntaxError through the diagnostics catalog. */
export function syntaxError(
  source: SourceText,
  code: SyntaxDiagnosticCode,
  input: SyntaxErrorInput,
): TemplateSyntaxError {
  const emitter = createDiagnosticEmitter(diagnosticsCatalog, {
    stage: code === "tessera/invalid-expression" || isParseCode(code) ? "parse" : "lex",
    source,
  });
  const diagnostic = emitter.emit(code, {
    message: input.message,
    span: input.span,
    ...(input.data ? { data: input.data } : {}),
  });
  return new TemplateSyntaxError(diagnostic);
}

/** Build a TemplateRuntimeError positioned at `span` within `source`. */
export function runtimeError(
  source: SourceText,
  code: RuntimeDiagnosticCode,
  message: string,
  span: SourceSpan | null,
): TemplateRuntimeError {
  const position = span ? source.positionAt(span.start) : null;
  return new TemplateRuntimeError(message, code, source.file, position?.line, position?.column);
}

function isParseCode(code: SyntaxDiagnosticCode): boolean {
  const stages: readonly string[] = diagnosticsCatalog[code].stages;
  return !stages.includes("lex");
}
