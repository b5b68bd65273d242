import type { SourceSpan } from "../model/span.js";
import type { SourceText } from "../model/text.js";
import type { CompilerDiagnostic, DiagnosticRelated, DiagnosticSeverity, DiagnosticStage } from "../model/diagnostics.js";
import type {
  DiagnosticDataBase,
  DiagnosticDataByCode,
  DiagnosticStatus,
  DiagnosticsCatalog,
} from "./types.js";
import { buildDiagnostic } from "../shared/diagnostics.js";

export type EmitDiagnosticInput<TData extends DiagnosticDataBase = DiagnosticDataBase> = {
  message: string;
  span?: SourceSpan | null;
  related?: readonly DiagnosticRelated[];
  severity?: DiagnosticSeverity;
  data?: Readonly<TData>;
};

export type DiagnosticEmitter<
  Catalog extends DiagnosticsCatalog,
  AllowedCodes extends keyof Catalog & string = keyof Catalog & string,
> = {
  emit<Code extends AllowedCodes>(
    code: Code,
    input: EmitDiagnosticInput<DiagnosticDataByCode<Catalog>[Code]>,
  ): CompilerDiagnostic<Code, DiagnosticDataByCode<Catalog>[Code]>;
};

export function createDiagnosticEmitter<
  Catalog extends DiagnosticsCatalog,
  AllowedCodes extends keyof Catalog & string = keyof Catalog & string,
>(
  catalog: Catalog,
  options: { stage: DiagnosticStage; source: SourceText },
): DiagnosticEmitter<Catalog, AllowedCodes> {
  const { stage, source } = options;

  return {
    emit(code, input) {
      const spec = catalog[code];
      if (!spec) {
        throw new Error(`Diagnostic code '${code}' is not in the catalog.`);
      }
      if (!ALLOWED_STATUSES.has(spec.status)) {
        throw new Error(
          `Diagnostic code '${code}' is ${spec.status} and cannot be emitted.`,
        );
      }
      return buildDiagnostic({
        code,
        message: input.message,
        stage,
        severity: input.severity ?? spec.defaultSeverity,
        source,
        span: input.span,
        ...(input.related ? { related: input.related } : {}),
        ...(input.data ? { data: input.data } : {}),
      });
    },
  };
}

const ALLOWED_STATUSES = new Set<DiagnosticStatus>(["canonical", "proposed"]);
