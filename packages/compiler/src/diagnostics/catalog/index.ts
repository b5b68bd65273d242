import type { DiagnosticDataByCode as CatalogDataByCode, DiagnosticsCatalog } from "../types.js";
import { componentCallDiagnostics, componentDefinitionDiagnostics } from "./components.js";
import { runtimeDiagnostics } from "./runtime.js";
import { expressionDiagnostics, templateSyntaxDiagnostics } from "./template-syntax.js";

export const diagnosticsCatalog = {
  ...templateSyntaxDiagnostics,
  ...expressionDiagnostics,
  ...componentDefinitionDiagnostics,
  ...componentCallDiagnostics,
  ...runtimeDiagnostics,
} as const satisfies DiagnosticsCatalog;

export type DiagnosticsCatalogType = typeof diagnosticsCatalog;
export type DiagnosticCodeName = keyof DiagnosticsCatalogType & string;
export type DiagnosticDataByCode = CatalogDataByCode<DiagnosticsCatalogType>;

export type SyntaxDiagnosticCode =
  | keyof typeof templateSyntaxDiagnostics
  | keyof typeof expressionDiagnostics;
export type VerifyDiagnosticCode =
  | keyof typeof componentDefinitionDiagnostics
  | keyof typeof componentCallDiagnostics;
export type RuntimeDiagnosticCode = keyof typeof runtimeDiagnostics;

export {
  templateSyntaxDiagnostics,
  expressionDiagnostics,
  componentDefinitionDiagnostics,
  componentCallDiagnostics,
  runtimeDiagnostics,
};
