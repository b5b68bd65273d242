// Compiler package public API
//
// Import from here rather than deep paths.

// === Facade ===
export { compileTemplate, compileSource, createHelpers, parseTemplateSource } from "./facade.js";
export type { CompileOptions } from "./facade.js";
export { CompiledTemplate } from "./render/template.js";
export type { ComponentDefinition, ComponentResolver, RenderEnvironment } from "./render/frame.js";

// === Declarative components ===
export { TemplateCompiler } from "./declarative/compiler.js";
export type { TemplateCompilerOptions, CompiledUnit } from "./declarative/compiler.js";
export { ComponentDefinitionBuilder, SlotDefinitionBuilder } from "./declarative/builder.js";
export type { AttrOptions, SlotOptions, DefinitionIssue } from "./declarative/builder.js";
export type { AttrType, AttrSpec, SlotSpec, ComponentSpec } from "./declarative/types.js";
export { describeAttrType, valueMatchesType } from "./declarative/types.js";
export { verifyCall, shapeMatchesType } from "./declarative/verify.js";
export { isGlobalAttribute } from "./declarative/globals.js";

// === Lexing ===
export { tokenize, tokenizeTemplate, finalizeTokenizer, INITIAL_STATE } from "./lexing/tokenizer.js";
export type { TokenizerState, TokenizeOptions, TokenizeResult } from "./lexing/tokenizer.js";
export type { Token, TagKind, TextToken, TagOpenToken, TagCloseToken, ExpressionToken } from "./lexing/tokens.js";
export { splitMarkers } from "./lexing/markers.js";
export type { MarkerKind, MarkerSegment } from "./lexing/markers.js";

// === Parsing ===
export { parseTemplate } from "./parsing/parser.js";
export type { FragmentNode, Node, ComponentCall, ComponentTarget, RecordedAttribute, RecordedSlot, LiteralShape } from "./parsing/nodes.js";

// === Expressions ===
export { parseExpression, parseBindingPattern, parseForOf } from "./expression/parser.js";
export { ExpressionSyntaxError } from "./expression/scanner.js";
export { evaluate, bindPattern, iterate, scopeFromRecord, childScope, EvaluationError } from "./expression/evaluate.js";
export type { EvaluationScope, Binding } from "./expression/evaluate.js";
export type { Expression, BindingPattern, ForOfStatement } from "./expression/ast.js";

// === Building ===
export { buildTemplate } from "./building/builder.js";
export type { BuildOptions } from "./building/builder.js";
export { INNER_BLOCK } from "./building/plans.js";
export type { CompiledFragment, Plan } from "./building/plans.js";
export { collectDependencies, isAffected, mergeDependencies } from "./tracking/dependencies.js";
export type { Dependencies, DependencyKey } from "./tracking/dependencies.js";

// === Model ===
export { SourceText } from "./model/text.js";
export type { Position } from "./model/text.js";
export type { SourceSpan } from "./model/span.js";
export type { CompilerDiagnostic, DiagnosticSeverity, DiagnosticStage } from "./model/diagnostics.js";

// === Errors & diagnostics ===
export { TemplateSyntaxError, TemplateRuntimeError } from "./errors.js";
export { formatDiagnostic } from "./shared/diagnostics.js";
export { diagnosticsCatalog } from "./diagnostics/catalog/index.js";
export type { DiagnosticCodeName, SyntaxDiagnosticCode, VerifyDiagnosticCode, RuntimeDiagnosticCode } from "./diagnostics/catalog/index.js";
