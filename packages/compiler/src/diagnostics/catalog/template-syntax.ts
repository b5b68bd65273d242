import { defineDiagnostic, type DiagnosticDataBase } from "../types.js";

export type TemplateSyntaxData = DiagnosticDataBase;

export const templateSyntaxDiagnostics = {
  "tessera/unterminated-tag": defineDiagnostic<TemplateSyntaxData>({
    category: "template-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["lex"],
    description: "Tag, attribute value or closing tag is not closed before the end of the input.",
  }),
  "tessera/unterminated-comment": defineDiagnostic<TemplateSyntaxData>({
    category: "template-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["lex"],
    description: "HTML comment is still open at the end of the template.",
  }),
  "tessera/unterminated-expression": defineDiagnostic<TemplateSyntaxData>({
    category: "template-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["lex"],
    description: "Curly-brace expression is not closed.",
  }),
  "tessera/unterminated-marker": defineDiagnostic<TemplateSyntaxData>({
    category: "template-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["lex"],
    description: "Embedded code marker is missing its closing delimiter.",
  }),
  "tessera/invalid-character-in-name": defineDiagnostic<TemplateSyntaxData>({
    category: "template-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["lex"],
    description: "Tag or attribute name contains a character names cannot hold.",
  }),
  "tessera/mismatched-closing-tag": defineDiagnostic<TemplateSyntaxData>({
    category: "template-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["parse"],
    description: "Closing tag does not match the innermost open tag.",
    data: {
      required: ["expected", "found"],
      optional: ["openSpan"],
    },
  }),
  "tessera/unexpected-closing-tag": defineDiagnostic<TemplateSyntaxData>({
    category: "template-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["parse"],
    description: "Closing tag with no corresponding open tag.",
    data: {
      required: ["found"],
    },
  }),
  "tessera/unclosed-tag": defineDiagnostic<TemplateSyntaxData>({
    category: "template-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["parse"],
    description: "Tag is still open at the end of the template or of a block.",
    data: {
      required: ["tag"],
    },
  }),
  "tessera/unclosed-block": defineDiagnostic<TemplateSyntaxData>({
    category: "template-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["parse"],
    description: "Block is still open at the end of the template.",
    data: {
      required: ["block"],
    },
  }),
  "tessera/unexpected-block": defineDiagnostic<TemplateSyntaxData>({
    category: "template-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["parse"],
    description: "else or end marker without an enclosing block.",
    data: {
      required: ["marker"],
    },
  }),
  "tessera/invalid-tag": defineDiagnostic<TemplateSyntaxData>({
    category: "template-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["lex", "parse"],
    description: "Tag name is not a valid element, component or slot name.",
  }),
  "tessera/slot-outside-component": defineDiagnostic<TemplateSyntaxData>({
    category: "template-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["parse"],
    description: "Slot entry is not a direct child of a component.",
    data: {
      required: ["slot"],
    },
  }),
  "tessera/reserved-slot-name": defineDiagnostic<TemplateSyntaxData>({
    category: "template-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["parse"],
    description: "Slot entry uses the reserved inner_block name.",
  }),
  "tessera/invalid-let": defineDiagnostic<TemplateSyntaxData>({
    category: "template-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["parse"],
    description: ":let is not a binding pattern between braces.",
  }),
  "tessera/duplicate-let": defineDiagnostic<TemplateSyntaxData>({
    category: "template-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["parse"],
    description: "More than one :let on the same tag.",
  }),
  "tessera/let-without-content": defineDiagnostic<TemplateSyntaxData>({
    category: "template-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["parse"],
    description: ":let on a self-closing component or slot.",
  }),
  "tessera/unsupported-attribute": defineDiagnostic<TemplateSyntaxData>({
    category: "template-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["parse"],
    description: "Colon-prefixed attribute the tag does not support.",
    data: {
      required: ["attribute"],
    },
  }),
  "tessera/invalid-for": defineDiagnostic<TemplateSyntaxData>({
    category: "template-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["parse"],
    description: ":for is not a generator expression between braces.",
  }),
  "tessera/duplicate-for": defineDiagnostic<TemplateSyntaxData>({
    category: "template-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["parse"],
    description: "More than one :for on the same tag.",
  }),
  "tessera/unsupported-marker": defineDiagnostic<TemplateSyntaxData>({
    category: "template-syntax",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["parse"],
    description: "Embedded code other than a block header, else or end.",
  }),
} as const;

export const expressionDiagnostics = {
  "tessera/invalid-expression": defineDiagnostic<TemplateSyntaxData>({
    category: "expression",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["parse"],
    description: "Expression does not parse.",
    data: {
      optional: ["code"],
    },
  }),
} as const;
