import { defineDiagnostic, type DiagnosticDataBase } from "../types.js";

export type ComponentData = DiagnosticDataBase;

export const componentDefinitionDiagnostics = {
  "tessera/duplicate-attr-definition": defineDiagnostic<ComponentData>({
    category: "component-definition",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    stages: ["verify"],
    description: "Attribute declared twice on the same component or slot.",
    data: {
      required: ["attribute"],
    },
  }),
  "tessera/duplicate-slot-definition": defineDiagnostic<ComponentData>({
    category: "component-definition",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    stages: ["verify"],
    description: "Slot declared twice on the same component.",
    data: {
      required: ["slot"],
    },
  }),
  "tessera/invalid-attr-definition": defineDiagnostic<ComponentData>({
    category: "component-definition",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    stages: ["verify"],
    description: "Attribute declaration is not valid: reserved name, conflicting options, or a default of the wrong type.",
    data: {
      required: ["attribute"],
    },
  }),
  "tessera/invalid-slot-definition": defineDiagnostic<ComponentData>({
    category: "component-definition",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    stages: ["verify"],
    description: "Slot declaration is not valid, such as attributes on inner_block.",
    data: {
      required: ["slot"],
    },
  }),
} as const;

export const componentCallDiagnostics = {
  "tessera/missing-required-attr": defineDiagnostic<ComponentData>({
    category: "component-call",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    stages: ["verify"],
    description: "A required attribute is not passed to the component.",
    data: {
      required: ["attribute", "component"],
    },
  }),
  "tessera/undefined-attr": defineDiagnostic<ComponentData>({
    category: "component-call",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    stages: ["verify"],
    description: "An attribute is passed that the component does not declare.",
    data: {
      required: ["attribute", "component"],
    },
  }),
  "tessera/global-attr-provided": defineDiagnostic<ComponentData>({
    category: "component-call",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    stages: ["verify"],
    description: "The component's global attribute is passed directly.",
    data: {
      required: ["attribute", "component"],
    },
  }),
  "tessera/attr-type-mismatch": defineDiagnostic<ComponentData>({
    category: "component-call",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    stages: ["verify"],
    description: "A literal attribute value does not match the declared type.",
    data: {
      required: ["attribute", "component", "type"],
    },
  }),
  "tessera/missing-required-slot": defineDiagnostic<ComponentData>({
    category: "component-call",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    stages: ["verify"],
    description: "A required slot has no entries in the call.",
    data: {
      required: ["slot", "component"],
    },
  }),
  "tessera/missing-required-slot-attr": defineDiagnostic<ComponentData>({
    category: "component-call",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    stages: ["verify"],
    description: "A slot entry lacks a required slot attribute.",
    data: {
      required: ["slot", "attribute", "component"],
    },
  }),
  "tessera/undefined-slot-attr": defineDiagnostic<ComponentData>({
    category: "component-call",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    stages: ["verify"],
    description: "A slot entry passes an attribute the slot does not declare.",
    data: {
      required: ["slot", "attribute", "component"],
    },
  }),
  "tessera/undefined-slot": defineDiagnostic<ComponentData>({
    category: "component-call",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    stages: ["verify"],
    description: "A slot entry names a slot the component does not declare.",
    data: {
      required: ["slot", "component"],
    },
  }),
  "tessera/undefined-component": defineDiagnostic<ComponentData>({
    category: "component-call",
    status: "canonical",
    defaultSeverity: "warning",
    impact: "degraded",
    stages: ["verify"],
    description: "A call names a component the unit cannot resolve.",
    data: {
      required: ["component"],
    },
  }),
} as const;
