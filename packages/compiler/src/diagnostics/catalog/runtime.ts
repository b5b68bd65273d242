import { defineDiagnostic, type DiagnosticDataBase } from "../types.js";

export type RuntimeData = DiagnosticDataBase;

export const runtimeDiagnostics = {
  "tessera/evaluation-failed": defineDiagnostic<RuntimeData>({
    category: "runtime",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["render"],
    description: "An expression could not be evaluated against the current bindings.",
  }),
  "tessera/unknown-component": defineDiagnostic<RuntimeData>({
    category: "runtime",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["render"],
    description: "A component call names a component that is not defined.",
  }),
  "tessera/slot-without-content": defineDiagnostic<RuntimeData>({
    category: "runtime",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["render"],
    description: "renderSlot was asked to render a slot entry that has no inner content.",
  }),
  "tessera/misplaced-render-slot": defineDiagnostic<RuntimeData>({
    category: "runtime",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["render"],
    description: "renderSlot was called somewhere other than the top of an output expression.",
  }),
  "tessera/pattern-mismatch": defineDiagnostic<RuntimeData>({
    category: "runtime",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["render"],
    description: "A value does not fit the :let or loop binding pattern.",
  }),
  "tessera/not-iterable": defineDiagnostic<RuntimeData>({
    category: "runtime",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["render"],
    description: "A loop source is not iterable.",
  }),
  "tessera/invalid-attributes": defineDiagnostic<RuntimeData>({
    category: "runtime",
    status: "canonical",
    defaultSeverity: "error",
    impact: "blocking",
    stages: ["render"],
    description: "An attribute spread did not evaluate to a record.",
  }),
} as const;
