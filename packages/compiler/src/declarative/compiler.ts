import { debug } from "@tessera/runtime";

import type { CompilerDiagnostic } from "../model/diagnostics.js";
import { SourceText } from "../model/text.js";
import type { ComponentTarget } from "../parsing/nodes.js";
import { diagnosticsCatalog } from "../diagnostics/catalog/index.js";
import { createDiagnosticEmitter } from "../diagnostics/emitter.js";
import { formatDiagnostic } from "../shared/diagnostics.js";
import { compileSource, createHelpers } from "../facade.js";
import type { ComponentDefinition, RenderEnvironment } from "../render/frame.js";
import type { CompiledTemplate } from "../render/template.js";
import { ComponentDefinitionBuilder } from "./builder.js";
import { isEmptySpec } from "./types.js";
import { displayTarget, verifyCall } from "./verify.js";

export interface TemplateCompilerOptions {
  /** File name diagnostics report; defaults to the unit name. */
  readonly file?: string;
  readonly trim?: boolean;
  readonly helpers?: Readonly<Record<string, unknown>>;
}

/** The frozen result of a `TemplateCompiler`. */
export interface CompiledUnit {
  readonly name: string;
  readonly components: ReadonlyMap<string, ComponentDefinition>;
  /** Definition and call warnings, in the order they were found. */
  readonly diagnostics: readonly CompilerDiagnostic[];
}

/**
 * A named unit of components and templates. Components are declared with
 * `component`, other units are made callable with `use` (as `<Unit.name>`)
 * or `import` (as `<.name>`), and `finalize` verifies every call recorded
 * by the unit's templates.
 */
export class TemplateCompiler {
  private readonly definitions = new Map<string, ComponentDefinition>();
  private readonly modules = new Map<string, CompiledUnit>();
  private readonly imported = new Map<string, ComponentDefinition>();
  private readonly templates: CompiledTemplate[] = [];
  private readonly diagnostics: CompilerDiagnostic[] = [];
  private readonly helpers: ReadonlyMap<string, unknown>;
  private unit: CompiledUnit | null = null;

  constructor(
    readonly name: string,
    private readonly options: TemplateCompilerOptions = {},
  ) {
    this.helpers = createHelpers(options.helpers);
  }

  component(name: string, define: (component: ComponentDefinitionBuilder) => void): this {
    this.assertOpen("define a component");
    if (this.definitions.has(name)) {
      throw new Error(`component "${name}" is already defined in ${this.name}`);
    }
    const builder = new ComponentDefinitionBuilder(name);
    define(builder);
    const { spec, source, issues } = builder.build();
    if (source === null) {
      throw new Error(`component "${name}" in ${this.name} has no template`);
    }

    const text = new SourceText(source, `${this.file}#${name}`);
    const emitter = createDiagnosticEmitter(diagnosticsCatalog, { stage: "verify", source: text });
    for (const issue of issues) {
      this.record(emitter.emit(issue.code, { message: issue.message, data: { component: name, ...issue.data } }));
    }

    const template = this.compileText(text);
    this.definitions.set(name, {
      name: `${this.name}.${name}`,
      spec,
      fragment: template.fragment,
      environment: template.environment,
    });
    debug.verify("component", { unit: this.name, name, attrs: spec.attrs.length, slots: spec.slots.length });
    return this;
  }

  /** Make `unit`'s components callable as `<moduleName.component>`. */
  use(moduleName: string, unit: CompiledUnit): this {
    this.assertOpen("use another unit");
    this.modules.set(moduleName, unit);
    return this;
  }

  /** Make `unit`'s components (or only `names`) callable as local `<.component>` tags. */
  import(unit: CompiledUnit, names?: readonly string[]): this {
    this.assertOpen("import components");
    for (const [name, definition] of unit.components) {
      if (!names || names.includes(name)) this.imported.set(name, definition);
    }
    return this;
  }

  /** Compile a template against this unit. After `finalize`, its calls are verified right away. */
  compile(source: string, options: { file?: string } = {}): CompiledTemplate {
    const template = this.compileText(new SourceText(source, options.file ?? this.file));
    if (this.unit) this.verify(template);
    return template;
  }

  finalize(): CompiledUnit {
    if (this.unit) return this.unit;
    for (const template of this.templates) this.verify(template);
    this.unit = Object.freeze({
      name: this.name,
      components: new Map(this.definitions),
      diagnostics: Object.freeze([...this.diagnostics]),
    });
    debug.verify("finalize", { unit: this.name, components: this.definitions.size, warnings: this.diagnostics.length });
    return this.unit;
  }

  resolve(target: ComponentTarget): ComponentDefinition | null {
    if (target.module === null) {
      return this.definitions.get(target.name) ?? this.imported.get(target.name) ?? null;
    }
    if (target.module === this.name) return this.definitions.get(target.name) ?? null;
    return this.modules.get(target.module)?.components.get(target.name) ?? null;
  }

  private get file(): string {
    return this.options.file ?? this.name;
  }

  private compileText(source: SourceText): CompiledTemplate {
    const environment: RenderEnvironment = {
      source,
      helpers: this.helpers,
      resolveComponent: (target) => this.resolve(target),
    };
    const template = compileSource(source, environment, this.options.trim ?? true);
    this.templates.push(template);
    return template;
  }

  private verify(template: CompiledTemplate): void {
    const found: CompilerDiagnostic[] = [];
    for (const call of template.calls) {
      const definition = this.resolve(call.target);
      if (!definition) {
        const emitter = createDiagnosticEmitter(diagnosticsCatalog, { stage: "verify", source: template.source });
        const component = displayTarget(call);
        found.push(emitter.emit("tessera/undefined-component", {
          message: `undefined component ${component}`,
          span: call.span,
          data: { component },
        }));
        continue;
      }
      if (isEmptySpec(definition.spec)) continue;
      found.push(...verifyCall(call, definition.spec, template.source));
    }
    template.report(found);
    for (const diagnostic of found) this.record(diagnostic);
  }

  private record(diagnostic: CompilerDiagnostic): void {
    this.diagnostics.push(diagnostic);
    debug.verify("warning", () => ({ code: diagnostic.code, message: formatDiagnostic(diagnostic) }));
  }

  private assertOpen(operation: string): void {
    if (this.unit) {
      throw new Error(`${this.name} is already finalized; cannot ${operation}`);
    }
  }
}
