import { assignsToAttributes, raw } from "@tessera/runtime";

import { SourceText } from "./model/text.js";
import { tokenizeTemplate } from "./lexing/tokenizer.js";
import { parseTemplate } from "./parsing/parser.js";
import type { FragmentNode } from "./parsing/nodes.js";
import { buildTemplate } from "./building/builder.js";
import { misplacedRenderSlot } from "./expression/evaluate.js";
import { CompiledTemplate } from "./render/template.js";
import type { ComponentResolver, RenderEnvironment } from "./render/frame.js";

export interface CompileOptions {
  /** Name reported in diagnostics and errors. Defaults to `nofile`. */
  file?: string;
  /** Strip whitespace around the template. Defaults to `true`. */
  trim?: boolean;
  /** Functions and values templates can call by name, next to `raw`, `assignsToAttributes` and `renderSlot`. */
  helpers?: Readonly<Record<string, unknown>>;
  /** Resolves `<.name>` and `<Module.name>` tags. Without one, every component call fails at render time. */
  components?: ComponentResolver;
}

const noComponents: ComponentResolver = () => null;

/** The helper table every template starts from. */
export function createHelpers(extra: Readonly<Record<string, unknown>> = {}): ReadonlyMap<string, unknown> {
  return new Map<string, unknown>([["raw", raw], ["assignsToAttributes", assignsToAttributes], ...Object.entries(extra), ["renderSlot", misplacedRenderSlot]]);
}

/** Tokenize and parse without building; the parse tree is what verification reads. */
export function parseTemplateSource(source: SourceText): FragmentNode {
  return parseTemplate(tokenizeTemplate(source), source);
}

/**
 * Compile template text into a `CompiledTemplate`. Throws
 * `TemplateSyntaxError` on the first lexical or structural error.
 */
export function compileTemplate(text: string, options: CompileOptions = {}): CompiledTemplate {
  const source = new SourceText(text, options.file);
  const environment: RenderEnvironment = {
    source,
    helpers: createHelpers(options.helpers),
    resolveComponent: options.components ?? noComponents,
  };
  return compileSource(source, environment, options.trim ?? true);
}

export function compileSource(source: SourceText, environment: RenderEnvironment, trim: boolean): CompiledTemplate {
  const fragment = parseTemplateSource(source);
  const compiled = buildTemplate(fragment, {
    source,
    helpers: new Set(environment.helpers.keys()),
    trim,
  });
  return new CompiledTemplate(compiled, environment, fragment.calls);
}
