import {
  MountRegistry,
  RenderContext,
  snapshotToString,
  type Rendered,
  type SessionTemplate,
  type TemplateRenderInput,
} from "@tessera/runtime";

import type { CompiledFragment } from "../building/plans.js";
import type { CompilerDiagnostic } from "../model/diagnostics.js";
import type { SourceText } from "../model/text.js";
import type { ComponentCall } from "../parsing/nodes.js";
import { renderFragment } from "./fragment.js";
import { RenderFrame, type RenderEnvironment } from "./frame.js";

/**
 * A compiled template bound to the environment it was compiled in. Plugs
 * into a `LiveSession`, or renders standalone to a string.
 */
export class CompiledTemplate implements SessionTemplate {
  private readonly warnings: CompilerDiagnostic[] = [];

  constructor(
    readonly fragment: CompiledFragment,
    readonly environment: RenderEnvironment,
    /** Component invocations in source order. */
    readonly calls: readonly ComponentCall[],
  ) {}

  get fingerprint(): string {
    return this.fragment.fingerprint;
  }

  get source(): SourceText {
    return this.environment.source;
  }

  /** Verification warnings about the component calls of this template. */
  get diagnostics(): readonly CompilerDiagnostic[] {
    return this.warnings;
  }

  /** @internal */
  report(diagnostics: readonly CompilerDiagnostic[]): void {
    this.warnings.push(...diagnostics);
  }

  render(input: TemplateRenderInput): Rendered {
    const frame = new RenderFrame({
      context: input.context,
      environment: this.environment,
      assigns: input.assigns,
      changed: input.changed,
      position: "root",
      cid: null,
    });
    return renderFragment(this.fragment, frame, input.previous);
  }

  /** One-off render of the full HTML, without change tracking. */
  renderToString(assigns: Readonly<Record<string, unknown>> = {}): string {
    const context = new RenderContext(null, new MountRegistry());
    const root = this.render({ context, assigns, changed: null, previous: null });
    return snapshotToString(context.finish(root));
  }
}
