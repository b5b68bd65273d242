import { NOTHING_CHANGED, isPlainRecord, type Rendered } from "@tessera/runtime";

import type { SourceSpan } from "../model/span.js";
import type { CompiledFragment, SlotEntryPlan } from "../building/plans.js";
import { EvaluationError, bindPattern, describe } from "../expression/evaluate.js";
import { renderFragment } from "./fragment.js";
import type { RenderFrame } from "./frame.js";

/** Where the callee renders slot content: its plan position and its cid. */
export interface SlotHost {
  readonly position: string;
  readonly cid: number | null;
}

/**
 * The content of one slot entry, rendered on demand by the component that
 * received it. Content is evaluated against the caller's frame with the
 * `:let` pattern bound to whatever the callee passes to `renderSlot`.
 */
export class InnerBlock {
  constructor(
    private readonly slot: string,
    private readonly pattern: SlotEntryPlan["let"],
    private readonly body: CompiledFragment,
    private readonly caller: RenderFrame,
    /** The caller-side dependencies of the entry were affected. */
    private readonly affected: boolean,
  ) {}

  render(argument: unknown, host: SlotHost, previous: Rendered | null): Rendered {
    let locals = this.caller.locals;
    if (this.pattern) {
      const bound = new Map(locals);
      bindPattern(this.pattern, argument, this.caller, bound);
      locals = bound;
    }
    const frame = this.caller.derive({
      locals,
      changed: this.affected ? this.caller.changed : NOTHING_CHANGED,
      position: host.position,
      slotOwner: host.cid === null ? this.caller.slotOwner : { cid: host.cid, slot: this.slot },
    });
    return renderFragment(this.body, frame, previous);
  }
}

/** A slot entry as the callee sees it: the entry's attributes plus its content. */
export interface SlotEntry {
  readonly __slot__: string;
  readonly inner_block: InnerBlock | null;
  readonly [attribute: string]: unknown;
}

export function isSlotEntry(value: unknown): value is SlotEntry {
  return (
    isPlainRecord(value) &&
    typeof value["__slot__"] === "string" &&
    (value["inner_block"] === null || value["inner_block"] instanceof InnerBlock)
  );
}

/** The entries `renderSlot` walks: a slot's list of entries, a single entry, or nothing. */
export function slotEntriesOf(value: unknown, span: SourceSpan): readonly SlotEntry[] {
  if (value == null) return [];
  if (isSlotEntry(value)) return [value];
  if (Array.isArray(value) && value.every(isSlotEntry)) return value;
  throw new EvaluationError(`renderSlot expects a slot, got: ${describe(value)}`, "tessera/evaluation-failed", span);
}
