// Model
export type {
  Rendered,
  Dynamic,
  ValueDynamic,
  NestedDynamic,
  ListDynamic,
  ComprehensionDynamic,
  ComponentDynamic,
} from "./model/rendered.js";
export {
  createRendered,
  valueDynamic,
  nestedDynamic,
  listDynamic,
  componentDynamic,
  comprehensionDynamic,
  isRendered,
  itemComponentKey,
  forEachComponentRef,
  forEachComponentRefIn,
} from "./model/rendered.js";
export type { ComponentNode, RenderSnapshot } from "./model/component.js";
export {
  escapeHtml,
  SafeHtml,
  raw,
  encodeText,
  encodeAttribute,
  encodeAttributeValue,
  encodeAttributes,
  encodeClass,
  encodeStyle,
  isPlainRecord,
} from "./model/html.js";
export { renderToString, snapshotToString } from "./model/to-string.js";

// Change tracking
export type { ChangeMark, ChangedSet } from "./tracking/changed.js";
export {
  NOTHING_CHANGED,
  isEmptyChangedSet,
  isPathChanged,
  changeMarkFor,
  mergeChangeMarks,
  mergeChangedSets,
  deepEqual,
} from "./tracking/changed.js";
export { Assigns, assignsToAttributes } from "./tracking/assigns.js";

// Diff
export type {
  Patch,
  TreePatch,
  SlotPatch,
  ValuePatch,
  ComponentRefPatch,
  ComprehensionPatch,
  ListPatch,
  ItemContent,
  ItemPatch,
  Move,
  Insert,
} from "./diff/patch.js";
export { isEmptyPatch } from "./diff/patch.js";
export { diff, diffSnapshot, fullTree, fullDynamic } from "./diff/diff.js";
export { longestIncreasingSubsequence, planMoves, applyMoves } from "./diff/moves.js";

// Wire
export type { WireValue, WireObject } from "./wire/encode.js";
export { encodePatch, encodeTree, encodeSlot } from "./wire/encode.js";

// Sessions
export type { SlotOwner, MountRequest, ComponentRender } from "./session/context.js";
export { RenderContext } from "./session/context.js";
export { MountRegistry } from "./session/registry.js";
export type { SessionTemplate, TemplateRenderInput, SessionOptions, MountResult } from "./session/session.js";
export { LiveSession } from "./session/session.js";

// Errors
export type { DiffInvariantCodeType } from "./errors.js";
export { DiffInvariantError, DiffInvariantCode } from "./errors.js";

// Shared
export type { DebugChannel, DebugChannelName, DebugConfig, DebugData, DebugPayload, Debug } from "./shared/debug.js";
export { debug, configureDebug, isDebugEnabled } from "./shared/debug.js";
export type { FingerprintPart } from "./shared/hash.js";
export { fingerprintOf } from "./shared/hash.js";
