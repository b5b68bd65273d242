import { isPlainRecord } from "@tessera/runtime";
import type { BinaryExpression, BindingPattern, Expression, UnaryExpression } from "./ast.js";
import type { SourceSpan } from "../model/span.js";
import type { RuntimeDiagnosticCode } from "../diagnostics/catalog/index.js";
import { TemplateRuntimeError } from "../errors.js";

/** An expression failed at render time; the renderer positions it in the template. */
export class EvaluationError extends Error {
  constructor(
    message: string,
    public readonly code: RuntimeDiagnosticCode,
    public readonly span: SourceSpan,
  ) {
    super(message);
    this.name = "EvaluationError";
  }
}

const MISPLACED_RENDER_SLOT = "renderSlot(...) must be the whole output expression, as in {renderSlot(inner_block)}";

/**
 * What `renderSlot` is bound to inside expressions. A direct call is reported
 * at its position; a call made from a helper has no position to report.
 */
export function misplacedRenderSlot(): never {
  throw new TemplateRuntimeError(MISPLACED_RENDER_SLOT, "tessera/misplaced-render-slot");
}

export interface Binding {
  readonly value: unknown;
}

/** Name resolution for AccessScope. `undefined` means the name is not bound. */
export interface EvaluationScope {
  lookup(name: string): Binding | undefined;
}

export function scopeFromRecord(record: Readonly<Record<string, unknown>>): EvaluationScope {
  return {
    lookup: (name) => (Object.prototype.hasOwnProperty.call(record, name) ? { value: record[name] } : undefined),
  };
}

/** A scope that binds `names` over `parent`. */
export function childScope(parent: EvaluationScope, names: ReadonlyMap<string, unknown>): EvaluationScope {
  if (names.size === 0) return parent;
  return {
    lookup: (name) => (names.has(name) ? { value: names.get(name) } : parent.lookup(name)),
  };
}

/** Property names never read through templates. */
const BLOCKED_MEMBERS: ReadonlySet<string> = new Set(["__proto__", "constructor", "prototype"]);

/** Marks an optional chain that hit a nullish link. */
const SHORT_CIRCUIT: unique symbol = Symbol("short-circuit");
type ChainResult = unknown;

export function evaluate(expr: Expression, scope: EvaluationScope): unknown {
  const result = evaluateLink(expr, scope);
  return result === SHORT_CIRCUIT ? undefined : result;
}

function evaluateLink(expr: Expression, scope: EvaluationScope): ChainResult {
  switch (expr.$kind) {
    case "PrimitiveLiteral":
      return expr.value;

    case "Template": {
      let out = expr.cooked[0] ?? "";
      expr.expressions.forEach((part, i) => {
        out += String(evaluate(part, scope)) + (expr.cooked[i + 1] ?? "");
      });
      return out;
    }

    case "AccessScope": {
      const binding = scope.lookup(expr.name);
      if (!binding) {
        throw new EvaluationError(`${expr.name} is not defined`, "tessera/evaluation-failed", expr.span);
      }
      return binding.value;
    }

    case "AccessMember": {
      const object = evaluateLink(expr.object, scope);
      if (object === SHORT_CIRCUIT) return SHORT_CIRCUIT;
      if (expr.optional && object == null) return SHORT_CIRCUIT;
      return readMember(object, expr.name, expr.span);
    }

    case "AccessKeyed": {
      const object = evaluateLink(expr.object, scope);
      if (object === SHORT_CIRCUIT) return SHORT_CIRCUIT;
      if (expr.optional && object == null) return SHORT_CIRCUIT;
      const key = evaluate(expr.key, scope);
      if (typeof key !== "string" && typeof key !== "number") {
        throw new EvaluationError(`invalid property key ${describe(key)}`, "tessera/evaluation-failed", expr.key.span);
      }
      return readMember(object, String(key), expr.span);
    }

    case "Call":
      return evaluateCall(expr.callee, expr.args, expr.optional, expr.span, scope);

    case "Unary":
      return evaluateUnary(expr, scope);

    case "Binary":
      return evaluateBinary(expr, scope);

    case "Conditional":
      return evaluate(expr.condition, scope) ? evaluate(expr.yes, scope) : evaluate(expr.no, scope);

    case "ArrayLiteral":
      return expr.elements.map((el) => evaluate(el, scope));

    case "ObjectLiteral": {
      const out: Record<string, unknown> = {};
      expr.keys.forEach((key, i) => {
        const value = expr.values[i];
        if (value) out[key] = evaluate(value, scope);
      });
      return out;
    }

    case "ArrowFunction":
      return (...args: unknown[]): unknown => {
        const names = new Map<string, unknown>();
        expr.params.forEach((param, i) => bindPattern(param, args[i], scope, names));
        return evaluate(expr.body, childScope(scope, names));
      };
  }
}

function evaluateCall(
  callee: Expression,
  args: readonly Expression[],
  optional: boolean,
  span: SourceSpan,
  scope: EvaluationScope,
): ChainResult {
  let receiver: unknown = undefined;
  let fn: unknown;

  if (callee.$kind === "AccessMember" || callee.$kind === "AccessKeyed") {
    const object = evaluateLink(callee.object, scope);
    if (object === SHORT_CIRCUIT) return SHORT_CIRCUIT;
    if (callee.optional && object == null) return SHORT_CIRCUIT;
    let name: string;
    if (callee.$kind === "AccessMember") {
      name = callee.name;
    } else {
      const key = evaluate(callee.key, scope);
      if (typeof key !== "string" && typeof key !== "number") {
        throw new EvaluationError(`invalid property key ${describe(key)}`, "tessera/evaluation-failed", callee.key.span);
      }
      name = String(key);
    }
    receiver = object;
    fn = readMember(object, name, callee.span);
  } else {
    fn = evaluateLink(callee, scope);
    if (fn === SHORT_CIRCUIT) return SHORT_CIRCUIT;
  }

  if (optional && fn == null) return SHORT_CIRCUIT;
  if (fn === misplacedRenderSlot) {
    throw new EvaluationError(MISPLACED_RENDER_SLOT, "tessera/misplaced-render-slot", span);
  }
  if (typeof fn !== "function") {
    throw new EvaluationError(`${describeCallee(callee)} is not a function`, "tessera/evaluation-failed", span);
  }
  const values = args.map((arg) => evaluate(arg, scope));
  return Reflect.apply(fn, receiver, values);
}

function readMember(object: unknown, name: string, span: SourceSpan): unknown {
  if (object == null) {
    throw new EvaluationError(`cannot read "${name}" of ${String(object)}`, "tessera/evaluation-failed", span);
  }
  if (BLOCKED_MEMBERS.has(name)) {
    throw new EvaluationError(`access to "${name}" is not allowed`, "tessera/evaluation-failed", span);
  }
  return Reflect.get(toObject(object), name);
}

/** Boxes primitives for property reads. */
function toObject(value: {}): object {
  return Object(value);
}

function evaluateUnary(expr: UnaryExpression, scope: EvaluationScope): unknown {
  const value = evaluate(expr.expression, scope);
  switch (expr.operation) {
    case "!":
      return !value;
    case "-":
      return -Number(value);
    case "+":
      return Number(value);
    case "typeof":
      return typeof value;
  }
}

function evaluateBinary(expr: BinaryExpression, scope: EvaluationScope): unknown {
  // short-circuit operators evaluate the right side lazily
  switch (expr.operation) {
    case "&&": {
      const left = evaluate(expr.left, scope);
      return left ? evaluate(expr.right, scope) : left;
    }
    case "||": {
      const left = evaluate(expr.left, scope);
      return left ? left : evaluate(expr.right, scope);
    }
    case "??": {
      const left = evaluate(expr.left, scope);
      return left ?? evaluate(expr.right, scope);
    }
    default:
      break;
  }

  const left = evaluate(expr.left, scope);
  const right = evaluate(expr.right, scope);
  switch (expr.operation) {
    case "===":
      return left === right;
    case "!==":
      return left !== right;
    case "==":
      return left == right;
    case "!=":
      return left != right;
    case "<":
      return compare(left, right) < 0;
    case "<=":
      return compare(left, right) <= 0;
    case ">":
      return compare(left, right) > 0;
    case ">=":
      return compare(left, right) >= 0;
    case "+":
      if (typeof left === "string" || typeof right === "string") {
        return String(left) + String(right);
      }
      return Number(left) + Number(right);
    case "-":
      return Number(left) - Number(right);
    case "*":
      return Number(left) * Number(right);
    case "/":
      return Number(left) / Number(right);
    case "%":
      return Number(left) % Number(right);
  }
}

/** Strings compare lexically, everything else numerically; NaN compares as unordered. */
function compare(left: unknown, right: unknown): number {
  if (typeof left === "string" && typeof right === "string") {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  const l = Number(left);
  const r = Number(right);
  if (Number.isNaN(l) || Number.isNaN(r)) return Number.NaN;
  return l - r;
}

/* ---- binding patterns ---- */

/** Destructure `value` into `into`, throwing `tessera/pattern-mismatch` when the shape does not fit. */
export function bindPattern(
  pattern: BindingPattern,
  value: unknown,
  scope: EvaluationScope,
  into: Map<string, unknown>,
): void {
  switch (pattern.$kind) {
    case "BindingIdentifier":
      into.set(pattern.name, value);
      return;

    case "BindingPatternDefault":
      bindPattern(pattern.target, value === undefined ? evaluate(pattern.default, childScope(scope, into)) : value, scope, into);
      return;

    case "ArrayBindingPattern": {
      if (!isIterable(value)) {
        throw new EvaluationError(
          `cannot destructure ${describe(value)} as an array`,
          "tessera/pattern-mismatch",
          pattern.span,
        );
      }
      const items = Array.from(value);
      pattern.elements.forEach((el, i) => {
        if (el) bindPattern(el, items[i], scope, into);
      });
      return;
    }

    case "ObjectBindingPattern": {
      if (value == null || typeof value !== "object") {
        throw new EvaluationError(
          `cannot destructure ${describe(value)} as an object`,
          "tessera/pattern-mismatch",
          pattern.span,
        );
      }
      for (const prop of pattern.properties) {
        bindPattern(prop.value, Reflect.get(value, prop.key), scope, into);
      }
      return;
    }
  }
}

/* ---- iteration ---- */

/**
 * Items a loop walks over: arrays, Sets and other iterables as they are, Maps
 * as `[key, value]` entries, plain records as their entries, nullish as empty.
 */
export function iterate(value: unknown, span: SourceSpan): unknown[] {
  if (value == null) return [];
  if (Array.isArray(value)) return value;
  if (isIterable(value)) return Array.from(value);
  if (isPlainRecord(value)) return Object.entries(value);
  throw new EvaluationError(`${describe(value)} is not iterable`, "tessera/not-iterable", span);
}

/** Strings are not iterated; loops take collections only. */
function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === "function"
  );
}

export function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "number":
    case "boolean":
    case "undefined":
      return String(value);
    case "function":
      return "a function";
    default:
      return isPlainRecord(value) ? "an object" : `a ${Object.prototype.toString.call(value).slice(8, -1)}`;
  }
}

function describeCallee(callee: Expression): string {
  switch (callee.$kind) {
    case "AccessScope":
      return callee.name;
    case "AccessMember":
      return `${describeCallee(callee.object)}.${callee.name}`;
    default:
      return "expression";
  }
}
