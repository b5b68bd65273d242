import { isEmptyChangedSet, isPathChanged, type ChangedSet } from "@tessera/runtime";
import { boundNames, type BindingPattern, type Expression } from "../expression/ast.js";

/* =============================================================================
 * Dependencies
 * -----------------------------------------------------------------------------
 * Which bindings an expression reads, derived from its AST:
 *
 *   user.name          -> { key: "user", path: ["name"] }
 *   user.name.trim()   -> { key: "user", path: ["name"] }   (method dropped)
 *   users[i]           -> { key: "users", path: [] }        (computed key)
 *   assigns            -> readsAll
 *   assigns.user       -> { key: "user", path: [] }
 *
 * Names bound by a loop, `:let` or an arrow parameter are locals.
 * ============================================================================= */

export interface DependencyKey {
  readonly key: string;
  readonly path: readonly string[];
}

export interface Dependencies {
  readonly keys: readonly DependencyKey[];
  /** The expression reads the whole binding map. */
  readonly readsAll: boolean;
  /** Locals read; these have no identity across renders. */
  readonly locals: readonly string[];
}

export const NO_DEPENDENCIES: Dependencies = Object.freeze({ keys: [], readsAll: false, locals: [] });

/** Identifier that names the whole binding map. */
export const ASSIGNS_NAME = "assigns";

export interface DependencyScope {
  readonly locals: ReadonlySet<string>;
  /** Names resolved to helpers before bindings. */
  readonly helpers: ReadonlySet<string>;
}

export function collectDependencies(
  expressions: Expression | readonly (Expression | null)[],
  scope: DependencyScope,
): Dependencies {
  const collector = new DependencyCollector(scope.helpers);
  const list = isExpressionList(expressions) ? expressions : [expressions];
  for (const expr of list) {
    if (expr) collector.visit(expr, scope.locals);
  }
  return collector.result();
}

function isExpressionList(value: Expression | readonly (Expression | null)[]): value is readonly (Expression | null)[] {
  return Array.isArray(value);
}

/** Dependencies of a binding pattern's default values. */
export function collectPatternDependencies(pattern: BindingPattern, scope: DependencyScope): Dependencies {
  const collector = new DependencyCollector(scope.helpers);
  collector.visitPattern(pattern, scope.locals);
  return collector.result();
}

export function mergeDependencies(...all: readonly Dependencies[]): Dependencies {
  const keys: DependencyKey[] = [];
  const seen = new Set<string>();
  const locals = new Set<string>();
  let readsAll = false;
  for (const deps of all) {
    readsAll ||= deps.readsAll;
    for (const local of deps.locals) locals.add(local);
    for (const dep of deps.keys) {
      const id = keyId(dep);
      if (seen.has(id)) continue;
      seen.add(id);
      keys.push(dep);
    }
  }
  return { keys, readsAll, locals: [...locals] };
}

/** Drop reads of `names`, for a block that binds them itself. */
export function withoutLocals(deps: Dependencies, names: Iterable<string>): Dependencies {
  const drop = new Set(names);
  if (drop.size === 0 || deps.locals.length === 0) return deps;
  return { ...deps, locals: deps.locals.filter((n) => !drop.has(n)) };
}

/**
 * Whether a plan with these dependencies must re-evaluate under `changed`.
 * `null` is untracked, and reads of locals are always affected.
 */
export function isAffected(deps: Dependencies, changed: ChangedSet | null): boolean {
  if (changed === null) return true;
  if (deps.locals.length > 0) return true;
  if (deps.readsAll) return !isEmptyChangedSet(changed);
  return deps.keys.some((dep) => isPathChanged(changed, dep.key, dep.path));
}

class DependencyCollector {
  private readonly keys: DependencyKey[] = [];
  private readonly seen = new Set<string>();
  private readonly locals = new Set<string>();
  private readsAll = false;

  constructor(private readonly helpers: ReadonlySet<string>) {}

  result(): Dependencies {
    return { keys: this.keys, readsAll: this.readsAll, locals: [...this.locals] };
  }

  visit(expr: Expression, locals: ReadonlySet<string>): void {
    switch (expr.$kind) {
      case "PrimitiveLiteral":
        return;
      case "Template":
        for (const part of expr.expressions) this.visit(part, locals);
        return;
      case "AccessScope":
        this.record(expr.name, [], locals);
        return;
      case "AccessMember":
      case "AccessKeyed": {
        const chain = staticChain(expr);
        if (chain) {
          this.record(chain.root, chain.path, locals);
          return;
        }
        this.visit(expr.object, locals);
        if (expr.$kind === "AccessKeyed") this.visit(expr.key, locals);
        return;
      }
      case "Call": {
        const callee = expr.callee;
        // a method call reads its receiver, not the method
        if (callee.$kind === "AccessMember") {
          this.visit(callee.object, locals);
        } else if (callee.$kind === "AccessKeyed") {
          this.visit(callee.object, locals);
          this.visit(callee.key, locals);
        } else {
          this.visit(callee, locals);
        }
        for (const arg of expr.args) this.visit(arg, locals);
        return;
      }
      case "Unary":
        this.visit(expr.expression, locals);
        return;
      case "Binary":
        this.visit(expr.left, locals);
        this.visit(expr.right, locals);
        return;
      case "Conditional":
        this.visit(expr.condition, locals);
        this.visit(expr.yes, locals);
        this.visit(expr.no, locals);
        return;
      case "ArrayLiteral":
        for (const el of expr.elements) this.visit(el, locals);
        return;
      case "ObjectLiteral":
        for (const value of expr.values) this.visit(value, locals);
        return;
      case "ArrowFunction": {
        const inner = new Set(locals);
        for (const param of expr.params) {
          this.visitPattern(param, inner);
          for (const name of boundNames(param)) inner.add(name);
        }
        // parameters are arguments, not locals of the enclosing template
        const before = new Set(this.locals);
        this.visit(expr.body, inner);
        for (const name of inner) {
          if (!locals.has(name) && !before.has(name)) this.locals.delete(name);
        }
        return;
      }
    }
  }

  visitPattern(pattern: BindingPattern, locals: ReadonlySet<string>): void {
    switch (pattern.$kind) {
      case "BindingIdentifier":
        return;
      case "BindingPatternDefault":
        this.visit(pattern.default, locals);
        this.visitPattern(pattern.target, locals);
        return;
      case "ArrayBindingPattern":
        for (const el of pattern.elements) if (el) this.visitPattern(el, locals);
        return;
      case "ObjectBindingPattern":
        for (const prop of pattern.properties) this.visitPattern(prop.value, locals);
        return;
    }
  }

  private record(name: string, path: readonly string[], locals: ReadonlySet<string>): void {
    if (locals.has(name)) {
      this.locals.add(name);
      return;
    }
    if (name === ASSIGNS_NAME) {
      const [key, ...rest] = path;
      if (key === undefined) {
        this.readsAll = true;
      } else {
        this.add({ key, path: rest });
      }
      return;
    }
    if (this.helpers.has(name)) return;
    this.add({ key: name, path });
  }

  private add(dep: DependencyKey): void {
    const id = keyId(dep);
    if (this.seen.has(id)) return;
    this.seen.add(id);
    this.keys.push(dep);
  }
}

/** `a.b["c"][0]` as root `a` and path `["b", "c", "0"]`; null past a computed key. */
function staticChain(expr: Expression): { root: string; path: string[] } | null {
  const path: string[] = [];
  let current = expr;
  for (;;) {
    switch (current.$kind) {
      case "AccessScope":
        return { root: current.name, path: path.reverse() };
      case "AccessMember":
        path.push(current.name);
        current = current.object;
        continue;
      case "AccessKeyed": {
        const key = current.key;
        if (key.$kind !== "PrimitiveLiteral" || (typeof key.value !== "string" && typeof key.value !== "number")) {
          return null;
        }
        path.push(String(key.value));
        current = current.object;
        continue;
      }
      default:
        return null;
    }
  }
}

function keyId(dep: DependencyKey): string {
  return [dep.key, ...dep.path].join("\u0000");
}
