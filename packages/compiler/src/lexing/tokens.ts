import type { SourceSpan } from "../model/span.js";

/** How a tag name is interpreted. */
export type TagKind =
  | "element"
  | "void"
  | "local-component"
  | "remote-component"
  | "slot";

export type AttributeValue =
  | { readonly kind: "literal"; readonly value: string; readonly quote: '"' | "'" | null }
  | { readonly kind: "expression"; readonly code: string; readonly codeSpan: SourceSpan }
  | { readonly kind: "none" };

export type TagAttribute =
  | {
      readonly kind: "attribute";
      readonly name: string;
      readonly value: AttributeValue;
      readonly span: SourceSpan;
    }
  | {
      readonly kind: "spread";
      readonly code: string;
      readonly codeSpan: SourceSpan;
      readonly span: SourceSpan;
    };

export interface TextToken {
  readonly kind: "text";
  readonly content: string;
  readonly span: SourceSpan;
}

export interface TagOpenToken {
  readonly kind: "tag-open";
  readonly name: string;
  readonly tagKind: TagKind;
  readonly attributes: readonly TagAttribute[];
  readonly selfClose: boolean;
  readonly span: SourceSpan;
}

export interface TagCloseToken {
  readonly kind: "tag-close";
  readonly name: string;
  readonly tagKind: TagKind;
  readonly span: SourceSpan;
}

/** `{expr}` in body position, or an embedded code marker. */
export interface ExpressionToken {
  readonly kind: "expression";
  readonly marker: "body" | "output" | "control";
  readonly code: string;
  readonly codeSpan: SourceSpan;
  readonly span: SourceSpan;
}

export type Token = TextToken | TagOpenToken | TagCloseToken | ExpressionToken;

const VOID_ELEMENTS: ReadonlySet<string> = new Set([
  "area", "base", "br", "col", "command", "embed", "hr", "img", "input",
  "keygen", "link", "meta", "param", "source", "track", "wbr",
]);

/** Elements whose content is raw text: no tags, no expressions until the closing tag. */
export const RAW_TEXT_ELEMENTS: ReadonlySet<string> = new Set(["script", "style"]);

export function classifyTag(name: string): TagKind {
  const first = name[0] ?? "";
  if (first === ".") return "local-component";
  if (first === ":") return "slot";
  if (first >= "A" && first <= "Z") return "remote-component";
  if (VOID_ELEMENTS.has(name.toLowerCase())) return "void";
  return "element";
}

export function isComponentKind(kind: TagKind): kind is "local-component" | "remote-component" {
  return kind === "local-component" || kind === "remote-component";
}
