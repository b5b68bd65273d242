import { debug } from "@tessera/runtime";

import type { SourceSpan } from "../model/span.js";
import { SourceText } from "../model/text.js";
import { syntaxError, type TemplateSyntaxError } from "../errors.js";
import type { SyntaxDiagnosticCode } from "../diagnostics/catalog/index.js";
import { splitMarkers } from "./markers.js";
import {
  RAW_TEXT_ELEMENTS,
  classifyTag,
  type AttributeValue,
  type TagAttribute,
  type TagKind,
  type Token,
} from "./tokens.js";

/** Where a chunk left off. Chunks may only end between tags. */
export type TokenizerState =
  | { readonly kind: "text" }
  | { readonly kind: "comment"; readonly start: number }
  | { readonly kind: "raw-text"; readonly tag: string };

export const INITIAL_STATE: TokenizerState = { kind: "text" };

export interface TokenizeOptions {
  /** Offset of the chunk within the whole template. */
  readonly offset?: number;
  /** The whole template, for error positions. Defaults to the chunk itself. */
  readonly source?: SourceText;
}

export interface TokenizeResult {
  readonly tokens: Token[];
  readonly state: TokenizerState;
}

const REMOTE_NAME = /^[A-Z][A-Za-z0-9_]*(\.[A-Z][A-Za-z0-9_]*)*\.[a-z_][A-Za-z0-9_]*$/;
const LOCAL_NAME = /^\.[a-z_][A-Za-z0-9_]*$/;
const SLOT_NAME = /^:[a-z_][A-Za-z0-9_]*$/;
const ELEMENT_NAME = /^[A-Za-z][A-Za-z0-9_.:-]*$/;

/**
 * Tokenize one chunk of HTML-like text. Expression tokens from embedded code
 * markers are not produced here; `tokenizeTemplate` interleaves them.
 */
export function tokenize(
  chunk: string,
  state: TokenizerState = INITIAL_STATE,
  options: TokenizeOptions = {},
): TokenizeResult {
  const offset = options.offset ?? 0;
  const source = options.source ?? new SourceText(chunk);
  return new ChunkTokenizer(chunk, offset, source).run(state);
}

/** Fail if the last chunk left a comment open. */
export function finalizeTokenizer(state: TokenizerState, source: SourceText): void {
  if (state.kind === "comment") {
    throw syntaxError(source, "tessera/unterminated-comment", {
      message: "unexpected end of template inside an HTML comment",
      span: { start: state.start, end: source.text.length },
    });
  }
}

/** Split embedded code markers out, tokenize the text between them, and merge. */
export function tokenizeTemplate(source: SourceText): Token[] {
  const tokens: Token[] = [];
  let state = INITIAL_STATE;
  for (const segment of splitMarkers(source)) {
    if (segment.kind === "text") {
      const result = tokenize(segment.content, state, { offset: segment.start, source });
      tokens.push(...result.tokens);
      state = result.state;
      continue;
    }
    if (state.kind !== "text") {
      // Inside a comment or raw text, markers are still honored as code.
      debug.lex("marker.in-raw", { state: state.kind, start: segment.start });
    }
    tokens.push({
      kind: "expression",
      marker: segment.marker,
      code: segment.code,
      codeSpan: { start: segment.codeStart, end: segment.codeStart + segment.code.length },
      span: { start: segment.start, end: segment.end },
    });
  }
  finalizeTokenizer(state, source);
  debug.lex("tokens", { file: source.file, count: tokens.length });
  return tokens;
}

class ChunkTokenizer {
  private pos = 0;
  private textStart = 0;
  private readonly tokens: Token[] = [];

  constructor(
    private readonly chunk: string,
    private readonly offset: number,
    private readonly source: SourceText,
  ) {}

  run(state: TokenizerState): TokenizeResult {
    if (state.kind === "comment") {
      const resumed = this.continueComment(state.start);
      if (resumed) return resumed;
    } else if (state.kind === "raw-text") {
      const resumed = this.continueRawText(state.tag);
      if (resumed) return resumed;
    }
    return this.scanText();
  }

  private scanText(): TokenizeResult {
    const chunk = this.chunk;
    while (this.pos < chunk.length) {
      const ch = chunk[this.pos];
      if (ch === "<") {
        if (chunk.startsWith("<!--", this.pos)) {
          this.flushText(this.pos);
          const start = this.pos;
          this.textStart = start;
          this.pos += 4;
          const resumed = this.continueComment(this.offset + start);
          if (resumed) return resumed;
          continue;
        }
        if (chunk.startsWith("<!", this.pos)) {
          const close = chunk.indexOf(">", this.pos);
          if (close === -1) {
            throw this.error("tessera/unterminated-tag", "unterminated <! declaration: expected >", this.pos, chunk.length);
          }
          this.pos = close + 1;
          continue;
        }
        const next = chunk[this.pos + 1] ?? "";
        if (next === "/") {
          this.flushText(this.pos);
          const tag = this.scanCloseTag();
          if (tag) return tag;
          continue;
        }
        if (isAsciiLetter(next) || next === "." || next === ":") {
          this.flushText(this.pos);
          const raw = this.scanOpenTag();
          if (raw) return raw;
          continue;
        }
        this.pos++;
        continue;
      }
      if (ch === "{") {
        this.flushText(this.pos);
        const start = this.pos;
        const { code, codeStart, end } = this.scanExpression(start);
        this.tokens.push({
          kind: "expression",
          marker: "body",
          code,
          codeSpan: this.span(codeStart, codeStart + code.length),
          span: this.span(start, end),
        });
        this.pos = end;
        this.textStart = end;
        continue;
      }
      this.pos++;
    }
    this.flushText(chunk.length);
    return { tokens: this.tokens, state: INITIAL_STATE };
  }

  /** Consume through `-->`. Returns a result when the chunk ends inside the comment. */
  private continueComment(absoluteStart: number): TokenizeResult | null {
    const close = this.chunk.indexOf("-->", this.pos);
    if (close === -1) {
      this.flushText(this.chunk.length);
      return { tokens: this.tokens, state: { kind: "comment", start: absoluteStart } };
    }
    this.pos = close + 3;
    this.flushText(this.pos);
    return null;
  }

  /** Consume raw text up to `</tag`. Returns a result when the chunk ends first. */
  private continueRawText(tag: string): TokenizeResult | null {
    const pattern = new RegExp(`</${tag}[\\s>]`, "ig");
    pattern.lastIndex = this.pos;
    const match = pattern.exec(this.chunk);
    if (!match) {
      this.flushText(this.chunk.length);
      return { tokens: this.tokens, state: { kind: "raw-text", tag } };
    }
    this.flushText(match.index);
    this.pos = match.index;
    return this.scanCloseTag();
  }

  private scanCloseTag(): TokenizeResult | null {
    const chunk = this.chunk;
    const start = this.pos;
    this.pos += 2;
    const name = this.readName();
    if (!name) {
      throw this.invalidCharacter("tag name", this.pos);
    }
    this.skipWhitespace();
    if (this.pos >= chunk.length) {
      throw this.error("tessera/unterminated-tag", `expected closing > for </${name}`, start, chunk.length);
    }
    if (chunk[this.pos] !== ">") {
      throw this.invalidCharacter("tag name", this.pos);
    }
    this.pos++;
    this.tokens.push({
      kind: "tag-close",
      name,
      tagKind: this.classify(name, start),
      span: this.span(start, this.pos),
    });
    this.textStart = this.pos;
    return null;
  }

  private scanOpenTag(): TokenizeResult | null {
    const chunk = this.chunk;
    const start = this.pos;
    this.pos++;
    const name = this.readName();
    const tagKind = this.classify(name, start);
    const after = chunk[this.pos];
    if (after !== undefined && !isWhitespace(after) && after !== ">" && after !== "/") {
      throw this.invalidCharacter("tag name", this.pos);
    }

    const attributes: TagAttribute[] = [];
    let selfClose = false;
    for (;;) {
      this.skipWhitespace();
      if (this.pos >= chunk.length) {
        throw this.error("tessera/unterminated-tag", `end of template reached inside <${name}: expected > or />`, start, chunk.length);
      }
      const ch = chunk[this.pos];
      if (ch === ">") {
        this.pos++;
        break;
      }
      if (ch === "/" && chunk[this.pos + 1] === ">") {
        this.pos += 2;
        selfClose = true;
        break;
      }
      if (ch === "{") {
        const attrStart = this.pos;
        const { code, codeStart, end } = this.scanExpression(attrStart);
        attributes.push({
          kind: "spread",
          code,
          codeSpan: this.span(codeStart, codeStart + code.length),
          span: this.span(attrStart, end),
        });
        this.pos = end;
        continue;
      }
      attributes.push(this.scanAttribute(name, start));
    }

    this.tokens.push({
      kind: "tag-open",
      name,
      tagKind,
      attributes,
      selfClose,
      span: this.span(start, this.pos),
    });
    this.textStart = this.pos;

    if (tagKind === "element" && !selfClose && RAW_TEXT_ELEMENTS.has(name.toLowerCase())) {
      return this.continueRawText(name.toLowerCase());
    }
    return null;
  }

  private scanAttribute(tagName: string, tagStart: number): TagAttribute {
    const chunk = this.chunk;
    const start = this.pos;
    while (this.pos < chunk.length && isAttributeNameChar(chunk[this.pos] ?? "")) this.pos++;
    if (this.pos === start) {
      throw this.invalidCharacter("attribute name", this.pos);
    }
    const name = chunk.slice(start, this.pos);
    const afterName = chunk[this.pos] ?? "";
    if (afterName === "/" && chunk[this.pos + 1] !== ">") {
      throw this.invalidCharacter("attribute name", this.pos);
    }
    if (afterName !== "" && !isWhitespace(afterName) && afterName !== "=" && afterName !== ">" && afterName !== "/") {
      throw this.invalidCharacter("attribute name", this.pos);
    }

    const beforeEquals = this.pos;
    this.skipWhitespace();
    if (chunk[this.pos] !== "=") {
      this.pos = beforeEquals;
      return { kind: "attribute", name, value: { kind: "none" }, span: this.span(start, this.pos) };
    }
    this.pos++;
    this.skipWhitespace();
    if (this.pos >= chunk.length) {
      throw this.error("tessera/unterminated-tag", `end of template reached inside <${tagName}: expected an attribute value`, tagStart, chunk.length);
    }

    const valueStart = this.pos;
    const ch = chunk[this.pos];
    let value: AttributeValue;
    if (ch === '"' || ch === "'") {
      const close = chunk.indexOf(ch, this.pos + 1);
      if (close === -1) {
        throw this.error("tessera/unterminated-tag", `missing closing ${ch} for the value of attribute "${name}"`, valueStart, chunk.length);
      }
      value = { kind: "literal", value: chunk.slice(this.pos + 1, close), quote: ch };
      this.pos = close + 1;
    } else if (ch === "{") {
      const { code, codeStart, end } = this.scanExpression(this.pos);
      value = { kind: "expression", code, codeSpan: this.span(codeStart, codeStart + code.length) };
      this.pos = end;
    } else {
      while (this.pos < chunk.length && isUnquotedValueChar(chunk[this.pos] ?? "")) this.pos++;
      if (this.pos === valueStart) {
        throw this.invalidCharacter("attribute value", this.pos);
      }
      value = { kind: "literal", value: chunk.slice(valueStart, this.pos), quote: null };
    }
    return { kind: "attribute", name, value, span: this.span(start, this.pos) };
  }

  /** From an opening brace to its match, skipping string literals. */
  private scanExpression(open: number): { code: string; codeStart: number; end: number } {
    const chunk = this.chunk;
    let depth = 0;
    let i = open;
    while (i < chunk.length) {
      const ch = chunk[i];
      if (ch === '"' || ch === "'" || ch === "`") {
        i = skipString(chunk, i);
        continue;
      }
      if (ch === "{") depth++;
      else if (ch === "}") {
        depth--;
        if (depth === 0) {
          return { code: chunk.slice(open + 1, i), codeStart: open + 1, end: i + 1 };
        }
      }
      i++;
    }
    throw this.error("tessera/unterminated-expression", "missing closing } for expression", open, chunk.length);
  }

  private readName(): string {
    const chunk = this.chunk;
    const start = this.pos;
    while (this.pos < chunk.length && isTagNameChar(chunk[this.pos] ?? "")) this.pos++;
    return chunk.slice(start, this.pos);
  }

  private classify(name: string, start: number): TagKind {
    const kind = classifyTag(name);
    const valid =
      kind === "remote-component" ? REMOTE_NAME.test(name)
      : kind === "local-component" ? LOCAL_NAME.test(name)
      : kind === "slot" ? SLOT_NAME.test(name)
      : ELEMENT_NAME.test(name);
    if (!valid) {
      throw this.error("tessera/invalid-tag", `invalid tag <${name}>`, start, start + name.length + 1);
    }
    return kind;
  }

  private skipWhitespace(): void {
    while (this.pos < this.chunk.length && isWhitespace(this.chunk[this.pos] ?? "")) this.pos++;
  }

  private flushText(end: number): void {
    if (end > this.textStart) {
      this.tokens.push({
        kind: "text",
        content: this.chunk.slice(this.textStart, end),
        span: this.span(this.textStart, end),
      });
    }
    this.textStart = end;
  }

  private span(start: number, end: number): SourceSpan {
    return { start: this.offset + start, end: this.offset + end };
  }

  private invalidCharacter(what: string, at: number): TemplateSyntaxError {
    const ch = this.chunk[at] ?? "";
    return this.error("tessera/invalid-character-in-name", `invalid character in ${what}: ${JSON.stringify(ch)}`, at, at + 1);
  }

  private error(code: SyntaxDiagnosticCode, message: string, start: number, end: number): TemplateSyntaxError {
    return syntaxError(this.source, code, { message, span: this.span(start, Math.max(start, end)) });
  }
}

function skipString(text: string, open: number): number {
  const quote = text[open];
  let i = open + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if (ch === quote) return i + 1;
    i++;
  }
  return text.length;
}

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\n" || ch === "\t" || ch === "\r" || ch === "\f";
}

function isAsciiLetter(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
}

function isTagNameChar(ch: string): boolean {
  return isAsciiLetter(ch) || (ch >= "0" && ch <= "9") || ch === "-" || ch === "_" || ch === "." || ch === ":";
}

function isAttributeNameChar(ch: string): boolean {
  return ch !== "" && !isWhitespace(ch) && !'"\'<>/={}'.includes(ch);
}

function isUnquotedValueChar(ch: string): boolean {
  return ch !== "" && !isWhitespace(ch) && !'"\'<>=`'.includes(ch);
}
