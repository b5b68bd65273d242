/* =============================================================================
 * Expression scanner
 * -----------------------------------------------------------------------------
 * Tokenizes the JavaScript subset templates embed between braces and in block
 * headers. Offsets are local to the expression text.
 * ============================================================================= */

export enum TokenType {
  EOF,
  Identifier,
  StringLiteral,
  NumericLiteral,
  TemplateLiteral,

  KeywordTrue,
  KeywordFalse,
  KeywordNull,
  KeywordUndefined,
  KeywordTypeof,

  OpenParen,
  CloseParen,
  OpenBracket,
  CloseBracket,
  OpenBrace,
  CloseBrace,
  Dot,
  QuestionDot,
  Comma,
  Colon,
  Question,
  Equals,
  Arrow,

  Plus,
  Minus,
  Asterisk,
  Slash,
  Percent,
  Exclamation,
  LessThan,
  LessThanOrEqual,
  GreaterThan,
  GreaterThanOrEqual,
  EqualsEquals,
  EqualsEqualsEquals,
  ExclamationEquals,
  ExclamationEqualsEquals,
  AmpersandAmpersand,
  BarBar,
  QuestionQuestion,
}

export interface Token {
  readonly type: TokenType;
  /** Cooked value for literals, source text otherwise. */
  readonly value: string | number;
  readonly start: number;
  readonly end: number;
}

/**
 * Raised for input the scanner or parser cannot accept. The scanner reports
 * offsets into the text it scans; CoreParser rebases them onto the template.
 */
export class ExpressionSyntaxError extends Error {
  constructor(
    message: string,
    public readonly start: number,
    public readonly end: number,
  ) {
    super(message);
    this.name = "ExpressionSyntaxError";
  }
}

const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ["true", TokenType.KeywordTrue],
  ["false", TokenType.KeywordFalse],
  ["null", TokenType.KeywordNull],
  ["undefined", TokenType.KeywordUndefined],
  ["typeof", TokenType.KeywordTypeof],
]);

/** Longest punctuators first so `===` wins over `==` and `=`. */
const PUNCTUATORS: readonly (readonly [string, TokenType])[] = [
  ["===", TokenType.EqualsEqualsEquals],
  ["!==", TokenType.ExclamationEqualsEquals],
  ["==", TokenType.EqualsEquals],
  ["!=", TokenType.ExclamationEquals],
  ["<=", TokenType.LessThanOrEqual],
  [">=", TokenType.GreaterThanOrEqual],
  ["&&", TokenType.AmpersandAmpersand],
  ["||", TokenType.BarBar],
  ["??", TokenType.QuestionQuestion],
  ["=>", TokenType.Arrow],
  ["(", TokenType.OpenParen],
  [")", TokenType.CloseParen],
  ["[", TokenType.OpenBracket],
  ["]", TokenType.CloseBracket],
  ["{", TokenType.OpenBrace],
  ["}", TokenType.CloseBrace],
  [".", TokenType.Dot],
  [",", TokenType.Comma],
  [":", TokenType.Colon],
  ["?", TokenType.Question],
  ["=", TokenType.Equals],
  ["+", TokenType.Plus],
  ["-", TokenType.Minus],
  ["*", TokenType.Asterisk],
  ["/", TokenType.Slash],
  ["%", TokenType.Percent],
  ["!", TokenType.Exclamation],
  ["<", TokenType.LessThan],
  [">", TokenType.GreaterThan],
];

export class Scanner {
  private pos = 0;

  constructor(private readonly source: string) {}

  get position(): number {
    return this.pos;
  }

  reset(position: number): void {
    this.pos = position;
  }

  next(): Token {
    this.skipWhitespace();
    const src = this.source;
    const start = this.pos;
    if (start >= src.length) {
      return { type: TokenType.EOF, value: "", start, end: start };
    }
    const ch = src[start] ?? "";

    if (isIdentifierStart(ch)) {
      let end = start + 1;
      while (end < src.length && isIdentifierPart(src[end] ?? "")) end++;
      this.pos = end;
      const text = src.slice(start, end);
      return { type: KEYWORDS.get(text) ?? TokenType.Identifier, value: text, start, end };
    }

    if (isDigit(ch) || (ch === "." && isDigit(src[start + 1] ?? ""))) {
      return this.scanNumber(start);
    }

    if (ch === '"' || ch === "'") {
      return this.scanString(start, ch);
    }

    if (ch === "`") {
      return this.scanTemplate(start);
    }

    // `?.` but not `a?.5:b`
    if (ch === "?" && src[start + 1] === "." && !isDigit(src[start + 2] ?? "")) {
      this.pos = start + 2;
      return { type: TokenType.QuestionDot, value: "?.", start, end: this.pos };
    }

    for (const [text, type] of PUNCTUATORS) {
      if (src.startsWith(text, start)) {
        this.pos = start + text.length;
        return { type, value: text, start, end: this.pos };
      }
    }

    throw new ExpressionSyntaxError(`unexpected character ${JSON.stringify(ch)}`, start, start + 1);
  }

  peek(): Token {
    const saved = this.pos;
    const token = this.next();
    this.pos = saved;
    return token;
  }

  private scanNumber(start: number): Token {
    const src = this.source;
    let end = start;
    while (end < src.length && isDigit(src[end] ?? "")) end++;
    if (src[end] === ".") {
      end++;
      while (end < src.length && isDigit(src[end] ?? "")) end++;
    }
    if (src[end] === "e" || src[end] === "E") {
      let exp = end + 1;
      if (src[exp] === "+" || src[exp] === "-") exp++;
      if (isDigit(src[exp] ?? "")) {
        end = exp;
        while (end < src.length && isDigit(src[end] ?? "")) end++;
      }
    }
    if (isIdentifierStart(src[end] ?? "")) {
      throw new ExpressionSyntaxError("invalid numeric literal", start, end + 1);
    }
    this.pos = end;
    return { type: TokenType.NumericLiteral, value: Number(src.slice(start, end)), start, end };
  }

  private scanString(start: number, quote: string): Token {
    const src = this.source;
    let value = "";
    let i = start + 1;
    while (i < src.length) {
      const ch = src[i] ?? "";
      if (ch === quote) {
        this.pos = i + 1;
        return { type: TokenType.StringLiteral, value, start, end: this.pos };
      }
      if (ch === "\\") {
        value += unescape(src[i + 1] ?? "");
        i += 2;
        continue;
      }
      value += ch;
      i++;
    }
    throw new ExpressionSyntaxError("unterminated string literal", start, src.length);
  }

  /** The token value is the raw text between the backticks. */
  private scanTemplate(start: number): Token {
    const src = this.source;
    let i = start + 1;
    while (i < src.length) {
      const ch = src[i];
      if (ch === "\\") {
        i += 2;
        continue;
      }
      if (ch === "`") {
        this.pos = i + 1;
        return { type: TokenType.TemplateLiteral, value: src.slice(start + 1, i), start, end: this.pos };
      }
      if (ch === "$" && src[i + 1] === "{") {
        i = skipBalanced(src, i + 1);
        continue;
      }
      i++;
    }
    throw new ExpressionSyntaxError("unterminated template literal", start, src.length);
  }

  private skipWhitespace(): void {
    const src = this.source;
    while (this.pos < src.length && /\s/.test(src[this.pos] ?? "")) this.pos++;
  }
}

/** From an opening brace, the index just past its matching close brace. */
export function skipBalanced(src: string, open: number): number {
  let depth = 0;
  let i = open;
  while (i < src.length) {
    const ch = src[i];
    if (ch === '"' || ch === "'" || ch === "`") {
      i = skipQuoted(src, i);
      continue;
    }
    if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i + 1;
    }
    i++;
  }
  throw new ExpressionSyntaxError("unterminated template substitution", open, src.length);
}

function skipQuoted(src: string, open: number): number {
  const quote = src[open];
  let i = open + 1;
  while (i < src.length) {
    const ch = src[i];
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if (ch === quote) return i + 1;
    i++;
  }
  return src.length;
}

export function unescape(ch: string): string {
  switch (ch) {
    case "n":
      return "\n";
    case "t":
      return "\t";
    case "r":
      return "\r";
    case "0":
      return "\0";
    default:
      return ch;
  }
}

export function isIdentifierStart(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_" || ch === "$";
}

function isIdentifierPart(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}
