import { ExpressionSyntaxError, Scanner, TokenType, skipBalanced, unescape, type Token } from "./scanner.js";
import type {
  ArrayBindingPattern,
  ArrayLiteralExpression,
  ArrowFunctionExpression,
  BinaryOperator,
  BindingIdentifier,
  BindingPattern,
  BindingProperty,
  Expression,
  ForOfStatement,
  ObjectBindingPattern,
  ObjectLiteralExpression,
  TemplateExpression,
  UnaryOperator,
} from "./ast.js";
import type { SourceSpan } from "../model/span.js";

/**
 * Recursive-descent parser for template expressions. Binary operators are
 * handled by precedence climbing; every node carries an absolute span
 * (`baseOffset` is where `source` starts in the template).
 *
 * Invalid input throws ExpressionSyntaxError with absolute offsets.
 */
export class CoreParser {
  private readonly scanner: Scanner;
  /** End offset of the last consumed token. */
  private lastTokenEnd = 0;

  constructor(
    source: string,
    private readonly baseOffset = 0,
  ) {
    this.scanner = new Scanner(source);
  }

  // ------------------------------------------------------------------------------------------
  // Entry points
  // ------------------------------------------------------------------------------------------

  /** Expr EOF */
  parseExpression(): Expression {
    const first = this.peekToken();
    if (first.type === TokenType.EOF) {
      throw this.error("empty expression", first);
    }
    const expr = this.parseAssignExpr();
    this.expectEnd("unexpected token after end of expression");
    return expr;
  }

  /** BindingPattern EOF */
  parseBindingPattern(): BindingPattern {
    const first = this.peekToken();
    if (first.type === TokenType.EOF) {
      throw this.error("empty binding pattern", first);
    }
    const pattern = this.parseBindingPatternWithDefault();
    this.expectEnd("unexpected token after binding pattern");
    return pattern;
  }

  /** BindingPattern "of" Expr EOF */
  parseForOf(): ForOfStatement {
    const first = this.peekToken();
    if (first.type === TokenType.EOF) {
      throw this.error("empty iterator header", first);
    }
    const declaration = this.parseBindingPatternBase();
    const ofTok = this.nextToken();
    if (ofTok.type !== TokenType.Identifier || ofTok.value !== "of") {
      throw this.error("expected 'of' in iterator header", ofTok);
    }
    const iterable = this.parseAssignExpr();
    this.expectEnd("unexpected token after iterator header");
    return {
      $kind: "ForOfStatement",
      declaration,
      iterable,
      span: this.span(first.start, this.lastTokenEnd),
    };
  }

  // ------------------------------------------------------------------------------------------
  // Expressions
  // ------------------------------------------------------------------------------------------

  private parseAssignExpr(): Expression {
    return this.parseConditionalExpr();
  }

  // ConditionalExpr ::= BinaryExpr ("?" AssignExpr ":" AssignExpr)?
  private parseConditionalExpr(): Expression {
    const condition = this.parseBinaryExpr(1);
    if (this.peekToken().type !== TokenType.Question) {
      return condition;
    }
    this.nextToken();
    const yes = this.parseAssignExpr();
    const colon = this.nextToken();
    if (colon.type !== TokenType.Colon) {
      throw this.error("expected ':' in conditional expression", colon);
    }
    const no = this.parseAssignExpr();
    return {
      $kind: "Conditional",
      condition,
      yes,
      no,
      span: this.cover(condition.span, no.span),
    };
  }

  private parseBinaryExpr(minPrecedence: number): Expression {
    let left = this.parseUnaryExpr();

    for (;;) {
      const look = this.peekToken();
      const info = getBinaryOpInfo(look.type);
      if (info == null || info.precedence < minPrecedence) {
        break;
      }
      this.nextToken();
      const right = this.parseBinaryExpr(info.precedence + 1);
      left = {
        $kind: "Binary",
        operation: info.operator,
        left,
        right,
        span: this.cover(left.span, right.span),
      };
    }

    return left;
  }

  // UnaryExpr ::= MemberExpr | ("!" | "+" | "-" | "typeof") UnaryExpr
  private parseUnaryExpr(): Expression {
    const t = this.peekToken();
    const op = getPrefixUnaryOperator(t.type);
    if (op == null) {
      return this.parseMemberExpression();
    }
    this.nextToken();
    const expression = this.parseUnaryExpr();
    return {
      $kind: "Unary",
      operation: op,
      expression,
      span: { start: this.baseOffset + t.start, end: expression.span.end },
    };
  }

  private parseMemberExpression(): Expression {
    let expr = this.parsePrimaryExpr();

    for (;;) {
      const t = this.peekToken();
      switch (t.type) {
        case TokenType.Dot: {
          this.nextToken();
          const name = this.expectPropertyName("expected identifier after '.'");
          expr = { $kind: "AccessMember", object: expr, name, optional: false, span: this.extend(expr.span) };
          continue;
        }
        case TokenType.QuestionDot: {
          this.nextToken();
          const next = this.peekToken();
          if (next.type === TokenType.OpenParen) {
            const args = this.parseArguments();
            expr = { $kind: "Call", callee: expr, args, optional: true, span: this.extend(expr.span) };
          } else if (next.type === TokenType.OpenBracket) {
            this.nextToken();
            const key = this.parseKeyedAccess();
            expr = { $kind: "AccessKeyed", object: expr, key, optional: true, span: this.extend(expr.span) };
          } else {
            const name = this.expectPropertyName("expected identifier after '?.'");
            expr = { $kind: "AccessMember", object: expr, name, optional: true, span: this.extend(expr.span) };
          }
          continue;
        }
        case TokenType.OpenBracket: {
          this.nextToken();
          const key = this.parseKeyedAccess();
          expr = { $kind: "AccessKeyed", object: expr, key, optional: false, span: this.extend(expr.span) };
          continue;
        }
        case TokenType.OpenParen: {
          const args = this.parseArguments();
          expr = { $kind: "Call", callee: expr, args, optional: false, span: this.extend(expr.span) };
          continue;
        }
        default:
          return expr;
      }
    }
  }

  /** After `[`: Expr "]" */
  private parseKeyedAccess(): Expression {
    const key = this.parseAssignExpr();
    const close = this.nextToken();
    if (close.type !== TokenType.CloseBracket) {
      throw this.error("expected ']' in indexed access", close);
    }
    return key;
  }

  private parseArguments(): Expression[] {
    const open = this.nextToken();
    if (open.type !== TokenType.OpenParen) {
      throw this.error("expected '(' for argument list", open);
    }
    const args: Expression[] = [];
    if (this.peekToken().type === TokenType.CloseParen) {
      this.nextToken();
      return args;
    }
    for (;;) {
      args.push(this.parseAssignExpr());
      const t = this.nextToken();
      if (t.type === TokenType.CloseParen) return args;
      if (t.type !== TokenType.Comma) {
        throw this.error("expected ',' or ')' in argument list", t);
      }
    }
  }

  private parsePrimaryExpr(): Expression {
    const t = this.peekToken();

    switch (t.type) {
      case TokenType.Identifier: {
        if (this.isArrowAfter(t)) {
          return this.parseArrowFunction();
        }
        this.nextToken();
        return { $kind: "AccessScope", name: String(t.value), span: this.span(t.start, t.end) };
      }
      case TokenType.StringLiteral:
      case TokenType.NumericLiteral:
        this.nextToken();
        return { $kind: "PrimitiveLiteral", value: t.value, span: this.span(t.start, t.end) };
      case TokenType.KeywordTrue:
      case TokenType.KeywordFalse:
        this.nextToken();
        return { $kind: "PrimitiveLiteral", value: t.type === TokenType.KeywordTrue, span: this.span(t.start, t.end) };
      case TokenType.KeywordNull:
        this.nextToken();
        return { $kind: "PrimitiveLiteral", value: null, span: this.span(t.start, t.end) };
      case TokenType.KeywordUndefined:
        this.nextToken();
        return { $kind: "PrimitiveLiteral", value: undefined, span: this.span(t.start, t.end) };
      case TokenType.TemplateLiteral:
        this.nextToken();
        return this.parseTemplateLiteral(t);
      case TokenType.OpenBracket:
        return this.parseArrayLiteral();
      case TokenType.OpenBrace:
        return this.parseObjectLiteral();
      case TokenType.OpenParen: {
        if (this.isParenthesizedArrowHead()) {
          return this.parseArrowFunction();
        }
        this.nextToken();
        const inner = this.parseAssignExpr();
        const close = this.nextToken();
        if (close.type !== TokenType.CloseParen) {
          throw this.error("expected ')' to close parenthesized expression", close);
        }
        return inner;
      }
      default:
        throw this.error(t.type === TokenType.EOF ? "unexpected end of expression" : `unexpected token ${JSON.stringify(t.value)}`, t);
    }
  }

  private parseArrayLiteral(): ArrayLiteralExpression {
    const open = this.nextToken();
    const elements: Expression[] = [];
    if (this.peekToken().type !== TokenType.CloseBracket) {
      for (;;) {
        elements.push(this.parseAssignExpr());
        if (this.peekToken().type !== TokenType.Comma) break;
        this.nextToken();
        // trailing comma
        if (this.peekToken().type === TokenType.CloseBracket) break;
      }
    }
    const close = this.nextToken();
    if (close.type !== TokenType.CloseBracket) {
      throw this.error("expected ',' or ']' in array literal", close);
    }
    return { $kind: "ArrayLiteral", elements, span: this.span(open.start, close.end) };
  }

  private parseObjectLiteral(): ObjectLiteralExpression {
    const open = this.nextToken();
    const keys: string[] = [];
    const values: Expression[] = [];

    while (this.peekToken().type !== TokenType.CloseBrace) {
      const keyTok = this.nextToken();
      const key = propertyKey(keyTok);
      if (key == null) {
        throw this.error("expected property name in object literal", keyTok);
      }
      keys.push(key);

      const look = this.peekToken();
      if (look.type === TokenType.Colon) {
        this.nextToken();
        values.push(this.parseAssignExpr());
      } else if (keyTok.type === TokenType.Identifier && (look.type === TokenType.Comma || look.type === TokenType.CloseBrace)) {
        values.push({ $kind: "AccessScope", name: key, span: this.span(keyTok.start, keyTok.end) });
      } else {
        throw this.error("expected ':' after object literal key", look);
      }

      const sep = this.peekToken();
      if (sep.type === TokenType.Comma) {
        this.nextToken();
      } else if (sep.type !== TokenType.CloseBrace) {
        throw this.error("expected ',' or '}' in object literal", sep);
      }
    }
    const close = this.nextToken();
    return { $kind: "ObjectLiteral", keys, values, span: this.span(open.start, close.end) };
  }

  private parseTemplateLiteral(t: Token): TemplateExpression {
    const raw = String(t.value);
    const rawStart = t.start + 1;
    const cooked: string[] = [];
    const expressions: Expression[] = [];
    let current = "";
    let i = 0;

    while (i < raw.length) {
      const ch = raw[i] ?? "";
      if (ch === "\\") {
        current += unescape(raw[i + 1] ?? "");
        i += 2;
        continue;
      }
      if (ch === "$" && raw[i + 1] === "{") {
        const end = this.rebaseErrors(() => skipBalanced(raw, i + 1), rawStart);
        const inner = new CoreParser(raw.slice(i + 2, end - 1), this.baseOffset + rawStart + i + 2);
        cooked.push(current);
        current = "";
        expressions.push(inner.parseExpression());
        i = end;
        continue;
      }
      current += ch;
      i++;
    }
    cooked.push(current);
    return { $kind: "Template", cooked, expressions, span: this.span(t.start, t.end) };
  }

  // ident => body | (params) => body
  private parseArrowFunction(): ArrowFunctionExpression {
    const first = this.peekToken();
    const params: BindingPattern[] = [];
    if (first.type === TokenType.Identifier) {
      params.push(this.parseBindingIdentifier());
    } else {
      this.nextToken();
      while (this.peekToken().type !== TokenType.CloseParen) {
        params.push(this.parseBindingPatternWithDefault());
        const sep = this.peekToken();
        if (sep.type === TokenType.Comma) {
          this.nextToken();
        } else if (sep.type !== TokenType.CloseParen) {
          throw this.error("expected ',' or ')' in arrow parameters", sep);
        }
      }
      this.nextToken();
    }
    const arrow = this.nextToken();
    if (arrow.type !== TokenType.Arrow) {
      throw this.error("expected '=>'", arrow);
    }
    const body = this.parseAssignExpr();
    return { $kind: "ArrowFunction", params, body, span: { start: this.baseOffset + first.start, end: body.span.end } };
  }

  private isArrowAfter(t: Token): boolean {
    const saved = this.scanner.position;
    this.scanner.reset(t.end);
    const next = this.rebaseErrors(() => this.scanner.peek());
    this.scanner.reset(saved);
    return next.type === TokenType.Arrow;
  }

  /** Lookahead: does the `(` at the cursor open an arrow parameter list? */
  private isParenthesizedArrowHead(): boolean {
    const saved = this.scanner.position;
    try {
      let depth = 0;
      for (;;) {
        const t = this.scanner.next();
        if (t.type === TokenType.EOF) return false;
        if (t.type === TokenType.OpenParen) depth++;
        else if (t.type === TokenType.CloseParen) {
          depth--;
          if (depth === 0) return this.scanner.next().type === TokenType.Arrow;
        }
      }
    } catch (err) {
      if (err instanceof ExpressionSyntaxError) return false;
      throw err;
    } finally {
      this.scanner.reset(saved);
    }
  }

  // ------------------------------------------------------------------------------------------
  // Binding patterns
  // ------------------------------------------------------------------------------------------

  private parseBindingPatternWithDefault(): BindingPattern {
    const target = this.parseBindingPatternBase();
    if (this.peekToken().type !== TokenType.Equals) {
      return target;
    }
    this.nextToken();
    const fallback = this.parseAssignExpr();
    return {
      $kind: "BindingPatternDefault",
      target,
      default: fallback,
      span: this.cover(target.span, fallback.span),
    };
  }

  private parseBindingPatternBase(): BindingPattern {
    const t = this.peekToken();
    switch (t.type) {
      case TokenType.Identifier:
        return this.parseBindingIdentifier();
      case TokenType.OpenBracket:
        return this.parseArrayBindingPattern();
      case TokenType.OpenBrace:
        return this.parseObjectBindingPattern();
      default:
        throw this.error("expected identifier or destructuring pattern", t);
    }
  }

  private parseBindingIdentifier(): BindingIdentifier {
    const t = this.nextToken();
    if (t.type !== TokenType.Identifier) {
      throw this.error("expected identifier", t);
    }
    return { $kind: "BindingIdentifier", name: String(t.value), span: this.span(t.start, t.end) };
  }

  private parseArrayBindingPattern(): ArrayBindingPattern {
    const open = this.nextToken();
    const elements: (BindingPattern | null)[] = [];
    for (;;) {
      const t = this.peekToken();
      if (t.type === TokenType.CloseBracket) break;
      if (t.type === TokenType.Comma) {
        this.nextToken();
        elements.push(null);
        continue;
      }
      elements.push(this.parseBindingPatternWithDefault());
      const sep = this.peekToken();
      if (sep.type === TokenType.Comma) {
        this.nextToken();
      } else if (sep.type !== TokenType.CloseBracket) {
        throw this.error("expected ',' or ']' in array binding pattern", sep);
      }
    }
    const close = this.nextToken();
    return { $kind: "ArrayBindingPattern", elements, span: this.span(open.start, close.end) };
  }

  private parseObjectBindingPattern(): ObjectBindingPattern {
    const open = this.nextToken();
    const properties: BindingProperty[] = [];
    while (this.peekToken().type !== TokenType.CloseBrace) {
      const keyTok = this.peekToken();
      const key = propertyKey(keyTok);
      if (key == null) {
        throw this.error("expected property name in object binding pattern", keyTok);
      }
      let value: BindingPattern;
      if (this.lookaheadIsColon(keyTok)) {
        this.nextToken();
        this.nextToken();
        value = this.parseBindingPatternWithDefault();
      } else {
        if (keyTok.type !== TokenType.Identifier) {
          throw this.error("object binding pattern shorthand requires an identifier key", keyTok);
        }
        value = this.parseBindingPatternWithDefault();
      }
      properties.push({ key, value });

      const sep = this.peekToken();
      if (sep.type === TokenType.Comma) {
        this.nextToken();
      } else if (sep.type !== TokenType.CloseBrace) {
        throw this.error("expected ',' or '}' in object binding pattern", sep);
      }
    }
    const close = this.nextToken();
    return { $kind: "ObjectBindingPattern", properties, span: this.span(open.start, close.end) };
  }

  private lookaheadIsColon(keyTok: Token): boolean {
    const saved = this.scanner.position;
    this.scanner.reset(keyTok.end);
    const next = this.rebaseErrors(() => this.scanner.peek());
    this.scanner.reset(saved);
    return next.type === TokenType.Colon;
  }

  // ------------------------------------------------------------------------------------------
  // Token plumbing
  // ------------------------------------------------------------------------------------------

  private peekToken(): Token {
    return this.rebaseErrors(() => this.scanner.peek());
  }

  private nextToken(): Token {
    const t = this.rebaseErrors(() => this.scanner.next());
    if (t.type !== TokenType.EOF) this.lastTokenEnd = t.end;
    return t;
  }

  private expectPropertyName(message: string): string {
    const t = this.nextToken();
    const name = typeof t.value === "string" && t.type !== TokenType.StringLiteral && t.type !== TokenType.TemplateLiteral ? t.value : "";
    if (!/^[A-Za-z_$][\w$]*$/.test(name)) {
      throw this.error(message, t);
    }
    return name;
  }

  private expectEnd(message: string): void {
    const t = this.peekToken();
    if (t.type !== TokenType.EOF) {
      throw this.error(message, t);
    }
  }

  private rebaseErrors<T>(fn: () => T, local = 0): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof ExpressionSyntaxError) {
        const shift = this.baseOffset + local;
        throw new ExpressionSyntaxError(err.message, err.start + shift, err.end + shift);
      }
      throw err;
    }
  }

  private span(start: number, end: number): SourceSpan {
    return { start: this.baseOffset + start, end: this.baseOffset + end };
  }

  /** From `start` (absolute) to the end of the last consumed token. */
  private extend(start: SourceSpan): SourceSpan {
    return { start: start.start, end: this.baseOffset + this.lastTokenEnd };
  }

  private cover(a: SourceSpan, b: SourceSpan): SourceSpan {
    return { start: a.start, end: b.end };
  }

  private error(message: string, t: Token): ExpressionSyntaxError {
    return new ExpressionSyntaxError(message, this.baseOffset + t.start, this.baseOffset + t.end);
  }
}

function getBinaryOpInfo(type: TokenType): { operator: BinaryOperator; precedence: number } | null {
  switch (type) {
    case TokenType.QuestionQuestion:
      return { operator: "??", precedence: 1 };
    case TokenType.BarBar:
      return { operator: "||", precedence: 2 };
    case TokenType.AmpersandAmpersand:
      return { operator: "&&", precedence: 3 };

    case TokenType.EqualsEquals:
      return { operator: "==", precedence: 4 };
    case TokenType.EqualsEqualsEquals:
      return { operator: "===", precedence: 4 };
    case TokenType.ExclamationEquals:
      return { operator: "!=", precedence: 4 };
    case TokenType.ExclamationEqualsEquals:
      return { operator: "!==", precedence: 4 };

    case TokenType.LessThan:
      return { operator: "<", precedence: 5 };
    case TokenType.LessThanOrEqual:
      return { operator: "<=", precedence: 5 };
    case TokenType.GreaterThan:
      return { operator: ">", precedence: 5 };
    case TokenType.GreaterThanOrEqual:
      return { operator: ">=", precedence: 5 };

    case TokenType.Plus:
      return { operator: "+", precedence: 6 };
    case TokenType.Minus:
      return { operator: "-", precedence: 6 };

    case TokenType.Asterisk:
      return { operator: "*", precedence: 7 };
    case TokenType.Slash:
      return { operator: "/", precedence: 7 };
    case TokenType.Percent:
      return { operator: "%", precedence: 7 };

    default:
      return null;
  }
}

function getPrefixUnaryOperator(type: TokenType): UnaryOperator | null {
  switch (type) {
    case TokenType.Exclamation:
      return "!";
    case TokenType.Minus:
      return "-";
    case TokenType.Plus:
      return "+";
    case TokenType.KeywordTypeof:
      return "typeof";
    default:
      return null;
  }
}

/** Identifier, keyword, string or number used as a property key. */
function propertyKey(t: Token): string | null {
  switch (t.type) {
    case TokenType.StringLiteral:
    case TokenType.NumericLiteral:
      return String(t.value);
    case TokenType.Identifier:
    case TokenType.KeywordTrue:
    case TokenType.KeywordFalse:
    case TokenType.KeywordNull:
    case TokenType.KeywordUndefined:
    case TokenType.KeywordTypeof:
      return String(t.value);
    default:
      return null;
  }
}

/* ---- convenience wrappers ---- */

export function parseExpression(code: string, baseOffset = 0): Expression {
  return new CoreParser(code, baseOffset).parseExpression();
}

export function parseBindingPattern(code: string, baseOffset = 0): BindingPattern {
  return new CoreParser(code, baseOffset).parseBindingPattern();
}

export function parseForOf(code: string, baseOffset = 0): ForOfStatement {
  return new CoreParser(code, baseOffset).parseForOf();
}
