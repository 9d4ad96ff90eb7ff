import { TagExpressionError } from "../types/errors.js";

/*
 * Tag expressions over unit tags, by recursive descent:
 *   or_expr  = and_expr ("or" and_expr)*
 *   and_expr = not_expr ("and" not_expr)*
 *   not_expr = "not" not_expr | primary
 *   primary  = TAG | "(" or_expr ")"
 *
 * A tag may be written with or without a leading "@"; tags and keywords
 * compare case-insensitively.
 */

export type TagExpression =
  | { type: "tag"; name: string }
  | { type: "and"; left: TagExpression; right: TagExpression }
  | { type: "or"; left: TagExpression; right: TagExpression }
  | { type: "not"; operand: TagExpression };

type Token =
  | { type: "TAG"; value: string }
  | { type: "AND" }
  | { type: "OR" }
  | { type: "NOT" }
  | { type: "LPAREN" }
  | { type: "RPAREN" }
  | { type: "EOF" };

const WORD = /^@?[\w-]+/;

function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    const ch = input[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (ch === "(") {
      tokens.push({ type: "LPAREN" });
      i++;
      continue;
    }
    if (ch === ")") {
      tokens.push({ type: "RPAREN" });
      i++;
      continue;
    }

    const word = WORD.exec(input.slice(i))?.[0];
    if (word === undefined) {
      if (ch === "@") throw new TagExpressionError(input, `lone '@' at position ${i}`);
      throw new TagExpressionError(input, `unexpected character '${ch}' at position ${i}`);
    }
    i += word.length;

    const lower = word.toLowerCase();
    if (lower === "and") tokens.push({ type: "AND" });
    else if (lower === "or") tokens.push({ type: "OR" });
    else if (lower === "not") tokens.push({ type: "NOT" });
    else tokens.push({ type: "TAG", value: normalizeTag(lower) });
  }

  tokens.push({ type: "EOF" });
  return tokens;
}

class TagExpressionParser {
  private pos = 0;

  constructor(
    private readonly input: string,
    private readonly tokens: Token[]
  ) {}

  parse(): TagExpression {
    const expr = this.parseOr();
    this.expect("EOF");
    return expr;
  }

  private parseOr(): TagExpression {
    let left = this.parseAnd();
    while (this.peek().type === "OR") {
      this.advance();
      left = { type: "or", left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): TagExpression {
    let left = this.parseNot();
    while (this.peek().type === "AND") {
      this.advance();
      left = { type: "and", left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): TagExpression {
    if (this.peek().type === "NOT") {
      this.advance();
      return { type: "not", operand: this.parseNot() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): TagExpression {
    const token = this.peek();
    if (token.type === "TAG") {
      this.advance();
      return { type: "tag", name: token.value };
    }
    if (token.type === "LPAREN") {
      this.advance();
      const expr = this.parseOr();
      this.expect("RPAREN");
      return expr;
    }
    throw new TagExpressionError(this.input, `expected a tag or '(' but got ${token.type}`);
  }

  private peek(): Token {
    return this.tokens[this.pos] ?? { type: "EOF" };
  }

  private advance(): void {
    this.pos++;
  }

  private expect(type: Token["type"]): void {
    const token = this.peek();
    if (token.type !== type) {
      throw new TagExpressionError(this.input, `expected ${type} but got ${token.type}`);
    }
    this.advance();
  }
}

/** `@Smoke` → `smoke`. */
export function normalizeTag(tag: string): string {
  return (tag.startsWith("@") ? tag.slice(1) : tag).toLowerCase();
}

/** Throws a TagExpressionError on blank or malformed input. */
export function parseTagExpression(input: string): TagExpression {
  const trimmed = input.trim();
  if (trimmed === "") throw new TagExpressionError(input, "empty expression");
  return new TagExpressionParser(trimmed, tokenize(trimmed)).parse();
}

export function evaluateTagExpression(expr: TagExpression, tags: ReadonlySet<string>): boolean {
  switch (expr.type) {
    case "tag":
      return tags.has(expr.name);
    case "and":
      return evaluateTagExpression(expr.left, tags) && evaluateTagExpression(expr.right, tags);
    case "or":
      return evaluateTagExpression(expr.left, tags) || evaluateTagExpression(expr.right, tags);
    case "not":
      return !evaluateTagExpression(expr.operand, tags);
  }
}
