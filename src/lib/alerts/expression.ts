/**
 * Alert Condition Expressions
 *
 * Conditions are parsed once into an AST and evaluated against a flat
 * context of named numbers. Only the grammar below is accepted; there is no
 * attribute access, indexing, assignment or arbitrary call.
 *
 *   or         := and (("or" | "||") and)*
 *   and        := not (("and" | "&&") not)*
 *   not        := ("not" | "!") not | comparison
 *   comparison := additive (("<" | "<=" | ">" | ">=" | "==" | "!=") additive)*
 *   additive   := term (("+" | "-") term)*
 *   term       := unary (("*" | "/" | "%") unary)*
 *   unary      := ("-" | "+") unary | power
 *   power      := primary ("**" unary)?
 *   primary    := number | "true" | "false" | identifier
 *               | function "(" or ("," or)* ")" | "(" or ")"
 *
 * Comparisons chain: `1 < x < 3` means `1 < x and x < 3`. A condition holds at
 * most MAX_CONDITION_TOKENS tokens and nests at most MAX_NESTING_DEPTH levels.
 */

import { ConditionEvalError, ConditionParseError } from "../errors.js";

// ============================================================================
// Tokens
// ============================================================================

type TokenKind = "number" | "identifier" | "operator" | "lparen" | "rparen" | "comma" | "end";

interface Token {
  kind: TokenKind;
  text: string;
  position: number;
}

const OPERATORS = ["**", "<=", ">=", "==", "!=", "&&", "||", "<", ">", "+", "-", "*", "/", "%", "!"] as const;

const NUMBER_PATTERN = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*/;

export const MAX_CONDITION_TOKENS = 1000;
export const MAX_NESTING_DEPTH = 100;

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (tokens.length >= MAX_CONDITION_TOKENS) {
      throw new ConditionParseError(`Condition has more than ${MAX_CONDITION_TOKENS} tokens`, i);
    }

    const rest = source.slice(i);
    const number = NUMBER_PATTERN.exec(rest);
    if (number) {
      tokens.push({ kind: "number", text: number[0], position: i });
      i += number[0].length;
      continue;
    }

    const identifier = IDENTIFIER_PATTERN.exec(rest);
    if (identifier) {
      tokens.push({ kind: "identifier", text: identifier[0], position: i });
      i += identifier[0].length;
      continue;
    }

    if (ch === "(" || ch === ")" || ch === ",") {
      tokens.push({ kind: ch === "(" ? "lparen" : ch === ")" ? "rparen" : "comma", text: ch, position: i });
      i++;
      continue;
    }

    const op = OPERATORS.find((candidate) => rest.startsWith(candidate));
    if (op) {
      tokens.push({ kind: "operator", text: op, position: i });
      i += op.length;
      continue;
    }

    throw new ConditionParseError(`Unexpected character '${ch}'`, i);
  }

  tokens.push({ kind: "end", text: "", position: source.length });
  return tokens;
}

// ============================================================================
// AST
// ============================================================================

export type ComparisonOperator = "<" | "<=" | ">" | ">=" | "==" | "!=";
export type ArithmeticOperator = "+" | "-" | "*" | "/" | "%" | "**";
export type FunctionName = "abs" | "min" | "max";

export type ExpressionNode =
  | { type: "number"; value: number }
  | { type: "boolean"; value: boolean }
  | { type: "variable"; name: string }
  | { type: "negate"; operand: ExpressionNode }
  | { type: "not"; operand: ExpressionNode }
  | { type: "arithmetic"; operator: ArithmeticOperator; left: ExpressionNode; right: ExpressionNode }
  | { type: "compare"; operands: ExpressionNode[]; operators: ComparisonOperator[] }
  | { type: "logical"; operator: "and" | "or"; left: ExpressionNode; right: ExpressionNode }
  | { type: "call"; name: FunctionName; args: ExpressionNode[] };

const COMPARISON_OPERATORS: readonly string[] = ["<", "<=", ">", ">=", "==", "!="];
const FUNCTION_NAMES: readonly string[] = ["abs", "min", "max"];
const KEYWORDS: readonly string[] = ["and", "or", "not", "true", "false"];

function isComparison(text: string): text is ComparisonOperator {
  return COMPARISON_OPERATORS.includes(text);
}

function isFunctionName(text: string): text is FunctionName {
  return FUNCTION_NAMES.includes(text);
}

// ============================================================================
// Parser
// ============================================================================

class Parser {
  private index = 0;
  private depth = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): ExpressionNode {
    const node = this.parseOr();
    const next = this.peek();
    if (next.kind !== "end") {
      throw new ConditionParseError(`Unexpected '${next.text}'`, next.position);
    }
    return node;
  }

  private peek(): Token {
    return this.tokens[this.index];
  }

  private advance(): Token {
    const token = this.tokens[this.index];
    if (token.kind !== "end") this.index++;
    return token;
  }

  private matchOperator(...texts: string[]): boolean {
    const token = this.peek();
    if ((token.kind === "operator" || token.kind === "identifier") && texts.includes(token.text)) {
      this.index++;
      return true;
    }
    return false;
  }

  /** Parse one level deeper, bounded by MAX_NESTING_DEPTH */
  private nested(position: number, parse: () => ExpressionNode): ExpressionNode {
    if (this.depth >= MAX_NESTING_DEPTH) {
      throw new ConditionParseError("Condition is nested too deeply", position);
    }
    this.depth++;
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  private expect(kind: TokenKind, label: string): Token {
    const token = this.peek();
    if (token.kind !== kind) {
      const found = token.kind === "end" ? "end of condition" : `'${token.text}'`;
      throw new ConditionParseError(`Expected ${label} but found ${found}`, token.position);
    }
    return this.advance();
  }

  private parseOr(): ExpressionNode {
    let left = this.parseAnd();
    while (this.matchOperator("or", "||")) {
      left = { type: "logical", operator: "or", left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ExpressionNode {
    let left = this.parseNot();
    while (this.matchOperator("and", "&&")) {
      left = { type: "logical", operator: "and", left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): ExpressionNode {
    const token = this.peek();
    if (this.matchOperator("not", "!")) {
      return { type: "not", operand: this.nested(token.position, () => this.parseNot()) };
    }
    return this.parseComparison();
  }

  private parseComparison(): ExpressionNode {
    const first = this.parseAdditive();
    const operands: ExpressionNode[] = [first];
    const operators: ComparisonOperator[] = [];

    let token = this.peek();
    while (token.kind === "operator" && isComparison(token.text)) {
      this.advance();
      operators.push(token.text);
      operands.push(this.parseAdditive());
      token = this.peek();
    }

    return operators.length === 0 ? first : { type: "compare", operands, operators };
  }

  private parseAdditive(): ExpressionNode {
    let left = this.parseTerm();
    for (;;) {
      const token = this.peek();
      if (token.kind === "operator" && (token.text === "+" || token.text === "-")) {
        this.advance();
        left = { type: "arithmetic", operator: token.text, left, right: this.parseTerm() };
      } else {
        return left;
      }
    }
  }

  private parseTerm(): ExpressionNode {
    let left = this.parseUnary();
    for (;;) {
      const token = this.peek();
      if (token.kind === "operator" && (token.text === "*" || token.text === "/" || token.text === "%")) {
        this.advance();
        left = { type: "arithmetic", operator: token.text, left, right: this.parseUnary() };
      } else {
        return left;
      }
    }
  }

  private parseUnary(): ExpressionNode {
    const token = this.peek();
    if (token.kind === "operator" && token.text === "-") {
      this.advance();
      return { type: "negate", operand: this.nested(token.position, () => this.parseUnary()) };
    }
    if (token.kind === "operator" && token.text === "+") {
      this.advance();
      return this.nested(token.position, () => this.parseUnary());
    }
    return this.parsePower();
  }

  private parsePower(): ExpressionNode {
    const base = this.parsePrimary();
    const token = this.peek();
    if (token.kind === "operator" && token.text === "**") {
      this.advance();
      const exponent = this.nested(token.position, () => this.parseUnary());
      return { type: "arithmetic", operator: "**", left: base, right: exponent };
    }
    return base;
  }

  private parsePrimary(): ExpressionNode {
    const token = this.peek();

    if (token.kind === "number") {
      this.advance();
      return { type: "number", value: Number(token.text) };
    }

    if (token.kind === "lparen") {
      this.advance();
      const inner = this.nested(token.position, () => this.parseOr());
      this.expect("rparen", "')'");
      return inner;
    }

    if (token.kind === "identifier") {
      this.advance();
      if (token.text === "true" || token.text === "false") {
        return { type: "boolean", value: token.text === "true" };
      }
      if (KEYWORDS.includes(token.text)) {
        throw new ConditionParseError(`Unexpected '${token.text}'`, token.position);
      }
      if (this.peek().kind === "lparen") {
        if (!isFunctionName(token.text)) {
          throw new ConditionParseError(`Unknown function '${token.text}'`, token.position);
        }
        return this.parseCall(token.text, token.position);
      }
      return { type: "variable", name: token.text };
    }

    const found = token.kind === "end" ? "end of condition" : `'${token.text}'`;
    throw new ConditionParseError(`Expected a value but found ${found}`, token.position);
  }

  private parseCall(name: FunctionName, position: number): ExpressionNode {
    const open = this.expect("lparen", "'('");
    const args: ExpressionNode[] = [this.nested(open.position, () => this.parseOr())];
    while (this.peek().kind === "comma") {
      this.advance();
      args.push(this.nested(open.position, () => this.parseOr()));
    }
    this.expect("rparen", "')'");

    if (name === "abs" && args.length !== 1) {
      throw new ConditionParseError("abs() takes exactly one argument", position);
    }
    return { type: "call", name, args };
  }
}

/**
 * Parse a condition into an AST
 *
 * @throws ConditionParseError with the offset of the offending token
 */
export function parseCondition(source: string): ExpressionNode {
  if (source.trim() === "") {
    throw new ConditionParseError("Condition is empty", 0);
  }
  return new Parser(tokenize(source)).parse();
}

/**
 * Names of every context variable an expression reads
 */
export function referencedVariables(node: ExpressionNode): string[] {
  const names = new Set<string>();
  const visit = (n: ExpressionNode): void => {
    switch (n.type) {
      case "variable":
        names.add(n.name);
        break;
      case "negate":
      case "not":
        visit(n.operand);
        break;
      case "arithmetic":
      case "logical":
        visit(n.left);
        visit(n.right);
        break;
      case "compare":
        n.operands.forEach(visit);
        break;
      case "call":
        n.args.forEach(visit);
        break;
      case "number":
      case "boolean":
        break;
    }
  };
  visit(node);
  return [...names];
}

// ============================================================================
// Evaluator
// ============================================================================

export type EvaluationContext = Readonly<Record<string, unknown>>;

type Value = number | boolean;

function expectNumber(value: Value, where: string): number {
  if (typeof value !== "number") {
    throw new ConditionEvalError(`${where} expects a number, got ${typeof value}`);
  }
  return value;
}

function expectBoolean(value: Value, where: string): boolean {
  if (typeof value !== "boolean") {
    throw new ConditionEvalError(`${where} expects a boolean, got ${typeof value}`);
  }
  return value;
}

function finite(value: number, where: string): number {
  if (!Number.isFinite(value)) {
    throw new ConditionEvalError(`${where} produced a non-finite result`);
  }
  return value;
}

function compare(operator: ComparisonOperator, left: Value, right: Value): boolean {
  if (operator === "==" || operator === "!=") {
    if (typeof left !== typeof right) {
      throw new ConditionEvalError(`'${operator}' compares values of different types`);
    }
    return operator === "==" ? left === right : left !== right;
  }
  const a = expectNumber(left, `'${operator}'`);
  const b = expectNumber(right, `'${operator}'`);
  switch (operator) {
    case "<":
      return a < b;
    case "<=":
      return a <= b;
    case ">":
      return a > b;
    default:
      return a >= b;
  }
}

function arithmetic(operator: ArithmeticOperator, a: number, b: number): number {
  switch (operator) {
    case "+":
      return a + b;
    case "-":
      return a - b;
    case "*":
      return a * b;
    case "/":
      if (b === 0) throw new ConditionEvalError("Division by zero");
      return a / b;
    case "%":
      if (b === 0) throw new ConditionEvalError("Modulo by zero");
      return a % b;
    case "**":
      return a ** b;
  }
}

function evaluateNode(node: ExpressionNode, context: EvaluationContext): Value {
  switch (node.type) {
    case "number":
    case "boolean":
      return node.value;

    case "variable": {
      if (!Object.hasOwn(context, node.name)) {
        throw new ConditionEvalError(`Unknown variable '${node.name}'`);
      }
      const value = context[node.name];
      if (typeof value === "number") return finite(value, `Variable '${node.name}'`);
      if (typeof value === "boolean") return value;
      throw new ConditionEvalError(`Variable '${node.name}' is not a number`);
    }

    case "negate":
      return -expectNumber(evaluateNode(node.operand, context), "'-'");

    case "not":
      return !expectBoolean(evaluateNode(node.operand, context), "'not'");

    case "arithmetic": {
      const where = `'${node.operator}'`;
      const a = expectNumber(evaluateNode(node.left, context), where);
      const b = expectNumber(evaluateNode(node.right, context), where);
      return finite(arithmetic(node.operator, a, b), where);
    }

    case "compare": {
      let left = evaluateNode(node.operands[0], context);
      for (let i = 0; i < node.operators.length; i++) {
        const right = evaluateNode(node.operands[i + 1], context);
        if (!compare(node.operators[i], left, right)) return false;
        left = right;
      }
      return true;
    }

    case "logical": {
      const left = expectBoolean(evaluateNode(node.left, context), `'${node.operator}'`);
      if (node.operator === "and" && !left) return false;
      if (node.operator === "or" && left) return true;
      return expectBoolean(evaluateNode(node.right, context), `'${node.operator}'`);
    }

    case "call": {
      const args = node.args.map((arg) => expectNumber(evaluateNode(arg, context), `${node.name}()`));
      switch (node.name) {
        case "abs":
          return Math.abs(args[0]);
        case "min":
          return Math.min(...args);
        default:
          return Math.max(...args);
      }
    }
  }
}

/**
 * Evaluate a parsed condition
 *
 * @returns Whether the condition holds
 * @throws ConditionEvalError on an unknown variable, a type mismatch,
 *   division by zero, or a non-boolean result
 */
export function evaluateCondition(node: ExpressionNode, context: EvaluationContext): boolean {
  return expectBoolean(evaluateNode(node, context), "Condition");
}
