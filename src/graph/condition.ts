import { ConditionError } from "../errors.js";
import type { TaskData } from "./types.js";

/**
 * Condition expressions gate a task on the outputs of earlier tasks, e.g.
 * `initial_decision.result.confidence >= 0.8 && !review.blocked`.
 *
 * Supported:
 * - paths: `<taskId>.<field>.<field>` (missing values are `undefined`)
 * - literals: numbers, quoted strings, true, false, null
 * - comparisons: == != === !== (all strict), > >= < <=
 * - logic: ! && || and parentheses
 *
 * Expressions are compiled once, when the workflow is validated, and
 * evaluated without eval() or new Function().
 */

type Literal = string | number | boolean | null;

type CompareOp = "==" | "!=" | "===" | "!==" | ">" | ">=" | "<" | "<=";

export type ConditionNode =
  | { type: "literal"; value: Literal }
  | { type: "path"; root: string; segments: string[] }
  | { type: "not"; operand: ConditionNode }
  | { type: "and" | "or"; left: ConditionNode; right: ConditionNode }
  | { type: "compare"; op: CompareOp; left: ConditionNode; right: ConditionNode };

/** Looks up the output of a succeeded task; undefined otherwise. */
export type OutputLookup = (taskId: string) => TaskData | undefined;

export type CompiledCondition = {
  source: string;
  ast: ConditionNode;
  /** Task ids the expression reads from. */
  roots: string[];
  evaluate(lookup: OutputLookup): boolean;
};

type Token =
  | { kind: "number"; value: number; pos: number }
  | { kind: "string"; value: string; pos: number }
  | { kind: "ident"; value: string; pos: number }
  | { kind: "op"; value: string; pos: number }
  | { kind: "dot" | "lparen" | "rparen"; pos: number };

const OPERATORS = ["===", "!==", "==", "!=", ">=", "<=", "&&", "||", ">", "<", "!"];
const COMPARE_OPS: ReadonlySet<string> = new Set(["==", "!=", "===", "!==", ">", ">=", "<", "<="]);
const IDENT_START = /[A-Za-z_$]/;
const IDENT_PART = /[A-Za-z0-9_$-]/;
const DIGIT = /[0-9]/;

function tokenize(source: string, fail: (detail: string) => never): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < source.length) {
    const ch = source[pos];

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }
    if (ch === "(") {
      tokens.push({ kind: "lparen", pos });
      pos++;
      continue;
    }
    if (ch === ")") {
      tokens.push({ kind: "rparen", pos });
      pos++;
      continue;
    }
    if (ch === ".") {
      tokens.push({ kind: "dot", pos });
      pos++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const start = pos;
      pos++;
      let str = "";
      while (pos < source.length && source[pos] !== ch) {
        if (source[pos] === "\\" && pos + 1 < source.length) pos++;
        str += source[pos];
        pos++;
      }
      if (source[pos] !== ch) fail(`unterminated string starting at position ${start}`);
      pos++;
      tokens.push({ kind: "string", value: str, pos: start });
      continue;
    }

    if (DIGIT.test(ch) || (ch === "-" && DIGIT.test(source[pos + 1] ?? ""))) {
      const start = pos;
      pos++;
      while (
        pos < source.length &&
        (DIGIT.test(source[pos]) || (source[pos] === "." && DIGIT.test(source[pos + 1] ?? "")))
      ) {
        pos++;
      }
      const text = source.slice(start, pos);
      const value = Number(text);
      if (Number.isNaN(value)) fail(`invalid number "${text}" at position ${start}`);
      tokens.push({ kind: "number", value, pos: start });
      continue;
    }

    if (IDENT_START.test(ch)) {
      const start = pos;
      while (pos < source.length && IDENT_PART.test(source[pos])) pos++;
      tokens.push({ kind: "ident", value: source.slice(start, pos), pos: start });
      continue;
    }

    const op = OPERATORS.find((o) => source.startsWith(o, pos));
    if (op) {
      tokens.push({ kind: "op", value: op, pos });
      pos += op.length;
      continue;
    }

    fail(`unexpected character "${ch}" at position ${pos}`);
  }

  return tokens;
}

class Parser {
  private index = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly fail: (detail: string) => never,
  ) {}

  parse(): ConditionNode {
    if (this.tokens.length === 0) this.fail("expression is empty");
    const node = this.parseOr();
    const extra = this.peek();
    if (extra) this.fail(`unexpected token at position ${extra.pos}`);
    return node;
  }

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private next(): Token {
    const token = this.tokens[this.index];
    if (!token) this.fail("unexpected end of expression");
    this.index++;
    return token;
  }

  private isOp(value: string): boolean {
    const token = this.peek();
    return token?.kind === "op" && token.value === value;
  }

  private parseOr(): ConditionNode {
    let left = this.parseAnd();
    while (this.isOp("||")) {
      this.index++;
      left = { type: "or", left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ConditionNode {
    let left = this.parseComparison();
    while (this.isOp("&&")) {
      this.index++;
      left = { type: "and", left, right: this.parseComparison() };
    }
    return left;
  }

  private parseComparison(): ConditionNode {
    const left = this.parseUnary();
    const token = this.peek();
    if (token?.kind === "op" && isCompareOp(token.value)) {
      this.index++;
      return { type: "compare", op: token.value, left, right: this.parseUnary() };
    }
    return left;
  }

  private parseUnary(): ConditionNode {
    if (this.isOp("!")) {
      this.index++;
      return { type: "not", operand: this.parseUnary() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): ConditionNode {
    const token = this.next();
    switch (token.kind) {
      case "lparen": {
        const inner = this.parseOr();
        if (this.next().kind !== "rparen") this.fail(`missing ")" for "(" at position ${token.pos}`);
        return inner;
      }
      case "number":
      case "string":
        return { type: "literal", value: token.value };
      case "ident":
        if (token.value === "true") return { type: "literal", value: true };
        if (token.value === "false") return { type: "literal", value: false };
        if (token.value === "null") return { type: "literal", value: null };
        return this.parsePath(token.value);
      default:
        return this.fail(`unexpected token at position ${token.pos}`);
    }
  }

  private parsePath(root: string): ConditionNode {
    const segments: string[] = [];
    while (this.peek()?.kind === "dot") {
      this.index++;
      const part = this.next();
      if (part.kind === "ident") segments.push(part.value);
      else if (part.kind === "number" && Number.isInteger(part.value) && part.value >= 0) {
        segments.push(String(part.value));
      } else this.fail(`expected a property name at position ${part.pos}`);
    }
    return { type: "path", root, segments };
  }
}

function isCompareOp(value: string): value is CompareOp {
  return COMPARE_OPS.has(value);
}

function collectRoots(node: ConditionNode, into: Set<string>): Set<string> {
  switch (node.type) {
    case "path":
      into.add(node.root);
      break;
    case "not":
      collectRoots(node.operand, into);
      break;
    case "and":
    case "or":
    case "compare":
      collectRoots(node.left, into);
      collectRoots(node.right, into);
      break;
    case "literal":
      break;
  }
  return into;
}

function readPath(lookup: OutputLookup, root: string, segments: string[]): unknown {
  let value: unknown = lookup(root);
  for (const segment of segments) {
    if (typeof value !== "object" || value === null) return undefined;
    if (!Object.prototype.hasOwnProperty.call(value, segment)) return undefined;
    value = Reflect.get(value, segment);
  }
  return value;
}

function compare(op: CompareOp, left: unknown, right: unknown): boolean {
  switch (op) {
    case "==":
    case "===":
      return left === right;
    case "!=":
    case "!==":
      return left !== right;
  }
  let order: number;
  if (typeof left === "number" && typeof right === "number") {
    order = left - right;
  } else if (typeof left === "string" && typeof right === "string") {
    order = left < right ? -1 : left > right ? 1 : 0;
  } else {
    return false;
  }
  switch (op) {
    case ">":
      return order > 0;
    case ">=":
      return order >= 0;
    case "<":
      return order < 0;
    case "<=":
      return order <= 0;
  }
}

function evaluateNode(node: ConditionNode, lookup: OutputLookup): unknown {
  switch (node.type) {
    case "literal":
      return node.value;
    case "path":
      return readPath(lookup, node.root, node.segments);
    case "not":
      return !evaluateNode(node.operand, lookup);
    case "and":
      return Boolean(evaluateNode(node.left, lookup)) && Boolean(evaluateNode(node.right, lookup));
    case "or":
      return Boolean(evaluateNode(node.left, lookup)) || Boolean(evaluateNode(node.right, lookup));
    case "compare":
      return compare(node.op, evaluateNode(node.left, lookup), evaluateNode(node.right, lookup));
  }
}

/** Compile a condition expression. Throws ConditionError on bad syntax. */
export function compileCondition(source: string, taskId?: string): CompiledCondition {
  const fail = (detail: string): never => {
    throw new ConditionError(source, detail, taskId);
  };
  const ast = new Parser(tokenize(source, fail), fail).parse();
  const roots = [...collectRoots(ast, new Set())];
  return {
    source,
    ast,
    roots,
    evaluate: (lookup) => Boolean(evaluateNode(ast, lookup)),
  };
}
