import { OPAQUE_PRECEDENCE } from "./common/types";
import {
  ArgumentValueError,
  EvaluationError,
  InputTypeError,
  ParseError,
  errorMessage,
} from "./errors";
import { Operator, collapse, getOperator } from "./operators";
import { getRandomSource, type RandomSource } from "./random";
import { Roll, formatSideList } from "./roll";
import { locateTokens, scan } from "./tokenizer";
import { Side } from "./types";
import type { Operand, Paren, SideList, Token } from "./types";

/** What a node holds: a value at the leaves, an operator everywhere else. */
export type Payload = number | SideList | Operator;

/** Stops a traversal from descending below the nodes it accepts. */
export type Abort = (node: EvalTreeNode) => boolean;

export type Combiner = "+" | "-";

/** Where the tokens handed to the builder came from, for error locations. */
export interface TokenSource {
  source: string;
  offsets: readonly number[];
}

const never: Abort = () => false;

function formatValue(value: Operand): string {
  if (typeof value === "number") return String(value);
  if (value instanceof Roll) return value.toString();
  return formatSideList(value);
}

function copyValue(value: Operand | undefined): Operand | undefined {
  return value instanceof Roll ? value.copy() : value;
}

export class EvalTreeNode {
  /** Result of the last evaluation of this subtree. */
  public value: Operand | undefined = undefined;

  constructor(
    public payload: Payload,
    public left: EvalTreeNode | null = null,
    public right: EvalTreeNode | null = null
  ) {}

  isLeaf(): boolean {
    return this.left === null && this.right === null;
  }

  /** Evaluate this subtree, left child first, and record the value on every node. */
  evaluate(random: RandomSource = getRandomSource()): Operand {
    const { payload } = this;
    if (this.isLeaf()) {
      if (payload instanceof Operator) {
        throw new ArgumentValueError(`Operator '${payload.display}' has no operands.`);
      }
      this.value = payload;
      return payload;
    }
    if (!(payload instanceof Operator)) {
      throw new ArgumentValueError(`The value ${formatValue(payload)} cannot have operands.`);
    }
    const left = this.left?.evaluate(random);
    const right = this.right?.evaluate(random);
    this.value = payload.apply(left, right, random);
    return this.value;
  }

  copy(): EvalTreeNode {
    const node = new EvalTreeNode(this.payload, this.left?.copy(), this.right?.copy());
    node.value = copyValue(this.value);
    return node;
  }

  /** Operator precedence, or `Infinity` for a value so it never needs brackets. */
  get precedence(): number {
    return this.payload instanceof Operator ? this.payload.precedence : Infinity;
  }
}

interface Built {
  node: EvalTreeNode;
  /** Offset of the leftmost token of the subtree. */
  start: number;
}

interface Pending {
  token: Operator | "(";
  offset: number;
}

/**
 * Shunting-yard over a token list. Finished subtrees go on `output`; an
 * operator is reduced into a subtree once something binding more loosely
 * (or a closing bracket, or the end) arrives.
 */
class TreeBuilder {
  private readonly output: Built[] = [];
  private readonly operators: Pending[] = [];

  constructor(private readonly where: TokenSource) {}

  build(tokens: readonly Token[]): EvalTreeNode {
    tokens.forEach((token, index) => this.accept(token, this.offset(index)));
    let pending = this.operators.pop();
    while (pending !== undefined) {
      if (pending.token === "(") {
        throw this.error("Unclosed parenthesis detected.", pending.offset);
      }
      this.reduce(pending.token, pending.offset);
      pending = this.operators.pop();
    }
    if (this.output.length > 1) {
      throw this.error("Expected a single expression.", this.output[1].start);
    }
    return this.output[0]?.node ?? new EvalTreeNode(0);
  }

  private accept(token: Token, offset: number): void {
    if (token === "(") {
      this.operators.push({ token, offset });
    } else if (token === ")") {
      this.closeParenthesis(offset);
    } else if (token instanceof Operator) {
      // A prefix operator has nothing on its left to claim yet
      if (token.takesLeft()) this.reduceWhile((top) => top.bindsBefore(token));
      this.operators.push({ token, offset });
    } else if (typeof token === "number" || Array.isArray(token)) {
      this.output.push({ node: new EvalTreeNode(token), start: offset });
    } else {
      throw new InputTypeError(`${String(token)} is not a token.`);
    }
  }

  private closeParenthesis(offset: number): void {
    this.reduceWhile(() => true);
    const open = this.operators.pop();
    if (open === undefined) throw this.error("Unopened parenthesis detected.", offset);
  }

  /** Reduce operators off the stack, stopping at a bracket or when `test` fails. */
  private reduceWhile(test: (top: Operator) => boolean): void {
    for (;;) {
      const top = this.operators[this.operators.length - 1];
      if (top === undefined || top.token === "(" || !test(top.token)) return;
      this.operators.pop();
      this.reduce(top.token, top.offset);
    }
  }

  private reduce(operator: Operator, offset: number): void {
    const node = new EvalTreeNode(operator);
    let start = offset;
    if (operator.takesRight()) {
      const right = this.output.pop();
      if (right === undefined || right.start < offset) {
        throw this.error(`Operator '${operator.display}' is missing its right operand.`, offset);
      }
      node.right = right.node;
    }
    if (operator.takesLeft()) {
      const left = this.output.pop();
      if (left === undefined || left.start > offset) {
        throw this.error(`Operator '${operator.display}' is missing its left operand.`, offset);
      }
      node.left = left.node;
      start = left.start;
    }
    this.output.push({ node, start });
  }

  private offset(index: number): number {
    return this.where.offsets[index] ?? this.where.source.length;
  }

  private error(message: string, offset: number): ParseError {
    return new ParseError(message, offset, this.where.source);
  }
}

/**
 * An expression tree. Leaves hold values and inner nodes hold operators;
 * unary operators leave one child slot empty.
 *
 * Evaluating stores each subtree's value on its node, which is what the
 * verbose result and the critical/fail checks read afterwards.
 */
export class EvalTree {
  constructor(public root: EvalTreeNode | null = null) {}

  /** Build a tree from text, tokens, a single number, or a copy of another tree. */
  static from(source: string | readonly Token[] | number | EvalTree | null): EvalTree {
    if (typeof source === "string") return EvalTree.fromString(source);
    if (typeof source === "number") return new EvalTree(new EvalTreeNode(source));
    if (source instanceof EvalTree) return source.copy();
    if (Array.isArray(source)) return EvalTree.fromTokens(source);
    if (source === null) return new EvalTree();
    throw new InputTypeError(`Cannot build an expression tree from ${String(source)}.`);
  }

  static fromString(source: string): EvalTree {
    const { tokens, offsets } = scan(source);
    return EvalTree.fromTokens(tokens, { source, offsets });
  }

  /**
   * Build a tree from infix tokens. Errors point into `where`, or into the
   * tokens written back out as text when it is not given.
   */
  static fromTokens(tokens: readonly Token[], where?: TokenSource): EvalTree {
    const location = where ?? locateTokens(tokens);
    try {
      return new EvalTree(new TreeBuilder(location).build(tokens));
    } catch (error) {
      if (error instanceof ParseError) throw error;
      throw new ParseError(
        "Failed to construct an expression from the token list.",
        0,
        location.source,
        { cause: error }
      );
    }
  }

  /** Roll everything and return the final number; a roll counts as its total. */
  evaluate(random: RandomSource = getRandomSource()): number {
    if (this.root === null) return 0;
    try {
      return collapse(this.root.evaluate(random));
    } catch (error) {
      throw new EvaluationError(`Failed to evaluate expression: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /** Turn normal and average rolls into critical rolls. */
  critify(): this {
    return this.rewrite(["d", "da"], "dc");
  }

  /** Turn normal rolls into average rolls. */
  averageify(): this {
    return this.rewrite(["d"], "da");
  }

  /** Turn every roll into a maximum roll. */
  maxify(): this {
    return this.rewrite(["d", "da", "dc"], "dm");
  }

  private rewrite(from: readonly string[], to: string): this {
    const replacement = getOperator(to);
    for (const node of this.preOrder()) {
      if (node.payload instanceof Operator && from.includes(node.payload.code)) {
        node.payload = replacement;
      }
    }
    return this;
  }

  /**
   * The expression with every roll replaced by its dice, then ` = ` and the
   * result. Evaluates first when the tree has not been evaluated.
   */
  verboseResult(random: RandomSource = getRandomSource()): string {
    const root = this.root;
    if (root === null) return "";
    if (root.value === undefined) this.evaluate(random);
    const opaque: Abort = (node) => node.precedence >= OPAQUE_PRECEDENCE;
    let text = "";
    for (const item of this.inOrder(opaque)) {
      if (typeof item === "string") {
        text += item;
      } else if (item.isLeaf() || opaque(item)) {
        text += item.value === undefined ? "" : formatValue(item.value);
      } else {
        text += String(item.payload);
      }
    }
    const final = root.value === undefined ? 0 : collapse(root.value);
    return `${text} = ${final}`;
  }

  /** Symbolic infix text that parses back into the same tree. */
  toExpression(): string {
    const render = (node: EvalTreeNode): string => {
      const { payload } = node;
      if (!(payload instanceof Operator)) {
        return typeof payload === "number" ? String(payload) : formatSideList(payload);
      }
      const side = (child: EvalTreeNode | null, position: Side): string => {
        if (child === null) return "";
        const text = render(child);
        return needsBrackets(payload, child, position) ? `(${text})` : text;
      };
      return side(node.left, Side.LEFT) + payload.display + side(node.right, Side.RIGHT);
    };
    return this.root === null ? "" : render(this.root);
  }

  /** Nodes in parent, left, right order. `abort` keeps a node's children from being visited. */
  *preOrder(abort: Abort = never): Generator<EvalTreeNode> {
    if (this.root === null) return;
    const stack: EvalTreeNode[] = [this.root];
    let node = stack.pop();
    while (node !== undefined) {
      yield node;
      if (!abort(node)) {
        if (node.right !== null) stack.push(node.right);
        if (node.left !== null) stack.push(node.left);
      }
      node = stack.pop();
    }
  }

  /**
   * Nodes in left, parent, right order, with brackets around any subtree
   * that binds more loosely than its parent. Nodes accepted by `abort` are
   * yielded whole.
   */
  *inOrder(abort: Abort = never): Generator<EvalTreeNode | Paren> {
    if (this.root === null) return;
    yield* walkInOrder(this.root, null, abort);
  }

  /** Whether a d20 in the expression came up 20. */
  isCritical(): boolean {
    return this.hasNatural(20);
  }

  /** Whether a d20 in the expression came up 1. */
  isFail(): boolean {
    return this.hasNatural(1);
  }

  private hasNatural(face: number): boolean {
    const isD20 = (node: EvalTreeNode): boolean =>
      node.value instanceof Roll && node.value.die === 20;
    for (const node of this.preOrder(isD20)) {
      if (isD20(node) && node.value instanceof Roll && node.value.rolls.includes(face)) {
        return true;
      }
    }
    return false;
  }

  copy(): EvalTree {
    return new EvalTree(this.root?.copy() ?? null);
  }

  /** A new tree `(this) op (other)`; both inputs are left untouched. */
  combine(other: EvalTree, operator: Combiner): EvalTree {
    checkTree(other);
    const joined = new EvalTreeNode(
      getOperator(operator),
      this.copy().root ?? new EvalTreeNode(0),
      other.copy().root ?? new EvalTreeNode(0)
    );
    return new EvalTree(joined);
  }

  /**
   * Join `other` onto this tree without copying. Afterwards the two trees
   * share nodes, so neither input should be used on its own again.
   */
  combineInPlace(other: EvalTree, operator: Combiner): this {
    checkTree(other);
    this.root = new EvalTreeNode(
      getOperator(operator),
      this.root ?? new EvalTreeNode(0),
      other.root ?? new EvalTreeNode(0)
    );
    return this;
  }
}

function checkTree(other: unknown): void {
  if (!(other instanceof EvalTree)) {
    throw new InputTypeError(`Cannot combine an expression tree with ${String(other)}.`);
  }
}

function* walkInOrder(
  current: EvalTreeNode,
  parent: EvalTreeNode | null,
  abort: Abort
): Generator<EvalTreeNode | Paren> {
  if (current.isLeaf() || abort(current)) {
    yield current;
    return;
  }
  const bracket = parent !== null && parent.precedence > current.precedence;
  if (bracket) yield "(";
  if (current.left !== null) yield* walkInOrder(current.left, current, abort);
  yield current;
  if (current.right !== null) yield* walkInOrder(current.right, current, abort);
  if (bracket) yield ")";
}

/**
 * A child binding more loosely than its parent needs brackets, and so does
 * an equal-precedence child on the side the parent does not associate
 * towards (`1-(2-3)`, `(2^3)^2`).
 */
function needsBrackets(parent: Operator, child: EvalTreeNode, position: Side): boolean {
  if (child.precedence < parent.precedence) return true;
  if (child.precedence > parent.precedence) return false;
  return position === Side.RIGHT
    ? parent.associativity === Side.LEFT
    : parent.associativity === Side.RIGHT;
}
