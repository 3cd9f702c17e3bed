import { MAX_DICE } from "./common/types";
import { ArgumentTypeError, ArgumentValueError, RollError } from "./errors";
import { getRandomSource, type RandomSource } from "./random";
import { Roll, formatSideList } from "./roll";
import { Side } from "./types";
import type { Die, Operand, Result } from "./types";

/** Receives exactly the operands named by the operator's arity, left first. */
export type OperatorFunction = (
  operands: readonly Operand[],
  random: RandomSource
) => Result;

export interface OperatorOptions {
  /** Operand slots the operator consumes. Defaults to both. */
  arity?: Side;
  /** Only consulted to break precedence ties. Defaults to left. */
  associativity?: Side;
  /** Sides whose roll or side list is summed before the function runs. Defaults to both. */
  cajole?: Side;
  /** Printed form, when it differs from the code (unary minus is `m` but prints `-`). */
  display?: string;
}

/** Code of the unary minus; `-` is taken by subtraction. */
export const UNARY_MINUS = "m";
/** Code of the unary plus; `+` is taken by addition. */
export const UNARY_PLUS = "p";

/** Sum of a roll or side list; numbers pass through. */
export function collapse(operand: Operand): number {
  if (typeof operand === "number") return operand;
  if (operand instanceof Roll) return operand.total();
  return operand.reduce((sum, value) => sum + value, 0);
}

function describe(operand: Operand): string {
  if (typeof operand === "number") return String(operand);
  if (operand instanceof Roll) return `the roll ${operand.toString()}`;
  return `the side list ${formatSideList(operand)}`;
}

/**
 * An operator like `+` or `d`. Instances are immutable and shared by every
 * tree; the table below holds the only ones the tokenizer produces.
 */
export class Operator {
  public readonly arity: Side;
  public readonly associativity: Side;
  public readonly cajole: Side;
  public readonly display: string;

  constructor(
    public readonly code: string,
    public readonly precedence: number,
    private readonly fn: OperatorFunction,
    options: OperatorOptions = {}
  ) {
    this.arity = options.arity ?? Side.BOTH;
    this.associativity = options.associativity ?? Side.LEFT;
    this.cajole = options.cajole ?? Side.BOTH;
    this.display = options.display ?? code;
  }

  takesLeft(): boolean {
    return (this.arity & Side.LEFT) !== 0;
  }

  takesRight(): boolean {
    return (this.arity & Side.RIGHT) !== 0;
  }

  /**
   * Whether this operator, already on the parser's stack, has to be reduced
   * before `incoming` is pushed.
   */
  bindsBefore(incoming: Operator): boolean {
    return (
      this.precedence > incoming.precedence ||
      (this.precedence === incoming.precedence &&
        this.associativity === Side.LEFT)
    );
  }

  apply(
    left: Operand | undefined,
    right: Operand | undefined,
    random: RandomSource = getRandomSource()
  ): Result {
    const operands: Operand[] = [];
    if (this.takesLeft()) operands.push(this.prepare(left, Side.LEFT));
    if (this.takesRight()) operands.push(this.prepare(right, Side.RIGHT));
    return this.fn(operands, random);
  }

  toString(): string {
    return this.display;
  }

  private prepare(operand: Operand | undefined, side: Side): Operand {
    if (operand === undefined) {
      const which = side === Side.LEFT ? "left" : "right";
      throw new ArgumentValueError(
        `Operator '${this.display}' is missing its ${which} operand.`
      );
    }
    return (this.cajole & side) !== 0 ? collapse(operand) : operand;
  }
}

// --- Operand checks ---

function expectRoll(value: Operand, role: string): Roll {
  if (value instanceof Roll) return value;
  throw new ArgumentTypeError(
    `Expecting ${role} to be a roll, was ${describe(value)} instead.`
  );
}

function expectNumber(value: Operand, role: string): number {
  if (typeof value === "number") return value;
  throw new ArgumentTypeError(
    `Expecting ${role} to be a number, was ${describe(value)} instead.`
  );
}

function expectInteger(value: Operand, role: string): number {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  throw new ArgumentTypeError(
    `Expecting ${role} to be a whole number, was ${describe(value)} instead.`
  );
}

function expectCount(value: Operand, role: string): number {
  const count = expectInteger(value, role);
  if (count < 0) {
    throw new ArgumentValueError(`Expecting ${role} to be at least 0, was ${count}.`);
  }
  return count;
}

function finite(value: number): number {
  if (!Number.isFinite(value)) {
    throw new ArgumentValueError(`Arithmetic produced ${value}.`);
  }
  return value;
}

// --- Rolling ---

function diceCount(number: Operand, multiplier = 1): number {
  const count = expectCount(number, "the number of dice") * multiplier;
  if (count > MAX_DICE) {
    throw new ArgumentValueError(
      `Cannot roll more than ${MAX_DICE} dice at once (asked for ${count}).`
    );
  }
  return count;
}

function toDie(sides: Operand): Die {
  if (typeof sides === "number") {
    if (!Number.isInteger(sides) || sides < 1) {
      throw new ArgumentValueError(
        `A die needs a positive whole number of sides, not ${sides}.`
      );
    }
    return sides;
  }
  if (!(sides instanceof Roll) && sides.length === 0) {
    throw new ArgumentValueError("A die needs at least one side.");
  }
  return sides;
}

/**
 * Lowest and highest face a fresh roll of `die` can show. A roll used as a
 * die is a side count, so its faces run from 1 to its total.
 */
export function faceRange(die: Die): [number, number] {
  if (typeof die === "number") return [1, die];
  if (die instanceof Roll) return [1, die.total()];
  return [Math.min(...die), Math.max(...die)];
}

/** Roll one die: an integer in `[1, sides]`, or one of the listed faces. */
export function singleDie(die: Die, random: RandomSource = getRandomSource()): number {
  if (typeof die === "number") return random.uniformInt(1, die);
  if (die instanceof Roll) {
    // 2d(1d4): the inner roll's total is the side count
    const sides = die.total();
    if (!Number.isInteger(sides) || sides < 1) {
      throw new ArgumentValueError(`Cannot roll a die with ${sides} sides.`);
    }
    return random.uniformInt(1, sides);
  }
  return random.choice(die);
}

export function rollDice(
  number: Operand,
  sides: Operand,
  random: RandomSource = getRandomSource()
): Roll {
  const count = diceCount(number);
  const die = toDie(sides);
  return new Roll(
    Array.from({ length: count }, () => singleDie(die, random)),
    die
  );
}

/** Roll twice as many dice, like the damage of a critical hit. */
export function rollCritical(
  number: Operand,
  sides: Operand,
  random: RandomSource = getRandomSource()
): Roll {
  const count = diceCount(number, 2);
  const die = toDie(sides);
  return new Roll(
    Array.from({ length: count }, () => singleDie(die, random)),
    die
  );
}

/** Every die shows its highest face; for a roll used as a die, its highest value. */
export function rollMax(number: Operand, sides: Operand): Roll {
  const count = diceCount(number);
  const die = toDie(sides);
  let face: number;
  if (typeof die === "number") {
    face = die;
  } else if (die instanceof Roll) {
    if (die.length === 0) {
      throw new ArgumentValueError("Cannot take the maximum of an empty roll.");
    }
    face = die.rolls[die.length - 1];
  } else {
    face = Math.max(...die);
  }
  return new Roll(new Array<number>(count).fill(face), die);
}

/** Every die shows its mean face, so most dice give a half. */
export function rollAverage(number: Operand, sides: Operand): Roll {
  const count = diceCount(number);
  const die = toDie(sides);
  let face: number;
  if (typeof die === "number") {
    face = (die + 1) / 2;
  } else {
    const values: readonly number[] = die instanceof Roll ? die.rolls : die;
    if (values.length === 0) {
      throw new ArgumentValueError("Cannot take the average of an empty roll.");
    }
    face = values.reduce((sum, value) => sum + value, 0) / values.length;
  }
  return new Roll(new Array<number>(count).fill(face), die);
}

// --- Roll post-processing ---

/** Keep the highest `number` rolls and discard the rest (advantage). */
export function takeHigh(roll: Operand, number: Operand): Roll {
  const copy = expectRoll(roll, "the roll").copy();
  const keep = expectCount(number, "the number of rolls to keep");
  if (copy.length > keep) copy.discardRange(0, copy.length - keep);
  return copy;
}

/** Keep the lowest `number` rolls and discard the rest (disadvantage). */
export function takeLow(roll: Operand, number: Operand): Roll {
  const copy = expectRoll(roll, "the roll").copy();
  const keep = expectCount(number, "the number of rolls to keep");
  if (copy.length > keep) copy.discardRange(keep);
  return copy;
}

function clampEach(
  roll: Operand,
  bound: Operand,
  outside: (value: number, bound: number) => boolean
): Roll {
  const modified = expectRoll(roll, "the roll").copy();
  const limit = expectNumber(bound, "the bound");
  return modified.withSortingDisabled((edit) => {
    for (let i = 0; i < edit.length; i += 1) {
      if (outside(edit.at(i), limit)) edit.replace(i, limit);
    }
    return edit;
  });
}

/** Raise every roll below `bottom` to `bottom`. */
export function floorValues(roll: Operand, bottom: Operand): Roll {
  return clampEach(roll, bottom, (value, limit) => value < limit);
}

/** Lower every roll above `top` to `top`. */
export function ceilValues(roll: Operand, top: Operand): Roll {
  return clampEach(roll, top, (value, limit) => value > limit);
}

/** 1 for each roll at or above `threshold`, otherwise 0. Originals become discards. */
export function thresholdLower(roll: Operand, threshold: Operand): Roll {
  const original = expectRoll(roll, "the roll");
  const limit = expectNumber(threshold, "the threshold");
  const counted = new Roll(
    original.rolls.map((value) => (value >= limit ? 1 : 0)),
    original.die
  );
  counted.discards = [...original.discards, ...original.rolls];
  return counted;
}

/** 1 for each roll at or below `threshold`, otherwise 0. Originals become discards. */
export function thresholdUpper(roll: Operand, threshold: Operand): Roll {
  const original = expectRoll(roll, "the roll");
  const limit = expectNumber(threshold, "the threshold");
  const counted = new Roll(
    original.rolls.map((value) => (value <= limit ? 1 : 0)),
    original.die
  );
  counted.discards = [...original.discards, ...original.rolls];
  return counted;
}

type Matcher = (value: number, target: number) => boolean;

const equal: Matcher = (value, target) => value === target;
const higher: Matcher = (value, target) => value > target;
const lower: Matcher = (value, target) => value < target;

/** Reroll each matching die once, keeping the new result whatever it is. */
export function rerollOnce(
  roll: Operand,
  target: Operand,
  matches: Matcher,
  random: RandomSource = getRandomSource()
): Roll {
  const modified = expectRoll(roll, "the roll").copy();
  const against = expectNumber(target, "the reroll target");
  return modified.withSortingDisabled((edit) => {
    for (let i = 0; i < edit.length; i += 1) {
      if (matches(edit.at(i), against)) {
        edit.replace(i, singleDie(edit.die, random));
      }
    }
    return edit;
  });
}

/**
 * Reroll each matching die until it stops matching. Callers must make sure
 * the die can produce a non-matching face.
 */
export function rerollUnconditional(
  roll: Operand,
  target: Operand,
  matches: Matcher,
  random: RandomSource = getRandomSource()
): Roll {
  const modified = expectRoll(roll, "the roll").copy();
  const against = expectNumber(target, "the reroll target");
  return modified.withSortingDisabled((edit) => {
    for (let i = 0; i < edit.length; i += 1) {
      while (matches(edit.at(i), against)) {
        edit.replace(i, singleDie(edit.die, random));
      }
    }
    return edit;
  });
}

export function rerollOnceOn(roll: Operand, target: Operand, random?: RandomSource): Roll {
  return rerollOnce(roll, target, equal, random);
}

export function rerollOnceHigher(roll: Operand, target: Operand, random?: RandomSource): Roll {
  return rerollOnce(roll, target, higher, random);
}

export function rerollOnceLower(roll: Operand, target: Operand, random?: RandomSource): Roll {
  return rerollOnce(roll, target, lower, random);
}

export function rerollUnconditionalOn(
  roll: Operand,
  target: Operand,
  random?: RandomSource
): Roll {
  const original = expectRoll(roll, "the roll");
  const against = expectNumber(target, "the reroll target");
  const [min, max] = faceRange(original.die);
  if (min === against && max === against) {
    throw new ArgumentValueError(
      `Every face of a d${describeDie(original.die)} is ${against}. This would create an infinite loop.`
    );
  }
  return rerollUnconditional(original, against, equal, random);
}

export function rerollUnconditionalHigher(
  roll: Operand,
  target: Operand,
  random?: RandomSource
): Roll {
  const original = expectRoll(roll, "the roll");
  const against = expectNumber(target, "the reroll target");
  const [min] = faceRange(original.die);
  if (against < min) {
    throw new ArgumentValueError(
      `A d${describeDie(original.die)} can never roll ${against} or less. This would create an infinite loop.`
    );
  }
  return rerollUnconditional(original, against, higher, random);
}

export function rerollUnconditionalLower(
  roll: Operand,
  target: Operand,
  random?: RandomSource
): Roll {
  const original = expectRoll(roll, "the roll");
  const against = expectNumber(target, "the reroll target");
  const [, max] = faceRange(original.die);
  if (against > max) {
    throw new ArgumentValueError(
      `A d${describeDie(original.die)} can never roll ${against} or more. This would create an infinite loop.`
    );
  }
  return rerollUnconditional(original, against, lower, random);
}

function describeDie(die: Die): string {
  if (typeof die === "number") return String(die);
  if (die instanceof Roll) return String(die.total());
  return formatSideList(die);
}

// --- Arithmetic ---

export function factorial(number: Operand): number {
  const n = expectInteger(number, "the factorial argument");
  if (n < 0) {
    throw new ArgumentValueError("Factorial is undefined for negative numbers.");
  }
  let result = 1;
  for (let i = 2; i <= n && Number.isFinite(result); i += 1) result *= i;
  return finite(result);
}

function unary(fn: (operand: Operand) => Result): OperatorFunction {
  return (operands) => {
    if (operands.length !== 1) {
      throw new ArgumentValueError(`Expected one operand, got ${operands.length}.`);
    }
    return fn(operands[0]);
  };
}

function binary(
  fn: (left: Operand, right: Operand, random: RandomSource) => Result
): OperatorFunction {
  return (operands, random) => {
    if (operands.length !== 2) {
      throw new ArgumentValueError(`Expected two operands, got ${operands.length}.`);
    }
    return fn(operands[0], operands[1], random);
  };
}

function arithmetic(fn: (left: number, right: number) => number): OperatorFunction {
  return binary((left, right) =>
    finite(
      fn(
        expectNumber(left, "the left operand"),
        expectNumber(right, "the right operand")
      )
    )
  );
}

function comparison(fn: (left: number, right: number) => boolean): OperatorFunction {
  return arithmetic((left, right) => (fn(left, right) ? 1 : 0));
}

function divide(left: number, right: number): number {
  if (right === 0) throw new ArgumentValueError("Division by zero.");
  return left / right;
}

/** Modulo whose result takes the sign of the divisor. */
function modulo(left: number, right: number): number {
  if (right === 0) throw new ArgumentValueError("Modulo by zero.");
  return left - right * Math.floor(left / right);
}

const negate = unary((operand) => -expectNumber(operand, "the operand"));
const identity = unary((operand) => expectNumber(operand, "the operand"));

const sided = { cajole: Side.LEFT } as const;
const postprocess = { cajole: Side.RIGHT } as const;

/** Sorted by descending precedence. */
const TABLE: readonly Operator[] = [
  new Operator("!", 8, unary(factorial), { arity: Side.LEFT, cajole: Side.LEFT }),
  new Operator("d", 7, binary(rollDice), sided),
  new Operator("da", 7, binary(rollAverage), sided),
  new Operator("dc", 7, binary(rollCritical), sided),
  new Operator("dm", 7, binary(rollMax), sided),
  new Operator("h", 6, binary(takeHigh), postprocess),
  new Operator("l", 6, binary(takeLow), postprocess),
  new Operator("f", 6, binary(floorValues), postprocess),
  new Operator("c", 6, binary(ceilValues), postprocess),
  new Operator("r", 6, binary(rerollOnceOn), postprocess),
  new Operator("R", 6, binary(rerollUnconditionalOn), postprocess),
  new Operator("r<", 6, binary(rerollOnceLower), postprocess),
  new Operator("R<", 6, binary(rerollUnconditionalLower), postprocess),
  new Operator("rl", 6, binary(rerollOnceLower), postprocess),
  new Operator("Rl", 6, binary(rerollUnconditionalLower), postprocess),
  new Operator("r>", 6, binary(rerollOnceHigher), postprocess),
  new Operator("R>", 6, binary(rerollUnconditionalHigher), postprocess),
  new Operator("rh", 6, binary(rerollOnceHigher), postprocess),
  new Operator("Rh", 6, binary(rerollUnconditionalHigher), postprocess),
  new Operator("t", 6, binary(thresholdLower), postprocess),
  new Operator("T", 6, binary(thresholdUpper), postprocess),
  new Operator("^", 5, arithmetic((x, y) => x ** y), { associativity: Side.RIGHT }),
  new Operator(UNARY_MINUS, 4, negate, { arity: Side.RIGHT, associativity: Side.RIGHT, cajole: Side.RIGHT, display: "-" }),
  new Operator(UNARY_PLUS, 4, identity, { arity: Side.RIGHT, associativity: Side.RIGHT, cajole: Side.RIGHT, display: "+" }),
  new Operator("*", 3, arithmetic((x, y) => x * y)),
  new Operator("/", 3, arithmetic(divide)),
  new Operator("%", 3, arithmetic(modulo)),
  new Operator("-", 2, arithmetic((x, y) => x - y)),
  new Operator("+", 2, arithmetic((x, y) => x + y)),
  new Operator(">", 1, comparison((x, y) => x > y)),
  new Operator("gt", 1, comparison((x, y) => x > y)),
  new Operator(">=", 1, comparison((x, y) => x >= y)),
  new Operator("ge", 1, comparison((x, y) => x >= y)),
  new Operator("<", 1, comparison((x, y) => x < y)),
  new Operator("lt", 1, comparison((x, y) => x < y)),
  new Operator("<=", 1, comparison((x, y) => x <= y)),
  new Operator("le", 1, comparison((x, y) => x <= y)),
  new Operator("=", 1, comparison((x, y) => x === y)),
  new Operator("|", 1, comparison((x, y) => x !== 0 || y !== 0)),
  new Operator("&", 1, comparison((x, y) => x !== 0 && y !== 0)),
];

/** Every operator, keyed by code. */
export const OPERATORS: ReadonlyMap<string, Operator> = new Map(
  TABLE.map((operator): [string, Operator] => [operator.code, operator])
);

export function getOperator(code: string): Operator {
  const operator = OPERATORS.get(code);
  if (operator === undefined) {
    throw new RollError(`Unknown operator code '${code}'.`);
  }
  return operator;
}
