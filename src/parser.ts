import { LRUCache } from "./common/lru-cache";
import { PARSE_CACHE_SIZE } from "./common/types";
import { InputTypeError } from "./errors";
import { EvalTree, EvalTreeNode } from "./evaltree";
import { getOperator } from "./operators";
import { getRandomSource, type RandomSource } from "./random";
import { tokens } from "./tokenizer";
import type { Mode, Token } from "./types";

/** Anything the roll functions accept. */
export type Rollable = string | number | EvalTree;

/**
 * Internal cache of trees parsed from strings, keyed by the trimmed
 * expression. Entries are never handed out directly, only copies.
 */
const parseCache = new LRUCache<string, EvalTree>(PARSE_CACHE_SIZE);

let cachingEnabled = true;

/** Enable or disable the internal parse cache. */
export function setCachingEnabled(enabled: boolean): void {
  cachingEnabled = enabled;
  if (!enabled) clearParserCache();
}

/** Returns whether the internal parse cache is currently enabled. */
export function getCachingEnabled(): boolean {
  return cachingEnabled;
}

/** Clears the internal parse cache. */
export function clearParserCache(): void {
  parseCache.clear();
}

/**
 * Tokens of an expression. With non-zero `modifiers` the expression is
 * bracketed and `+ modifiers` appended, so `3d4` with 2 is `(3d4)+2`.
 */
export function tokenize(expr: string | number, modifiers: number = 0): Token[] {
  const plus = getOperator("+");
  if (typeof expr === "number") return modifiers === 0 ? [expr] : [expr, plus, modifiers];
  if (typeof expr !== "string") {
    throw new InputTypeError("You can only tokenize a string expression or a number.");
  }
  const body = tokens(expr);
  if (modifiers === 0) return body;
  return ["(", ...body, ")", plus, modifiers];
}

/** Parse text or tokens into a fresh tree. */
export function parse(source: string | readonly Token[]): EvalTree {
  if (typeof source !== "string") return EvalTree.fromTokens(source);
  if (!cachingEnabled) return EvalTree.fromString(source);

  const key = source.trim();
  const cached = parseCache.get(key);
  if (cached) return cached.copy();

  const tree = EvalTree.fromString(source);
  parseCache.set(key, tree.copy());
  return tree;
}

function withModifiers(tree: EvalTree, modifiers: number): EvalTree {
  if (modifiers === 0) return tree;
  return new EvalTree(
    new EvalTreeNode(
      getOperator("+"),
      tree.root ?? new EvalTreeNode(0),
      new EvalTreeNode(modifiers)
    )
  );
}

/** Parse an expression ahead of time, for rolling it many times. */
export function compile(expr: string | number, modifiers: number = 0): EvalTree {
  if (typeof expr === "number") return EvalTree.from(expr + modifiers);
  if (typeof expr !== "string") {
    throw new InputTypeError("You can only compile a string expression or a number.");
  }
  return withModifiers(parse(expr), modifiers);
}

function toTree(expr: Rollable): EvalTree {
  if (typeof expr === "string") return parse(expr);
  if (typeof expr === "number") return EvalTree.from(expr);
  if (expr instanceof EvalTree) return expr.copy();
  throw new InputTypeError(
    "This function can only take a rollable string, a number, or a compiled evaluation tree."
  );
}

function applyMode(tree: EvalTree, mode: Mode): EvalTree {
  switch (mode) {
    case "average":
      return tree.averageify();
    case "critical":
      return tree.critify();
    case "maximum":
      return tree.maxify();
    default:
      return tree;
  }
}

/** Roll an expression and return the number. A number is returned plus `modifiers`. */
export function rollBasic(
  expr: Rollable,
  mode: Mode = "normal",
  modifiers: number = 0,
  random: RandomSource = getRandomSource()
): number {
  if (typeof expr === "number") return expr + modifiers;
  return applyMode(toTree(expr), mode).evaluate(random) + modifiers;
}

/** Roll an expression and show every die, e.g. `1+[d20: 4, 17] = 22`. */
export function rollVerbose(
  expr: Rollable,
  mode: Mode = "normal",
  modifiers: number = 0,
  random: RandomSource = getRandomSource()
): string {
  const tree = withModifiers(applyMode(toTree(expr), mode), modifiers);
  tree.evaluate(random);
  return tree.verboseResult(random);
}

const MODES: readonly Mode[] = ["normal", "average", "critical", "maximum"];

/** Mode by name, ignoring case; anything unknown is `normal`. */
export function modeFromString(name: string): Mode {
  const lowered = name.toLowerCase();
  return MODES.find((mode) => mode === lowered) ?? "normal";
}
