import type { Operator } from "./operators";
import type { Roll } from "./roll";

/** Explicit die faces, e.g. `[1, 3, 5]`, or the fudge die `[-1, 0, 1]`. */
export type SideList = readonly number[];

/**
 * What a die is rolled from: a side count, explicit faces, or an earlier
 * roll whose total becomes the side count (as in `2d(1d4)`).
 */
export type Die = number | SideList | Roll;

/** Anything that can flow into an operator. */
export type Operand = number | SideList | Roll;

/** Anything an operator can produce. Comparisons produce 1 or 0. */
export type Result = number | Roll;

export type Paren = "(" | ")";

/** One lexical unit of an expression. */
export type Token = number | SideList | Operator | Paren;

/** How the dice of an expression are rolled. Higher modes supersede lower ones. */
export type Mode = "normal" | "average" | "critical" | "maximum";

/**
 * Operand slots as bit flags, so `arity & Side.LEFT` asks whether an
 * operator takes a left operand.
 */
export const Side = {
  NEITHER: 0b00,
  RIGHT: 0b01,
  LEFT: 0b10,
  BOTH: 0b11,
} as const;

export type Side = (typeof Side)[keyof typeof Side];
