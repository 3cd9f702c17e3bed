import { EvalTreeNode, Operator } from "../src/index";
import type { RandomSource } from "../src/index";

/**
 * Deterministic source for tests. Hands out the scripted values in order,
 * then `fallback` forever; `choice` picks the element at `choiceIndex`.
 */
export class ScriptedRandom implements RandomSource {
  public readonly calls: Array<[number, number]> = [];
  private readonly script: number[];

  constructor(
    script: readonly number[] = [],
    private readonly fallback = 4,
    private readonly choiceIndex = 0
  ) {
    this.script = [...script];
  }

  uniformInt(low: number, high: number): number {
    this.calls.push([low, high]);
    return this.script.shift() ?? this.fallback;
  }

  choice<T>(values: readonly T[]): T {
    return values[Math.min(this.choiceIndex, values.length - 1)];
  }
}

/** Always rolls the same face. */
export function fixed(face = 4): ScriptedRandom {
  return new ScriptedRandom([], face);
}

/** Nested-array view of a tree: `[code, left, right]` for operators, the value for leaves. */
export type Shape = number | readonly number[] | [string, Shape | null, Shape | null];

export function shape(node: EvalTreeNode | null): Shape | null {
  if (node === null) return null;
  const { payload } = node;
  if (payload instanceof Operator) {
    return [payload.code, shape(node.left), shape(node.right)];
  }
  return payload;
}
