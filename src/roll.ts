import { FUDGE_DIE } from "./common/types";
import { ArgumentValueError } from "./errors";
import type { Die, SideList } from "./types";

const ascending = (a: number, b: number): number => a - b;

export function isFudgeDie(sides: SideList): boolean {
  return (
    sides.length === FUDGE_DIE.length &&
    sides.every((face, index) => face === FUDGE_DIE[index])
  );
}

export function formatSideList(sides: SideList): string {
  return isFudgeDie(sides) ? "F" : `[${sides.join(", ")}]`;
}

function formatDie(die: Die): string {
  if (typeof die === "number") return String(die);
  if (die instanceof Roll) return die.toString();
  return formatSideList(die);
}

/**
 * A set of dice results.
 *
 * Active values are kept sorted ascending after every change, which the
 * keep/drop operators rely on. Edits that must keep positions stable
 * (rerolling in place, clamping) run inside `withSortingDisabled`, which
 * sorts once at the end. Values taken out by any operator are appended to
 * `discards` so the verbose trace can still show them.
 */
export class Roll implements Iterable<number> {
  private values: number[];
  private sortingDisabled = false;
  public discards: number[] = [];

  constructor(rolls: readonly number[] = [], public readonly die: Die = 0) {
    this.values = [...rolls].sort(ascending);
  }

  get rolls(): readonly number[] {
    return this.values;
  }

  set rolls(values: readonly number[]) {
    this.values = [...values];
    this.resort();
  }

  get length(): number {
    return this.values.length;
  }

  [Symbol.iterator](): Iterator<number> {
    return this.values[Symbol.iterator]();
  }

  at(index: number): number {
    this.checkIndex(index);
    return this.values[index];
  }

  /** Move the value at `index` to the discards. */
  discard(index: number): void {
    this.checkIndex(index);
    this.discards.push(...this.values.splice(index, 1));
  }

  /** Move the values in `[start, end)` to the discards; bounds are clamped. */
  discardRange(start: number, end: number = this.values.length): void {
    const from = Math.max(0, Math.min(start, this.values.length));
    const to = Math.max(from, Math.min(end, this.values.length));
    this.discards.push(...this.values.splice(from, to - from));
  }

  /** Discard the value at `index` and put `value` in its place. */
  replace(index: number, value: number): void {
    this.checkIndex(index);
    this.discards.push(this.values[index]);
    this.values[index] = value;
    this.resort();
  }

  /**
   * Run `edit` with automatic sorting suspended, so indices keep pointing
   * at the same die; the values are sorted again afterwards even if
   * `edit` throws.
   */
  withSortingDisabled<T>(edit: (roll: this) => T): T {
    this.sortingDisabled = true;
    try {
      return edit(this);
    } finally {
      this.sortingDisabled = false;
      this.resort();
    }
  }

  total(): number {
    return this.values.reduce((sum, value) => sum + value, 0);
  }

  copy(): Roll {
    const copy = new Roll(this.values, this.die);
    copy.discards = [...this.discards];
    return copy;
  }

  toString(): string {
    const rolls = this.values.join(", ");
    if (this.discards.length === 0) return `[d${formatDie(this.die)}: ${rolls}]`;
    return `[d${formatDie(this.die)}: ${rolls}; (${this.discards.join(", ")})]`;
  }

  private resort(): void {
    if (!this.sortingDisabled) this.values.sort(ascending);
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.values.length) {
      throw new ArgumentValueError(
        `Index ${index} is out of bounds for a roll of ${this.values.length} dice.`
      );
    }
  }
}
