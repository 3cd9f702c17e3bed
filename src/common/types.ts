/** Largest number of dice a single rolling operator will accept. */
export const MAX_DICE = 10_000;

/**
 * Operators at or above this precedence (dice and roll post-processing)
 * are shown as their evaluated value in verbose output, never expanded.
 */
export const OPAQUE_PRECEDENCE = 6;

/** Codes of the rolling operators. Side lists and `F` may only follow one of these. */
export const DICE_CODES: ReadonlySet<string> = new Set(["d", "da", "dc", "dm"]);

/** Faces of the fudge die, written `F` in an expression. */
export const FUDGE_DIE: readonly number[] = Object.freeze([-1, 0, 1]);

/** Default capacity of the parse cache. */
export const PARSE_CACHE_SIZE = 1000;
