/**
 * Every error thrown by this package extends `RollError`, so callers can
 * catch that one class.
 *
 * - `ParseError`: the text (or token list) does not form an expression.
 * - `InputTypeError`: an entry point got something it cannot roll.
 * - `EvaluationError`: the tree failed while being evaluated. Operator
 *   functions throw its subclasses `ArgumentTypeError` and
 *   `ArgumentValueError`; the tree rethrows them wrapped in a plain
 *   `EvaluationError`.
 */
export class RollError extends Error {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RollError";
  }
}

export class ParseError extends RollError {
  /** Character offset into `source` where the problem was found. */
  public readonly offset: number;
  public readonly source: string;

  public constructor(
    message: string,
    offset: number,
    source: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "ParseError";
    this.offset = offset;
    this.source = source;
  }

  /** The message followed by the source and a caret under the offending character. */
  public format(indent = 4): string {
    const pad = " ".repeat(indent);
    return `${this.message}\n${pad}${this.source}\n${pad}${" ".repeat(this.offset)}^`;
  }

  public toString(): string {
    return this.format();
  }
}

export class InputTypeError extends RollError {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "InputTypeError";
  }
}

export class EvaluationError extends RollError {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "EvaluationError";
  }
}

/** An operand has the wrong kind, e.g. keeping the highest of a plain number. */
export class ArgumentTypeError extends EvaluationError {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ArgumentTypeError";
  }
}

/** An operand has the right kind but an unusable value. */
export class ArgumentValueError extends EvaluationError {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ArgumentValueError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
