import { DICE_CODES, FUDGE_DIE } from "./common/types";
import { ParseError } from "./errors";
import { OPERATORS, Operator, UNARY_MINUS, UNARY_PLUS, getOperator } from "./operators";
import { formatSideList } from "./roll";
import type { SideList, Token } from "./types";

/** Tokens of an expression, each with the offset in the source where it starts. */
export interface Scan {
  tokens: Token[];
  offsets: number[];
}

/** Codes that can be typed; the sign codes are only ever produced by the tokenizer. */
const LEXABLE_CODES: readonly string[] = [...OPERATORS.keys()].filter(
  (code) => code !== UNARY_MINUS && code !== UNARY_PLUS
);

const OPERATOR_CHARS: ReadonlySet<string> = new Set(LEXABLE_CODES.join(""));

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

function isDigit(char: string): boolean {
  return char >= "0" && char <= "9";
}

function isOperatorPrefix(run: string): boolean {
  return LEXABLE_CODES.some((code) => code.startsWith(run));
}

function isDiceOperator(token: Token | undefined): boolean {
  return token instanceof Operator && DICE_CODES.has(token.code);
}

function takesRight(token: Token | undefined): boolean {
  return token instanceof Operator && token.takesRight();
}

function checkParentheses(source: string): void {
  const open: number[] = [];
  for (let i = 0; i < source.length; i++) {
    if (source[i] === "(") {
      open.push(i);
    } else if (source[i] === ")") {
      if (open.length === 0) {
        throw new ParseError("Unopened parenthesis detected.", i, source);
      }
      open.pop();
    }
  }
  if (open.length > 0) {
    throw new ParseError("Unclosed parenthesis detected.", open[0], source);
  }
}

/** Parse the inside of `[...]`, which starts at `start` (just past the bracket). */
function readSideList(body: string, start: number, source: string): SideList {
  if (body.trim() === "") {
    throw new ParseError("A die side list cannot be empty.", start - 1, source);
  }
  const sides: number[] = [];
  let position = start;
  for (const element of body.split(",")) {
    const text = element.trim();
    const at = position + (element.length - element.trimStart().length);
    if (text === "") {
      throw new ParseError("Missing value in the die side list.", at, source);
    }
    if (!DECIMAL.test(text)) {
      throw new ParseError(
        `${text} cannot be interpreted as a decimal number.`,
        at,
        source
      );
    }
    sides.push(Number(text));
    position += element.length + 1;
  }
  return sides;
}

/**
 * Split an expression into tokens, remembering where each one starts.
 *
 * Digits and operator characters are gathered into runs; a run ends when a
 * character of the other kind, a parenthesis or whitespace arrives. An
 * operator run grows as long as it is still the beginning of some operator
 * code, so `<=` is one token and `<-` is two.
 */
export function scan(source: string): Scan {
  checkParentheses(source);

  const tokens: Token[] = [];
  const offsets: number[] = [];
  let digits = "";
  let digitsStart = 0;
  let run = "";
  let runStart = 0;

  const push = (token: Token, offset: number): void => {
    tokens.push(token);
    offsets.push(offset);
  };
  const flushDigits = (): void => {
    if (digits === "") return;
    push(Number(digits), digitsStart);
    digits = "";
  };
  const flushRun = (): void => {
    if (run === "") return;
    if (!LEXABLE_CODES.includes(run)) {
      throw new ParseError("Invalid operator.", runStart, source);
    }
    push(getOperator(run), runStart);
    run = "";
  };
  const flush = (): void => {
    flushDigits();
    flushRun();
  };
  const last = (): Token | undefined => tokens[tokens.length - 1];

  let i = 0;
  while (i < source.length) {
    const char = source[i];

    if (isDigit(char)) {
      flushRun();
      if (digits === "") digitsStart = i;
      digits += char;
    } else if (char === "+" || char === "-") {
      flush();
      const previous = last();
      if (previous === undefined || previous === "(" || takesRight(previous)) {
        push(getOperator(char === "+" ? UNARY_PLUS : UNARY_MINUS), i);
      } else {
        push(getOperator(char), i);
      }
    } else if (char === "(" || char === ")") {
      flush();
      const previous = last();
      if (char === ")" && previous === "(") {
        throw new ParseError("Empty parentheses.", i, source);
      }
      if (previous instanceof Operator) {
        const needsRight = previous.takesRight();
        if ((char === ")" && needsRight) || (char === "(" && !needsRight)) {
          throw new ParseError("Unexpectedly terminated expression.", i, source);
        }
      }
      push(char, i);
    } else if (char === "[") {
      flush();
      if (!isDiceOperator(last())) {
        throw new ParseError("A list can only appear as the sides of a die.", i, source);
      }
      const end = source.indexOf("]", i + 1);
      if (end === -1) {
        throw new ParseError("Unterminated die side list.", i, source);
      }
      push(readSideList(source.slice(i + 1, end), i + 1, source), i);
      i = end;
    } else if (char === "F") {
      flush();
      if (!isDiceOperator(last())) {
        throw new ParseError(
          "F is the 'fudge dice' value, and must appear as the side specifier of a roll.",
          i,
          source
        );
      }
      push(FUDGE_DIE, i);
    } else if (OPERATOR_CHARS.has(char)) {
      flushDigits();
      if (run !== "" && !isOperatorPrefix(run + char)) flushRun();
      if (run === "") runStart = i;
      run += char;
    } else if (/\s/.test(char)) {
      flush();
    } else {
      throw new ParseError("Unrecognized character detected.", i, source);
    }
    i++;
  }
  flush();

  return { tokens, offsets };
}

/** Split an expression into tokens. */
export function tokens(source: string): Token[] {
  return scan(source).tokens;
}

/** How a token is written back out. Sign operators print as `-`/`+`. */
export function tokenText(token: Token): string {
  if (typeof token === "number") return String(token);
  if (typeof token === "string") return token;
  if (token instanceof Operator) return token.display;
  return formatSideList(token);
}

/**
 * Render a token list as text, space separated, with the offset of each
 * token in it. Used to point at a problem in a list that has no source.
 */
export function locateTokens(list: readonly Token[]): Scan & { source: string } {
  const offsets: number[] = [];
  let source = "";
  list.forEach((token, index) => {
    if (index > 0) source += " ";
    offsets.push(source.length);
    source += tokenText(token);
  });
  return { source, tokens: [...list], offsets };
}
