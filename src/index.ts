export {
  clearParserCache,
  compile,
  getCachingEnabled,
  modeFromString,
  parse,
  rollBasic,
  rollVerbose,
  setCachingEnabled,
  tokenize,
} from "./parser";
export type { Rollable } from "./parser";

export { EvalTree, EvalTreeNode } from "./evaltree";
export type { Abort, Combiner, Payload, TokenSource } from "./evaltree";

export { locateTokens, scan, tokenText, tokens } from "./tokenizer";
export type { Scan } from "./tokenizer";

export {
  OPERATORS,
  Operator,
  UNARY_MINUS,
  UNARY_PLUS,
  ceilValues,
  collapse,
  factorial,
  faceRange,
  floorValues,
  getOperator,
  rerollOnceHigher,
  rerollOnceLower,
  rerollOnceOn,
  rerollUnconditionalHigher,
  rerollUnconditionalLower,
  rerollUnconditionalOn,
  rollAverage,
  rollCritical,
  rollDice,
  rollMax,
  singleDie,
  takeHigh,
  takeLow,
  thresholdLower,
  thresholdUpper,
} from "./operators";
export type { OperatorFunction, OperatorOptions } from "./operators";

export { Roll, formatSideList, isFudgeDie } from "./roll";

export {
  SeededRandomSource,
  createRandomSource,
  getRandomSource,
  resetRandomSource,
  setRandomSource,
} from "./random";
export type { RandomSource } from "./random";

export {
  ArgumentTypeError,
  ArgumentValueError,
  EvaluationError,
  InputTypeError,
  ParseError,
  RollError,
} from "./errors";

export { Side } from "./types";
export type { Die, Mode, Operand, Paren, Result, SideList, Token } from "./types";

export {
  DICE_CODES,
  FUDGE_DIE,
  MAX_DICE,
  OPAQUE_PRECEDENCE,
  PARSE_CACHE_SIZE,
} from "./common/types";
