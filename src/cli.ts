import chalk from "chalk";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { ParseError, RollError } from "./errors";
import { compile, rollBasic, rollVerbose } from "./parser";
import { createRandomSource, getRandomSource } from "./random";
import type { Mode } from "./types";

/** Where the CLI writes. Each call is one line. */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const defaultIO: CliIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

interface CliOptions {
  average?: boolean;
  critical?: boolean;
  maximum?: boolean;
  number: number;
  verbose?: boolean;
  wrap: number;
  seed?: string;
}

function parseWholeNumber(minimum: number): (value: string) => number {
  return (value) => {
    const parsed = Number(value);
    if (!/^\d+$/.test(value.trim()) || parsed < minimum) {
      throw new InvalidArgumentError(`Expected a whole number of at least ${minimum}.`);
    }
    return parsed;
  };
}

function modeOf(options: CliOptions): Mode {
  if (options.maximum) return "maximum";
  if (options.critical) return "critical";
  if (options.average) return "average";
  return "normal";
}

/**
 * Lay results out space separated, starting a new line before one would
 * run past `width` characters. A width of 0 keeps everything on one line.
 */
export function wrapResults(results: readonly string[], width: number): string[] {
  const lines: string[] = [];
  let line: string[] = [];
  let length = 0;
  for (const result of results) {
    const size = result.length + 1;
    if (width > 0 && line.length > 0 && length + size > width) {
      lines.push(line.join(" "));
      line = [];
      length = 0;
    }
    line.push(result);
    length += size;
  }
  if (line.length > 0) lines.push(line.join(" "));
  return lines;
}

export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command();

  program
    .name("dicetree")
    .description(
      "Roll dice expressions like 1d20+5 or 4d6h3. All the usual arithmetic " +
        "works alongside the dice operators."
    )
    .argument("<expression...>", "the rolling expressions to perform")
    .addOption(
      new Option("-a, --average", "calculate the average of the given roll").conflicts([
        "critical",
        "maximum",
      ])
    )
    .addOption(
      new Option(
        "-c, --critical",
        "roll the dice as a critical hit (roll twice as many)"
      ).conflicts("maximum")
    )
    .option("-m, --maximum", "calculate the maximum value that can be rolled")
    .option(
      "-n, --number <count>",
      "roll each expression this many times",
      parseWholeNumber(1),
      1
    )
    .option("-v, --verbose", "show the result of every die")
    .option(
      "-w, --wrap <width>",
      "wrap lines after this many characters, 0 for no wrapping",
      parseWholeNumber(0),
      80
    )
    .option("--seed <seed>", "seed the dice so the same rolls come out every time")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    })
    .action((expressions: string[], options: CliOptions) => {
      const mode = modeOf(options);
      const random =
        options.seed === undefined ? getRandomSource() : createRandomSource(options.seed);
      for (const expression of expressions) {
        const compiled = compile(expression);
        const results: string[] = [];
        for (let i = 0; i < options.number; i++) {
          results.push(
            options.verbose
              ? rollVerbose(compiled, mode, 0, random)
              : String(rollBasic(compiled, mode, 0, random))
          );
        }
        for (const line of wrapResults(results, options.wrap)) io.stdout(line);
      }
    });

  return program;
}

/**
 * Run the CLI against `argv` (as in `process.argv`) and return the exit
 * code. Roll failures are reported on stderr; anything else is rethrown.
 */
export function runCli(argv: readonly string[], io: CliIO = defaultIO): number {
  try {
    createProgram(io).parse([...argv]);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    if (error instanceof RollError) {
      io.stderr(chalk.red(error instanceof ParseError ? error.format() : error.message));
      return 1;
    }
    throw error;
  }
}
