/**
 * lagrange CLI -- interpolate a polynomial through points read from a file
 *
 * Usage:
 *   lagrange <input file> [--rational] [--at <x>] [--verbose]
 *
 * The input holds x y pairs separated by whitespace. A final number without a
 * partner is the x-coordinate to evaluate the polynomial at.
 */

import { config } from "../core/config.js";
import { InvalidInputError, UsageError } from "../errors.js";
import { formatCoefficient, formatPolynomial } from "../format/polynomial.js";
import { interpolate } from "../interpolation/lagrange.js";
import { evaluate, withName, type Polynomial } from "../types/polynomial.js";
import { readPoints, type PointSet } from "./points.js";
import { timed, type Timed } from "./timing.js";

export interface CliOptions {
  input: string;
  rational?: boolean;
  maxDenominator?: number;
  precision?: number;
  at?: number;
  name?: string;
  color?: boolean;
  verbose?: boolean;
}

export type ParsedArgs = { command: "help" } | { command: "run"; options: CliOptions };

/** Where the CLI writes its lines. */
export interface CliIo {
  stdout(line: string): void;
  stderr(line: string): void;
}

export const consoleIo: CliIo = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

export const HELP = `
lagrange - Lagrange interpolating polynomial through a set of points

USAGE:
  lagrange <input file> [options]

  The input file holds x y pairs separated by whitespace. Use - to read
  from stdin. A trailing number without a partner is evaluated. Without
  it or --at, no value is printed.

OPTIONS:
  -r, --rational               Print coefficients as fractions
  -d, --max-denominator <n>    Largest denominator of a fraction (default: 1000000)
  -x, --at <x>                 Evaluate the polynomial at x
  -p, --precision <n>          Significant digits of decimals (default: 12)
  -n, --name <name>            Name to print for the polynomial (default: p)
      --no-color               Do not style the output
  -v, --verbose                Log progress to stderr
  -h, --help                   Show this help message

EXAMPLES:
  lagrange points.txt
  lagrange points.txt --rational --max-denominator 1000
  lagrange points.txt --at 2.5
  cat points.txt | lagrange -
`;

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined) {
    throw new UsageError(`${flag} expects a value`);
  }
  return value;
}

function parseNumber(flag: string, value: string | undefined): number {
  const text = requireValue(flag, value);
  const n = Number(text);
  if (text.trim() === "" || Number.isNaN(n)) {
    throw new UsageError(`${flag} expects a number, got "${text}"`);
  }
  return n;
}

function parseInteger(flag: string, value: string | undefined, min: number, max: number): number {
  const n = parseNumber(flag, value);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new UsageError(`${flag} expects an integer from ${min} to ${max}, got ${n}`);
  }
  return n;
}

/**
 * Parse command-line arguments (without the node and script paths).
 *
 * @throws UsageError for unknown options, missing values and malformed numbers
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const options: Partial<CliOptions> = {};
  let input: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--rational" || arg === "-r") {
      options.rational = true;
    } else if (arg === "--max-denominator" || arg === "-d") {
      options.maxDenominator = parseInteger(arg, args[++i], 1, Number.MAX_SAFE_INTEGER);
    } else if (arg === "--precision" || arg === "-p") {
      options.precision = parseInteger(arg, args[++i], 1, 100);
    } else if (arg === "--at" || arg === "-x") {
      options.at = parseNumber(arg, args[++i]);
    } else if (arg === "--name" || arg === "-n") {
      options.name = requireValue(arg, args[++i]);
    } else if (arg === "--no-color") {
      options.color = false;
    } else if (arg === "--verbose" || arg === "-v") {
      options.verbose = true;
    } else if (arg === "--help" || arg === "-h") {
      return { command: "help" };
    } else if (arg === "-" || !arg.startsWith("-")) {
      if (input !== undefined) {
        throw new UsageError(`Unexpected argument: ${arg}`);
      }
      input = arg;
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  if (input === undefined) {
    throw new UsageError("Missing input file");
  }
  return { command: "run", options: { ...options, input } };
}

/**
 * Interpolate the points in `options.input` and print the result.
 * Flags in `options` take precedence over the loaded configuration.
 *
 * @returns the process exit code
 */
export function run(options: CliOptions, io: CliIo = consoleIo): number {
  const settings = config.getAll();
  const rational = options.rational ?? settings.rational;
  const maxDenominator = options.maxDenominator ?? settings.maxDenominator;
  const precision = options.precision ?? settings.precision;
  const name = options.name ?? settings.name;
  const color = options.color ?? settings.color;
  const verbose = options.verbose ?? settings.verbose;

  const log = (message: string): void => {
    if (verbose) io.stderr(`[lagrange] ${message}`);
  };

  const configPath = config.getConfigFilePath();
  if (configPath) {
    log(`Using config: ${configPath}`);
  }

  let points: PointSet;
  try {
    points = readPoints(options.input);
  } catch (error) {
    io.stderr(`File '${options.input}' could not be read.`);
    log(error instanceof Error ? error.message : String(error));
    return 1;
  }
  log(`Read ${points.xs.length} points from ${options.input === "-" ? "stdin" : options.input}`);

  const query = options.at ?? points.query;
  let result: Timed<{ p: Polynomial; value: number | undefined }>;
  try {
    result = timed(() => {
      const p = interpolate(points.xs, points.ys);
      return { p, value: query === undefined ? undefined : evaluate(p, query) };
    });
  } catch (error) {
    if (error instanceof InvalidInputError) {
      io.stderr(error.message);
      return 1;
    }
    throw error;
  }

  const label = color ? `\x1b[3m${name}\x1b[0m` : name;
  const p = withName(result.value.p, label);
  io.stdout(formatPolynomial(p, { rational, maxDenominator, precision }));
  if (query !== undefined && result.value.value !== undefined) {
    io.stdout(
      `${label}(${formatCoefficient(query, { precision })}) = ${formatCoefficient(result.value.value, { precision })}`,
    );
  }
  io.stdout(`Done in ${result.micros} µs.`);
  return 0;
}

/**
 * Entry point: parse `argv`, run, and return the exit code.
 */
export function main(argv: readonly string[] = process.argv.slice(2), io: CliIo = consoleIo): number {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`${error.message}\nUsage: lagrange <input file> [options] (see --help)`);
      return 1;
    }
    throw error;
  }

  if (parsed.command === "help") {
    io.stdout(HELP);
    return 0;
  }

  const { options } = parsed;
  if (options.color === undefined && !process.stdout.isTTY) {
    options.color = false;
  }
  return run(options, io);
}
