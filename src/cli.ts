/**
 * Command-line interface
 *
 * ```
 * rearrangement-index <input_dir> [options]
 * ```
 *
 * Exit codes: 0 success, 1 failed run, 2 usage error.
 */

import { parseArgs } from "node:util";
import { RearrangementError } from "./errors";
import { runPipeline } from "./operations/pipeline";
import type { PipelineOptions } from "./types";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: rearrangement-index <input_dir> [options]

Computes the rearrangement index of every coordinates table (.tsv, .tsv.gz)
in <input_dir> and writes:
  Rearrangement_index.tsv          RALG per ALG and species
  Splitting_parameter.tsv          SCHR per ALG and species
  Combining_parameter.tsv          CCHR per ALG and species
  Genome_rearrangement_index.tsv   Ri per species

Options:
  -o, --output-dir <dir>     directory for output tables (default: .)
  -c, --concurrency <n>      genomes processed in parallel (default: 4)
  -p, --precision <n>        decimal places in output (default: full precision)
      --missing <marker>     marker for missing cells (default: NA)
      --no-merge-subgroups   keep ALG sub-groups (A1a, Eb, Qc, ...) separate
      --gzip                 gzip the output tables
  -q, --quiet                suppress progress messages
  -h, --help                 show this message`;

/**
 * Invalid command line
 */
export class UsageError extends RearrangementError {
  constructor(message: string) {
    super(message, "USAGE_ERROR");
    this.name = "UsageError";
  }
}

export interface CliCommand {
  readonly help: boolean;
  readonly inputDir: string;
  readonly options: PipelineOptions;
}

/**
 * Where the CLI prints
 */
export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

const consoleIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

function parseInteger(flag: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isInteger(parsed)) {
    throw new UsageError(`--${flag} expects an integer, got "${value}"`);
  }
  return parsed;
}

function readArgv(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        "output-dir": { type: "string", short: "o" },
        concurrency: { type: "string", short: "c" },
        precision: { type: "string", short: "p" },
        missing: { type: "string" },
        "no-merge-subgroups": { type: "boolean" },
        gzip: { type: "boolean" },
        quiet: { type: "boolean", short: "q" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Turn argv (without the node and script entries) into a pipeline command
 *
 * @throws {UsageError} On unknown flags, bad values or a wrong argument count
 */
export function parseCliArgs(argv: readonly string[], io: CliIO = consoleIO): CliCommand {
  const { values, positionals } = readArgv(argv);
  if (values.help === true) {
    return { help: true, inputDir: "", options: {} };
  }
  if (positionals.length !== 1) {
    throw new UsageError(`Expected exactly one input directory, got ${positionals.length}`);
  }

  const options: PipelineOptions = {
    onProgress: values.quiet === true ? (): void => {} : io.stdout,
    onWarning: io.stderr,
  };
  if (values["output-dir"] !== undefined) options.outputDir = values["output-dir"];
  if (values.concurrency !== undefined) {
    options.concurrency = parseInteger("concurrency", values.concurrency);
  }
  if (values.precision !== undefined) {
    options.precision = parseInteger("precision", values.precision);
  }
  if (values.missing !== undefined) options.missing = values.missing;
  if (values["no-merge-subgroups"] === true) options.algAliases = false;
  if (values.gzip === true) options.compress = true;

  return { help: false, inputDir: positionals[0] ?? "", options };
}

/**
 * Run the CLI and resolve to the process exit code
 */
export async function main(argv: readonly string[], io: CliIO = consoleIO): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv, io);
  } catch (error) {
    io.stderr(error instanceof Error ? `Error: ${error.message}` : String(error));
    io.stderr(USAGE);
    return EXIT_USAGE;
  }

  if (command.help) {
    io.stdout(USAGE);
    return EXIT_SUCCESS;
  }

  try {
    await runPipeline(command.inputDir, command.options);
    return EXIT_SUCCESS;
  } catch (error) {
    io.stderr(
      error instanceof RearrangementError
        ? error.toString()
        : `Error: ${error instanceof Error ? error.message : String(error)}`
    );
    return EXIT_FAILURE;
  }
}
