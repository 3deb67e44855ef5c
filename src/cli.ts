/**
 * fqview command line
 *
 * Parses arguments with commander, renders the requested records and maps
 * failures to exit codes: 0 on success, 1 on a file, format or option
 * error (message on stderr).
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { isFqviewError } from "./errors";
import { FastqRenderer, type OutputSink } from "./render/renderer";

export const VERSION = "0.1.0";

/**
 * Streams and signal the command runs against
 */
export interface CliIO {
  readonly stdout: OutputSink;
  readonly stderr: OutputSink;
  readonly signal?: AbortSignal;
}

interface CliOptions {
  numRecords?: number;
  seqColor: boolean;
  legend?: boolean;
  rawQuality?: boolean;
  wrap?: number;
  colorHeader?: boolean;
  labels: boolean;
}

const EXAMPLES = `
Examples:
  fqview reads.fastq -n 5          # Show first 5 records
  fqview reads.fastq.gz -n 10      # Works with gzipped files
  fqview reads.fq --no-seq-color   # Disable sequence coloring
  fqview reads.fastq --legend      # Show quality color legend
  fqview reads.fastq --wrap 60     # Wrap long reads at 60 columns
`;

/**
 * Parse a strictly positive integer option value
 *
 * @throws {InvalidArgumentError} So commander reports it as a usage error
 */
export function parsePositiveInteger(value: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

/**
 * Build the commander program; `onRun` receives the parsed invocation
 */
export function createProgram(
  io: CliIO,
  onRun: (fastq: string, options: CliOptions) => Promise<void>
): Command {
  return new Command()
    .name("fqview")
    .description("Display FASTQ files with colorful quality visualization")
    .version(VERSION)
    .argument("<fastq>", "Input FASTQ file (plain or gzip-compressed)")
    .option(
      "-n, --num-records <count>",
      "Number of records to display (default: all)",
      parsePositiveInteger
    )
    .option("--no-seq-color", "Disable coloring of sequence bases")
    .option("--legend", "Show quality score color legend")
    .option("--raw-quality", "Show raw quality characters beneath the colored blocks")
    .option("--wrap <width>", "Wrap sequence and quality lines at this width", parsePositiveInteger)
    .option("--color-header", "Color the colon-separated fields of the header line")
    .option("--no-labels", 'Omit the "Record N:" label above each record')
    .addHelpText("after", EXAMPLES)
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    })
    .exitOverride()
    .action(onRun);
}

/**
 * Run fqview with user arguments (without the node and script entries)
 *
 * @returns Process exit code
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  let exitCode = 0;

  const program = createProgram(io, async (fastq, options) => {
    try {
      const renderer = new FastqRenderer(
        {
          limit: options.numRecords,
          colorSequence: options.seqColor,
          legend: options.legend === true,
          rawQuality: options.rawQuality === true,
          wrapWidth: options.wrap,
          colorHeader: options.colorHeader === true,
          recordLabels: options.labels,
        },
        {
          sink: io.stdout,
          signal: io.signal,
          onWarning: (message) => io.stderr.write(`${message}\n`),
        }
      );
      await renderer.renderFile(fastq);
    } catch (error) {
      if (!isFqviewError(error)) throw error;
      io.stderr.write(`${error.toString()}\n`);
      exitCode = 1;
    }
  });

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}
