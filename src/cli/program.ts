import { Command, CommanderError, InvalidArgumentError as OptionValueError } from "commander";
import type { BatchParams, BatchSummary, OnProgress } from "../memories/types.js";
import { resolveConcurrency } from "../config/env.js";
import { runBatch, type BatchOptions } from "../memories/batch.js";
import { InvalidArgumentError, NotFoundError } from "../memories/errors.js";
import { parseBatchParams } from "../memories/params.js";
import { formatSummary } from "../memories/summary.js";
import { VERSION } from "../version.js";

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_FAILURE = 2;

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
};

export type CliDeps = {
  io?: CliIo;
  env?: NodeJS.ProcessEnv;
  runBatch?: (params: BatchParams, opts?: BatchOptions) => Promise<BatchSummary>;
};

type CliOptions = {
  overwrite?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
  json?: boolean;
  failFast?: boolean;
  concurrency?: number;
};

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new OptionValueError("must be a positive integer.");
  }
  return n;
}

export function buildProgram(io: CliIo = defaultIo): Command {
  return new Command()
    .name("memento-merge")
    .description("Restore exported memories by merging each capture with its overlay.")
    .version(VERSION)
    .argument("<input>", "directory containing the exported memories")
    .argument("<output>", "directory for the restored files (created if missing)")
    .option("--overwrite", "re-process entries whose output already exists (any extension)")
    .option("--dry-run", "show what would be processed without writing files")
    .option("-v, --verbose", "print each entry as it is processed")
    .option("-c, --concurrency <n>", "entries processed at once", parsePositiveInt)
    .option("--fail-fast", "stop at the first failed entry")
    .option("--json", "print the batch summary as JSON")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    });
}

function progressPrinter(io: CliIo): OnProgress {
  return (event) => {
    if (event.type !== "batch.entry.done") {
      return;
    }
    const { result } = event;
    const detail =
      result.status === "failed"
        ? `: ${result.error?.message ?? "unknown error"}`
        : result.output
          ? ` -> ${result.output}`
          : "";
    io.stdout(`[${event.index}/${event.total}] ${result.status} ${result.name}${detail}\n`);
  };
}

/**
 * Parse `argv` (without the node and script entries), run the batch and
 * report. Resolves to the process exit code: 0 when nothing failed, 1 for
 * usage errors and a missing input directory, 2 when any entry failed or
 * the batch aborted.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? defaultIo;
  const env = deps.env ?? process.env;
  const program = buildProgram(io);

  try {
    program.parse(argv, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      // --help and --version also land here, with exit code 0
      return err.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    }
    throw err;
  }

  const [input, output] = program.args;
  const options = program.opts<CliOptions>();

  let params: BatchParams;
  try {
    params = parseBatchParams({
      source_path: input,
      dest_path: output,
      overwrite: options.overwrite === true,
      dry_run: options.dryRun === true,
      concurrency: options.concurrency ?? resolveConcurrency(env),
      fail_fast: options.failFast === true,
    });
  } catch (err) {
    if (err instanceof InvalidArgumentError) {
      io.stderr(`Error: ${err.message}\n`);
      return EXIT_USAGE;
    }
    throw err;
  }

  const verbose = options.verbose === true && options.json !== true;
  if (verbose) {
    io.stdout(`Input directory : ${params.source_path}\n`);
    io.stdout(`Output directory: ${params.dest_path}\n`);
    io.stdout(`Overwrite       : ${params.overwrite}\n`);
    io.stdout(`Dry run         : ${params.dry_run === true}\n\n`);
  }

  let summary: BatchSummary;
  try {
    summary = await (deps.runBatch ?? runBatch)(params, {
      onProgress: verbose ? progressPrinter(io) : undefined,
    });
  } catch (err) {
    io.stderr(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    return err instanceof NotFoundError ? EXIT_USAGE : EXIT_FAILURE;
  }

  if (options.json) {
    io.stdout(JSON.stringify(summary, null, 2) + "\n");
  } else {
    io.stdout(formatSummary(summary, { verbose: summary.dry_run && !verbose }) + "\n");
  }

  return summary.totals.failed_count > 0 ? EXIT_FAILURE : EXIT_OK;
}
