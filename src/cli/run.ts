/**
 * Command line front end
 *
 * Kept apart from the bin entry so the argument handling and exit codes can
 * be driven from tests without spawning a process.
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import type { BatchReport } from '../batch/report';
import { formatReport } from '../batch/report';
import { DEFAULT_CONFIG } from '../constants/config';
import { describeError, isScalerError } from '../errors';
import { BuildShapeScaler } from '../index';
import { LogLevelSchema } from '../schemas';
import { configureLogging, consoleSink, createFileSink, LogSink } from '../utils/logger';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  PARTIAL: 1,
  FAILURES: 2,
  CONFIG_ERROR: 3,
  CANCELLED: 10,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Where the CLI writes; the process streams unless a test supplies its own
 */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  /** Receives log lines; console by default */
  logSink?: LogSink;
}

export interface CliRunOptions {
  io?: CliIO;
  signal?: AbortSignal;
  /** Directory the default templates lookup starts from */
  baseDir?: string;
}

type CliOptions = {
  templates?: string;
  out: string;
  scale?: string[];
  concurrency?: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  logFile?: string | boolean;
  json?: boolean;
  debug?: boolean;
};

const processIO: CliIO = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Templates folder shipped with the tool: the nearest `templates/` above `startDir`
 */
export function findDefaultTemplatesDir(startDir: string): string {
  let current = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(current, 'templates');
    if (fs.existsSync(path.join(candidate, 'material.xml'))) {
      return candidate;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return path.resolve(DEFAULT_CONFIG.TEMPLATES_DIR);
    }
    current = parent;
  }
}

/**
 * Log file name with the run's start time, e.g. `buildshape-scaler-20240301-142530.log`
 */
export function timestampedLogFile(date: Date = new Date()): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  const stamp =
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `buildshape-scaler-${stamp}.log`;
}

/**
 * Exit code for a finished batch
 */
export function exitCodeFor(report: BatchReport): ExitCode {
  if (report.cancelled) return EXIT_CODES.CANCELLED;
  if (report.summary.groups.failed > 0) return EXIT_CODES.FAILURES;
  if (report.summary.groups.partial > 0 || report.ungrouped.length > 0) return EXIT_CODES.PARTIAL;
  return EXIT_CODES.SUCCESS;
}

/**
 * Exit code for an error that stopped the run before any group started
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (!isScalerError(error)) return EXIT_CODES.FAILURES;
  switch (error._tag) {
    case 'ScalerConfigError':
    case 'TemplateLoadError':
    case 'UnsupportedScaleFactorError':
      return EXIT_CODES.CONFIG_ERROR;
    default:
      return EXIT_CODES.FAILURES;
  }
}

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name('buildshape-scaler')
    .description('Create scaled variants of .nl2mat material and .nl2sco object files')
    .argument('[paths...]', 'Files or folders to scale (folders are searched recursively)')
    .option('-t, --templates <dir>', 'Folder with the scaling templates (default: templates/ next to the tool)')
    .option('-o, --out <dir>', 'Destination folder; one subfolder per scale', DEFAULT_CONFIG.OUTPUT_DIR)
    .option('-s, --scale <tags...>', 'Only produce these scales (default: every scale the templates define)')
    .option('-c, --concurrency <n>', 'Folders processed in parallel', parsePositiveInt)
    .addOption(
      new Option('--log-level <level>', 'Minimum level of log lines')
        .choices(LogLevelSchema.options)
        .default(DEFAULT_CONFIG.LOG_LEVEL)
    )
    .option('--log-file [path]', 'Also write log lines to a file (default: timestamped name)')
    .option('--json', 'Print the report as JSON instead of the summary')
    .option('--debug', 'Shorthand for --log-level debug')
    .configureOutput({
      writeOut: text => io.stdout(text),
      writeErr: text => io.stderr(text),
    })
    .exitOverride();

  return program;
}

/**
 * Parse `argv` (user arguments only) and run a batch
 */
export async function runCli(argv: readonly string[], options: CliRunOptions = {}): Promise<ExitCode> {
  const io = options.io ?? processIO;
  const program = createProgram(io);

  try {
    program.parse([...argv], { from: 'user' });
  } catch (error) {
    // commander already printed help, the version or the usage problem
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.CONFIG_ERROR;
    }
    throw error;
  }

  const inputs = program.args;
  if (inputs.length === 0) {
    program.outputHelp();
    return EXIT_CODES.SUCCESS;
  }

  const opts = program.opts<CliOptions>();
  const sinks: LogSink[] = [io.logSink ?? (opts.json ? (_level, line) => io.stderr(`${line}\n`) : consoleSink)];
  if (opts.logFile) {
    const logFile = typeof opts.logFile === 'string' ? opts.logFile : timestampedLogFile();
    sinks.push(createFileSink(path.resolve(logFile)));
  }
  configureLogging({ sinks, colors: !opts.logFile && !opts.json });

  try {
    const scaler = new BuildShapeScaler({
      templatesDir: opts.templates ?? findDefaultTemplatesDir(options.baseDir ?? __dirname),
      outputDir: opts.out,
      logLevel: opts.logLevel,
      debug: opts.debug ?? false,
      ...(opts.scale ? { scales: opts.scale } : {}),
      ...(opts.concurrency ? { concurrency: opts.concurrency } : {}),
    });

    const report = await scaler.convert(inputs, options.signal ? { signal: options.signal } : {});
    if (opts.json) {
      io.stdout(`${JSON.stringify(report, null, 2)}\n`);
    } else {
      io.stdout(`${formatReport(report).join('\n')}\n`);
    }
    return exitCodeFor(report);
  } catch (error) {
    io.stderr(`Error: ${describeError(error)}\n`);
    return exitCodeForError(error);
  }
}
