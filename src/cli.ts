#!/usr/bin/env node
/**
 * tock: a time tracker for the command line
 */
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { readFileSync } from 'fs';
import { join, resolve } from 'path';
import { stringify } from 'yaml';
import { z } from 'zod';
import {
  TockConfig,
  applyDotenv,
  checkConfigFile,
  defaultConfig,
  envConfigPath,
  expandHome,
  getConfigValue,
  loadConfig,
  userConfigPath,
  writeConfigFile,
} from './config';
import { SqliteStore } from './database';
import { formatDuration } from './durations';
import {
  LOG_LEVELS,
  LogLevel,
  envLogLevel,
  getLogger,
  initLogger,
  parseLogLevel,
} from './logger';
import {
  REPORT_FORMATS,
  REPORT_GRANULARITIES,
  ReportFormat,
  ReportGranularity,
  displayLabel,
  renderReport,
} from './report';
import { TimeRecordStore, YamlFileStore, writeFileAtomic } from './store';
import { TimeTrackingService } from './time-tracking';
import {
  ConfigError,
  CorruptStoreError,
  InvalidTransitionError,
  StoreWriteError,
  TockError,
  ValidationError,
} from './types';

export const EXIT_CODES = {
  ok: 0,
  validation: 1,
  invalidTransition: 2,
  corruptStore: 3,
  storeWrite: 4,
  config: 5,
} as const;

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: Record<string, string | undefined>;
  cwd: string;
  clock: () => Date;
}

interface GlobalOptions {
  log?: LogLevel;
  logfile?: string;
  config?: string;
}

interface ReportCommandOptions {
  format?: ReportFormat;
  by?: ReportGranularity;
  since?: Date;
  until?: Date;
  includeOpen?: boolean;
  output?: string;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  env: process.env,
  cwd: process.cwd(),
  clock: () => new Date(),
};

function packageVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
  return z.object({ version: z.string() }).parse(raw).version;
}

export function exitCodeFor(error: TockError): number {
  if (error instanceof InvalidTransitionError) return EXIT_CODES.invalidTransition;
  if (error instanceof CorruptStoreError) return EXIT_CODES.corruptStore;
  if (error instanceof StoreWriteError) return EXIT_CODES.storeWrite;
  if (error instanceof ConfigError) return EXIT_CODES.config;
  return EXIT_CODES.validation;
}

/**
 * Parse a report boundary. A bare date (YYYY-MM-DD) means local midnight;
 * as an upper bound it covers that whole day.
 */
export function parseDateBound(value: string, bound: 'since' | 'until'): Date {
  const dateOnly = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (dateOnly) {
    const [year, month, day] = dateOnly.slice(1).map(Number);
    const date = new Date(year, month - 1, day);
    if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
      throw new ValidationError(`Invalid date "${value}"`);
    }
    return bound === 'until' ? new Date(year, month - 1, day + 1) : date;
  }

  const time = new Date(value);
  if (Number.isNaN(time.getTime())) {
    throw new ValidationError(`Invalid date "${value}". Use YYYY-MM-DD or an ISO timestamp.`);
  }
  return time;
}

function optionParser<T>(parse: (value: string) => T): (value: string) => T {
  return (value) => {
    try {
      return parse(value);
    } catch (error) {
      throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
    }
  };
}

function quoted(label: string): string {
  return label === '' ? displayLabel(label) : `"${label}"`;
}

export function openStore(config: TockConfig): TimeRecordStore & { close?: () => void } {
  return config.store.backend === 'sqlite'
    ? new SqliteStore(config.store.path)
    : new YamlFileStore(config.store.path);
}

/**
 * Build the command tree. Nothing is read or written until a command runs.
 */
export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command('tock');

  program
    .description('Track time spent on tasks and report on it')
    .version(packageVersion(), '--version', 'Print version information and exit')
    .addOption(
      new Option('--log <level>', `Set the log level (${LOG_LEVELS.join(', ')})`).argParser(
        optionParser(parseLogLevel)
      )
    )
    .option('--logfile <path>', 'Write logs to this file instead of stderr')
    .option('--config <path>', 'Read this configuration file after the others')
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr })
    .exitOverride();

  const globals = () => program.opts<GlobalOptions>();

  const loadSettings = (): TockConfig => {
    const options = globals();
    const { config, files } = loadConfig({ file: options.config, env: io.env, cwd: io.cwd });
    initLogger({
      level: options.log ?? envLogLevel(io.env) ?? config.log.level,
      file: options.logfile ? resolve(io.cwd, expandHome(options.logfile, io.env)) : undefined,
    });
    getLogger('cli').debug({ files }, 'cli initialised');
    return config;
  };

  const withService = <T>(run: (service: TimeTrackingService, config: TockConfig) => T): T => {
    const config = loadSettings();
    const store = openStore(config);
    try {
      const service = new TimeTrackingService(store, {
        defaultTask: config.defaults.task,
        clock: io.clock,
      });
      return run(service, config);
    } finally {
      store.close?.();
    }
  };

  const print = (line: string) => io.stdout(`${line}\n`);

  program
    .command('start')
    .description('Start tracking a task')
    .option('-t, --task <label>', 'Task label')
    .action((options: { task?: string }) => {
      withService((service) => {
        const record = service.start({ task: options.task });
        print(`Started ${quoted(record.taskLabel)}.`);
      });
    });

  program
    .command('switch')
    .description('Finish the current task and start another')
    .option('-t, --task <label>', 'Task label')
    .action((options: { task?: string }) => {
      withService((service) => {
        const { sealed, opened } = service.switchTask({ task: options.task });
        print(
          `Switched from ${quoted(sealed.taskLabel)} ` +
            `(${formatDuration(service.activeDurationMs(sealed))} active) ` +
            `to ${quoted(opened.taskLabel)}.`
        );
      });
    });

  program
    .command('pause')
    .description('Pause the current task')
    .action(() => {
      withService((service) => {
        const record = service.pause();
        print(
          `Paused ${quoted(record.taskLabel)} after ` +
            `${formatDuration(service.activeDurationMs(record))} active.`
        );
      });
    });

  program
    .command('resume')
    .description('Resume the paused task')
    .action(() => {
      withService((service) => {
        const record = service.resume();
        print(`Resumed ${quoted(record.taskLabel)}.`);
      });
    });

  program
    .command('end')
    .description('Finish the current task')
    .action(() => {
      withService((service) => {
        const record = service.end();
        print(
          `Ended ${quoted(record.taskLabel)}: ` +
            `${formatDuration(service.activeDurationMs(record))} active.`
        );
      });
    });

  program
    .command('status')
    .description('Show what is being tracked')
    .action(() => {
      withService((service) => {
        const status = service.status(io.clock());
        print(`State: ${status.state}`);
        if (status.activeRecord) {
          print(`Task: ${displayLabel(status.activeRecord.taskLabel)}`);
          print(`Active: ${formatDuration(status.activeMs)}`);
        } else if (status.lastRecord) {
          print(`Last task: ${displayLabel(status.lastRecord.taskLabel)}`);
        }
        print(`Next: ${status.allowed.join(', ')}`);
      });
    });

  program
    .command('report')
    .description('Summarise recorded time')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(REPORT_FORMATS))
    .addOption(
      new Option('--by <granularity>', 'One row per task or per record').choices(
        REPORT_GRANULARITIES
      )
    )
    .option(
      '--since <date>',
      'Only records starting on or after this date',
      optionParser((value) => parseDateBound(value, 'since'))
    )
    .option(
      '--until <date>',
      'Only records starting up to the end of this date, or before this timestamp',
      optionParser((value) => parseDateBound(value, 'until'))
    )
    .option('--include-open', 'Count the task being tracked up to now')
    .option('-o, --output <file>', 'Write the report to a file')
    .action((options: ReportCommandOptions) => {
      withService((service, config) => {
        const report = service.report({
          granularity: options.by ?? config.report.granularity,
          since: options.since,
          until: options.until,
          includeOpen: options.includeOpen ?? false,
          now: io.clock(),
        });
        const output = renderReport(report, options.format ?? config.report.format);
        if (options.output) {
          writeFileAtomic(resolve(io.cwd, expandHome(options.output, io.env)), output);
          print(`Wrote report to ${options.output}.`);
        } else {
          io.stdout(output);
        }
      });
    });

  const configCommand = program.command('config').description('Inspect or create configuration');

  // same file the other commands would read last
  const configTarget = (file?: string): string => {
    const explicit = file ?? globals().config;
    if (explicit) {
      return resolve(io.cwd, expandHome(explicit, io.env));
    }
    applyDotenv(io.env, io.cwd);
    return envConfigPath(io.env, io.cwd) ?? userConfigPath(io.env);
  };

  configCommand
    .command('check')
    .description('Validate a configuration file without changing it')
    .option('--file <path>', 'File to check (default: the user configuration file)')
    .action((options: { file?: string }) => {
      const path = configTarget(options.file);
      const issues = checkConfigFile(path);
      if (issues.length > 0) {
        throw new ConfigError(`${path} is invalid:\n  ${issues.join('\n  ')}`);
      }
      print(`Configuration OK: ${path}`);
    });

  configCommand
    .command('write')
    .description('Write a configuration file holding the defaults')
    .option('--file <path>', 'Where to write (default: the user configuration file)')
    .option('--force', 'Replace an existing file')
    .action((options: { file?: string; force?: boolean }) => {
      const path = configTarget(options.file);
      writeConfigFile(path, defaultConfig(io.env), { force: options.force ?? false });
      print(`Wrote configuration to ${path}`);
    });

  configCommand
    .command('get')
    .description('Print one configuration value, e.g. store.path')
    .argument('<key>', 'Dotted key')
    .action((key: string) => {
      const config = loadSettings();
      const value = getConfigValue(config, key);
      io.stdout(typeof value === 'object' && value !== null ? stringify(value) : `${value}\n`);
    });

  return program;
}

/**
 * Run the CLI and return the exit code
 */
export function runCli(argv: string[], io: CliIO = defaultIO): number {
  const program = createProgram(io);
  try {
    program.parse(argv, { from: 'user' });
    return EXIT_CODES.ok;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof TockError) {
      io.stderr(`Error: ${error.message}\n`);
      return exitCodeFor(error);
    }
    throw error;
  }
}

if (require.main === module) {
  process.exitCode = runCli(process.argv.slice(2));
}
