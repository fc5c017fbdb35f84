/**
 * sentinel - run pipeline health checks from the command line
 *
 * Usage:
 *   sentinel freshness                      Check table freshness now
 *   sentinel gaps --date 2024-03-09         Check one business date
 *   sentinel stalls --start-date 2024-03-01 --end-date 2024-03-07
 *   sentinel all --dry-run --json           Everything, alerts logged only
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import pc from 'picocolors';
import {
  CheckStatus,
  systemClock,
  worstStatus,
  type CheckSummary,
  type Clock,
} from '@sentinel/shared-types';
import {
  DETECTOR_NAMES,
  dateRange,
  isBusinessDate,
  yesterday,
  type DetectorName,
  type MonitorRuntime,
  type RuntimeOptions,
  type ThresholdOverrides,
} from '@sentinel/monitor-core';
import { EXIT_CRITICAL, EXIT_OK, exitCodeFor, formatOverall, formatSummary } from './report';

export type CliRuntime = Pick<MonitorRuntime, 'runDetector' | 'close'>;

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export interface CliDeps {
  createRuntime(options: Pick<RuntimeOptions, 'dryRun' | 'thresholdOverrides'>): Promise<CliRuntime>;
  io: CliIO;
  clock?: Clock;
  color?: boolean;
}

interface CommandOptions {
  date?: string;
  startDate?: string;
  endDate?: string;
  dryRun?: boolean;
  json?: boolean;
  threshold?: number;
}

type CommandName = DetectorName | 'all';
type ThresholdCommand = keyof ThresholdOverrides;

const DESCRIPTIONS: Record<CommandName, string> = {
  freshness: 'Check how old the newest row of each watched table is',
  gaps: 'Compare raw files against loaded rows for a date',
  stalls: 'Find stages that stopped making progress',
  coverage: 'Check the share of played games that got predictions',
  completeness: 'Check scheduled games against loaded game data',
  latency: 'Measure time between stage completions',
  dlq: 'Inspect dead letter queues',
  all: 'Run every check',
};

const THRESHOLD_COMMANDS: readonly ThresholdCommand[] = ['freshness', 'stalls', 'coverage'];

function isThresholdCommand(name: CommandName): name is ThresholdCommand {
  return THRESHOLD_COMMANDS.some((command) => command === name);
}

function parseDate(value: string): string {
  if (!isBusinessDate(value)) {
    throw new InvalidArgumentError('Expected a YYYY-MM-DD date.');
  }
  return value;
}

function parseThreshold(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Expected a number.');
  }
  return parsed;
}

function resolveDates(options: CommandOptions, command: Command, clock: Clock): string[] {
  const { date, startDate, endDate } = options;
  if (startDate === undefined && endDate === undefined) {
    return [date ?? yesterday(clock.now())];
  }
  if (date !== undefined) {
    command.error('error: --date cannot be combined with --start-date/--end-date', { exitCode: EXIT_CRITICAL });
  }
  if (startDate === undefined || endDate === undefined) {
    command.error('error: --start-date and --end-date must be given together', { exitCode: EXIT_CRITICAL });
  }
  if (startDate > endDate) {
    command.error(`error: --start-date ${startDate} is after --end-date ${endDate}`, { exitCode: EXIT_CRITICAL });
  }
  return dateRange(startDate, endDate);
}

async function runChecks(
  name: CommandName,
  options: CommandOptions,
  command: Command,
  deps: CliDeps
): Promise<number> {
  const clock = deps.clock ?? systemClock;
  const colors = pc.createColors(deps.color ?? false);
  const dates = resolveDates(options, command, clock);
  const detectors: readonly DetectorName[] = name === 'all' ? DETECTOR_NAMES : [name];

  const thresholdOverrides: ThresholdOverrides = {};
  if (options.threshold !== undefined && isThresholdCommand(name)) {
    thresholdOverrides[name] = options.threshold;
  }

  const runtime = await deps.createRuntime({ dryRun: options.dryRun === true, thresholdOverrides });
  const summaries: CheckSummary[] = [];
  try {
    for (const businessDate of dates) {
      for (const detector of detectors) {
        summaries.push(await runtime.runDetector(detector, businessDate, { alert: true }));
      }
    }
  } finally {
    await runtime.close();
  }

  const status: CheckStatus = worstStatus(summaries.map((summary) => summary.status));
  const exitCode = exitCodeFor(status);

  if (options.json) {
    deps.io.out(`${JSON.stringify({ status, exitCode, summaries }, null, 2)}\n`);
  } else {
    for (const summary of summaries) {
      deps.io.out(`${formatSummary(summary, colors)}\n`);
    }
    deps.io.out(`${formatOverall(status, exitCode, colors)}\n`);
  }
  return exitCode;
}

export function buildProgram(deps: CliDeps, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name('sentinel')
    .description('Pipeline health checks')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.io.out(text),
      writeErr: (text) => deps.io.err(text),
    });

  const names: CommandName[] = [...DETECTOR_NAMES, 'all'];
  for (const name of names) {
    const command = program
      .command(name)
      .description(DESCRIPTIONS[name])
      .option('--date <date>', 'business date (YYYY-MM-DD), defaults to yesterday', parseDate)
      .option('--start-date <date>', 'first business date of a range', parseDate)
      .option('--end-date <date>', 'last business date of a range', parseDate)
      .option('--dry-run', 'evaluate and log alerts without sending them')
      .option('--json', 'print results as JSON');

    if (isThresholdCommand(name)) {
      command.option('--threshold <value>', 'override the warning threshold of every check', parseThreshold);
    }

    command.action(async (options: CommandOptions, self: Command) => {
      onExit(await runChecks(name, options, self, deps));
    });
  }

  return program;
}

/**
 * Parses argv (without the node and script entries) and runs the command.
 * Resolves to the process exit code; rejects only when a check run fails.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  let exitCode = EXIT_OK;
  const program = buildProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_CRITICAL;
    }
    throw error;
  }
  return exitCode;
}
