/**
 * Command line parsing
 */

import { parseRunDate } from './utils/date.js';
import { ConfigError } from './utils/errors.js';

export type CliCommand =
  | { kind: 'run'; targetDate?: string; force: boolean }
  | { kind: 'service' }
  | { kind: 'status'; days: number }
  | { kind: 'papers'; date?: string; keyword?: string }
  | { kind: 'config' };

const COMMAND_FLAGS = ['--run', '--service', '--status', '--papers', '--config'] as const;

function optionValue(args: string[], name: string): string | undefined {
  const prefix = `${name}=`;
  const match = args.find((arg) => arg.startsWith(prefix));
  return match === undefined ? undefined : match.slice(prefix.length);
}

function validDate(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  parseRunDate(value);
  return value.trim();
}

/**
 * Parse process arguments (without node and script path). No command means service mode.
 */
export function parseCliArgs(args: string[]): CliCommand {
  const commands = COMMAND_FLAGS.filter((flag) => args.includes(flag));
  if (commands.length > 1) {
    throw new ConfigError(`Only one of ${COMMAND_FLAGS.join(', ')} may be given`);
  }

  const date = validDate(optionValue(args, '--date'));

  const selected: (typeof COMMAND_FLAGS)[number] | undefined = commands[0];
  switch (selected) {
    case '--run':
      return date === undefined
        ? { kind: 'run', force: args.includes('--force') }
        : { kind: 'run', targetDate: date, force: args.includes('--force') };
    case '--status': {
      const raw = optionValue(args, '--days') ?? '7';
      const days = Number(raw);
      if (!Number.isInteger(days) || days < 1) {
        throw new ConfigError(`--days must be a positive integer, got "${raw}"`);
      }
      return { kind: 'status', days };
    }
    case '--papers': {
      const command: CliCommand = { kind: 'papers' };
      const keyword = optionValue(args, '--keyword');
      if (date !== undefined) command.date = date;
      if (keyword) command.keyword = keyword;
      return command;
    }
    case '--config':
      return { kind: 'config' };
    case '--service':
    case undefined:
      return { kind: 'service' };
  }
}
