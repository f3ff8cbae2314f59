import minimist from 'minimist';

import { addLog } from '@insight/shared/logger';

export const CLI_COMMANDS = {
  'five-whys': 'five-whys',
  vote: 'vote-stories',
  'vote-stories': 'vote-stories',
  empathy: 'empathy-mapping',
  'empathy-mapping': 'empathy-mapping',
} as const;

export type CliCommand = keyof typeof CLI_COMMANDS;
export type CliAgentId = (typeof CLI_COMMANDS)[CliCommand];

export interface CliArgs {
  command?: CliCommand;
  agentId?: CliAgentId;
  prompt?: string;
  maxWhys?: number;
  search: boolean;
  arguments: string[];
  tickets?: string;
  workspace?: string;
  verbose: boolean;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const isCommand = (value: string): value is CliCommand => Object.prototype.hasOwnProperty.call(CLI_COMMANDS, value);

const lastString = (value: unknown): string | undefined => {
  const candidate: unknown = Array.isArray(value) ? value[value.length - 1] : value;
  if (typeof candidate === 'string' && candidate.trim().length > 0) {
    return candidate.trim();
  }
  if (typeof candidate === 'number') {
    return String(candidate);
  }
  return undefined;
};

const stringList = (value: unknown): string[] => {
  const values: unknown[] = Array.isArray(value) ? value : value === undefined ? [] : [value];
  return values
    .map(item => (typeof item === 'number' ? String(item) : item))
    .filter((item): item is string => typeof item === 'string' && item.trim().length > 0)
    .map(item => item.trim());
};

export const parseCliArgs = (raw: string[] = process.argv.slice(2)): CliArgs => {
  const argv = minimist(raw, {
    string: ['prompt', 'argument', 'tickets', 'workspace', 'max-whys'],
    boolean: ['help', 'verbose', 'search'],
    alias: { p: 'prompt', h: 'help', w: 'workspace' },
    default: { search: true },
  });

  const positional: unknown[] = argv._;
  const first = positional[0];
  let command: CliCommand | undefined;
  if (typeof first === 'string') {
    const normalized = first.trim().toLowerCase();
    if (!isCommand(normalized)) {
      throw new CliUsageError(`Unknown command: ${first}`);
    }
    command = normalized;
  }

  // Words after the command stand in for -p.
  const prompt =
    lastString(argv.prompt) ?? (positional.length > 1 ? positional.slice(1).map(String).join(' ') : undefined);

  let maxWhys: number | undefined;
  const rawMaxWhys = lastString(argv['max-whys']);
  if (rawMaxWhys !== undefined) {
    maxWhys = Number(rawMaxWhys);
    if (!Number.isInteger(maxWhys) || maxWhys < 0) {
      throw new CliUsageError(`--max-whys must be a non-negative integer, got "${rawMaxWhys}"`);
    }
  }

  const help: unknown = argv.help;
  const verbose: unknown = argv.verbose;
  const search: unknown = argv.search;

  const result: CliArgs = {
    command,
    agentId: command ? CLI_COMMANDS[command] : undefined,
    prompt,
    maxWhys,
    search: search !== false,
    arguments: stringList(argv.argument),
    tickets: lastString(argv.tickets),
    workspace: lastString(argv.workspace),
    verbose: verbose === true,
    help: help === true,
  };

  addLog(
    `[CLI] Parsed args -> command: ${result.command ?? 'undefined'}, prompt: ${result.prompt ?? 'undefined'}, maxWhys: ${result.maxWhys ?? 'undefined'}, search: ${result.search}, arguments: ${result.arguments.length}, tickets: ${result.tickets ?? 'undefined'}, workspace: ${result.workspace ?? 'undefined'}`
  );

  return result;
};
