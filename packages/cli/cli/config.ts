import { resolve } from 'node:path';
import { loadEnv } from '@insight/shared/env';
import { addLog } from '@insight/shared/logger';
import type { CliAgentId, CliArgs } from './args.js';

export interface CliConfig {
  agentId: CliAgentId;
  prompt: string;
  workspacePath: string;
  verbose: boolean;
  parameters: Record<string, unknown>;
  search: boolean;
  ticketsFile?: string;
}

/**
 * Resolve the run configuration and load credentials into process.env.
 */
export const loadCliConfig = (args: CliArgs): CliConfig => {
  if (!args.agentId || !args.prompt) {
    throw new Error('A command and a prompt (-p) are required');
  }

  const workspacePath = resolve(args.workspace ?? process.cwd());
  const search = args.agentId === 'five-whys' && args.search;

  loadEnv(workspacePath, { requireSearch: search });

  const parameters: Record<string, unknown> = {};
  if (args.agentId === 'five-whys' && args.maxWhys !== undefined) {
    parameters.maxWhys = args.maxWhys;
  }
  if (args.agentId === 'vote-stories' && args.arguments.length > 0) {
    parameters.arguments = args.arguments;
  }

  const cfg: CliConfig = {
    agentId: args.agentId,
    prompt: args.prompt,
    workspacePath,
    verbose: args.verbose,
    parameters,
    search,
    ticketsFile: args.agentId === 'empathy-mapping' ? args.tickets : undefined,
  };

  addLog(`[CLI] Config -> agent: ${cfg.agentId}, workspace: ${cfg.workspacePath}, search: ${cfg.search}`);
  return cfg;
};
