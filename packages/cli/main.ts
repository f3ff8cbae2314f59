import { EventBus } from '@insight/core';
import {
  AgentRegistry,
  createLlmClient,
  createSearchClient,
  registerAllAgents,
  type LlmClient,
  type SearchClient,
} from '@insight/agents';
import { addLog } from '@insight/shared/logger';
import { closeRunLogger, getRunLogger, type RunLogger } from '@insight/shared/run-logger';
import { CliUsageError, parseCliArgs, type CliArgs } from './cli/args.js';
import { loadCliConfig } from './cli/config.js';
import { consoleOutput, subscribeCliOutput, type CliOutput } from './cli/events.js';
import { formatCliUsage } from './cli/help.js';
import { loadTicketsFile } from './cli/tickets.js';

export interface SignalSource {
  once(event: 'SIGINT', listener: () => void): unknown;
  off(event: 'SIGINT', listener: () => void): unknown;
}

/**
 * Collaborators main() builds from the environment unless given.
 */
export interface CliRuntime {
  createLlm?: () => LlmClient;
  createSearch?: () => SearchClient | undefined;
  runLogger?: RunLogger;
  output?: CliOutput;
  signals?: SignalSource;
}

/**
 * Runs one command and resolves to the process exit code:
 * 0 success, 1 failed or cancelled run, 2 usage error.
 */
export async function main(argv: string[] = process.argv.slice(2), runtime: CliRuntime = {}): Promise<number> {
  const output = runtime.output ?? consoleOutput;
  const signals: SignalSource = runtime.signals ?? process;

  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      output.err(error.message);
      output.out(formatCliUsage());
      return 2;
    }
    throw error;
  }

  if (args.help) {
    output.out(formatCliUsage());
    return 0;
  }
  if (!args.command || !args.prompt) {
    output.err(args.command ? 'Missing -p/--prompt' : 'Missing command');
    output.out(formatCliUsage());
    return 2;
  }

  const config = loadCliConfig(args);
  const parameters = { ...config.parameters };
  if (config.ticketsFile) {
    parameters.tickets = await loadTicketsFile(config.ticketsFile, config.workspacePath);
  }

  const createSearch = runtime.createSearch ?? createSearchClient;
  const registry = registerAllAgents(
    {
      llm: (runtime.createLlm ?? createLlmClient)(),
      search: config.search ? createSearch() : undefined,
      runLogger: runtime.runLogger ?? getRunLogger(),
    },
    { fiveWhys: { webSearch: { enabled: config.search } } },
    new AgentRegistry()
  );

  const eventBus = new EventBus();
  const unsubscribe = subscribeCliOutput(eventBus, config.verbose, output);

  try {
    const handle = await registry.startAgent(
      config.agentId,
      config.prompt,
      { workspacePath: config.workspacePath, parameters },
      eventBus
    );
    const onSigint = () => {
      addLog(`[CLI] SIGINT, cancelling ${handle.runId}`);
      handle.cancel();
    };
    signals.once('SIGINT', onSigint);
    const ok = await handle.completion;
    signals.off('SIGINT', onSigint);
    return ok ? 0 : 1;
  } finally {
    unsubscribe();
    if (!runtime.runLogger) {
      closeRunLogger();
    }
  }
}
