import {
  AgentCompletedPayloadSchema,
  AgentEventPayloadSchema,
  AgentFailedPayloadSchema,
  type AgentEvent,
  type EventBus,
} from '@insight/core';

export interface CliOutput {
  out: (line: string) => void;
  err: (line: string) => void;
}

export const consoleOutput: CliOutput = {
  out: line => console.log(line),
  err: line => console.error(line),
};

/**
 * Print run events. Node events only show with --verbose; warnings, errors
 * and the final result always do. Returns the unsubscribe function.
 */
export const subscribeCliOutput = (eventBus: EventBus, verbose: boolean, output: CliOutput = consoleOutput): (() => void) => {
  const onEvent = (event: AgentEvent) => {
    const parsed = AgentEventPayloadSchema.safeParse(event.payload);
    if (!parsed.success) return;
    const { level, message } = parsed.data;
    if (level === 'warning' || level === 'error') {
      output.err(`[${event.agentId}] ${level}: ${message}`);
    } else if (verbose) {
      output.out(`[${event.agentId}] ${message}`);
    }
  };
  const onCompleted = (event: AgentEvent) => {
    const parsed = AgentCompletedPayloadSchema.safeParse(event.payload);
    if (parsed.success) output.out(parsed.data.fullText);
  };
  const onFailed = (event: AgentEvent) => {
    const parsed = AgentFailedPayloadSchema.safeParse(event.payload);
    output.err(`[${event.agentId}] failed: ${parsed.success ? parsed.data.error : 'unknown error'}`);
  };

  eventBus.on('agent:event', onEvent);
  eventBus.on('agent:completed', onCompleted);
  eventBus.on('agent:failed', onFailed);

  return () => {
    eventBus.off('agent:event', onEvent);
    eventBus.off('agent:completed', onCompleted);
    eventBus.off('agent:failed', onFailed);
  };
};
