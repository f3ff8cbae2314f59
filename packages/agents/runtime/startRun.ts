import { randomUUID } from 'crypto';
import { addLog } from '@insight/shared/logger';
import type { AgentStartContext, AgentStartSinks, ExecutionHandle } from './types.js';
import { describeError } from './llm.js';

export interface RunContext {
    runId: string;
    signal: AbortSignal;
}

/**
 * Shared start() body for the agents: runs `work` in the background,
 * reports the rendered output through the sinks and exposes cancel().
 */
export function startAgentRun(
    agentId: string,
    context: AgentStartContext,
    sinks: AgentStartSinks,
    work: (run: RunContext) => Promise<string>
): ExecutionHandle {
    const controller = new AbortController();
    const runId = context.runId ?? `${agentId}-${randomUUID()}`;

    const completion = Promise.resolve()
        .then(() => work({ runId, signal: controller.signal }))
        .then(output => {
            sinks.onCompleted?.(output);
            return true;
        })
        .catch(error => {
            const message = describeError(error);
            addLog(`[${agentId}] run ${runId} failed: ${message}`);
            sinks.onFailed?.(message);
            return false;
        });

    return {
        cancel: () => controller.abort(),
        runId,
        completion,
    };
}
