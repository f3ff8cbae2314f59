/**
 * Event Bus Adapter for Agents
 *
 * Converts Agent callbacks (AgentStartSinks) to EventBus events,
 * decoupling agents from whatever renders their progress.
 */

import type { EventBus } from '@insight/core';
import type { AgentStartSinks } from './types.js';

export interface EventBusAdapterOptions {
    eventBus: EventBus;
    agentId: string;
    runId: string;
    parentAgentId?: string;
}

export function createEventBusAdapter(options: EventBusAdapterOptions): AgentStartSinks {
    const { eventBus, agentId, runId, parentAgentId } = options;
    const base = () => ({
        agentId,
        runId,
        timestamp: Date.now(),
        version: '1.0' as const,
        parentAgentId,
    });

    return {
        onText: (chunk) => {
            eventBus.emit({ ...base(), type: 'agent:text', payload: chunk });
        },

        onEvent: (event) => {
            eventBus.emit({ ...base(), type: 'agent:event', payload: event });
        },

        onProgress: (progress) => {
            eventBus.emit({ ...base(), type: 'agent:progress', payload: progress });
        },

        onCompleted: (fullText) => {
            eventBus.emit({ ...base(), type: 'agent:completed', payload: { fullText } });
        },

        onFailed: (error) => {
            eventBus.emit({ ...base(), type: 'agent:failed', payload: { error } });
        },
    };
}
