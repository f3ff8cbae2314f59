/**
 * Agent Registry
 *
 * Central registry for all available agents in the application.
 * Provides unified interface for agent discovery and instantiation.
 */

import type { EventBus } from '@insight/core';
import { addLog } from '@insight/shared/logger';
import { createEventBusAdapter } from '../runtime/eventBusAdapter.js';
import { describeError } from '../runtime/llm.js';
import type { AgentStartContext, ExecutionHandle, RunnableAgent } from '../runtime/types.js';
import { randomUUID } from 'crypto';

/**
 * Agent Factory - creates agent instances
 */
export type AgentFactory = () => Promise<RunnableAgent>;

/**
 * Agent Registration Entry
 */
export interface AgentRegistryEntry {
    id: string;
    factory: AgentFactory;
    description: string;
    tags?: string[];  // e.g., ['analysis', 'research']
}

/**
 * Agent Registry - manages all available agents
 */
export class AgentRegistry {
    private agents = new Map<string, AgentRegistryEntry>();

    register(entry: AgentRegistryEntry): void {
        if (this.agents.has(entry.id)) {
            addLog(`[AgentRegistry] Agent ${entry.id} already registered, overwriting`);
        }
        this.agents.set(entry.id, entry);
    }

    getFactory(agentId: string): AgentFactory | undefined {
        return this.agents.get(agentId)?.factory;
    }

    getAllIds(): string[] {
        return Array.from(this.agents.keys());
    }

    getAllEntries(): AgentRegistryEntry[] {
        return Array.from(this.agents.values());
    }

    has(agentId: string): boolean {
        return this.agents.has(agentId);
    }

    /**
     * Create agent instance. Throws when the id is unknown or the factory fails.
     */
    async createAgent(agentId: string): Promise<RunnableAgent> {
        const factory = this.getFactory(agentId);
        if (!factory) {
            throw new Error(`Unknown agent: ${agentId}. Available: ${this.getAllIds().join(', ') || '(none)'}`);
        }

        try {
            return await factory();
        } catch (error) {
            addLog(`[AgentRegistry] Failed to create agent ${agentId}: ${describeError(error)}`);
            throw error;
        }
    }

    /**
     * Start an agent with EventBus integration
     *
     * This is the main entry point for running agents.
     * The agent's sinks are bridged onto the EventBus.
     */
    async startAgent(
        agentId: string,
        userInput: string,
        context: AgentStartContext,
        eventBus: EventBus
    ): Promise<ExecutionHandle> {
        const agent = await this.createAgent(agentId);
        const runId = context.runId ?? `${agent.id}-${randomUUID()}`;

        const sinks = createEventBusAdapter({
            eventBus,
            agentId: agent.id,
            runId,
            parentAgentId: context.parentAgentId,
        });

        try {
            return agent.start(userInput, { ...context, runId }, sinks);
        } catch (error) {
            addLog(`[AgentRegistry] Failed to start agent ${agentId}: ${describeError(error)}`);
            sinks.onFailed?.(describeError(error));
            throw error;
        }
    }
}

/**
 * Global agent registry instance
 */
export const globalAgentRegistry = new AgentRegistry();
