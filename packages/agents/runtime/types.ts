import type { AgentEventPayload, AgentProgressPayload } from '@insight/core';
import type { RunLogger } from '@insight/shared/run-logger';
import type { LlmClient } from './llm.js';
import type { SearchClient } from './search.js';

/**
 * Unified start() contract – minimal, non-blocking execution handle
 */
export type AgentStartContext = {
    runId?: string;
    workspacePath?: string;
    /**
     * Agent-specific parameters (e.g. maxWhys for five-whys).
     * Each agent validates its own shape.
     */
    parameters?: Record<string, unknown>;
    /**
     * Parent agent in call chain (for agent hierarchy tracking)
     */
    parentAgentId?: string;
};

export type AgentStartSinks = {
    onText?: (chunk: string) => void;
    onEvent?: (event: AgentEventPayload) => void;
    onProgress?: (progress: AgentProgressPayload) => void;
    onCompleted?: (fullText: string) => void;
    onFailed?: (error: string) => void;
};

export interface ExecutionHandle {
    cancel: () => void;
    runId: string;
    /**
     * Resolves to true on successful completion, false when the run fails or is aborted.
     */
    completion: Promise<boolean>;
}

/**
 * RunnableAgent – unified external contract for agents
 */
export interface RunnableAgent {
    readonly id: string;
    readonly description: string;
    start(userInput: string, context: AgentStartContext, sinks: AgentStartSinks): ExecutionHandle;
}

/**
 * Collaborators handed to agent factories.
 */
export interface AgentDependencies {
    llm: LlmClient;
    search?: SearchClient;
    runLogger?: RunLogger;
}
