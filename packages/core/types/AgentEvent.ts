/**
 * Agent Event Types - Event Bus protocol
 *
 * Agents emit these events while a run is in flight; the CLI (or any other
 * observer) subscribes and renders progress.
 */

export type AgentEventType =
    | 'agent:text'          // Text chunk from Agent
    | 'agent:event'         // Run event (info/warning/error)
    | 'agent:progress'      // A graph node was entered
    | 'agent:completed'     // Agent execution completed
    | 'agent:failed';       // Agent execution failed

export interface AgentEvent {
    type: AgentEventType;
    agentId: string;        // Which Agent emitted this
    runId: string;          // Which run this event belongs to
    timestamp: number;
    payload: unknown;       // Event-specific payload
    version: '1.0';         // Protocol version (fixed, no wildcards)
    parentAgentId?: string;
}

export type AgentEventLevel = 'debug' | 'info' | 'warning' | 'error';

export interface AgentEventPayload {
    level: AgentEventLevel;
    message: string;
}

export interface AgentProgressPayload {
    node: string;
    step: number;
}

export interface AgentCompletedPayload {
    fullText: string;
}

export interface AgentFailedPayload {
    error: string;
    code?: string;
}
