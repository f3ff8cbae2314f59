/**
 * Event Bus - Decoupling bridge between Agents and their observers
 *
 * Agents emit events, the CLI subscribes and renders progress.
 *
 * Features:
 * - Zod validation of every event (throws on malformed events)
 * - Fixed event version (1.0)
 * - Wildcard subscription support ('*') for debugging and monitoring
 */

import { EventEmitter } from 'node:events';
import type { AgentEvent, AgentEventType } from '../types/AgentEvent.js';
import { AgentEventSchema } from '../schemas/agent-event.schema.js';

export type AgentEventHandler = (event: AgentEvent) => void;

export class EventBus {
    private emitter = new EventEmitter();

    /**
     * Emit an event with Schema validation
     */
    emit(event: AgentEvent): void {
        const validated = AgentEventSchema.parse(event);

        this.emitter.emit(validated.type, validated);
        this.emitter.emit('*', validated);
    }

    on(type: AgentEventType | '*', handler: AgentEventHandler): void {
        this.emitter.on(type, handler);
    }

    off(type: AgentEventType | '*', handler: AgentEventHandler): void {
        this.emitter.off(type, handler);
    }

    /**
     * Subscribe once (auto-unsubscribe after first event)
     */
    once(type: AgentEventType | '*', handler: AgentEventHandler): void {
        this.emitter.once(type, handler);
    }

    listenerCount(type: AgentEventType | '*'): number {
        return this.emitter.listenerCount(type);
    }

    removeAllListeners(type?: AgentEventType | '*'): void {
        this.emitter.removeAllListeners(type);
    }
}
