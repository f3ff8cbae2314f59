export { EventBus } from './event-bus/EventBus.js';
export {
    AgentEventSchema,
    AgentProgressPayloadSchema,
    AgentEventPayloadSchema,
    AgentCompletedPayloadSchema,
    AgentFailedPayloadSchema,
} from './schemas/agent-event.schema.js';
export type {
    AgentEvent,
    AgentEventType,
    AgentEventLevel,
    AgentEventPayload,
    AgentProgressPayload,
    AgentCompletedPayload,
    AgentFailedPayload,
} from './types/AgentEvent.js';
