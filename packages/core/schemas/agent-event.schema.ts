/**
 * Agent Event Schema - Zod validation for Event Bus protocol
 */

import { z } from 'zod';

export const AgentEventSchema = z.object({
    type: z.enum([
        'agent:text',
        'agent:event',
        'agent:progress',
        'agent:completed',
        'agent:failed',
    ]),
    agentId: z.string().min(1),
    runId: z.string().min(1),
    timestamp: z.number().positive(),
    payload: z.unknown(),
    version: z.literal('1.0'),
    parentAgentId: z.string().min(1).optional(),
});

export const AgentProgressPayloadSchema = z.object({
    node: z.string().min(1),
    step: z.number().int().nonnegative(),
});

export const AgentEventPayloadSchema = z.object({
    level: z.enum(['debug', 'info', 'warning', 'error']),
    message: z.string(),
});

export const AgentCompletedPayloadSchema = z.object({
    fullText: z.string(),
});

export const AgentFailedPayloadSchema = z.object({
    error: z.string(),
    code: z.string().optional(),
});

export type AgentEventSchemaType = z.infer<typeof AgentEventSchema>;
