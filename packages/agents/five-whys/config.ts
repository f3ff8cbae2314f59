import { z } from 'zod';

export const DEFAULT_MAX_WHY_LEVELS = 5;

export const WebSearchConfigSchema = z.object({
    enabled: z.boolean().default(true),
    /** Results scoring below this are dropped. */
    scoreThreshold: z.number().min(0).max(1).default(0.2),
    searchDepth: z.enum(['basic', 'advanced']).default('advanced'),
    maxResults: z.number().int().positive().default(3),
    /** Queries are truncated to this many characters. */
    maxQueryLength: z.number().int().positive().default(400),
});

export const FiveWhysConfigSchema = z.object({
    webSearch: WebSearchConfigSchema.default({}),
    graph: z
        .object({
            /** Hard ceiling on node executions per run, independent of maxWhyLevels. */
            recursionLimit: z.number().int().positive().default(30),
        })
        .default({}),
});

export type FiveWhysConfig = z.infer<typeof FiveWhysConfigSchema>;
export type FiveWhysConfigInput = z.input<typeof FiveWhysConfigSchema>;
export type WebSearchConfig = FiveWhysConfig['webSearch'];

export function resolveFiveWhysConfig(overrides: FiveWhysConfigInput = {}): FiveWhysConfig {
    return FiveWhysConfigSchema.parse(overrides);
}
