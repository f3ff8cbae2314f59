import { z } from 'zod';
import { SENTIMENTS } from './entities.js';

export const EmpathyClarificationSchema = z.object({
    clarifiedProblem: z.string(),
});

const QuadrantSchema = z.object({
    insights: z.array(z.string()).describe('Observations for this quadrant'),
    quotes: z.array(z.string()).describe('Verbatim (redacted) customer quotes supporting the insights'),
    confidence: z.number().min(0).max(1),
});

export const EmpathyAnalysisSchema = z.object({
    say: QuadrantSchema.describe('What users are saying'),
    think: QuadrantSchema.describe('What users are thinking'),
    do: QuadrantSchema.describe('What users are doing'),
    feel: QuadrantSchema.describe('How users are feeling'),
    goals: z.array(z.string()),
    pains: z.array(z.string()),
    gains: z.array(z.string()),
    latentNeeds: z.array(z.string()).describe('Needs users do not state directly'),
    overallSentiment: z.enum(SENTIMENTS),
    confidence: z.number().min(0).max(1),
});

export type EmpathyClarification = z.infer<typeof EmpathyClarificationSchema>;
export type EmpathyAnalysis = z.infer<typeof EmpathyAnalysisSchema>;
