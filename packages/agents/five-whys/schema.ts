/**
 * Structured outputs requested from the model at each five-whys step.
 */

import { z } from 'zod';

const score = () => z.number().min(0).max(1);

export const ClarificationSchema = z.object({
    clarifiedProblem: z.string().describe('The problem restated so it is specific and actionable'),
    assumptions: z.array(z.string()).default([]).describe('Assumptions that need to be validated'),
    evidenceNeeded: z.array(z.string()).default([]).describe('Evidence or data that would help the analysis'),
});

export const CauseAnalysisSchema = z.object({
    primaryCause: z.string().describe('The main cause that answers the why question'),
    evidence: z.string().describe('Evidence or reasoning supporting this cause'),
    alternativeCauses: z.array(z.string()).describe('Alternative causes'),
    depthAssessment: z.string().describe('How deep this cause is (surface/intermediate/deep)'),
    confidenceLevel: score().describe('0.0 to 1.0'),
    actionability: z.enum(['low', 'medium', 'high']).describe('How actionable this cause is'),
});

export const ValidationSchema = z.object({
    chainValidity: score().describe('0.0 to 1.0'),
    depthAdequacy: score().describe('0.0 to 1.0'),
    evidenceStrength: score().describe('0.0 to 1.0'),
    actionability: score().describe('0.0 to 1.0'),
    issuesFound: z.array(z.string()).describe('Issues found in the chain'),
    improvementSuggestions: z.array(z.string()).describe('Improvement suggestions'),
    isRootCauseLikely: z.boolean().describe('Is the root cause likely?'),
    recommendedAction: z.string().describe('Recommended action'),
});

export const SolutionSchema = z.object({
    immediateActions: z.array(z.string()).describe('Immediate actions to address the root cause'),
    preventiveMeasures: z.array(z.string()).describe('Preventive measures to avoid recurrence'),
    monitoringStrategies: z.array(z.string()).describe('Monitoring strategies to track effectiveness'),
    alternativeApproaches: z.array(z.string()).describe('Alternative approaches if the primary solution fails'),
    successMetrics: z.array(z.string()).describe('Success metrics'),
    timeline: z.string().describe('Suggested implementation timeline'),
});

export type Clarification = z.infer<typeof ClarificationSchema>;
export type CauseAnalysis = z.infer<typeof CauseAnalysisSchema>;
export type ValidationRecord = z.infer<typeof ValidationSchema>;
export type SolutionDetails = z.infer<typeof SolutionSchema>;
