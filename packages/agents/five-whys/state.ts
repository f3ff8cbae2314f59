import type { SolutionDetails, ValidationRecord } from './schema.js';

export type StopReason =
    | 'max_whys_reached'
    | 'root_cause_identified'
    | 'insufficient_depth'
    | 'too_many_errors'
    | 'step_limit_reached';

export interface WhyChainEntry {
    question: string;
    answer: string;
    evidence: string;
    alternatives: string[];
    level: number;
}

export interface WebSearchOutput {
    searchResults: string[];
    searchQuery: string;
    /** Provider-reported duration, empty when unknown. */
    searchTime: string;
    searchEngine: string;
    searchUrl: string;
}

/**
 * Mutable record owned by a single analyze() call.
 */
export interface FiveWhysState {
    // Core problem
    problemStatement: string;
    currentFocus: string;

    // Why chain
    whyLevel: number;
    maxWhyLevels: number;
    whyQuestions: string[];
    whyAnswers: string[];
    whyChain: WhyChainEntry[];

    webSearchResults: WebSearchOutput | null;

    // Analysis components
    assumptionsMade: string[];
    evidenceNeeded: string[];
    evidenceGathered: string[];

    // Quality metrics
    depthScores: number[];
    relevanceScores: number[];
    actionabilityScores: number[];

    // Validation and refinement
    validationResults: ValidationRecord[];
    refinementSuggestions: string[];

    // Solutions
    potentialSolutions: string[];
    recommendedActions: string[];
    solutionDetails: SolutionDetails | null;

    // Final results
    finalRootCause: string;
    finalReport: string;

    // Control
    shouldContinue: boolean;
    stopReason: StopReason | null;

    // Monitoring
    startedAt: number;
    processingTime: number;
    nodeHistory: string[];

    errors: string[];
}

export const createInitialState = (problem: string, maxWhyLevels: number, now = Date.now()): FiveWhysState => ({
    problemStatement: problem,
    currentFocus: '',
    whyLevel: 0,
    maxWhyLevels,
    whyQuestions: [],
    whyAnswers: [],
    whyChain: [],
    webSearchResults: null,
    assumptionsMade: [],
    evidenceNeeded: [],
    evidenceGathered: [],
    depthScores: [],
    relevanceScores: [],
    actionabilityScores: [],
    validationResults: [],
    refinementSuggestions: [],
    potentialSolutions: [],
    recommendedActions: [],
    solutionDetails: null,
    finalRootCause: '',
    finalReport: '',
    shouldContinue: true,
    stopReason: null,
    startedAt: now,
    processingTime: 0,
    nodeHistory: [],
    errors: [],
});

export const elapsedSeconds = (state: FiveWhysState, now = Date.now()): number =>
    (now - state.startedAt) / 1000;
