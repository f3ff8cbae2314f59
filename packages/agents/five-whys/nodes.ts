/**
 * Step functions of the five-whys graph. Each one mutates the run's state in place.
 */

import { addLog } from '@insight/shared/logger';
import type { LlmClient } from '../runtime/llm.js';
import { describeError } from '../runtime/llm.js';
import type { PromptLibrary } from '../runtime/promptLoader.js';
import type { SearchClient } from '../runtime/search.js';
import { PreconditionViolationError } from '../runtime/errors.js';
import type { FiveWhysConfig } from './config.js';
import type { FiveWhysNode } from './graph.js';
import {
    buildCauseAnalysisMessages,
    buildClarificationMessages,
    buildReportMessages,
    buildSolutionMessages,
    buildValidationMessages,
    formatWhyQuestion,
    formatWhyQuestionChain,
} from './prompts.js';
import { CauseAnalysisSchema, ClarificationSchema, SolutionSchema, ValidationSchema } from './schema.js';
import { elapsedSeconds, type FiveWhysState, type StopReason } from './state.js';
import { emptySearchOutput, webSearch } from './tools.js';

/** error_handling aborts once more than this many errors have accumulated. */
export const MAX_RECOVERABLE_ERRORS = 3;

/** Two consecutive confidence scores below this end the run. */
export const MIN_DEPTH_SCORE = 0.3;

export interface FiveWhysNodeContext {
    llm: LlmClient;
    search?: SearchClient;
    prompts: PromptLibrary;
    config: FiveWhysConfig;
    signal?: AbortSignal;
}

export type FiveWhysNodeHandler = (state: FiveWhysState, ctx: FiveWhysNodeContext) => Promise<void> | void;

export async function entryNode(state: FiveWhysState, ctx: FiveWhysNodeContext): Promise<void> {
    const result = await ctx.llm.completeStructured(buildClarificationMessages(ctx.prompts, state), ClarificationSchema, {
        schemaName: 'clarification',
        signal: ctx.signal,
    });

    // An unusable clarification keeps the caller's wording.
    if (result.ok) {
        const clarified = result.value.clarifiedProblem.trim();
        if (clarified) {
            state.problemStatement = clarified;
        }
        state.assumptionsMade = result.value.assumptions;
        state.evidenceNeeded = result.value.evidenceNeeded;
    }

    state.currentFocus = state.problemStatement;
}

export function whyQuestionNode(state: FiveWhysState, ctx: FiveWhysNodeContext): void {
    let question: string;
    if (state.whyLevel === 0) {
        question = formatWhyQuestion(ctx.prompts, state);
    } else {
        const lastAnswer = state.whyAnswers[state.whyAnswers.length - 1];
        if (lastAnswer === undefined) {
            throw new PreconditionViolationError(
                `why_question reached at level ${state.whyLevel} without a previous answer`
            );
        }
        question = formatWhyQuestionChain(ctx.prompts, state, lastAnswer);
    }

    state.whyQuestions.push(question);
    state.whyLevel += 1;
}

const currentQuestion = (state: FiveWhysState, node: FiveWhysNode): string => {
    const question = state.whyQuestions[state.whyQuestions.length - 1];
    if (question === undefined) {
        throw new PreconditionViolationError(`${node} reached before any why question was asked`);
    }
    return question;
};

export async function webSearchNode(state: FiveWhysState, ctx: FiveWhysNodeContext): Promise<void> {
    const query = currentQuestion(state, 'web_search');

    if (!ctx.config.webSearch.enabled || !ctx.search) {
        state.webSearchResults = emptySearchOutput(query);
        return;
    }

    try {
        state.webSearchResults = await webSearch(ctx.search, query, ctx.config.webSearch);
    } catch (error) {
        const message = describeError(error);
        addLog(`[FiveWhys] web search failed: ${message}`);
        state.errors.push(`Web search failed: ${message}`);
        state.webSearchResults = emptySearchOutput(query);
    }
}

export async function causeAnalysisNode(state: FiveWhysState, ctx: FiveWhysNodeContext): Promise<void> {
    const question = currentQuestion(state, 'cause_analysis');

    const result = await ctx.llm.completeStructured(
        buildCauseAnalysisMessages(ctx.prompts, state, question),
        CauseAnalysisSchema,
        { schemaName: 'cause_analysis', signal: ctx.signal }
    );

    if (!result.ok) {
        state.errors.push(`Failed to parse cause analysis response: ${result.error}`);
        return;
    }

    const analysis = result.value;
    const primaryCause = analysis.primaryCause.trim() || 'Unknown cause';

    state.whyAnswers.push(primaryCause);
    state.whyChain.push({
        question,
        answer: primaryCause,
        evidence: analysis.evidence,
        alternatives: analysis.alternativeCauses,
        level: state.whyLevel,
    });
    state.depthScores.push(analysis.confidenceLevel);
    if (analysis.evidence) {
        state.evidenceGathered.push(analysis.evidence);
    }
    state.currentFocus = primaryCause;
}

export async function validationNode(state: FiveWhysState, ctx: FiveWhysNodeContext): Promise<void> {
    const result = await ctx.llm.completeStructured(buildValidationMessages(ctx.prompts, state), ValidationSchema, {
        schemaName: 'validation',
        signal: ctx.signal,
    });

    // A failed validation is recorded but never short-circuits; decision still runs.
    if (!result.ok) {
        state.errors.push(`Failed to parse validation response: ${result.error}`);
        return;
    }

    const validation = result.value;
    state.validationResults.push(validation);
    state.refinementSuggestions.push(...validation.improvementSuggestions);
    state.relevanceScores.push(validation.chainValidity);
    state.actionabilityScores.push(validation.actionability);
}

/**
 * Stop conditions, first match wins: depth limit, root-cause signal, stalled depth.
 */
export function evaluateStopCondition(state: FiveWhysState): StopReason | null {
    if (state.whyLevel >= state.maxWhyLevels) {
        return 'max_whys_reached';
    }

    const latestValidation = state.validationResults[state.validationResults.length - 1];
    if (latestValidation?.isRootCauseLikely) {
        return 'root_cause_identified';
    }

    if (state.depthScores.length >= 2 && state.depthScores.slice(-2).every(score => score < MIN_DEPTH_SCORE)) {
        return 'insufficient_depth';
    }

    return null;
}

export function decisionNode(state: FiveWhysState): void {
    const stopReason = evaluateStopCondition(state);
    state.shouldContinue = stopReason === null;
    state.stopReason = stopReason;
}

export async function solutionGenerationNode(state: FiveWhysState, ctx: FiveWhysNodeContext): Promise<void> {
    const result = await ctx.llm.completeStructured(buildSolutionMessages(ctx.prompts, state), SolutionSchema, {
        schemaName: 'solution',
        signal: ctx.signal,
    });

    // Same policy as validation: record and carry on to synthesis.
    if (!result.ok) {
        state.errors.push(`Failed to parse solution response: ${result.error}`);
        return;
    }

    state.potentialSolutions = result.value.immediateActions;
    state.recommendedActions = result.value.preventiveMeasures;
    state.solutionDetails = result.value;
}

export async function synthesisNode(state: FiveWhysState, ctx: FiveWhysNodeContext): Promise<void> {
    state.finalRootCause = state.whyChain[state.whyChain.length - 1]?.answer ?? '';

    try {
        state.finalReport = await ctx.llm.complete(buildReportMessages(ctx.prompts, state), { signal: ctx.signal });
    } catch (error) {
        state.errors.push(`Failed to generate final report: ${describeError(error)}`);
    }

    state.processingTime = elapsedSeconds(state);
}

export function errorHandlingNode(state: FiveWhysState): void {
    if (state.errors.length > MAX_RECOVERABLE_ERRORS) {
        state.shouldContinue = false;
        state.stopReason = 'too_many_errors';
    }
}

export const FIVE_WHYS_NODE_HANDLERS: Record<FiveWhysNode, FiveWhysNodeHandler> = {
    entry: entryNode,
    why_question: whyQuestionNode,
    web_search: webSearchNode,
    cause_analysis: causeAnalysisNode,
    validation: validationNode,
    decision: decisionNode,
    solution_generation: solutionGenerationNode,
    synthesis: synthesisNode,
    error_handling: errorHandlingNode,
};
