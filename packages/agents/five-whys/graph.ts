import type { FiveWhysState } from './state.js';

export type FiveWhysNode =
    | 'entry'
    | 'why_question'
    | 'web_search'
    | 'cause_analysis'
    | 'validation'
    | 'decision'
    | 'solution_generation'
    | 'synthesis'
    | 'error_handling';

export const END = '__end__';

export type GraphTarget = FiveWhysNode | typeof END;

export const START_NODE: FiveWhysNode = 'entry';

export function routeAfterCauseAnalysis(stepFailed: boolean): 'validation' | 'error_handling' {
    return stepFailed ? 'error_handling' : 'validation';
}

export function routeAfterDecision(state: FiveWhysState): 'why_question' | 'solution_generation' {
    return state.shouldContinue ? 'why_question' : 'solution_generation';
}

export function routeAfterError(state: FiveWhysState): 'cause_analysis' | typeof END {
    return state.shouldContinue ? 'cause_analysis' : END;
}

/**
 * Transition function of the five-whys graph.
 * `stepFailed` is true when the node that just ran appended to `errors`.
 */
export function nextNode(node: FiveWhysNode, state: FiveWhysState, stepFailed: boolean): GraphTarget {
    switch (node) {
        case 'entry':
            // A zero-depth run never asks a question.
            return state.whyLevel >= state.maxWhyLevels ? 'decision' : 'why_question';
        case 'why_question':
            return 'web_search';
        case 'web_search':
            return 'cause_analysis';
        case 'cause_analysis':
            return routeAfterCauseAnalysis(stepFailed);
        case 'validation':
            return 'decision';
        case 'decision':
            return routeAfterDecision(state);
        case 'solution_generation':
            return 'synthesis';
        case 'synthesis':
            return END;
        case 'error_handling':
            return routeAfterError(state);
    }
}
