import type { ChatMessage } from '../runtime/llm.js';
import type { PromptLibrary } from '../runtime/promptLoader.js';
import type { FiveWhysState } from './state.js';

export const FIVE_WHYS_PROMPTS = [
    'clarification',
    'why-question',
    'why-question-chain',
    'cause-analysis',
    'validation',
    'solution',
    'report',
] as const;

const formatChain = (state: FiveWhysState) => JSON.stringify(state.whyChain, null, 2);

const formatSearchResults = (state: FiveWhysState) => {
    const results = state.webSearchResults?.searchResults ?? [];
    if (results.length === 0) {
        return '(no web results)';
    }
    return results.map(result => `- ${result}`).join('\n');
};

export function buildClarificationMessages(prompts: PromptLibrary, state: FiveWhysState): ChatMessage[] {
    return [
        { role: 'system', content: prompts.render('clarification') },
        { role: 'user', content: `Problem: ${state.problemStatement}` },
    ];
}

export function formatWhyQuestion(prompts: PromptLibrary, state: FiveWhysState): string {
    return prompts.render('why-question', { problem_statement: state.problemStatement });
}

export function formatWhyQuestionChain(prompts: PromptLibrary, state: FiveWhysState, currentCause: string): string {
    return prompts.render('why-question-chain', {
        problem_statement: state.problemStatement,
        current_cause: currentCause,
    });
}

export function buildCauseAnalysisMessages(
    prompts: PromptLibrary,
    state: FiveWhysState,
    currentQuestion: string
): ChatMessage[] {
    return [
        {
            role: 'system',
            content: prompts.render('cause-analysis', {
                problem_statement: state.problemStatement,
                why_chain: formatChain(state),
                current_question: currentQuestion,
                web_search_results: formatSearchResults(state),
            }),
        },
        { role: 'user', content: currentQuestion },
    ];
}

export function buildValidationMessages(prompts: PromptLibrary, state: FiveWhysState): ChatMessage[] {
    return [
        {
            role: 'system',
            content: prompts.render('validation', {
                problem_statement: state.problemStatement,
                why_chain: formatChain(state),
            }),
        },
        { role: 'user', content: 'Please validate the current 5 Whys chain.' },
    ];
}

export function buildSolutionMessages(prompts: PromptLibrary, state: FiveWhysState): ChatMessage[] {
    return [
        {
            role: 'system',
            content: prompts.render('solution', {
                problem_statement: state.problemStatement,
                why_chain: formatChain(state),
            }),
        },
        { role: 'user', content: 'Generate solutions based on the 5 Whys analysis.' },
    ];
}

export function buildReportMessages(prompts: PromptLibrary, state: FiveWhysState): ChatMessage[] {
    return [
        {
            role: 'system',
            content: prompts.render('report', {
                problem_statement: state.problemStatement,
                why_chain: formatChain(state),
                solutions: JSON.stringify(state.solutionDetails ?? {}, null, 2),
            }),
        },
        { role: 'user', content: 'Generate the final 5 Whys analysis report.' },
    ];
}
