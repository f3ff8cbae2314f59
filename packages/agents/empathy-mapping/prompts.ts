import type { ChatMessage } from '../runtime/llm.js';
import type { PromptLibrary } from '../runtime/promptLoader.js';
import type { EmpathyMappingState } from './state.js';

export const EMPATHY_PROMPTS = ['clarification', 'support-ticket-analysis'] as const;

export function buildClarificationMessages(prompts: PromptLibrary, problem: string): ChatMessage[] {
    return [
        { role: 'system', content: prompts.render('clarification', { problem_statement: problem }) },
        { role: 'user', content: `Problem: ${problem}` },
    ];
}

export function formatRedactedTickets(state: EmpathyMappingState): string {
    return state.consentedTickets
        .map(ticket => {
            const document = state.redactedDocuments.find(doc => doc.ticketId === ticket.ticketId);
            const content = document ? document.redactedContent : '(content unavailable)';
            return `### Ticket ${ticket.ticketId} [${ticket.category}, ${ticket.priority}, ${ticket.status}]\n${content}`;
        })
        .join('\n\n');
}

export function buildAnalysisMessages(prompts: PromptLibrary, state: EmpathyMappingState): ChatMessage[] {
    return [
        {
            role: 'system',
            content: prompts.render('support-ticket-analysis', { problem_statement: state.problemStatement }),
        },
        { role: 'user', content: formatRedactedTickets(state) },
    ];
}
