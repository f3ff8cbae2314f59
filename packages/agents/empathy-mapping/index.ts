import path from 'path';
import { fileURLToPath } from 'url';
import { loadPromptLibrary } from '../runtime/promptLoader.js';
import type { AgentDependencies } from '../runtime/types.js';
import { EmpathyMappingAgent, type EmpathyMappingAgentOptions } from './EmpathyMappingAgent.js';

export const EMPATHY_PROMPT_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), 'prompts');

export type EmpathyCollaborators = Pick<EmpathyMappingAgentOptions, 'ticketSource' | 'consentRequester' | 'documentSink' | 'now'>;

export async function createAgent(deps: AgentDependencies, collaborators: EmpathyCollaborators = {}): Promise<EmpathyMappingAgent> {
    const prompts = await loadPromptLibrary(EMPATHY_PROMPT_DIR);
    return new EmpathyMappingAgent({
        llm: deps.llm,
        runLogger: deps.runLogger,
        prompts,
        ...collaborators,
    });
}

export { EmpathyMappingAgent, EMPATHY_MAPPING_AGENT_ID } from './EmpathyMappingAgent.js';
export type { EmpathyResult, EmpathyAnalyzeInput } from './EmpathyMappingAgent.js';
export { SupportTicketSchema, SupportTicketListSchema, EMPATHY_MAPPING_SCOPE } from './entities.js';
export type { SupportTicket, SupportTicketInput, ConsentRecord, EmpathyMap, ProcessingMetrics } from './entities.js';
export { InMemoryTicketSource, MockConsentRequester, MockDocumentSink, redactPii, validateConsent } from './tools.js';
export type { TicketSource, ConsentRequester, DocumentSink } from './tools.js';
export { renderEmpathyResult } from './render.js';
