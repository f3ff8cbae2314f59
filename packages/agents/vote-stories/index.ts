import path from 'path';
import { fileURLToPath } from 'url';
import { loadPromptLibrary } from '../runtime/promptLoader.js';
import type { AgentDependencies } from '../runtime/types.js';
import { VoteStoriesAgent } from './VoteStoriesAgent.js';

export const VOTE_PROMPT_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), 'prompts');

export async function createAgent(deps: AgentDependencies, options: { timeoutMs?: number } = {}): Promise<VoteStoriesAgent> {
    const prompts = await loadPromptLibrary(VOTE_PROMPT_DIR);
    return new VoteStoriesAgent({ llm: deps.llm, prompts, timeoutMs: options.timeoutMs });
}

export {
    VoteStoriesAgent,
    VoteSchema,
    VOTE_STORIES_AGENT_ID,
    DEFAULT_VOTE_ARGUMENTS,
    VOTE_TIMEOUT_MS,
    renderVoteResult,
} from './VoteStoriesAgent.js';
export type { VoteResult } from './VoteStoriesAgent.js';
