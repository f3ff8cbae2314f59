import path from 'path';
import { fileURLToPath } from 'url';
import { loadPromptLibrary } from '../runtime/promptLoader.js';
import type { AgentDependencies } from '../runtime/types.js';
import { resolveFiveWhysConfig, type FiveWhysConfigInput } from './config.js';
import { FiveWhysAgent } from './FiveWhysAgent.js';

export const FIVE_WHYS_PROMPT_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), 'prompts');

export async function createAgent(deps: AgentDependencies, config: FiveWhysConfigInput = {}): Promise<FiveWhysAgent> {
    const prompts = await loadPromptLibrary(FIVE_WHYS_PROMPT_DIR);
    return new FiveWhysAgent({
        llm: deps.llm,
        search: deps.search,
        runLogger: deps.runLogger,
        prompts,
        config: resolveFiveWhysConfig(config),
    });
}

export { FiveWhysAgent, FIVE_WHYS_AGENT_ID } from './FiveWhysAgent.js';
export type { FiveWhysResult, AnalyzeOptions } from './FiveWhysAgent.js';
export { resolveFiveWhysConfig, DEFAULT_MAX_WHY_LEVELS } from './config.js';
export type { FiveWhysConfig, FiveWhysConfigInput } from './config.js';
export type { FiveWhysState, StopReason, WhyChainEntry } from './state.js';
export { renderFiveWhysResult } from './render.js';
