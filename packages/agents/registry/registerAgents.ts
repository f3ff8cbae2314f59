/**
 * Register all available agents
 *
 * Call from the CLI entry point once the LLM and search clients exist.
 */

import { addLog } from '@insight/shared/logger';
import { AgentRegistry, globalAgentRegistry } from './AgentRegistry.js';
import { createAgent as createFiveWhysAgent, FIVE_WHYS_AGENT_ID, type FiveWhysConfigInput } from '../five-whys/index.js';
import { createAgent as createEmpathyAgent, EMPATHY_MAPPING_AGENT_ID, type EmpathyCollaborators } from '../empathy-mapping/index.js';
import { createAgent as createVoteStoriesAgent, VOTE_STORIES_AGENT_ID } from '../vote-stories/index.js';
import type { AgentDependencies } from '../runtime/types.js';

export interface RegisterAgentsOptions {
    fiveWhys?: FiveWhysConfigInput;
    empathy?: EmpathyCollaborators;
}

export function registerAllAgents(
    deps: AgentDependencies,
    options: RegisterAgentsOptions = {},
    registry: AgentRegistry = globalAgentRegistry
): AgentRegistry {
    registry.register({
        id: FIVE_WHYS_AGENT_ID,
        factory: () => createFiveWhysAgent(deps, options.fiveWhys),
        description: 'Five Whys - iterative root-cause analysis with web research',
        tags: ['analysis', 'root-cause'],
    });

    registry.register({
        id: EMPATHY_MAPPING_AGENT_ID,
        factory: () => createEmpathyAgent(deps, options.empathy),
        description: 'Empathy Mapping - say/think/do/feel synthesis from support tickets',
        tags: ['research', 'empathy'],
    });

    registry.register({
        id: VOTE_STORIES_AGENT_ID,
        factory: () => createVoteStoriesAgent(deps),
        description: 'Vote Stories - scores a user story from 0 (weak) to 5 (good)',
        tags: ['planning', 'scoring'],
    });

    const registeredIds = registry.getAllIds();
    addLog(`[AgentRegistry] Registered ${registeredIds.length} agents: ${registeredIds.join(', ')}`);
    return registry;
}
