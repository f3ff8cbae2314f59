/**
 * Unified Agents Export
 *
 * Exposes package-scoped agent factories and the runtime for consumers.
 */

export { createAgent as createFiveWhysAgent } from './five-whys/index.js';
export { createAgent as createEmpathyMappingAgent } from './empathy-mapping/index.js';
export { createAgent as createVoteStoriesAgent } from './vote-stories/index.js';

export * as fiveWhys from './five-whys/index.js';
export * as empathyMapping from './empathy-mapping/index.js';
export * as voteStories from './vote-stories/index.js';

export { AgentRegistry, globalAgentRegistry, registerAllAgents } from './registry/index.js';
export type { AgentFactory, AgentRegistryEntry, RegisterAgentsOptions } from './registry/index.js';

export { createLlmClient, ensureAiProvider } from './runtime/ai-provider.js';
export { AiSdkLlmClient, describeError } from './runtime/llm.js';
export type { LlmClient, ChatMessage, StructuredResult } from './runtime/llm.js';
export { createSearchClient, TavilySearchClient } from './runtime/search.js';
export type { SearchClient, SearchResponse, SearchHit } from './runtime/search.js';
export { loadPromptLibrary, PromptLibrary } from './runtime/promptLoader.js';
export { createEventBusAdapter } from './runtime/eventBusAdapter.js';
export { PreconditionViolationError, RunAbortedError } from './runtime/errors.js';

export type {
    AgentDependencies,
    AgentStartContext,
    AgentStartSinks,
    ExecutionHandle,
    RunnableAgent,
} from './runtime/types.js';
