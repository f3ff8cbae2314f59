/**
 * Agent Registry - Export
 */

export { AgentRegistry, globalAgentRegistry } from './AgentRegistry.js';
export type { AgentFactory, AgentRegistryEntry } from './AgentRegistry.js';
export { registerAllAgents } from './registerAgents.js';
export type { RegisterAgentsOptions } from './registerAgents.js';
