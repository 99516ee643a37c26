/**
 * Agents 模块导出
 */
export { AgentRegistry } from './AgentRegistry';
export { RegistryTaskExecutor } from './RegistryTaskExecutor';
export { FunctionAgent } from './FunctionAgent';
export type { AgentFunction } from './FunctionAgent';
export { EchoAgent } from './EchoAgent';
export { LlmAgent } from './LlmAgent';
export type { LlmAgentOptions } from './LlmAgent';
export { ResourceManager, ResourceStatus, DEFAULT_POOLS } from './ResourceManager';
export type { ResourcePool } from './ResourceManager';
export { WorkflowPlanner, parsePlan } from './WorkflowPlanner';
export type { ContextProvider, PlanValidator, WorkflowPlannerOptions } from './WorkflowPlanner';
export type { Agent, AgentDescriptor, AgentFactory } from './types';
