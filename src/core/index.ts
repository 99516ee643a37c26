/**
 * 核心模块导出
 */
export { WorkflowBuilder, createWorkflowBuilder, workflowTitleFor } from './WorkflowBuilder';
export { WorkflowController } from './WorkflowController';
export type { WorkflowSummary } from './WorkflowController';
export { taskToJSON, workflowToJSON, workflowFromJSON } from './serialization';
export type { TaskJSON, WorkflowJSON } from './serialization';
export { createChatModel, contentToText } from './model/ChatModel';
export type { ChatModel } from './model/ChatModel';
export * from './errors';
export * from './types';
