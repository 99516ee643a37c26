/**
 * Memory 模块 - 统一导出
 *
 * 任务执行期间的作用域键值存储
 */
export { InMemoryContextStore } from './ContextStore';
export { AgentContext, GLOBAL_SCOPE, taskScope } from './AgentContext';
