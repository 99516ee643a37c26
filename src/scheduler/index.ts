/**
 * 调度层模块导出
 */
export { DAGraph } from './DAGraph';
export { WorkflowScheduler } from './WorkflowScheduler';
export { validateDependencies, findCyclePath, topologicalLayers } from './DependencyValidator';
export type { DependencyIssue, ValidationResult, ValidateOptions } from './DependencyValidator';
export { executable, isExecutable, hasRunningTasks, allCompleted, blockedTasks } from './ReadinessSelector';
export { buildTaskInput } from './TaskInput';
export { buildReport, formatReport } from './ExecutionReport';
export type { ExecutionReport, TaskReport, ReportSummary } from './ExecutionReport';
export type {
  DAGNode,
  GraphEdge,
  StatusEvent,
  StatusEventType,
  StatusNotifier,
  ContextHandle,
  ContextStore,
  TaskExecutor,
  TaskExecutionOptions,
  ResourceAllocation,
  ResourceAllocator,
  SchedulerOptions,
  RunOptions,
} from './types';
