/**
 * 工具模块导出
 */
export {
  Logger,
  createLogger,
  createJsonLogger,
  formatEntry,
  getGlobalLogger,
  resetGlobalLogger,
  isLogLevel,
} from './logger';
export type { LogLevel, EntryLevel, LogEntry, LoggerOptions } from './logger';
export { EventBus } from './event-bus';
export type { StatusEventHandler } from './event-bus';
export { TaskQueue } from './task-queue';
export type { TaskFunction, TaskQueueOptions, AddTaskOptions } from './task-queue';
