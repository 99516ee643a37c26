/**
 * Agent 层类型定义
 */
import type { ContextHandle } from '../scheduler/types';

/**
 * 执行任务的 agent
 * resolve 的值成为任务结果，reject 即任务失败
 */
export interface Agent {
  readonly name: string;
  run(input: string, context: ContextHandle, signal: AbortSignal): Promise<unknown>;
}

/**
 * 延迟创建 agent 的工厂
 */
export type AgentFactory = () => Agent;

/**
 * 注册表中某个引用的描述
 */
export interface AgentDescriptor {
  ref: string;
  description?: string;
  /** 是否注册了工厂 */
  hasFactory: boolean;
  /** 是否已有实例 */
  instantiated: boolean;
}
