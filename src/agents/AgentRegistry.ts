import { AgentNotFoundError } from '../core/errors';
import { createLogger } from '../utils/logger';
import type { Agent, AgentDescriptor, AgentFactory } from './types';

const logger = createLogger('AgentRegistry');

interface FactoryEntry {
  factory: AgentFactory;
  description?: string;
}

/**
 * Agent 注册表
 * 通过工厂注册的 agent 在第一次 get 时才创建，之后复用同一实例
 */
export class AgentRegistry {
  private factories: Map<string, FactoryEntry> = new Map();
  private instances: Map<string, Agent> = new Map();

  /**
   * 注册工厂；同名工厂会被替换，已创建的实例被丢弃
   */
  registerFactory(ref: string, factory: AgentFactory, description?: string): this {
    if (this.factories.has(ref)) {
      logger.warn(`Replacing agent factory: ${ref}`);
    }
    this.factories.set(ref, { factory, description });
    this.instances.delete(ref);
    logger.debug(`Agent factory registered: ${ref}`);
    return this;
  }

  /**
   * 直接注册实例
   */
  registerInstance(ref: string, agent: Agent): this {
    this.instances.set(ref, agent);
    logger.debug(`Agent instance registered: ${ref}`);
    return this;
  }

  /**
   * 获取 agent，必要时由工厂创建
   */
  get(ref: string): Agent {
    const existing = this.instances.get(ref);
    if (existing) {
      return existing;
    }

    const entry = this.factories.get(ref);
    if (!entry) {
      throw new AgentNotFoundError(ref);
    }

    const agent = entry.factory();
    this.instances.set(ref, agent);
    logger.info(`Agent instantiated: ${ref}`);
    return agent;
  }

  has(ref: string): boolean {
    return this.instances.has(ref) || this.factories.has(ref);
  }

  listFactories(): string[] {
    return [...this.factories.keys()];
  }

  listInstances(): string[] {
    return [...this.instances.keys()];
  }

  describe(ref: string): AgentDescriptor | undefined {
    if (!this.has(ref)) {
      return undefined;
    }
    return {
      ref,
      description: this.factories.get(ref)?.description,
      hasFactory: this.factories.has(ref),
      instantiated: this.instances.has(ref),
    };
  }

  unregister(ref: string): boolean {
    const removedFactory = this.factories.delete(ref);
    const removedInstance = this.instances.delete(ref);
    return removedFactory || removedInstance;
  }
}
