import type { ResourceAllocation, ResourceAllocator } from '../scheduler/types';
import { createLogger } from '../utils/logger';

const logger = createLogger('ResourceManager');

/**
 * 资源状态
 */
export enum ResourceStatus {
  AVAILABLE = 'available',
  EXHAUSTED = 'exhausted',
}

/**
 * 资源池
 */
export interface ResourcePool {
  id: string;
  status: ResourceStatus;
  capacity: number;
  used: number;
}

/**
 * 默认资源池容量
 */
export const DEFAULT_POOLS: Record<string, number> = {
  llm_pool: 10,
  memory_pool: 100,
  tool_pool: 20,
};

/**
 * 资源管理器
 * 在工作流开始前按需求分配各资源池的单位，结束时全部归还
 */
export class ResourceManager implements ResourceAllocator {
  private pools: Map<string, ResourcePool> = new Map();
  /** ownerId → 资源池 → 单位数 */
  private allocations: Map<string, Record<string, number>> = new Map();

  constructor(pools: Record<string, number> = DEFAULT_POOLS) {
    for (const [id, capacity] of Object.entries(pools)) {
      this.addPool(id, capacity);
    }
    logger.debug('Resource pools initialized', { pools: Object.keys(pools) });
  }

  /**
   * 添加资源池
   */
  addPool(id: string, capacity: number): void {
    this.pools.set(id, {
      id,
      status: capacity > 0 ? ResourceStatus.AVAILABLE : ResourceStatus.EXHAUSTED,
      capacity,
      used: 0,
    });
  }

  getPool(id: string): ResourcePool | undefined {
    const pool = this.pools.get(id);
    return pool ? { ...pool } : undefined;
  }

  /**
   * 分配资源，要么全部成功，要么不占用任何资源
   * 未给出需求时每个资源池分配 1 个单位
   */
  async allocate(ownerId: string, requirements?: Record<string, number>): Promise<ResourceAllocation> {
    logger.info(`Allocating resources for ${ownerId}`);

    if (this.allocations.has(ownerId)) {
      return { success: false, allocated: {}, message: `Resources already allocated for ${ownerId}` };
    }

    const wanted: Record<string, number> =
      requirements ?? Object.fromEntries([...this.pools.keys()].map((id) => [id, 1]));

    for (const [poolId, units] of Object.entries(wanted)) {
      const pool = this.pools.get(poolId);
      if (!pool) {
        return { success: false, allocated: {}, message: `Unknown resource pool: ${poolId}` };
      }
      if (!Number.isFinite(units) || units < 0) {
        return { success: false, allocated: {}, message: `Invalid ${poolId} requirement: ${units}` };
      }
      if (pool.capacity - pool.used < units) {
        return { success: false, allocated: {}, message: `Insufficient ${poolId} resources` };
      }
    }

    for (const [poolId, units] of Object.entries(wanted)) {
      const pool = this.pools.get(poolId);
      if (pool) {
        pool.used += units;
        if (pool.used >= pool.capacity) {
          pool.status = ResourceStatus.EXHAUSTED;
        }
      }
    }
    this.allocations.set(ownerId, { ...wanted });
    logger.debug(`Resources allocated for ${ownerId}`, { allocated: wanted });

    return { success: true, allocated: { ...wanted } };
  }

  /**
   * 释放占用的资源
   */
  release(ownerId: string): void {
    const allocated = this.allocations.get(ownerId);
    if (!allocated) {
      return;
    }

    for (const [poolId, units] of Object.entries(allocated)) {
      const pool = this.pools.get(poolId);
      if (pool) {
        pool.used = Math.max(0, pool.used - units);
        if (pool.used < pool.capacity) {
          pool.status = ResourceStatus.AVAILABLE;
        }
      }
    }

    this.allocations.delete(ownerId);
    logger.debug(`Resources released for ${ownerId}`);
  }

  /**
   * 获取资源使用情况
   */
  getUsageStats(): Record<string, { capacity: number; used: number; available: number }> {
    const stats: Record<string, { capacity: number; used: number; available: number }> = {};
    for (const [id, pool] of this.pools) {
      stats[id] = {
        capacity: pool.capacity,
        used: pool.used,
        available: pool.capacity - pool.used,
      };
    }
    return stats;
  }

  isResourceAvailable(poolId: string, required: number = 1): boolean {
    const pool = this.pools.get(poolId);
    if (!pool) {
      return false;
    }
    return pool.capacity - pool.used >= required;
  }

  /**
   * 重置所有资源
   */
  reset(): void {
    for (const pool of this.pools.values()) {
      pool.used = 0;
      pool.status = pool.capacity > 0 ? ResourceStatus.AVAILABLE : ResourceStatus.EXHAUSTED;
    }
    this.allocations.clear();
  }
}
