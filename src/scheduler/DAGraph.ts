import { ValidationError } from '../core/errors';
import type { DAGNode, GraphEdge } from './types';

/**
 * 有向图
 * 边 from → to 表示 from 依赖于 to。节点和每个节点的依赖都保持插入顺序，
 * 因此循环检测和分层结果是确定的。
 */
export class DAGraph<T> {
  /** 节点映射表 */
  private nodes: Map<string, DAGNode<T>> = new Map();
  /** 依赖表（出边） */
  private dependencyList: Map<string, string[]> = new Map();

  /**
   * 从节点列表构建，指向未知节点的依赖被忽略
   */
  static fromNodes<T>(nodes: DAGNode<T>[]): DAGraph<T> {
    const graph = new DAGraph<T>();
    for (const node of nodes) {
      graph.addNode(node);
    }
    for (const node of nodes) {
      for (const depId of node.dependencies) {
        if (graph.nodes.has(depId)) {
          graph.addEdge(node.id, depId);
        }
      }
    }
    return graph;
  }

  /**
   * 添加节点
   */
  addNode(node: DAGNode<T>): void {
    if (this.nodes.has(node.id)) {
      throw new Error(`Node with id ${node.id} already exists`);
    }
    this.nodes.set(node.id, node);
    this.dependencyList.set(node.id, []);
  }

  /**
   * 添加边（from 依赖于 to），重复的边被忽略
   */
  addEdge(from: string, to: string): void {
    if (!this.nodes.has(from)) {
      throw new Error(`Source node ${from} does not exist`);
    }
    if (!this.nodes.has(to)) {
      throw new Error(`Target node ${to} does not exist`);
    }

    const deps = this.dependencyList.get(from) ?? [];
    if (!deps.includes(to)) {
      deps.push(to);
      this.dependencyList.set(from, deps);
    }
  }

  getNode(id: string): DAGNode<T> | undefined {
    return this.nodes.get(id);
  }

  getNodeCount(): number {
    return this.nodes.size;
  }

  getAllEdges(): GraphEdge[] {
    const edges: GraphEdge[] = [];
    for (const [from, deps] of this.dependencyList) {
      for (const to of deps) {
        edges.push({ from, to });
      }
    }
    return edges;
  }

  /**
   * 查找第一个循环（DFS）
   * @returns 从重复访问的节点开始并回到它自身的路径，例如 ['A', 'B', 'A']；无循环时为 undefined
   */
  findCyclePath(): string[] | undefined {
    const processed = new Set<string>();
    const onStack = new Set<string>();
    const path: string[] = [];

    const dfs = (nodeId: string): string[] | undefined => {
      onStack.add(nodeId);
      path.push(nodeId);

      for (const depId of this.dependencyList.get(nodeId) ?? []) {
        if (onStack.has(depId)) {
          // 找到循环，截取从 depId 开始的路径
          return [...path.slice(path.indexOf(depId)), depId];
        }
        if (!processed.has(depId)) {
          const cycle = dfs(depId);
          if (cycle) {
            return cycle;
          }
        }
      }

      path.pop();
      onStack.delete(nodeId);
      processed.add(nodeId);
      return undefined;
    };

    for (const nodeId of this.nodes.keys()) {
      if (!processed.has(nodeId)) {
        const cycle = dfs(nodeId);
        if (cycle) {
          return cycle;
        }
      }
    }
    return undefined;
  }

  hasCycle(): boolean {
    return this.findCyclePath() !== undefined;
  }

  /**
   * Kahn 算法分层
   * @returns 每层节点的依赖都在前面的层中，层内按插入顺序排列
   */
  topologicalSort(): string[][] {
    const cyclePath = this.findCyclePath();
    if (cyclePath) {
      throw new ValidationError(`Cycle detected: ${cyclePath.join(' -> ')}`, 'CYCLE_DETECTED', {
        cyclePath,
      });
    }

    // 剩余未满足的依赖数
    const remaining = new Map<string, number>();
    const dependents = new Map<string, string[]>();
    for (const [id, deps] of this.dependencyList) {
      remaining.set(id, deps.length);
      for (const depId of deps) {
        const list = dependents.get(depId) ?? [];
        list.push(id);
        dependents.set(depId, list);
      }
    }

    const layers: string[][] = [];
    while (remaining.size > 0) {
      const layer = [...remaining].filter(([, count]) => count === 0).map(([id]) => id);

      for (const id of layer) {
        remaining.delete(id);
        for (const dependent of dependents.get(id) ?? []) {
          const count = remaining.get(dependent);
          if (count !== undefined) {
            remaining.set(dependent, count - 1);
          }
        }
      }
      layers.push(layer);
    }

    return layers;
  }
}
