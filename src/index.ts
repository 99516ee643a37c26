/**
 * dag-workflow-runner - 主入口
 *
 * 依赖有序的任务工作流调度
 * - core: 数据模型、构建、序列化与控制器
 * - scheduler: 依赖校验、就绪选择与执行循环
 * - agents: agent 注册表、执行器与规划器
 */

// 核心模块
export * from './core/index';

// Agent 模块
export * from './agents/index';

// 调度模块
export * from './scheduler/index';

// 配置 schema
export * from './config/schema';

// 工具模块
export * from './utils/index';

// 任务上下文存储
export * from './memory/index';
