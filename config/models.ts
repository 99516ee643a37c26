import { config } from './env';

/**
 * LLM 模型配置接口
 */
export interface ModelConfig {
  modelName: string;
  temperature: number;
  maxTokens: number;
}

export type ModelRole = 'planner' | 'worker';

/**
 * 各角色的模型配置
 */
export const modelConfigs: Record<ModelRole, ModelConfig> = {
  /**
   * Planner 模型配置
   * 使用低温度以获得稳定、结构化的计划
   */
  planner: {
    modelName: config.models.planner,
    temperature: 0.1,
    maxTokens: 4000,
  },

  /**
   * Worker 模型配置
   * 执行任务使用中等温度
   */
  worker: {
    modelName: config.models.worker,
    temperature: 0.2,
    maxTokens: 2000,
  },
};

/**
 * 获取指定角色的模型配置
 */
export function getModelConfig(role: ModelRole): ModelConfig {
  return modelConfigs[role];
}
