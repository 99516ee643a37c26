import dotenv from 'dotenv';
import { z } from 'zod';

// 加载环境变量
dotenv.config();

/**
 * 环境变量 Schema
 * 非法取值回退为默认值，并由 validateConfig 报告
 */
const envSchema = z.object({
  OPENAI_API_KEY: z.string().default(''),
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  PLANNER_MODEL: z.string().min(1).default('gpt-4o-mini'),
  WORKER_MODEL: z.string().min(1).default('gpt-4o-mini'),
  MAX_CONCURRENCY: z.coerce.number().int().min(1).default(1),
  TASK_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),
  VALIDATION_MODE: z.enum(['permissive', 'strict']).default('permissive'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

type Env = z.infer<typeof envSchema>;

function loadEnv(source: NodeJS.ProcessEnv): { env: Env; errors: string[] } {
  const result = envSchema.safeParse(source);
  if (result.success) {
    return { env: result.data, errors: [] };
  }

  const invalid = new Set(result.error.issues.map((issue) => String(issue.path[0])));
  const rest = Object.fromEntries(Object.entries(source).filter(([key]) => !invalid.has(key)));
  return {
    env: envSchema.parse(rest),
    errors: result.error.issues.map((issue) => `${String(issue.path[0])}: ${issue.message}`),
  };
}

const { env, errors: envErrors } = loadEnv(process.env);

/**
 * 环境变量配置
 */
export const config = {
  // OpenAI API 配置（llm agent 与 planner 使用）
  openai: {
    apiKey: env.OPENAI_API_KEY,
    baseUrl: env.OPENAI_BASE_URL,
  },

  // 各角色使用的模型
  models: {
    planner: env.PLANNER_MODEL,
    worker: env.WORKER_MODEL,
  },

  // 调度配置
  execution: {
    maxConcurrency: env.MAX_CONCURRENCY,
    taskTimeoutMs: env.TASK_TIMEOUT_MS,
    validationMode: env.VALIDATION_MODE,
  },

  // 日志级别，全局 logger 使用
  logging: {
    level: env.LOG_LEVEL,
  },
} as const;

/**
 * 验证环境变量
 * 调度本身不依赖外部服务，只有 LLM 相关功能需要 API Key
 */
export function validateConfig(options: { requireLlm?: boolean } = {}): {
  valid: boolean;
  errors: string[];
} {
  const errors = [...envErrors];

  if (options.requireLlm && !config.openai.apiKey) {
    errors.push('OPENAI_API_KEY is required');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

export type Config = typeof config;
