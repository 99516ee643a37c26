import { readFile } from 'node:fs/promises';
import chalk from 'chalk';
import { config, validateConfig } from '../../config/env';
import { parseWorkflowDefinition } from '../config/schema';
import { AgentRegistry } from '../agents/AgentRegistry';
import { EchoAgent } from '../agents/EchoAgent';
import { LlmAgent } from '../agents/LlmAgent';
import { RegistryTaskExecutor } from '../agents/RegistryTaskExecutor';
import { WorkflowPlanner } from '../agents/WorkflowPlanner';
import { ValidationError } from '../core/errors';
import { WorkflowBuilder } from '../core/WorkflowBuilder';
import { WorkflowStatus } from '../core/types';
import type { Workflow } from '../core/types';
import { topologicalLayers, validateDependencies } from '../scheduler/DependencyValidator';
import { formatReport } from '../scheduler/ExecutionReport';
import type { StatusEvent } from '../scheduler/types';
import { WorkflowScheduler } from '../scheduler/WorkflowScheduler';
import { createLogger } from '../utils/logger';

const logger = createLogger('CommandHandler');

/**
 * 命令处理结果
 */
export interface CommandResult {
  success: boolean;
  message: string;
  data?: unknown;
}

export interface RunCommandOptions {
  concurrency?: number;
  timeout?: number;
  json?: boolean;
}

/**
 * 命令输出目标，测试中可替换
 */
export type Output = (line: string) => void;

/**
 * 创建内置 agent 注册表：echo 总是可用，配置了 API Key 时加入 llm
 */
export function createDefaultRegistry(options: { withLlm?: boolean } = {}): AgentRegistry {
  const registry = new AgentRegistry();
  registry.registerFactory('echo', () => new EchoAgent(), 'Returns its input unchanged');
  if (options.withLlm ?? Boolean(config.openai.apiKey)) {
    registry.registerFactory('llm', () => new LlmAgent(), 'Completes the task with the worker chat model');
  }
  return registry;
}

/**
 * 命令处理器
 * 处理 CLI 命令并返回结果
 */
export class CommandHandler {
  constructor(
    private registry: AgentRegistry = createDefaultRegistry(),
    private output: Output = (line) => console.log(line)
  ) {}

  /**
   * 读取并构建工作流定义文件
   */
  async loadWorkflow(file: string): Promise<Workflow> {
    const raw = await readFile(file, 'utf-8');
    const definition = parseWorkflowDefinition(JSON.parse(raw));
    return WorkflowBuilder.fromDefinition(definition);
  }

  /**
   * 处理 validate 命令 - 校验依赖图并打印分层
   */
  async handleValidate(file: string): Promise<CommandResult> {
    const workflow = await this.loadWorkflow(file);
    const result = validateDependencies(workflow, { mode: config.execution.validationMode, logger });

    for (const issue of result.issues) {
      this.output(chalk.yellow(`  ! ${issue.kind} dependency ${issue.taskId} -> ${issue.dependencyId}`));
    }

    if (!result.ok) {
      if (result.cyclePath) {
        this.output(chalk.red(`Cycle: ${result.cyclePath.join(' -> ')}`));
      }
      return {
        success: false,
        message: result.error?.message ?? 'Validation failed',
        data: { cyclePath: result.cyclePath, issues: result.issues },
      };
    }

    const layers = topologicalLayers(workflow);
    this.output(chalk.bold(`\n${workflow.title}`));
    layers.forEach((layer, index) => {
      const titles = layer.map((id) => workflow.tasks.get(id)?.title ?? id);
      this.output(`  ${chalk.cyan(`Layer ${index + 1}:`)} ${titles.join(', ')}`);
    });

    return { success: true, message: 'Workflow is valid', data: { layers } };
  }

  /**
   * 处理 run 命令 - 执行工作流并打印报告
   */
  async handleRun(file: string, options: RunCommandOptions = {}): Promise<CommandResult> {
    const workflow = await this.loadWorkflow(file);
    const scheduler = new WorkflowScheduler(new RegistryTaskExecutor(this.registry), {
      maxConcurrency: options.concurrency ?? config.execution.maxConcurrency,
      taskTimeoutMs: options.timeout ?? config.execution.taskTimeoutMs,
      validationMode: config.execution.validationMode,
    });

    const notifier = options.json ? undefined : (event: StatusEvent): void => this.printEvent(event);
    const report = await scheduler.run(workflow, notifier);

    if (options.json) {
      this.output(JSON.stringify(report, null, 2));
    } else {
      this.output('');
      this.output(formatReport(report));
    }

    const success = report.status === WorkflowStatus.COMPLETED;
    return {
      success,
      message: success ? 'Workflow completed' : `Workflow failed: ${report.error ?? report.planningError ?? 'task failure'}`,
      data: report,
    };
  }

  /**
   * 处理 plan 命令 - 用 LLM 生成任务计划
   */
  async handlePlan(query: string): Promise<CommandResult> {
    if (!query.trim()) {
      return { success: false, message: 'Please provide a query. Usage: plan <query>' };
    }

    const validation = validateConfig({ requireLlm: true });
    if (!validation.valid) {
      return { success: false, message: validation.errors.join('; ') };
    }

    const scheduler = new WorkflowScheduler(new RegistryTaskExecutor(this.registry));
    const planner = new WorkflowPlanner({ validator: scheduler, agentRefs: this.registry.listFactories() });

    this.output(chalk.cyan('\nGenerating workflow plan...\n'));
    try {
      const workflow = await planner.plan(query);
      [...workflow.tasks.values()].forEach((task, index) => {
        const deps = task.dependencies.length > 0 ? chalk.gray(` (after ${task.dependencies.join(', ')})`) : '';
        this.output(`  ${index + 1}. ${chalk.bold(task.title)} [${task.executorRef}] ${task.id}${deps}`);
        this.output(chalk.gray(`     ${task.description}`));
      });
      return { success: true, message: `Planned ${workflow.tasks.size} tasks`, data: workflow };
    } catch (error) {
      if (error instanceof ValidationError) {
        return { success: false, message: `Plan is invalid: ${error.message}` };
      }
      throw error;
    }
  }

  /**
   * 处理 config 命令 - 显示配置状态
   */
  handleConfig(): CommandResult {
    const validation = validateConfig();
    this.output(chalk.bold('\nConfiguration'));
    this.output(`  OpenAI API key:   ${config.openai.apiKey ? chalk.green('set') : chalk.yellow('not set')}`);
    this.output(`  OpenAI base URL:  ${config.openai.baseUrl}`);
    this.output(`  Planner model:    ${config.models.planner}`);
    this.output(`  Worker model:     ${config.models.worker}`);
    this.output(`  Max concurrency:  ${config.execution.maxConcurrency}`);
    this.output(`  Task timeout:     ${config.execution.taskTimeoutMs || 'none'}`);
    this.output(`  Validation mode:  ${config.execution.validationMode}`);
    this.output(`  Log level:        ${config.logging.level}`);
    this.output(`  Agents:           ${this.registry.listFactories().join(', ')}`);

    for (const error of validation.errors) {
      this.output(chalk.yellow(`  - ${error}`));
    }
    if (!validation.valid) {
      logger.warn('Configuration validation failed', { errors: validation.errors });
    }
    return { success: validation.valid, message: validation.valid ? 'Configuration OK' : validation.errors.join('; ') };
  }

  private printEvent(event: StatusEvent): void {
    const color = event.type.endsWith('failed')
      ? chalk.red
      : event.type.endsWith('completed')
        ? chalk.green
        : chalk.cyan;
    this.output(color(`[${event.type}] ${event.message}`));
  }
}
