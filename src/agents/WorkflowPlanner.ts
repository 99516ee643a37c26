import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import { planSchema } from '../config/schema';
import type { Plan } from '../config/schema';
import { PlanParseError } from '../core/errors';
import { contentToText, createChatModel } from '../core/model/ChatModel';
import type { ChatModel } from '../core/model/ChatModel';
import { WorkflowBuilder, workflowTitleFor } from '../core/WorkflowBuilder';
import { WorkflowStatus } from '../core/types';
import type { Workflow } from '../core/types';
import { formatValue } from '../scheduler/TaskInput';
import { createLogger } from '../utils/logger';

const logger = createLogger('WorkflowPlanner');

/**
 * 外部上下文来源
 */
export interface ContextProvider {
  getContext(): Promise<Record<string, unknown>> | Record<string, unknown>;
}

/**
 * 计划生成后的校验步骤，通常是 WorkflowScheduler.validateAndPrepare
 */
export interface PlanValidator {
  validateAndPrepare(workflow: Workflow): unknown;
}

export interface WorkflowPlannerOptions {
  /** 默认使用 planner 角色的 ChatOpenAI */
  model?: ChatModel;
  validator?: PlanValidator;
  /** 计划中可用的 executorRef */
  agentRefs?: string[];
}

function buildSystemPrompt(agentRefs: string[]): string {
  const agents = agentRefs.length > 0 ? agentRefs.map((ref) => `- ${ref}`).join('\n') : '- llm';
  return `You are a workflow planner. Break the user's request into a small set of tasks.

Available agents (use one of them as executorRef):
${agents}

Respond with JSON only, in this shape:
{"tasks": [{"title": "...", "description": "...", "executorRef": "...", "dependencies": [0]}]}

"dependencies" lists the zero-based indices of tasks that must finish first.
Tasks must not depend on themselves or form cycles.`;
}

/**
 * 从模型输出中解析计划
 * 允许输出被 markdown 代码块包裹
 */
export function parsePlan(raw: string): Plan {
  const cleaned = raw.replace(/^```(?:json)?\s*\n?/m, '').replace(/\n?```\s*$/m, '').trim();

  let data: unknown;
  try {
    data = JSON.parse(cleaned);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PlanParseError(`Invalid JSON result: ${reason}`, { rawResult: raw });
  }

  const parsed = planSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new PlanParseError(`Plan does not match schema: ${issues}`, { rawResult: raw });
  }
  return parsed.data;
}

/**
 * 工作流规划器
 * 让聊天模型把请求拆成任务，再把计划应用到工作流上并校验
 */
export class WorkflowPlanner {
  private model: ChatModel;
  private validator?: PlanValidator;
  private agentRefs: string[];

  constructor(options: WorkflowPlannerOptions = {}) {
    this.model = options.model ?? createChatModel('planner');
    this.validator = options.validator;
    this.agentRefs = options.agentRefs ?? [];
  }

  /**
   * 为请求创建 PLANNING 状态的空工作流
   */
  createWorkflow(query: string, externalContext?: Record<string, unknown>): Workflow {
    const builder = new WorkflowBuilder()
      .withTitle(workflowTitleFor(query))
      .withDescription(`Generated workflow for query: ${query}`)
      .withQuery(query);
    if (externalContext && Object.keys(externalContext).length > 0) {
      builder.withExternalContext(externalContext);
    }
    return builder.build();
  }

  /**
   * 规划请求并返回工作流
   */
  async plan(query: string, externalContext?: Record<string, unknown>): Promise<Workflow> {
    const workflow = this.createWorkflow(query, externalContext);
    await this.planWorkflow(workflow);
    return workflow;
  }

  /**
   * 为已有的 PLANNING 工作流生成任务
   * 失败时工作流进入 FAILED 并记录 planningError，错误继续抛出
   */
  async planWorkflow(workflow: Workflow): Promise<Workflow> {
    logger.info(`Planning workflow ${workflow.id}`);

    try {
      const response = await this.model.invoke([
        new SystemMessage(buildSystemPrompt(this.agentRefs)),
        new HumanMessage(this.buildQuery(workflow)),
      ]);
      const plan = parsePlan(contentToText(response.content));
      logger.info(`Retrieved ${plan.tasks.length} tasks from planner`);

      WorkflowBuilder.applyPlan(workflow, plan);
      this.validator?.validateAndPrepare(workflow);
      return workflow;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Workflow planning failed: ${message}`, { workflowId: workflow.id });
      workflow.status = WorkflowStatus.FAILED;
      workflow.completedAt = workflow.completedAt ?? new Date();
      workflow.metadata.planningError = workflow.metadata.planningError ?? message;
      if (error instanceof PlanParseError && typeof error.details?.rawResult === 'string') {
        workflow.metadata.rawResult = error.details.rawResult;
      }
      throw error;
    }
  }

  /**
   * 请求文本，外部上下文以 User Context 段追加
   */
  private buildQuery(workflow: Workflow): string {
    const context = workflow.metadata.externalContext;
    if (!context || Object.keys(context).length === 0) {
      return workflow.query;
    }
    const lines = Object.entries(context).map(([key, value]) => `${key}: ${formatValue(value)}`);
    return `${workflow.query}\n\nUser Context:\n${lines.join('\n')}`;
  }
}
