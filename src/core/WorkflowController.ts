import type { ContextProvider, WorkflowPlanner } from '../agents/WorkflowPlanner';
import type { ExecutionReport } from '../scheduler/ExecutionReport';
import type { StatusNotifier } from '../scheduler/types';
import type { WorkflowScheduler } from '../scheduler/WorkflowScheduler';
import { createLogger } from '../utils/logger';
import { WorkflowStateError } from './errors';
import type { Workflow, WorkflowStatus } from './types';

const logger = createLogger('WorkflowController');

/**
 * 工作流列表中的摘要
 */
export interface WorkflowSummary {
  id: string;
  title: string;
  status: WorkflowStatus;
  createdAt: Date;
  query: string;
}

/**
 * 工作流控制器
 * 持有进程内的工作流注册表，串联规划与调度
 */
export class WorkflowController {
  private workflows: Map<string, Workflow> = new Map();

  constructor(
    private scheduler: WorkflowScheduler,
    private planner?: WorkflowPlanner
  ) {}

  /**
   * 根据请求规划新工作流
   * 工作流在规划前就被登记，规划失败时仍可以查询到 FAILED 状态和 planningError
   */
  async createWorkflow(query: string, contextProvider?: ContextProvider): Promise<string> {
    if (!this.planner) {
      throw new WorkflowStateError('No planner configured for this controller');
    }
    logger.info(`Creating workflow for query: '${query}'`);

    const externalContext = contextProvider ? await contextProvider.getContext() : undefined;
    const workflow = this.planner.createWorkflow(query, externalContext);
    this.workflows.set(workflow.id, workflow);

    await this.planner.planWorkflow(workflow);
    logger.info(`Workflow ${workflow.id} created with status: ${workflow.status}`);
    return workflow.id;
  }

  /**
   * 登记一个已构建的工作流
   */
  addWorkflow(workflow: Workflow): string {
    if (this.workflows.has(workflow.id)) {
      throw new WorkflowStateError(`Workflow ${workflow.id} already registered`, { workflowId: workflow.id });
    }
    this.workflows.set(workflow.id, workflow);
    return workflow.id;
  }

  getWorkflow(workflowId: string): Workflow | undefined {
    return this.workflows.get(workflowId);
  }

  listWorkflows(): WorkflowSummary[] {
    return [...this.workflows.values()].map((workflow) => ({
      id: workflow.id,
      title: workflow.title,
      status: workflow.status,
      createdAt: workflow.createdAt,
      query: workflow.query,
    }));
  }

  /**
   * 执行已登记的工作流；未知 ID 返回 undefined
   */
  async executeWorkflow(workflowId: string, notifier?: StatusNotifier): Promise<ExecutionReport | undefined> {
    const workflow = this.workflows.get(workflowId);
    if (!workflow) {
      logger.warn(`Workflow ${workflowId} not found`);
      return undefined;
    }

    logger.info(`Executing workflow ${workflowId}`);
    return this.scheduler.run(workflow, notifier);
  }

  cancelWorkflow(workflowId: string): boolean {
    return this.scheduler.cancel(workflowId);
  }
}
