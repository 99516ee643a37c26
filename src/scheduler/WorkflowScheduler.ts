import { parseSchedulerConfig } from '../config/schema';
import type { SchedulerConfig } from '../config/schema';
import { TaskCancelledError, ValidationError, WorkflowStateError, toTaskError } from '../core/errors';
import { TaskStatus, WorkflowStatus, isTerminalWorkflowStatus, transitionTask } from '../core/types';
import type { Task, Workflow } from '../core/types';
import { InMemoryContextStore } from '../memory/ContextStore';
import { EventBus } from '../utils/event-bus';
import { createLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { TaskQueue } from '../utils/task-queue';
import { validateDependencies } from './DependencyValidator';
import type { ValidationResult } from './DependencyValidator';
import { buildReport } from './ExecutionReport';
import type { ExecutionReport } from './ExecutionReport';
import { allCompleted, executable } from './ReadinessSelector';
import { buildTaskInput } from './TaskInput';
import type {
  ContextStore,
  ResourceAllocator,
  RunOptions,
  SchedulerOptions,
  StatusEvent,
  StatusEventType,
  StatusNotifier,
  TaskExecutor,
} from './types';

/**
 * 工作流调度器
 * 校验依赖图，按依赖顺序把就绪任务交给执行器，直到工作流进入终态。
 * 默认 maxConcurrency = 1：一次只执行一个任务，按工作流中的顺序选择。
 */
export class WorkflowScheduler {
  readonly eventBus: EventBus;
  private config: SchedulerConfig;
  private clock: () => Date;
  private logger: Logger;
  private contextStore: ContextStore;
  private resourceManager?: ResourceAllocator;
  /** 正在运行的工作流 → 取消控制器 */
  private controllers = new Map<string, AbortController>();

  constructor(
    private executor: TaskExecutor,
    options: SchedulerOptions = {}
  ) {
    const { clock, logger, eventBus, contextStore, resourceManager, ...config } = options;
    this.config = parseSchedulerConfig(config);
    this.clock = clock ?? (() => new Date());
    this.logger = logger ?? createLogger('WorkflowScheduler');
    this.eventBus = eventBus ?? new EventBus({ logger: this.logger });
    this.contextStore = contextStore ?? new InMemoryContextStore();
    this.resourceManager = resourceManager;

    this.logger.debug('WorkflowScheduler initialized', { ...this.config });
  }

  getConfig(): SchedulerConfig {
    return { ...this.config };
  }

  /**
   * 校验依赖图并进入 READY
   * 失败时工作流进入 FAILED，记录 planningError（和 cyclePath）后抛出 ValidationError
   */
  validateAndPrepare(workflow: Workflow): ValidationResult {
    if (workflow.status !== WorkflowStatus.PLANNING && workflow.status !== WorkflowStatus.READY) {
      throw new WorkflowStateError(`Cannot validate workflow ${workflow.id} in status ${workflow.status}`, {
        workflowId: workflow.id,
        status: workflow.status,
      });
    }

    const result = validateDependencies(workflow, { mode: this.config.validationMode, logger: this.logger });
    if (!result.ok) {
      const error =
        result.error ?? new ValidationError(`Workflow ${workflow.id} failed validation`, 'CYCLE_DETECTED');
      workflow.status = WorkflowStatus.FAILED;
      workflow.completedAt = this.now();
      workflow.metadata.planningError = error.message;
      if (result.cyclePath) {
        workflow.metadata.cyclePath = result.cyclePath;
      }
      throw error;
    }

    workflow.status = WorkflowStatus.READY;
    this.logger.info(`Workflow ${workflow.id} ready with ${workflow.tasks.size} tasks`);
    return result;
  }

  /**
   * 执行工作流直到终态
   * PLANNING 状态的工作流会先被校验，校验失败返回 FAILED 报告而不是抛出
   */
  async run(workflow: Workflow, notifier?: StatusNotifier, options: RunOptions = {}): Promise<ExecutionReport> {
    if (workflow.status === WorkflowStatus.RUNNING || isTerminalWorkflowStatus(workflow.status)) {
      throw new WorkflowStateError(`Cannot run workflow ${workflow.id} in status ${workflow.status}`, {
        workflowId: workflow.id,
        status: workflow.status,
      });
    }

    if (workflow.status === WorkflowStatus.PLANNING) {
      try {
        this.validateAndPrepare(workflow);
      } catch (error) {
        if (!(error instanceof ValidationError)) {
          throw error;
        }
        await this.notifyWorkflow(workflow, 'workflow_failed', `Validation failed: ${error.message}`, notifier);
        return buildReport(workflow);
      }
    }

    const controller = new AbortController();
    const external = options.signal;
    const onExternalAbort = (): void => controller.abort();
    if (external?.aborted) {
      controller.abort();
    } else {
      external?.addEventListener('abort', onExternalAbort, { once: true });
    }
    this.controllers.set(workflow.id, controller);

    try {
      if (this.resourceManager) {
        const allocation = await this.resourceManager.allocate(
          workflow.id,
          workflow.metadata.resourceRequirements
        );
        if (!allocation.success) {
          this.logger.error(`Resource allocation failed for workflow ${workflow.id}`, {
            reason: allocation.message,
          });
          workflow.status = WorkflowStatus.FAILED;
          workflow.completedAt = this.now();
          workflow.metadata.error = 'Failed to allocate resources';
          await this.notifyWorkflow(workflow, 'workflow_failed', 'Failed to allocate resources', notifier);
          return buildReport(workflow);
        }
      }

      workflow.status = WorkflowStatus.RUNNING;
      workflow.startedAt = this.now();
      this.logger.info(`Running workflow ${workflow.id}: ${workflow.title}`);
      await this.notifyWorkflow(workflow, 'workflow_started', `Workflow '${workflow.title}' started`, notifier);

      await this.executeLoop(workflow, controller.signal, notifier);
      return buildReport(workflow);
    } finally {
      external?.removeEventListener('abort', onExternalAbort);
      this.controllers.delete(workflow.id);
      this.resourceManager?.release(workflow.id);
    }
  }

  /**
   * 取消正在运行的工作流
   * @returns 工作流是否正在运行
   */
  cancel(workflowId: string): boolean {
    const controller = this.controllers.get(workflowId);
    if (!controller) {
      return false;
    }
    this.logger.warn(`Cancelling workflow ${workflowId}`);
    controller.abort();
    return true;
  }

  isRunning(workflowId: string): boolean {
    return this.controllers.has(workflowId);
  }

  snapshotReport(workflow: Workflow): ExecutionReport {
    return buildReport(workflow);
  }

  /**
   * 主循环
   */
  private async executeLoop(workflow: Workflow, signal: AbortSignal, notifier?: StatusNotifier): Promise<void> {
    const queue = new TaskQueue({
      maxConcurrent: this.config.maxConcurrency,
      defaultTimeout: this.config.taskTimeoutMs,
    });
    const inFlight = new Map<string, Promise<void>>();
    const aborted = new Promise<void>((resolve) => {
      if (signal.aborted) {
        resolve();
      } else {
        signal.addEventListener('abort', () => resolve(), { once: true });
      }
    });

    for (;;) {
      // 1. 取消检查
      if (signal.aborted) {
        await this.finishCancelled(workflow, inFlight, notifier);
        return;
      }

      // 2. 就绪任务
      const ready = executable(workflow);

      if (ready.length === 0) {
        // 3. 没有就绪任务：完成、死锁或等待
        if (allCompleted(workflow)) {
          workflow.status = WorkflowStatus.COMPLETED;
          workflow.completedAt = this.now();
          this.logger.success(`Workflow ${workflow.id} completed`);
          await this.notifyWorkflow(workflow, 'workflow_completed', `Workflow '${workflow.title}' completed`, notifier);
          return;
        }
        if (inFlight.size === 0) {
          const blocked = [...workflow.tasks.values()]
            .filter((task) => task.status === TaskStatus.PENDING)
            .map((task) => task.id);
          workflow.status = WorkflowStatus.FAILED;
          workflow.completedAt = this.now();
          workflow.metadata.error = 'deadlocked';
          workflow.metadata.blockedTasks = blocked;
          this.logger.error(`Workflow ${workflow.id} deadlocked`, { blockedTasks: blocked });
          await this.notifyWorkflow(
            workflow,
            'workflow_failed',
            `Workflow deadlocked with ${blocked.length} blocked tasks`,
            notifier
          );
          return;
        }
      } else {
        // 4. 按顺序派发，不超过并发上限
        const slots = this.config.maxConcurrency - inFlight.size;
        for (const task of ready.slice(0, Math.max(0, slots))) {
          const settled = this.dispatch(task, workflow, queue, signal, notifier).finally(() => {
            inFlight.delete(task.id);
          });
          inFlight.set(task.id, settled);
        }
      }

      // 等待任一任务结束或取消
      await Promise.race([...inFlight.values(), aborted]);
    }
  }

  /**
   * 执行单个任务；任务失败被记录到模型中，不会抛出
   */
  private async dispatch(
    task: Task,
    workflow: Workflow,
    queue: TaskQueue,
    signal: AbortSignal,
    notifier?: StatusNotifier
  ): Promise<void> {
    // 同步进入 RUNNING，主循环下一次选择时不会重复派发
    transitionTask(task, TaskStatus.RUNNING, this.now());
    this.logger.info(`Task started: ${task.title}`, { taskId: task.id, executorRef: task.executorRef });
    await this.notifyTask(workflow, task, 'task_started', `Task '${task.title}' started`, notifier);

    try {
      const input = buildTaskInput(task, workflow);
      const context = this.contextStore.createContext(workflow.id, task.id);
      const result = await queue.add(
        (taskSignal) => this.executor.execute(task.id, task.executorRef, input, context, { signal: taskSignal }),
        { id: task.id, timeout: this.resolveTimeout(task), signal }
      );
      if (task.status !== TaskStatus.RUNNING) {
        return;
      }
      task.result = result;
      workflow.results.set(task.id, result);
      transitionTask(task, TaskStatus.COMPLETED, this.now());
      this.logger.success(`Task completed: ${task.title}`, { taskId: task.id });
      await this.notifyTask(workflow, task, 'task_completed', `Task '${task.title}' completed`, notifier);
    } catch (error) {
      if (task.status !== TaskStatus.RUNNING) {
        return;
      }
      this.failTask(task, error);
      await this.notifyTask(workflow, task, 'task_failed', `Task '${task.title}' failed: ${task.error?.message ?? ''}`, notifier);
    }
  }

  private failTask(task: Task, error: unknown): void {
    const taskError = toTaskError(error);
    task.error = taskError;
    task.metadata.errorCode = taskError.code;
    transitionTask(task, TaskStatus.FAILED, this.now());
    this.logger.error(`Task failed: ${task.title}`, { taskId: task.id, code: taskError.code, error: taskError.message });
  }

  /**
   * 取消后的收尾：等待在途任务以 TaskCancelledError 结束，然后工作流进入 FAILED
   */
  private async finishCancelled(
    workflow: Workflow,
    inFlight: Map<string, Promise<void>>,
    notifier?: StatusNotifier
  ): Promise<void> {
    await Promise.allSettled([...inFlight.values()]);

    for (const task of workflow.tasks.values()) {
      if (task.status === TaskStatus.RUNNING) {
        this.failTask(task, new TaskCancelledError(task.id));
      }
    }

    workflow.status = WorkflowStatus.FAILED;
    workflow.completedAt = this.now();
    workflow.metadata.error = 'cancelled';
    this.logger.warn(`Workflow ${workflow.id} cancelled`);
    await this.notifyWorkflow(workflow, 'workflow_failed', 'Workflow cancelled', notifier);
  }

  private resolveTimeout(task: Task): number {
    const override = task.metadata.timeoutMs;
    if (typeof override === 'number' && Number.isInteger(override) && override >= 0) {
      return override;
    }
    return this.config.taskTimeoutMs;
  }

  private now(): Date {
    return this.clock();
  }

  private notifyTask(
    workflow: Workflow,
    task: Task,
    type: StatusEventType,
    message: string,
    notifier?: StatusNotifier
  ): Promise<void> {
    return this.notify(
      {
        type,
        workflowId: workflow.id,
        taskId: task.id,
        status: task.status,
        message,
        timestamp: this.now(),
        error: task.error ? { ...task.error } : undefined,
      },
      notifier
    );
  }

  private notifyWorkflow(
    workflow: Workflow,
    type: StatusEventType,
    message: string,
    notifier?: StatusNotifier
  ): Promise<void> {
    return this.notify(
      { type, workflowId: workflow.id, status: workflow.status, message, timestamp: this.now() },
      notifier
    );
  }

  /**
   * 通知失败只记录日志，不影响调度
   */
  private async notify(event: StatusEvent, notifier?: StatusNotifier): Promise<void> {
    this.eventBus.emit(event);
    if (!notifier) {
      return;
    }
    try {
      await notifier(event);
    } catch (error) {
      this.logger.logError(error, `Status notifier failed on ${event.type}`);
    }
  }
}
