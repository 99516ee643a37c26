import { v4 as uuidv4 } from 'uuid';
import { taskSpecSchema, workflowDefinitionSchema } from '../config/schema';
import type { Plan, TaskSpec, TaskSpecInput, WorkflowDefinitionInput } from '../config/schema';
import { addTask, createTask, createWorkflow } from './types';
import type { Workflow, WorkflowMetadata } from './types';
import { createLogger } from '../utils/logger';

const logger = createLogger('WorkflowBuilder');

const TITLE_QUERY_LENGTH = 50;

/**
 * 由请求生成的工作流标题
 */
export function workflowTitleFor(query: string): string {
  const suffix = query.length > TITLE_QUERY_LENGTH ? '...' : '';
  return `Workflow for: ${query.slice(0, TITLE_QUERY_LENGTH)}${suffix}`;
}

/**
 * 把下标形式的依赖解析为任务 ID
 */
function resolveDependencies(spec: TaskSpec, ids: string[]): string[] {
  const resolved: string[] = [];
  for (const dependency of spec.dependencies) {
    if (typeof dependency === 'string') {
      resolved.push(dependency);
      continue;
    }
    if (dependency >= 0 && dependency < ids.length) {
      resolved.push(ids[dependency]);
    } else {
      logger.warn(`Dropping out-of-range dependency index ${dependency} of task '${spec.title}'`);
    }
  }
  return resolved;
}

/**
 * 把任务声明追加到 PLANNING 状态的工作流中
 * 下标相对于这一批声明
 */
function appendTasks(workflow: Workflow, inputs: TaskSpecInput[]): void {
  const specs: TaskSpec[] = inputs.map((spec) => taskSpecSchema.parse(spec));
  const ids = specs.map((spec) => spec.id ?? uuidv4());

  specs.forEach((spec, index) => {
    addTask(
      workflow,
      createTask({
        id: ids[index],
        title: spec.title,
        description: spec.description,
        executorRef: spec.executorRef,
        dependencies: resolveDependencies(spec, ids),
        metadata: spec.metadata,
      })
    );
  });
}

/**
 * 工作流建造者
 * 负责把任务声明组装成 PLANNING 状态的工作流。
 * 依赖既可以是任务列表中的整数下标，也可以是任务 ID；
 * 下标只在这里被解析一次，进入数据模型的永远是 ID。
 */
export class WorkflowBuilder {
  private id?: string;
  private title = 'Untitled workflow';
  private description = '';
  private query = '';
  private metadata: WorkflowMetadata = {};
  private specs: TaskSpecInput[] = [];

  /**
   * 从 planner 返回的计划构建工作流
   */
  static fromPlan(plan: Plan, query: string): Workflow {
    return new WorkflowBuilder()
      .withTitle(workflowTitleFor(query))
      .withDescription(`Generated workflow for query: ${query}`)
      .withQuery(query)
      .addTasks(plan.tasks)
      .build();
  }

  /**
   * 把计划中的任务加入已有的 PLANNING 工作流
   */
  static applyPlan(workflow: Workflow, plan: Plan): Workflow {
    appendTasks(workflow, plan.tasks);
    logger.info(`Applied plan with ${plan.tasks.length} tasks to workflow ${workflow.id}`);
    return workflow;
  }

  /**
   * 从工作流定义文件构建
   */
  static fromDefinition(input: WorkflowDefinitionInput): Workflow {
    const definition = workflowDefinitionSchema.parse(input);
    const builder = new WorkflowBuilder()
      .withTitle(definition.title)
      .withDescription(definition.description)
      .withQuery(definition.query)
      .withMetadata(definition.metadata)
      .addTasks(definition.tasks);

    if (definition.id) {
      builder.withId(definition.id);
    }
    return builder.build();
  }

  withId(id: string): WorkflowBuilder {
    this.id = id;
    return this;
  }

  withTitle(title: string): WorkflowBuilder {
    this.title = title;
    return this;
  }

  withDescription(description: string): WorkflowBuilder {
    this.description = description;
    return this;
  }

  withQuery(query: string): WorkflowBuilder {
    this.query = query;
    return this;
  }

  /**
   * 合并元数据
   */
  withMetadata(metadata: WorkflowMetadata): WorkflowBuilder {
    this.metadata = { ...this.metadata, ...metadata };
    return this;
  }

  /**
   * 设置合并到任务输入中的外部上下文
   */
  withExternalContext(context: Record<string, unknown>): WorkflowBuilder {
    this.metadata = { ...this.metadata, externalContext: { ...context } };
    return this;
  }

  addTask(spec: TaskSpecInput): WorkflowBuilder {
    this.specs.push(spec);
    return this;
  }

  addTasks(specs: TaskSpecInput[]): WorkflowBuilder {
    for (const spec of specs) {
      this.addTask(spec);
    }
    return this;
  }

  /**
   * 验证任务声明是否完整
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const seen = new Set<string>();

    this.specs.forEach((input, index) => {
      const parsed = taskSpecSchema.safeParse(input);
      if (!parsed.success) {
        errors.push(`Task #${index} is invalid: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
        return;
      }
      if (parsed.data.id) {
        if (seen.has(parsed.data.id)) {
          errors.push(`Duplicate task id '${parsed.data.id}'`);
        }
        seen.add(parsed.data.id);
      }
    });

    return {
      valid: errors.length === 0,
      errors,
    };
  }

  /**
   * 构建工作流
   */
  build(): Workflow {
    const workflow = createWorkflow({
      id: this.id,
      title: this.title,
      description: this.description,
      query: this.query,
      metadata: this.metadata,
    });
    appendTasks(workflow, this.specs);

    logger.info(`Built workflow ${workflow.id} with ${workflow.tasks.size} tasks`);
    return workflow;
  }

  /**
   * 重置建造者状态
   */
  reset(): WorkflowBuilder {
    this.id = undefined;
    this.title = 'Untitled workflow';
    this.description = '';
    this.query = '';
    this.metadata = {};
    this.specs = [];
    return this;
  }
}

/**
 * 创建 WorkflowBuilder 的便捷函数
 */
export function createWorkflowBuilder(): WorkflowBuilder {
  return new WorkflowBuilder();
}
