import type { Task, Workflow } from '../core/types';

/**
 * 结果是不透明值；BigInt 或循环引用无法序列化时退回 String()
 */
export function formatValue(value: unknown, indent?: number): string {
  if (typeof value === 'string') {
    return value;
  }
  try {
    return JSON.stringify(value, null, indent) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * 构建交给执行器的输入文本
 * metadata.input 为字符串时原样使用；否则由标题、描述、外部上下文和依赖结果组成
 */
export function buildTaskInput(task: Task, workflow: Workflow): string {
  const literal = task.metadata.input;
  if (typeof literal === 'string') {
    return literal;
  }

  const sections: string[] = [`Task: ${task.title}\n\n${task.description}`];

  const context = workflow.metadata.externalContext;
  if (context && Object.keys(context).length > 0) {
    const lines = Object.entries(context).map(([key, value]) => `${key}: ${formatValue(value, 2)}`);
    sections.push(`Context:\n${lines.join('\n')}`);
  }

  if (task.dependencies.length > 0) {
    const results = task.dependencies.map((depId) => {
      const title = workflow.tasks.get(depId)?.title ?? depId;
      return `[${title}]\n${formatValue(workflow.results.get(depId), 2)}`;
    });
    sections.push(`Results from dependencies:\n${results.join('\n\n')}`);
  }

  return sections.join('\n\n');
}
