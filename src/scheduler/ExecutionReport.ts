import chalk from 'chalk';
import { TaskStatus } from '../core/types';
import type { TaskError, Workflow, WorkflowStatus } from '../core/types';
import { formatValue } from './TaskInput';

/**
 * 单个任务在报告中的视图
 */
export interface TaskReport {
  title: string;
  agentRef: string;
  status: TaskStatus;
  result?: unknown;
  error?: TaskError;
  startedAt?: Date;
  completedAt?: Date;
}

export interface ReportSummary {
  total: number;
  pending: number;
  running: number;
  completed: number;
  failed: number;
}

/**
 * 执行报告，工作流某一时刻的快照
 */
export interface ExecutionReport {
  workflowId: string;
  title: string;
  status: WorkflowStatus;
  query: string;
  startedAt?: Date;
  completedAt?: Date;
  error?: string;
  planningError?: string;
  cyclePath?: string[];
  blockedTasks?: string[];
  tasks: Record<string, TaskReport>;
  summary: ReportSummary;
}

function copyDate(date: Date | undefined): Date | undefined {
  return date ? new Date(date.getTime()) : undefined;
}

function copyResult(value: unknown): unknown {
  if (value === undefined) {
    return undefined;
  }
  try {
    return structuredClone(value);
  } catch {
    // 不可克隆的值（如函数）按引用返回
    return value;
  }
}

const SUMMARY_KEYS: Record<TaskStatus, Exclude<keyof ReportSummary, 'total'>> = {
  [TaskStatus.PENDING]: 'pending',
  [TaskStatus.RUNNING]: 'running',
  [TaskStatus.COMPLETED]: 'completed',
  [TaskStatus.FAILED]: 'failed',
};

/**
 * 从工作流生成报告，不共享任何可变结构
 */
export function buildReport(workflow: Workflow): ExecutionReport {
  const tasks: Record<string, TaskReport> = {};
  const summary: ReportSummary = { total: 0, pending: 0, running: 0, completed: 0, failed: 0 };

  for (const task of workflow.tasks.values()) {
    tasks[task.id] = {
      title: task.title,
      agentRef: task.executorRef,
      status: task.status,
      result: copyResult(task.result),
      error: task.error ? { ...task.error } : undefined,
      startedAt: copyDate(task.startedAt),
      completedAt: copyDate(task.completedAt),
    };
    summary.total++;
    summary[SUMMARY_KEYS[task.status]]++;
  }

  const { error, planningError, cyclePath, blockedTasks } = workflow.metadata;
  return {
    workflowId: workflow.id,
    title: workflow.title,
    status: workflow.status,
    query: workflow.query,
    startedAt: copyDate(workflow.startedAt),
    completedAt: copyDate(workflow.completedAt),
    error,
    planningError,
    cyclePath: cyclePath ? [...cyclePath] : undefined,
    blockedTasks: blockedTasks ? [...blockedTasks] : undefined,
    tasks,
    summary,
  };
}

const STATUS_COLORS: Record<TaskStatus, (text: string) => string> = {
  [TaskStatus.PENDING]: chalk.gray,
  [TaskStatus.RUNNING]: chalk.yellow,
  [TaskStatus.COMPLETED]: chalk.green,
  [TaskStatus.FAILED]: chalk.red,
};

function preview(value: unknown, max = 60): string {
  const text = value === undefined ? '' : formatValue(value);
  const line = text.replace(/\s+/g, ' ').trim();
  return line.length > max ? `${line.slice(0, max - 3)}...` : line;
}

/**
 * 渲染为终端文本
 */
export function formatReport(report: ExecutionReport): string {
  const lines: string[] = [];
  lines.push(chalk.bold(`Workflow: ${report.title}`));
  lines.push(`ID: ${report.workflowId}`);
  lines.push(`Status: ${report.status}`);
  if (report.error) lines.push(chalk.red(`Error: ${report.error}`));
  if (report.planningError) lines.push(chalk.red(`Planning error: ${report.planningError}`));
  if (report.blockedTasks && report.blockedTasks.length > 0) {
    lines.push(chalk.red(`Blocked: ${report.blockedTasks.join(', ')}`));
  }
  lines.push('');

  for (const [id, task] of Object.entries(report.tasks)) {
    const color = STATUS_COLORS[task.status];
    lines.push(`  ${color(task.status.toUpperCase().padEnd(10))} ${task.title} (${id}) [${task.agentRef}]`);
    if (task.error) {
      lines.push(chalk.red(`             ${task.error.code}: ${task.error.message}`));
    } else if (task.result !== undefined) {
      lines.push(chalk.gray(`             ${preview(task.result)}`));
    }
  }

  const { summary } = report;
  lines.push('');
  lines.push(
    `Total: ${summary.total}  Completed: ${summary.completed}  Failed: ${summary.failed}  ` +
      `Pending: ${summary.pending}  Running: ${summary.running}`
  );
  return lines.join('\n');
}
