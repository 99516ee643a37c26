import { z } from 'zod';

/**
 * Dependency validation mode
 *
 * - permissive: self, duplicate and dangling edges are pruned
 * - strict: the first such edge fails validation
 */
export const validationModeSchema = z.enum(['permissive', 'strict']);

/**
 * Scheduler configuration schema
 */
export const schedulerConfigSchema = z.object({
  /** Tasks allowed in flight at once (1 = sequential, fully deterministic) */
  maxConcurrency: z.number().int().min(1).default(1),
  /** Per-task executor timeout in milliseconds, 0 disables it */
  taskTimeoutMs: z.number().int().min(0).default(0),
  /** How degenerate dependency edges are handled */
  validationMode: validationModeSchema.default('permissive'),
});

/**
 * Well-known workflow metadata keys; unknown keys pass through
 */
export const workflowMetadataSchema = z
  .object({
    planningError: z.string().optional(),
    cyclePath: z.array(z.string()).optional(),
    error: z.string().optional(),
    blockedTasks: z.array(z.string()).optional(),
    externalContext: z.record(z.unknown()).optional(),
    resourceRequirements: z.record(z.number().int().min(0)).optional(),
  })
  .passthrough();

/**
 * A task as declared in a workflow file or returned by the planner.
 * Dependencies may be integer indices into the task list or task ids.
 */
export const taskSpecSchema = z.object({
  /** Task identifier (generated when omitted) */
  id: z.string().min(1).optional(),
  /** Short title */
  title: z.string().min(1),
  /** Payload handed to the executor */
  description: z.string().default(''),
  /** Agent that should run the task */
  executorRef: z.string().min(1),
  /** Index or id references to prerequisite tasks */
  dependencies: z.array(z.union([z.number().int(), z.string()])).default([]),
  /** Extension data, e.g. a literal `input` or `timeoutMs` */
  metadata: z.record(z.unknown()).default({}),
});

/**
 * Workflow definition file schema
 */
export const workflowDefinitionSchema = z.object({
  id: z.string().min(1).optional(),
  title: z.string().min(1),
  description: z.string().default(''),
  query: z.string().default(''),
  metadata: workflowMetadataSchema.default({}),
  tasks: z.array(taskSpecSchema),
});

/**
 * Planner structured output schema
 */
export const planSchema = z.object({
  tasks: z.array(taskSpecSchema).min(1),
});

export type SchedulerConfig = z.infer<typeof schedulerConfigSchema>;
export type SchedulerConfigInput = z.input<typeof schedulerConfigSchema>;
export type ValidationMode = z.infer<typeof validationModeSchema>;
export type TaskSpec = z.infer<typeof taskSpecSchema>;
export type TaskSpecInput = z.input<typeof taskSpecSchema>;
export type WorkflowDefinition = z.infer<typeof workflowDefinitionSchema>;
export type WorkflowDefinitionInput = z.input<typeof workflowDefinitionSchema>;
export type Plan = z.infer<typeof planSchema>;

/**
 * Validate and parse scheduler configuration
 */
export function parseSchedulerConfig(input: unknown = {}): SchedulerConfig {
  return schedulerConfigSchema.parse(input);
}

/**
 * Validate scheduler configuration without throwing
 */
export function validateSchedulerConfig(
  input: unknown
): { success: true; data: SchedulerConfig } | { success: false; error: z.ZodError } {
  const result = schedulerConfigSchema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Validate and parse a workflow definition
 */
export function parseWorkflowDefinition(input: unknown): WorkflowDefinition {
  return workflowDefinitionSchema.parse(input);
}
