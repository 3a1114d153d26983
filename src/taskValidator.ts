import { z } from 'zod';
import { log, LogLevel } from './logger';
import { Priority, Task, isPriority } from './types/task';

// Parsing and serializing never reject anything. This module is the opt-in
// check for tasks built or edited by hand, before they are written out.

const wordSchema = z.string().regex(/^\w+$/, 'Must be one or more letters, digits or underscores');

const prioritySchema = z.custom<Priority>(
  (value) => typeof value === 'string' && isPriority(value),
  { message: 'Priority must be a single uppercase letter A-Z' },
);

const inlineTagRegex = /\+\w|@\w|\w:\w/;
// A marker token at the start of the description, followed by a space or nothing.
const leadingPriorityRegex = /^\([A-Z]\)(?: |$)/;
const leadingCompletionRegex = /^x(?: |$)/;

export const TaskSchema = z
  .object({
    isComplete: z.boolean(),
    priority: prioritySchema.nullable(),
    description: z.string(),
    projects: z.array(wordSchema),
    contexts: z.array(wordSchema),
    attributes: z.array(z.object({ key: wordSchema, value: wordSchema })),
  })
  .superRefine((task, ctx) => {
    const { description } = task;
    const addIssue = (message: string) => ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['description'], message });

    if (description !== description.trim()) {
      addIssue('Description must not start or end with whitespace');
    }
    if (inlineTagRegex.test(description)) {
      addIssue('Description must not contain +project, @context or key:value tokens');
    }
    if (task.priority === null && leadingPriorityRegex.test(description)) {
      addIssue('Description would be read back as a priority');
    }
    if (!task.isComplete && task.priority === null && leadingCompletionRegex.test(description)) {
      addIssue('Description would be read back as a completion marker');
    }

    // "x" or "(A)" alone loses the trailing space the parser needs.
    const hasMarker = task.isComplete || task.priority !== null;
    const hasTags = task.projects.length > 0 || task.contexts.length > 0 || task.attributes.length > 0;
    if (description === '' && hasMarker && !hasTags) {
      addIssue('Description must not be empty when a completion or priority marker is set without tags');
    }
  });

export interface TaskValidationIssue {
  path: string; // e.g. "projects.1", "" for the task itself
  message: string;
}

export type TaskValidationResult =
  | { success: true; task: Task }
  | { success: false; issues: TaskValidationIssue[] };

export class TaskValidationError extends Error {
  constructor(public readonly issues: TaskValidationIssue[]) {
    super(`Invalid task: ${issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ')}`);
    this.name = 'TaskValidationError';
  }
}

/**
 * Checks a value against the task invariants. A task that passes serializes
 * to a line that parses back to an equal task.
 */
export function validateTask(value: unknown): TaskValidationResult {
  const result = TaskSchema.safeParse(value);
  if (result.success) {
    return { success: true, task: result.data };
  }

  const issues = result.error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  log(LogLevel.DEBUG, 'Task failed validation: %j', issues);
  return { success: false, issues };
}

export function assertValidTask(value: unknown): Task {
  const result = validateTask(value);
  if (!result.success) {
    throw new TaskValidationError(result.issues);
  }
  return result.task;
}
