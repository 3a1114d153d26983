import { Task, TaskAttribute } from './types/task';

/**
 * Builds a task from scratch. Missing fields take the values an empty line
 * parses to; arrays passed in are copied so the new task owns its data.
 */
export function createTask(fields: Partial<Task> = {}): Task {
  return cloneTask({
    isComplete: fields.isComplete ?? false,
    priority: fields.priority ?? null,
    description: fields.description ?? '',
    projects: fields.projects ?? [],
    contexts: fields.contexts ?? [],
    attributes: fields.attributes ?? [],
  });
}

export function cloneTask(task: Task): Task {
  return {
    isComplete: task.isComplete,
    priority: task.priority,
    description: task.description,
    projects: [...task.projects],
    contexts: [...task.contexts],
    attributes: task.attributes.map(({ key, value }) => ({ key, value })),
  };
}

function sameStrings(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((item, i) => item === b[i]);
}

function sameAttributes(a: TaskAttribute[], b: TaskAttribute[]): boolean {
  return a.length === b.length && a.every((attr, i) => attr.key === b[i].key && attr.value === b[i].value);
}

// Structural equality; order matters in every list.
export function tasksEqual(a: Task, b: Task): boolean {
  return (
    a.isComplete === b.isComplete &&
    a.priority === b.priority &&
    a.description === b.description &&
    sameStrings(a.projects, b.projects) &&
    sameStrings(a.contexts, b.contexts) &&
    sameAttributes(a.attributes, b.attributes)
  );
}
