import { Task, TaskAttribute, isPriority } from './types/task';

export class TaskParser {
  // Markers recognised only at the very start of the line, in this order.
  private static completionMarker = 'x ';
  private static priorityRegex = /^\(([A-Z])\) /;

  // Inline tags. `\w` is [A-Za-z0-9_] without the unicode flag.
  private static projectRegex = /\+(\w+)/g;
  private static contextRegex = /@(\w+)/g;
  private static attributeRegex = /(\w+):(\w+)/g;

  /**
   * Parses a single todo.txt line. Any string is accepted; text that does not
   * match a marker or tag exactly stays in the description.
   */
  public static parse(line: string): Task {
    let rest = line;

    const isComplete = rest.startsWith(this.completionMarker);
    if (isComplete) {
      rest = rest.slice(this.completionMarker.length);
    }

    let priority: Task['priority'] = null;
    const priorityMatch = rest.match(this.priorityRegex);
    if (priorityMatch && isPriority(priorityMatch[1])) {
      priority = priorityMatch[1];
      rest = rest.slice(priorityMatch[0].length);
    }

    // Each pass runs on what the previous one left behind.
    const projects = Array.from(rest.matchAll(this.projectRegex), (m) => m[1]);
    rest = rest.replace(this.projectRegex, '');

    const contexts = Array.from(rest.matchAll(this.contextRegex), (m) => m[1]);
    rest = rest.replace(this.contextRegex, '');

    const attributes: TaskAttribute[] = Array.from(rest.matchAll(this.attributeRegex), (m) => ({
      key: m[1],
      value: m[2],
    }));
    rest = rest.replace(this.attributeRegex, '');

    return {
      isComplete,
      priority,
      // Runs of spaces left inside by the removals are kept as they are.
      description: rest.trim(),
      projects,
      contexts,
      attributes,
    };
  }

  /**
   * Writes a task back as a line in canonical order: completion, priority,
   * description, projects, contexts, attributes.
   */
  public static serialize(task: Task): string {
    const parts: string[] = [];

    if (task.isComplete) {
      parts.push('x');
    }
    if (task.priority) {
      parts.push(`(${task.priority})`);
    }

    // Emitted even when empty, so "x" + "" + "+p" gives "x  +p".
    parts.push(task.description);

    for (const project of task.projects) {
      parts.push(`+${project}`);
    }
    for (const context of task.contexts) {
      parts.push(`@${context}`);
    }
    for (const { key, value } of task.attributes) {
      parts.push(`${key}:${value}`);
    }

    // Only the end is trimmed; a leading space from an empty description stays.
    return parts.join(' ').trimEnd();
  }
}

export function parseTask(line: string): Task {
  return TaskParser.parse(line);
}

export function serializeTask(task: Task): string {
  return TaskParser.serialize(task);
}
