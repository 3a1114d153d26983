export type Priority =
  | 'A' | 'B' | 'C' | 'D' | 'E' | 'F' | 'G' | 'H' | 'I' | 'J' | 'K' | 'L' | 'M'
  | 'N' | 'O' | 'P' | 'Q' | 'R' | 'S' | 'T' | 'U' | 'V' | 'W' | 'X' | 'Y' | 'Z';

export interface TaskAttribute {
  key: string; // e.g. "due"
  value: string; // e.g. "tomorrow"
}

export interface Task {
  isComplete: boolean; // true if the line starts with "x "
  priority: Priority | null; // e.g. "A" from "(A) ", null when absent
  description: string; // Text left after markers and tags are removed, e.g. "Call mom"
  projects: string[]; // Names without the "+", in order of appearance, e.g. ["family"]
  contexts: string[]; // Names without the "@", e.g. ["phone", "home"]
  attributes: TaskAttribute[]; // key:value pairs in order of appearance; keys may repeat
}

export function isPriority(value: string): value is Priority {
  return /^[A-Z]$/.test(value);
}
