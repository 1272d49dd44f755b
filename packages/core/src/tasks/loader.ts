import path from 'path';
import { readFile } from 'fs/promises';
import yaml from 'js-yaml';
import {
  TaskDefinitionError,
  TaskSchema,
  UsageError,
  formatIssues,
  getPath,
  type Task,
} from '@patchproof/shared';

function parseDocument(filePath: string, content: string): unknown {
  const ext = path.extname(filePath).toLowerCase();
  try {
    return ext === '.yaml' || ext === '.yml' ? yaml.load(content) : JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TaskDefinitionError(`Cannot parse task file ${filePath}: ${reason}`, { cause: error });
  }
}

function describeEntry(raw: unknown, index: number): string {
  const id = getPath(raw, 'id');
  return typeof id === 'string' ? `tasks[${index}] (${id})` : `tasks[${index}]`;
}

/**
 * Parses and validates a task list. Accepts a bare array or `{ tasks: [...] }`.
 * Every invalid entry is reported, not just the first.
 */
export function parseTasks(document: unknown, source = 'tasks'): Task[] {
  const entries = Array.isArray(document) ? document : getPath(document, 'tasks');
  if (!Array.isArray(entries)) {
    throw new TaskDefinitionError(`${source} must contain an array of tasks`);
  }

  const tasks: Task[] = [];
  const problems: string[] = [];
  entries.forEach((raw: unknown, index) => {
    const result = TaskSchema.safeParse(raw);
    if (result.success) {
      tasks.push(result.data);
    } else {
      const label = describeEntry(raw, index);
      problems.push(...formatIssues(result.error).split('\n').map((line) => `${label} ${line}`));
    }
  });

  const seen = new Set<string>();
  for (const task of tasks) {
    if (seen.has(task.id)) problems.push(`Duplicate task id "${task.id}"`);
    seen.add(task.id);
  }

  if (problems.length > 0) {
    throw new TaskDefinitionError(`Invalid task definitions in ${source}:\n${problems.map((p) => `- ${p}`).join('\n')}`);
  }
  return tasks;
}

export async function loadTasks(filePath: string): Promise<Task[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new UsageError(`Cannot read task file: ${filePath}`, { cause: error });
  }
  return parseTasks(parseDocument(filePath, content), filePath);
}

export interface TaskSelection {
  ids?: string[];
  limit?: number;
}

/**
 * Filters tasks by id, keeping file order, then applies the limit.
 */
export function selectTasks(tasks: Task[], selection: TaskSelection = {}): Task[] {
  let selected = tasks;
  if (selection.ids && selection.ids.length > 0) {
    const known = new Set(tasks.map((t) => t.id));
    const unknown = selection.ids.filter((id) => !known.has(id));
    if (unknown.length > 0) {
      throw new UsageError(`Unknown task id(s): ${unknown.join(', ')}`);
    }
    const wanted = new Set(selection.ids);
    selected = tasks.filter((t) => wanted.has(t.id));
  }
  return selection.limit !== undefined ? selected.slice(0, selection.limit) : selected;
}
