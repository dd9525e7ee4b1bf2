import { randomUUID } from 'node:crypto';
import { fitContext, type ContextItem } from '../context/supplier.js';
import { deepFreeze } from '../guards.js';
import type { Task } from './types.js';

export interface TaskInput {
  items?: readonly ContextItem[];
  dialect?: string;
}

/**
 * Create a frozen task. Context is fitted to `contextMaxSize` here so every
 * later prompt sees the same bounded context.
 */
export function createTask(text: string, input: TaskInput, contextMaxSize: number): Task {
  const fitted = fitContext(input.items ?? [], contextMaxSize);
  return deepFreeze({
    id: randomUUID(),
    text,
    context: {
      items: fitted.items.map((item) => ({ ...item })),
      dropped: fitted.dropped,
      dialect: input.dialect ?? null,
    },
    createdAt: new Date().toISOString(),
  });
}

export function contextSize(task: Task): number {
  return task.context.items.reduce((sum, item) => sum + item.content.length, 0);
}

export function schemaItemCount(task: Task): number {
  return task.context.items.filter((item) => item.kind === 'schema').length;
}
