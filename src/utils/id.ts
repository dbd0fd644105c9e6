import { randomUUID } from 'crypto';

/**
 * Generate a prefixed unique id, e.g. `task_1a2b3c4d5e6f7a8b`.
 */
export function generateId(prefix: string): string {
  return `${prefix}_${randomUUID().replace(/-/g, '').slice(0, 16)}`;
}
