import { randomUUID } from 'node:crypto';

/**
 * Generate a unique ID for new rows
 */
export function generateId(): string {
  return randomUUID();
}

/**
 * Get current ISO timestamp
 */
export function now(): string {
  return new Date().toISOString();
}

export function toFlag(value: boolean): number {
  return value ? 1 : 0;
}

export function placeholders(count: number): string {
  return new Array<string>(count).fill('?').join(', ');
}
