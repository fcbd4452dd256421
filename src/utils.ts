import type { Clock } from './types.js';

export const systemClock: Clock = () => new Date().toISOString();

export function preview(value: string, maxChars = 50): string {
  return value.length > maxChars ? `${value.slice(0, maxChars)}...` : value;
}

export function formatTaskId(sequence: number): string {
  return `task-${String(sequence).padStart(3, '0')}`;
}
