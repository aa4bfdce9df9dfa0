import type { RemoteTask, TaskId } from '../types/remote.js';

// At least two digits at the very start, optionally after whitespace, ending on a word boundary.
const PREFIX_RE = /^\s*(\d{2,})\b/;
const DIGITS_RE = /^\d+$/;

export interface OrderKey {
  /** Numeric prefix without leading zeros ("02" → "2"); null sorts after every prefix */
  readonly prefix: string | null;
  readonly createdAt: string;
}

function compareCodeUnits(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function stripZeros(digits: string): string {
  return digits.replace(/^0+(?=\d)/, '');
}

/** Compare two all-digit strings without leading zeros by value, at any length */
function compareDigits(a: string, b: string): number {
  if (a.length !== b.length) return a.length < b.length ? -1 : 1;
  return compareCodeUnits(a, b);
}

export function orderKey(task: Pick<RemoteTask, 'content' | 'createdAt'>): OrderKey {
  const digits = PREFIX_RE.exec(task.content)?.[1];
  return {
    prefix: digits !== undefined ? stripZeros(digits) : null,
    createdAt: task.createdAt,
  };
}

export function comparePrefixes(a: string | null, b: string | null): number {
  if (a === null || b === null) {
    if (a === b) return 0;
    return a === null ? 1 : -1;
  }
  return compareDigits(a, b);
}

/**
 * Last-resort tie-break for tasks sharing prefix and creation time.
 * All-digit ids come first, by value; any other ids follow, by code unit.
 */
export function compareIds(a: TaskId, b: TaskId): number {
  const aDigits = DIGITS_RE.test(a);
  const bDigits = DIGITS_RE.test(b);
  if (aDigits !== bDigits) return aDigits ? -1 : 1;
  // "7" and "007" have the same value; code units keep them apart
  if (aDigits) return compareDigits(stripZeros(a), stripZeros(b)) || compareCodeUnits(a, b);
  return compareCodeUnits(a, b);
}

export function compareTasks(a: RemoteTask, b: RemoteTask): number {
  const ka = orderKey(a);
  const kb = orderKey(b);
  const byPrefix = comparePrefixes(ka.prefix, kb.prefix);
  if (byPrefix !== 0) return byPrefix;
  if (ka.createdAt !== kb.createdAt) return ka.createdAt < kb.createdAt ? -1 : 1;
  return compareIds(a.id, b.id);
}

/** Queue order: index 0 is the head. Returns a new array. */
export function orderTasks(tasks: readonly RemoteTask[]): RemoteTask[] {
  return [...tasks].sort(compareTasks);
}
