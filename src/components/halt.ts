// src/components/halt.ts
import type { HaltSource } from '../types/event.ts';
import { LABEL } from '../types/ui.ts';

/**
 * Raised by `error()` and a failed `assert()` after the report reaches its sink.
 * It means "this task stops here", not "something went wrong while logging".
 */
export class TaskHalt extends Error {
  readonly source: HaltSource;

  constructor(source: HaltSource) {
    super(`Task halted after ${LABEL[source]} report`);
    this.name = 'TaskHalt';
    this.source = source;
  }
}

export function isTaskHalt(value: unknown): value is TaskHalt {
  return value instanceof TaskHalt;
}

export type TaskOutcome<T> =
  | { status: 'completed'; value: T }
  | { status: 'halted'; halt: TaskHalt };

/** Run a unit of work; a halt ends it quietly, any other error propagates. */
export function runTask<T>(work: () => T): TaskOutcome<T> {
  try {
    return { status: 'completed', value: work() };
  } catch (e) {
    if (isTaskHalt(e)) return { status: 'halted', halt: e };
    throw e;
  }
}

export async function runTaskAsync<T>(work: () => Promise<T>): Promise<TaskOutcome<T>> {
  try {
    return { status: 'completed', value: await work() };
  } catch (e) {
    if (isTaskHalt(e)) return { status: 'halted', halt: e };
    throw e;
  }
}
