import { cpus } from 'node:os';
import { LogBuffer } from './logger.js';

export function defaultWorkerCount(): number {
  return Math.max(1, cpus().length - 1);
}

export interface PoolResult<R> {
  results: R[];
  buffers: LogBuffer[];
}

export type PoolTask<T, R> = (item: T, log: LogBuffer, index: number) => Promise<R>;

/**
 * Runs `task` over `items` with at most `workers` in flight. Each worker owns
 * a log buffer; results come back in input order whatever order they finish.
 */
export async function runPool<T, R>(
  items: readonly T[],
  workers: number,
  task: PoolTask<T, R>,
  scope = 'worker'
): Promise<PoolResult<R>> {
  const size = Math.max(1, Math.min(Math.floor(workers), items.length || 1));
  const results = new Array<R>(items.length);
  const buffers = Array.from({ length: size }, (_, id) => new LogBuffer(`${scope}-${id + 1}`));
  let next = 0;

  async function work(log: LogBuffer): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await task(items[index], log, index);
    }
  }

  await Promise.all(buffers.map((buffer) => work(buffer)));

  return { results, buffers };
}
