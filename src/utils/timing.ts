import { performance } from "node:perf_hooks";

export interface Timed<T> {
  value: T;
  elapsedMs: number;
}

// Elapsed time is rounded to microseconds so results serialize compactly
function since(start: number): number {
  return Math.round((performance.now() - start) * 1000) / 1000;
}

export async function timed<T>(fn: () => Promise<T>): Promise<Timed<T>> {
  const start = performance.now();
  const value = await fn();
  return { value, elapsedMs: since(start) };
}

export function timedSync<T>(fn: () => T): Timed<T> {
  const start = performance.now();
  const value = fn();
  return { value, elapsedMs: since(start) };
}
