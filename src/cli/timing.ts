/** Result of a timed computation */
export interface Timed<T> {
  value: T;
  micros: number;
}

/** Time a synchronous operation in whole microseconds */
export function timed<T>(fn: () => T): Timed<T> {
  const startTime = performance.now();
  const value = fn();
  const endTime = performance.now();
  return { value, micros: Math.round((endTime - startTime) * 1000) };
}
