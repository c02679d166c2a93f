/**
 * Expands a schedule into concrete occurrences. Implementations must be deterministic for a
 * given window: the same `(n, start, end)` always yields the same ascending dates, all within
 * `[start, end]`, and never more than `n` of them.
 */
export interface Clock {
  getDates(n: number, start: Date, end: Date): Promise<Date[]>;
}

export function isEmptyWindow(n: number, start: Date, end: Date): boolean {
  return n <= 0 || Number.isNaN(start.getTime()) || Number.isNaN(end.getTime()) || end.getTime() < start.getTime();
}
