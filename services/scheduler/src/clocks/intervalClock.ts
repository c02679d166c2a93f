import type { IntervalClockDefinition } from '../db/types';
import { isEmptyWindow, type Clock } from './types';

export const DEFAULT_INTERVAL_ANCHOR = '2020-01-01T00:00:00.000Z';

export class IntervalClock implements Clock {
  private readonly intervalMs: number;
  private readonly anchorMs: number;

  constructor(definition: Pick<IntervalClockDefinition, 'intervalSeconds' | 'anchorDate'>) {
    if (!Number.isFinite(definition.intervalSeconds) || definition.intervalSeconds <= 0) {
      throw new Error('Interval clock requires a positive intervalSeconds');
    }
    const anchor = new Date(definition.anchorDate ?? DEFAULT_INTERVAL_ANCHOR);
    if (Number.isNaN(anchor.getTime())) {
      throw new Error(`Interval clock anchor is not a valid date: ${String(definition.anchorDate)}`);
    }
    this.intervalMs = Math.round(definition.intervalSeconds * 1000);
    this.anchorMs = anchor.getTime();
  }

  async getDates(n: number, start: Date, end: Date): Promise<Date[]> {
    if (isEmptyWindow(n, start, end)) {
      return [];
    }

    // first anchor + k * interval at or after start
    let step = Math.ceil((start.getTime() - this.anchorMs) / this.intervalMs);
    const dates: Date[] = [];
    let next = this.anchorMs + step * this.intervalMs;
    while (dates.length < n && next <= end.getTime()) {
      dates.push(new Date(next));
      step += 1;
      next = this.anchorMs + step * this.intervalMs;
    }
    return dates;
  }
}
