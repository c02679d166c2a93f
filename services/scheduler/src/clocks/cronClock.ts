import { parseExpression, type CronExpression, type ParserOptions } from 'cron-parser';

import type { CronClockDefinition } from '../db/types';
import { isEmptyWindow, type Clock } from './types';

export class CronClock implements Clock {
  private readonly cron: string;
  private readonly timezone: string | null;

  /** Throws when `cron` does not parse. */
  constructor(definition: Pick<CronClockDefinition, 'cron' | 'timezone'>) {
    this.cron = definition.cron.trim();
    this.timezone = definition.timezone?.trim() || null;
    if (this.cron.length === 0) {
      throw new Error('Cron expression must be a non-empty string');
    }
    this.expression(new Date(0));
  }

  private expression(currentDate: Date, endDate?: Date): CronExpression {
    const options: ParserOptions = { currentDate };
    if (endDate) {
      options.endDate = endDate;
    }
    if (this.timezone) {
      options.tz = this.timezone;
    }
    return parseExpression(this.cron, options);
  }

  async getDates(n: number, start: Date, end: Date): Promise<Date[]> {
    if (isEmptyWindow(n, start, end)) {
      return [];
    }

    // next() is exclusive of currentDate, so step back a millisecond to include `start`
    const expression = this.expression(new Date(start.getTime() - 1), end);
    const dates: Date[] = [];
    while (dates.length < n && expression.hasNext()) {
      const next = expression.next().toDate();
      if (next.getTime() > end.getTime()) {
        break;
      }
      if (next.getTime() >= start.getTime()) {
        dates.push(next);
      }
    }
    return dates;
  }
}
