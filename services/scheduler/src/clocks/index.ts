import type { ClockDefinition } from '../db/types';
import { CronClock } from './cronClock';
import { IntervalClock } from './intervalClock';
import type { Clock } from './types';

export type { Clock } from './types';
export { CronClock } from './cronClock';
export { IntervalClock, DEFAULT_INTERVAL_ANCHOR } from './intervalClock';

export function createClock(definition: ClockDefinition): Clock {
  switch (definition.kind) {
    case 'interval':
      return new IntervalClock(definition);
    case 'cron':
      return new CronClock(definition);
  }
}
