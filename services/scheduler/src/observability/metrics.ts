import type { JsonValue } from '../db/types';
import { normalizeMeta } from './meta';

type SchedulerEvent =
  | 'tick_started'
  | 'tick_completed'
  | 'tick_failed'
  | 'deployment_scheduled'
  | 'deployment_failed';

type RecentEntry = {
  event: SchedulerEvent;
  at: string;
  details?: Record<string, JsonValue>;
};

type SchedulerCounters = {
  ticks: number;
  tickFailures: number;
  deploymentsProcessed: number;
  deploymentFailures: number;
  runsCreated: number;
};

export type SchedulerMetricsSnapshot = {
  counters: SchedulerCounters;
  recent: RecentEntry[];
  updatedAt: string | null;
};

const MAX_RECENT_ENTRIES = 50;

function emptyCounters(): SchedulerCounters {
  return {
    ticks: 0,
    tickFailures: 0,
    deploymentsProcessed: 0,
    deploymentFailures: 0,
    runsCreated: 0
  };
}

const state: SchedulerMetricsSnapshot = {
  counters: emptyCounters(),
  recent: [],
  updatedAt: null
};

export function recordSchedulerEvent(event: SchedulerEvent, details?: Record<string, unknown>): void {
  switch (event) {
    case 'tick_started':
      state.counters.ticks += 1;
      break;
    case 'tick_failed':
      state.counters.tickFailures += 1;
      break;
    case 'deployment_scheduled': {
      state.counters.deploymentsProcessed += 1;
      const runs = details?.runs;
      if (typeof runs === 'number' && runs > 0) {
        state.counters.runsCreated += runs;
      }
      break;
    }
    case 'deployment_failed':
      state.counters.deploymentFailures += 1;
      break;
    default:
      break;
  }

  const entry: RecentEntry = { event, at: new Date().toISOString() };
  const normalized = normalizeMeta(details);
  if (normalized) {
    entry.details = normalized;
  }
  state.recent.unshift(entry);
  if (state.recent.length > MAX_RECENT_ENTRIES) {
    state.recent.length = MAX_RECENT_ENTRIES;
  }
  state.updatedAt = entry.at;
}

export function getSchedulerMetricsSnapshot(): SchedulerMetricsSnapshot {
  return {
    counters: { ...state.counters },
    recent: state.recent.map((entry) => ({ ...entry, details: entry.details ? { ...entry.details } : undefined })),
    updatedAt: state.updatedAt
  } satisfies SchedulerMetricsSnapshot;
}

export function resetSchedulerMetrics(): void {
  state.counters = emptyCounters();
  state.recent = [];
  state.updatedAt = null;
}
