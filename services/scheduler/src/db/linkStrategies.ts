import { LINK_STRATEGIES, type LinkStrategyName } from '../config/scheduler';
import { StorageCapabilityError } from '../errors';
import { SqlParamList, type SqlDialect, type SqlParam } from './executor';

export type SqlStatement = {
  sql: string;
  params: SqlParam[];
};

/**
 * Sets `flow_runs.state_id` from freshly inserted `flow_run_states` rows. Both strategies touch
 * exactly the runs that own one of `stateIds` and nothing else.
 */
export interface LinkStrategy {
  readonly name: LinkStrategyName;
  /** Times each state id is bound in one statement. */
  readonly bindsPerStateId: number;
  buildLinkStatement(dialect: SqlDialect, stateIds: readonly string[]): SqlStatement;
}

const updateJoinStrategy: LinkStrategy = {
  name: 'update-join',
  bindsPerStateId: 1,
  buildLinkStatement(dialect, stateIds) {
    const params = new SqlParamList(dialect);
    const sql = `UPDATE flow_runs
       SET state_id = flow_run_states.id
      FROM flow_run_states
     WHERE flow_run_states.flow_run_id = flow_runs.id
       AND flow_run_states.id IN (${params.addList(stateIds)})`;
    return { sql, params: params.values };
  }
};

const correlatedSubqueryStrategy: LinkStrategy = {
  name: 'correlated-subquery',
  bindsPerStateId: 2,
  buildLinkStatement(dialect, stateIds) {
    const params = new SqlParamList(dialect);
    const subqueryIds = params.addList(stateIds);
    const restrictionIds = params.addList(stateIds);
    const sql = `UPDATE flow_runs
       SET state_id = (
         SELECT flow_run_states.id
           FROM flow_run_states
          WHERE flow_run_states.flow_run_id = flow_runs.id
            AND flow_run_states.id IN (${subqueryIds})
          LIMIT 1
       )
     WHERE flow_runs.id IN (
       SELECT flow_run_states.flow_run_id
         FROM flow_run_states
        WHERE flow_run_states.id IN (${restrictionIds})
     )`;
    return { sql, params: params.values };
  }
};

const STRATEGIES: Record<LinkStrategyName, LinkStrategy> = {
  'update-join': updateJoinStrategy,
  'correlated-subquery': correlatedSubqueryStrategy
};

function isLinkStrategyName(value: string): value is LinkStrategyName {
  return LINK_STRATEGIES.some((entry) => entry === value);
}

/**
 * Picks the link strategy once, when a store is created. An explicit override wins; otherwise the
 * dialect decides. Anything unrecognized means a missing adapter and fails fast.
 */
export function resolveLinkStrategy(dialect: string, override?: string | null): LinkStrategy {
  if (override) {
    if (!isLinkStrategyName(override)) {
      throw new StorageCapabilityError(`Unrecognized link strategy: ${override}`);
    }
    return STRATEGIES[override];
  }

  // postgres supports UPDATE ... FROM; the sqlite adapter sticks to the portable correlated form
  switch (dialect) {
    case 'postgresql':
      return STRATEGIES['update-join'];
    case 'sqlite':
      return STRATEGIES['correlated-subquery'];
    default:
      throw new StorageCapabilityError(`Unrecognized storage dialect: ${dialect}`);
  }
}
