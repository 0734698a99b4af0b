/**
 * Cycle executor
 *
 * One cycle of one subscription: fetch (under the account permit when the
 * subscription uses a shared account), diff against the stored snapshot,
 * commit, then route. Nothing is committed after the signal is aborted, and
 * nothing is routed unless the commit succeeded.
 */

import type { AccountPool } from '../accounts';
import type { Subscription } from '../config/types';
import { detectChanges, type DetectSubject } from '../detect';
import {
  accountOf,
  type AdapterRegistry,
  adapterFor,
  fetchSnapshot,
  type Snapshot,
} from '../sources';
import type { StateStore } from '../state';
import { CommitError, FetchError, getLogger, LogEvent } from '../utils';
import type { CycleOutcome, EventRouter } from './types';

const logger = getLogger('Executor');

export interface CycleDeps {
  adapters: AdapterRegistry;
  accounts: AccountPool;
  store: StateStore;
  router: EventRouter;
  seenCap?: number;
}

async function fetchCurrent(
  deps: CycleDeps,
  subscription: Subscription
): Promise<Snapshot> {
  const accountName = accountOf(subscription.platform);
  if (accountName === undefined) {
    return fetchSnapshot(deps.adapters, subscription.platform);
  }
  const handle = deps.accounts.get(accountName);
  if (!handle) {
    throw new FetchError(`unknown account '${accountName}'`);
  }
  return handle.withPermit(
    (account) => fetchSnapshot(deps.adapters, subscription.platform, account),
    subscription.key
  );
}

/**
 * Execute a single cycle for a subscription
 * @throws FetchError | DiffError | CommitError
 */
export async function runCycle(
  deps: CycleDeps,
  subscription: Subscription,
  signal: AbortSignal
): Promise<CycleOutcome> {
  const context = { subscription: subscription.key };
  const aborted: CycleOutcome = {
    status: 'aborted',
    baseline: false,
    events: [],
    reports: [],
  };

  const current = await fetchCurrent(deps, subscription);
  if (signal.aborted) {
    return aborted;
  }

  const adapter = adapterFor(deps.adapters, subscription.platform);
  const subject: DetectSubject = {
    key: subscription.key,
    name: subscription.name,
    platform: adapter.displayName,
    snapshotKind: adapter.snapshotKind,
    detect: subscription.detect,
  };
  const previous = await deps.store.get(subscription.key);
  const result = detectChanges(subject, previous, current, {
    seenCap: deps.seenCap,
  });

  if (signal.aborted) {
    logger.debug('Shutting down, snapshot not committed', context);
    return aborted;
  }
  try {
    await deps.store.commit(subscription.key, result.next);
  } catch (error) {
    throw error instanceof CommitError
      ? error
      : new CommitError(`failed to persist state for ${subscription.key}`, {
          cause: error,
        });
  }

  if (result.baseline) {
    logger.info('Baseline established', context);
    return { status: 'completed', baseline: true, events: [], reports: [] };
  }
  if (result.events.length === 0) {
    logger.debug('No changes', context);
    return { status: 'completed', baseline: false, events: [], reports: [] };
  }

  logger.info(`Detected ${result.events.length} change(s)`, context, {
    eventType: LogEvent.CHANGE_DETECTED,
    kinds: result.events.map((event) => event.kind),
  });
  const reports = await deps.router.route(subscription, result.events);
  return {
    status: 'completed',
    baseline: false,
    events: result.events,
    reports,
  };
}
