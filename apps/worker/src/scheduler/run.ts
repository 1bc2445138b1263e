import type { FlagLookup, FlagStore } from '../flags/store';
import { toErrorMessage } from '../middleware/errors';
import { probeUrl, type Probe } from '../monitor/http';
import { reconcile, stateFromFlag, type ReconcileAction } from '../monitor/state-machine';
import { toMonitoredTarget } from '../monitor/targets';
import type { MonitoredTarget, ProbeResult } from '../monitor/types';
import { buildDownNotification, buildRecoveryNotification } from '../notify/template';
import type { Notifier } from '../notify/types';

export type RunDeps = {
  flagStore: FlagStore;
  notifier: Notifier;
  probe?: Probe;
  /** Unix seconds. */
  now?: () => number;
};

export type EvaluationRecord = {
  url: string;
  key: string;
  probe: ProbeResult;
  /** null when the flag store could not tell. */
  flagExisted: boolean | null;
  action: ReconcileAction;
  notified: boolean;
  error: string | null;
};

export type EvaluationRecordJson = {
  url: string;
  key: string;
  status: {
    is_up: boolean;
    status_code: number | null;
    error: string | null;
  };
  flag_exists: boolean | null;
  action: ReconcileAction;
  notified: boolean;
  error: string | null;
};

export type RunSummary = {
  total: number;
  up: number;
  down: number;
  errors: number;
};

export type RunReportBody =
  | {
      ok: true;
      message: string;
      checked_at: number;
      summary: RunSummary;
      results: EvaluationRecordJson[];
    }
  | {
      ok: false;
      message: string;
      error: { code: string; message: string };
      results: [];
    };

export type RunReport = {
  statusCode: 200 | 500;
  body: RunReportBody;
};

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

function toJson(r: EvaluationRecord): EvaluationRecordJson {
  return {
    url: r.url,
    key: r.key,
    status: {
      is_up: r.probe.reachable,
      status_code: r.probe.statusCode,
      error: r.probe.error,
    },
    flag_exists: r.flagExisted,
    action: r.action,
    notified: r.notified,
    error: r.error,
  };
}

function logOutcome(r: EvaluationRecord): void {
  if (r.error) {
    console.warn(`ping: ${r.url} action=${r.action} notified=${r.notified} error=${r.error}`);
    return;
  }

  switch (r.action) {
    case 'raise_alert':
      console.log(`ping: ${r.url} is down (${r.probe.error ?? 'no detail'}); flag created, alert sent`);
      return;
    case 'clear_alert':
      console.log(`ping: ${r.url} is back up; flag removed, recovery sent`);
      return;
    case 'none':
      console.log(
        r.probe.reachable
          ? `ping: ${r.url} is up`
          : `ping: ${r.url} is still down; flag exists, no notification`,
      );
  }
}

async function applyDecision(
  target: MonitoredTarget,
  probe: ProbeResult,
  action: ReconcileAction,
  downSince: number | null,
  deps: RunDeps & { now: () => number },
): Promise<Pick<EvaluationRecord, 'notified' | 'error'>> {
  if (action === 'none') return { notified: false, error: null };

  const timestamp = deps.now();

  // Flag first: if the mutation fails nothing is sent, so the next run retries the transition.
  try {
    if (action === 'raise_alert') {
      await deps.flagStore.create(target.key, timestamp);
    } else {
      await deps.flagStore.delete(target.key);
    }
  } catch (err) {
    return { notified: false, error: toErrorMessage(err) };
  }

  const notification =
    action === 'raise_alert'
      ? buildDownNotification({ url: target.url, key: target.key, probe, timestamp })
      : buildRecoveryNotification({ url: target.url, key: target.key, probe, timestamp, downSince });

  try {
    await deps.notifier.publish(notification);
    return { notified: true, error: null };
  } catch (err) {
    return { notified: false, error: `notification failed: ${toErrorMessage(err)}` };
  }
}

export async function evaluateTarget(url: string, deps: RunDeps): Promise<EvaluationRecord> {
  const probe = deps.probe ?? probeUrl;
  const now = deps.now ?? nowSeconds;
  const target = toMonitoredTarget(url);

  const result = await probe(url);
  const lookup: FlagLookup = await deps.flagStore
    .exists(target.key)
    .catch((err: unknown) => ({ kind: 'error', error: toErrorMessage(err) }) as const);

  if (lookup.kind === 'error') {
    return {
      url,
      key: target.key,
      probe: result,
      flagExisted: null,
      action: 'none',
      notified: false,
      error: lookup.error,
    };
  }

  const state = stateFromFlag(lookup.kind === 'exists' ? lookup.flag : null);
  const decision = reconcile(target, result, state.kind === 'down_flagged');
  const downSince = state.kind === 'down_flagged' ? state.since : null;

  const applied = await applyDecision(target, result, decision.action, downSince, {
    ...deps,
    now,
  });

  return {
    url,
    key: target.key,
    probe: result,
    flagExisted: lookup.kind === 'exists',
    action: decision.action,
    ...applied,
  };
}

function failedRecord(url: string, err: unknown): EvaluationRecord {
  const error = toErrorMessage(err);
  return {
    url,
    key: toMonitoredTarget(url).key,
    probe: { reachable: false, statusCode: null, error },
    flagExisted: null,
    action: 'none',
    notified: false,
    error,
  };
}

function summarize(records: EvaluationRecord[]): RunSummary {
  return {
    total: records.length,
    up: records.filter((r) => r.probe.reachable).length,
    down: records.filter((r) => !r.probe.reachable).length,
    errors: records.filter((r) => r.error !== null).length,
  };
}

/**
 * One pass over `urls`, in order. A failure on one URL is recorded on its
 * record and evaluation moves on to the next.
 */
export async function runChecks(urls: readonly string[], deps: RunDeps): Promise<RunReport> {
  const checkedAt = (deps.now ?? nowSeconds)();
  const records: EvaluationRecord[] = [];

  for (const url of urls) {
    let record: EvaluationRecord;
    try {
      record = await evaluateTarget(url, deps);
    } catch (err) {
      record = failedRecord(url, err);
    }
    logOutcome(record);
    records.push(record);
  }

  const summary = summarize(records);
  console.log(
    `run: total=${summary.total} up=${summary.up} down=${summary.down} errors=${summary.errors}`,
  );

  return {
    statusCode: 200,
    body: {
      ok: true,
      message: 'URL ping completed',
      checked_at: checkedAt,
      summary,
      results: records.map(toJson),
    },
  };
}

export function failedRunReport(code: string, message: string): RunReport {
  return {
    statusCode: 500,
    body: { ok: false, message, error: { code, message }, results: [] },
  };
}
