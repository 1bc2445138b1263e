import { describe, expect, it } from 'vitest';

import {
  classifyTransition,
  reconcile,
  stateFromFlag,
  type ReconcileAction,
} from '../src/monitor/state-machine';
import { toMonitoredTarget } from '../src/monitor/targets';
import type { ProbeResult } from '../src/monitor/types';

const target = toMonitoredTarget('https://api.example.com/health');
const UP: ProbeResult = { reachable: true, statusCode: 200, error: null };
const DOWN: ProbeResult = { reachable: false, statusCode: 503, error: 'HTTP Error 503: Service Unavailable' };

describe('reconcile', () => {
  it.each([
    { probe: DOWN, flagExists: false, transition: 'went_down', action: 'raise_alert' },
    { probe: DOWN, flagExists: true, transition: 'still_down', action: 'none' },
    { probe: UP, flagExists: true, transition: 'recovered', action: 'clear_alert' },
    { probe: UP, flagExists: false, transition: 'still_up', action: 'none' },
  ] as const)(
    'reachable=$probe.reachable flag=$flagExists -> $action',
    ({ probe, flagExists, transition, action }) => {
      const decision = reconcile(target, probe, flagExists);
      expect(decision.transition).toBe(transition);
      expect(decision.action).toBe(action);
      expect(decision.key).toBe('api.example.com');
    },
  );

  it('reports the state before and after the probe', () => {
    expect(reconcile(target, DOWN, false)).toEqual({
      key: 'api.example.com',
      from: 'up_clean',
      to: 'down_flagged',
      transition: 'went_down',
      action: 'raise_alert',
    });
    expect(reconcile(target, UP, true)).toMatchObject({ from: 'down_flagged', to: 'up_clean' });
  });

  it('ignores status code and error text once reachability is known', () => {
    const timeout: ProbeResult = { reachable: false, statusCode: null, error: 'Timeout after 10000ms' };
    expect(reconcile(target, timeout, false).action).toBe('raise_alert');
    expect(reconcile(target, { ...UP, statusCode: 204 }, true).action).toBe('clear_alert');
  });

  it('returns identical decisions for identical inputs', () => {
    const first = reconcile(target, DOWN, false);
    const second = reconcile(target, DOWN, false);
    expect(second).toEqual(first);
  });

  it('walks up -> down -> down -> up as raise, none, clear', () => {
    let flagExists = false;
    const actions: ReconcileAction[] = [];

    for (const probe of [DOWN, DOWN, UP]) {
      const { action } = reconcile(target, probe, flagExists);
      actions.push(action);
      if (action === 'raise_alert') flagExists = true;
      if (action === 'clear_alert') flagExists = false;
    }

    expect(actions).toEqual(['raise_alert', 'none', 'clear_alert']);
    expect(flagExists).toBe(false);
  });
});

describe('classifyTransition', () => {
  it('maps (wasDown, isDown) pairs', () => {
    expect(classifyTransition(false, true)).toBe('went_down');
    expect(classifyTransition(true, true)).toBe('still_down');
    expect(classifyTransition(true, false)).toBe('recovered');
    expect(classifyTransition(false, false)).toBe('still_up');
  });
});

describe('stateFromFlag', () => {
  it('derives the resting state from flag presence', () => {
    expect(stateFromFlag(null)).toEqual({ kind: 'up_clean' });
    expect(stateFromFlag({ timestamp: 1_700_000_000 })).toEqual({
      kind: 'down_flagged',
      since: 1_700_000_000,
    });
  });
});
