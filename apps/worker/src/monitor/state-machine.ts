import type { MonitoredTarget, ProbeResult } from './types';

// Resting states, inferred from flag presence. "Up after being down" is the
// `recovered` transition, never a state of its own.
export type TargetState =
  | { kind: 'up_clean' }
  | { kind: 'down_flagged'; since: number | null };

export type Transition = 'went_down' | 'still_down' | 'recovered' | 'still_up';

export type ReconcileAction = 'none' | 'raise_alert' | 'clear_alert';

export type Decision = {
  key: string;
  from: TargetState['kind'];
  to: TargetState['kind'];
  transition: Transition;
  action: ReconcileAction;
};

const ACTION_BY_TRANSITION: Record<Transition, ReconcileAction> = {
  went_down: 'raise_alert',
  still_down: 'none',
  recovered: 'clear_alert',
  still_up: 'none',
};

export function stateFromFlag(flag: { timestamp: number } | null): TargetState {
  return flag ? { kind: 'down_flagged', since: flag.timestamp } : { kind: 'up_clean' };
}

export function classifyTransition(wasDown: boolean, isDown: boolean): Transition {
  if (isDown) return wasDown ? 'still_down' : 'went_down';
  return wasDown ? 'recovered' : 'still_up';
}

/**
 * Decide what to do for one target from a single snapshot of its flag.
 * Pure: the caller performs the flag mutation and notification.
 */
export function reconcile(
  target: MonitoredTarget,
  probe: ProbeResult,
  flagExists: boolean,
): Decision {
  const isDown = !probe.reachable;
  const transition = classifyTransition(flagExists, isDown);

  return {
    key: target.key,
    from: flagExists ? 'down_flagged' : 'up_clean',
    to: isDown ? 'down_flagged' : 'up_clean',
    transition,
    action: ACTION_BY_TRANSITION[transition],
  };
}
