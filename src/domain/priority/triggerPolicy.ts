import { effectivePriority, highestEffectivePriority } from './priorityModel';
import { Task, TriggerDecisionKind } from '../../types';

export interface TriggerDecision {
  kind: TriggerDecisionKind;
  incomingHighest: number | null;
  activePriority: number | null;
  activeTaskId: number | null;
}

/**
 * Decide how a geofence trigger relates to the active task.
 *
 * Both the foreground arbiter and the background trigger handler call this
 * with state read from storage, so they reach the same answer. The active
 * task never competes with itself.
 *
 * - `none`: nothing to surface
 * - `announce`: no active task, alert normally
 * - `queue`: the active task wins or ties, defer the incoming ones
 * - `preempt`: an incoming task outranks the active one, ask the user
 */
export function decideTriggerOutcome(incoming: readonly Task[], active: Task | null, now: Date): TriggerDecision {
  const contenders = active ? incoming.filter(task => task.id !== active.id) : incoming;
  const incomingHighest = highestEffectivePriority(contenders, now);
  const activePriority = active ? effectivePriority(active, now) : null;
  const activeTaskId = active ? active.id : null;

  if (incomingHighest === null) {
    return { kind: 'none', incomingHighest, activePriority, activeTaskId };
  }
  if (activePriority === null) {
    return { kind: 'announce', incomingHighest, activePriority, activeTaskId };
  }
  return {
    kind: incomingHighest <= activePriority ? 'queue' : 'preempt',
    incomingHighest,
    activePriority,
    activeTaskId,
  };
}
