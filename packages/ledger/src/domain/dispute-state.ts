import type { DisputeActionKind } from '@ledgerfold/core';

export const DISPUTE_STATES = ['normal', 'disputed', 'resolved', 'charged_back'] as const;
export type DisputeState = (typeof DISPUTE_STATES)[number];

/**
 * Canonical transition rule for a dispute action.
 */
export interface DisputeTransitionRule {
  /** State the referenced deposit must be in */
  from: DisputeState;
  /** State the deposit moves to when the action applies */
  to: DisputeState;
}

/**
 * Exhaustive dispute lifecycle. Single source of truth for the engine.
 *
 *   normal --dispute--> disputed --resolve----> resolved
 *                                 --chargeback-> charged_back
 */
export const DISPUTE_TRANSITIONS: Readonly<Record<DisputeActionKind, DisputeTransitionRule>> = {
  dispute: { from: 'normal', to: 'disputed' },
  resolve: { from: 'disputed', to: 'resolved' },
  chargeback: { from: 'disputed', to: 'charged_back' },
};

const TERMINAL_STATES: ReadonlySet<DisputeState> = new Set<DisputeState>(['resolved', 'charged_back']);

export function isTerminalDisputeState(state: DisputeState): boolean {
  return TERMINAL_STATES.has(state);
}

/**
 * State reached by applying `action` in `current`, or undefined when the action is not allowed.
 */
export function nextDisputeState(current: DisputeState, action: DisputeActionKind): DisputeState | undefined {
  const rule = DISPUTE_TRANSITIONS[action];
  return rule.from === current ? rule.to : undefined;
}
